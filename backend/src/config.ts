import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().min(1).default('retail'),
  POSTGRES_PASSWORD: z.string().default('retailpass'),
  POSTGRES_DB: z.string().min(1).default('retaildb'),
  POSTGRES_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  API_PORT: z.coerce.number().int().positive().default(8080),
  REPORT_SEGMENT_TOP_N: z.coerce.number().int().min(1).default(3),
});

export type AppConfig = {
  postgres: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    statementTimeoutMs: number;
  };
  apiPort: number;
  segmentTopN: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    postgres: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
      statementTimeoutMs: parsed.POSTGRES_STATEMENT_TIMEOUT_MS,
    },
    apiPort: parsed.API_PORT,
    segmentTopN: parsed.REPORT_SEGMENT_TOP_N,
  };
}
