export function toNumeric(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

// Sums of price × quantity drift under binary floating point; reports carry cents.
export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}
