function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/** Header comes from the first row's keys; later rows are read by those keys. */
export function toCsv(rows: readonly Record<string, unknown>[]): string {
  if (rows.length === 0) return '';
  const columns = Object.keys(rows[0]);
  const lines: string[] = [];
  lines.push(columns.map(formatCell).join(','));
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
