function escapeCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const s = value instanceof Date ? value.toISOString() : String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** RFC 4180 style: header row, CRLF-free (\n) line endings, quotes doubled. */
export function toCsv<T extends object, K extends keyof T & string>(
  rows: readonly T[],
  columns: readonly K[],
): string {
  const lines = [columns.join(',')];
  for (const row of rows) lines.push(columns.map((c) => escapeCell(row[c])).join(','));
  return lines.join('\n');
}
