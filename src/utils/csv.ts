/**
 * Minimal CSV writing: comma separated, LF line endings, RFC 4180 quoting.
 */

export type CsvCell = string | number | boolean | null | undefined;

export function escapeCsvCell(cell: CsvCell): string {
  if (cell === null || cell === undefined) {
    return '';
  }
  const text = String(cell);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsv(header: readonly string[], rows: readonly (readonly CsvCell[])[]): string {
  const lines: (readonly CsvCell[])[] = [header, ...rows];
  return lines.map((row) => row.map(escapeCsvCell).join(',')).join('\n');
}
