import { writeFile } from 'node:fs/promises';

type Cell = string | number;

function formatCell(value: Cell): string {
  const text = typeof value === 'number'
    ? (Number.isInteger(value) ? String(value) : String(Number(value.toFixed(3))))
    : value;
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv<T extends object>(rows: readonly T[], columns: ReadonlyArray<keyof T & string>): string {
  const lines = [columns.join(',')];
  for (const row of rows) {
    lines.push(columns.map(column => {
      const value: unknown = row[column];
      return formatCell(typeof value === 'number' ? value : String(value ?? ''));
    }).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export async function writeCsv<T extends object>(
  path: string,
  rows: readonly T[],
  columns: ReadonlyArray<keyof T & string>
): Promise<void> {
  await writeFile(path, toCsv(rows, columns), 'utf8');
}
