import { OutputSink } from '../types';

export type TsvCell = string | number | null | undefined;

function cleanCell(cell: TsvCell): string {
  if (cell === null || cell === undefined) {
    return '';
  }
  return String(cell).replace(/[\t\r\n]+/g, ' ');
}

export function formatTsvRow(cells: readonly TsvCell[]): string {
  return `${cells.map(cleanCell).join('\t')}\n`;
}

export async function writeTsv(
  header: readonly string[],
  rows: AsyncIterable<readonly TsvCell[]> | Iterable<readonly TsvCell[]>,
  sink: OutputSink
): Promise<number> {
  let count = 0;
  sink.write(formatTsvRow(header));
  for await (const row of rows) {
    sink.write(formatTsvRow(row));
    count++;
  }
  return count;
}
