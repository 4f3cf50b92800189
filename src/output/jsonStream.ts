import { OutputSink } from '../types';

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Writes `items` as a JSON array one element at a time, so the sequence is
 * never held in memory as a whole. An empty sequence prints `[\n]\n`.
 */
export async function writeJsonArray<T>(
  items: AsyncIterable<T> | Iterable<T>,
  sink: OutputSink
): Promise<number> {
  let count = 0;
  sink.write('[\n');
  for await (const item of items) {
    if (count > 0) {
      sink.write(',\n');
    }
    sink.write(`${formatJson(item)}\n`);
    count++;
  }
  sink.write(']\n');
  return count;
}
