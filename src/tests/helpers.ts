import { Response } from 'node-fetch';
import { OutputSink } from '../types';

export type MarcFieldSpec =
  | { tag: string; value: string }
  | { tag: string; ind1: string; ind2: string; subfields: Array<[string, string]> };

/**
 * Encodes fields as one ISO 2709 record. `characterCoding` is leader/09:
 * 'a' for UTF-8, ' ' for MARC-8 (read back as Latin-1).
 */
export function buildMarc(fields: MarcFieldSpec[], characterCoding: 'a' | ' ' = 'a'): Buffer {
  const encoding: BufferEncoding = characterCoding === 'a' ? 'utf8' : 'latin1';
  const chunks: Buffer[] = [];
  let directory = '';
  let offset = 0;

  for (const field of fields) {
    const text =
      'value' in field
        ? `${field.value}\x1e`
        : `${field.ind1}${field.ind2}${field.subfields.map(([code, value]) => `\x1f${code}${value}`).join('')}\x1e`;
    const data = Buffer.from(text, encoding);
    directory += `${field.tag}${String(data.length).padStart(4, '0')}${String(offset).padStart(5, '0')}`;
    chunks.push(data);
    offset += data.length;
  }
  directory += '\x1e';

  const baseAddress = 24 + directory.length;
  const recordLength = baseAddress + offset + 1;
  const leader = `${String(recordLength).padStart(5, '0')}nam ${characterCoding}22${String(baseAddress).padStart(5, '0')}   4500`;

  return Buffer.concat([
    Buffer.from(leader + directory, 'latin1'),
    ...chunks,
    Buffer.from('\x1d', 'latin1'),
  ]);
}

export const SAMPLE_FIELDS: MarcFieldSpec[] = [
  { tag: '001', value: '111' },
  {
    tag: '245',
    ind1: '1',
    ind2: '0',
    subfields: [
      ['a', 'A history of things /'],
      ['c', 'by Someone.'],
    ],
  },
];

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function searchBody(numFound: number | string, docs: unknown[]): unknown {
  return { responseHeader: { status: 0 }, response: { numFound, start: 0, docs } };
}

export function marcResponse(bytes: Buffer): Response {
  return new Response(bytes, { status: 200, headers: { 'Content-Type': 'application/marc' } });
}

export function rateLimitedResponse(retryAfter?: string): Response {
  const headers: Record<string, string> = { 'Content-Type': 'text/html' };
  if (retryAfter !== undefined) {
    headers['Retry-After'] = retryAfter;
  }
  return new Response('<html><body>Too Many Requests</body></html>', { status: 429, headers });
}

export class MemorySink implements OutputSink {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}
