import { deriveLinks } from '../archive/links';
import { CatalogResolver } from '../catalog/catalogResolver';
import { extractCatalogId } from '../catalog/catalogId';
import { MarcRecord } from '../catalog/marc';
import { CollectionSummary, EbookRecord, SearchResult } from '../types';

function descriptionText(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return Array.isArray(value) ? value.map(String).join('\n') : String(value);
}

export function summarizeCollection(doc: SearchResult): CollectionSummary {
  return {
    identifier: doc.identifier,
    description: descriptionText(doc.description),
  };
}

/**
 * Adds derived links and, when a resolver is given, the CLIO record. Documents
 * without a CLIO id get `clioId: null` and a blank record without a request.
 */
export async function augmentEbook(
  doc: SearchResult,
  resolver?: CatalogResolver
): Promise<EbookRecord> {
  const record: EbookRecord = { ...doc, links: deriveLinks(doc.identifier) };
  if (!resolver) {
    return record;
  }

  const clioId = extractCatalogId(doc) ?? null;
  const marc = clioId === null ? MarcRecord.empty() : await resolver.fetchRecord(clioId);
  return { ...record, clioId, clio: marc.toDict() };
}

export async function* augmentEbooks(
  docs: AsyncIterable<SearchResult>,
  resolver?: CatalogResolver
): AsyncGenerator<EbookRecord, void, undefined> {
  for await (const doc of docs) {
    yield await augmentEbook(doc, resolver);
  }
}
