import { SearchResult } from '../types';

// ldpd_<bib id>_<sequence>, as assigned to CLIO-derived scans
const CLIO_DERIVED_ID = /^ldpd_+([0-9A-Za-z]+)_+\d+$/;
const CLIO_LINK = /https?:\/\/clio\.columbia\.edu\/catalog\/([0-9A-Za-z]+)/;

function freeText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.filter((part): part is string => typeof part === 'string').join('\n');
  }
  return '';
}

/**
 * Finds the CLIO bib id an archive document refers to, either encoded in its
 * identifier or linked from its description markup.
 */
export function extractCatalogId(doc: SearchResult): string | undefined {
  const idMatch = CLIO_DERIVED_ID.exec(doc.identifier);
  if (idMatch) {
    return idMatch[1];
  }

  const linkMatch = CLIO_LINK.exec(freeText(doc.stripped_tags));
  return linkMatch ? linkMatch[1] : undefined;
}
