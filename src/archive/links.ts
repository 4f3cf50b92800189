import { DerivedLinks } from '../types';

const ARCHIVE_BASE = 'https://archive.org';

export function deriveLinks(identifier: string): DerivedLinks {
  return {
    thumbnail: `${ARCHIVE_BASE}/services/img/${identifier}`,
    poster: `${ARCHIVE_BASE}/download/${identifier}/page/cover_medium.jpg`,
    pdf: `${ARCHIVE_BASE}/download/${identifier}/${identifier}.pdf`,
    iframe: `${ARCHIVE_BASE}/stream/${identifier}?ui=full&showNavbar=false`,
  };
}
