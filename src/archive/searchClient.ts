import fetch from 'node-fetch';
import { logger } from '../utils/logger';
import { FetchFn, QueryClause, SearchPage, SearchQuery, SearchResult } from '../types';

export const SEARCH_SORT = '__sort desc';

export class ArchiveSearchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ArchiveSearchError';
  }
}

export interface ArchiveSearchClientOptions {
  searchUrl: string;
  userAgent: string;
  fetchFn?: FetchFn;
}

export function buildQuery(clauses: readonly QueryClause[]): string {
  return clauses.map(([field, value]) => `${field}:(${value})`).join(' AND ');
}

function isSearchResult(value: unknown): value is SearchResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'identifier' in value &&
    typeof value.identifier === 'string'
  );
}

function toCount(value: unknown): number | undefined {
  const count = typeof value === 'string' ? Number(value) : value;
  return typeof count === 'number' && Number.isInteger(count) && count >= 0 ? count : undefined;
}

/**
 * Thin wrapper over the advancedsearch.php endpoint. One call, one page; paging
 * is left to {@link PagedSearch}.
 */
export class ArchiveSearchClient {
  private searchUrl: string;
  private userAgent: string;
  private fetchFn: FetchFn;

  constructor(options: ArchiveSearchClientOptions) {
    this.searchUrl = options.searchUrl;
    this.userAgent = options.userAgent;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  buildUrl(query: SearchQuery, page: number): string {
    const params = new URLSearchParams({
      q: buildQuery(query.clauses),
      rows: query.pageSize.toString(),
      page: page.toString(),
      output: 'json',
      'sort[]': SEARCH_SORT,
    });
    return `${this.searchUrl}?${params}`;
  }

  async fetchPage(query: SearchQuery, page: number): Promise<SearchPage> {
    const url = this.buildUrl(query, page);
    logger.debug(`Fetching search page ${page}: ${url}`);

    let body: string;
    let status: number;
    try {
      const response = await this.fetchFn(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json',
        },
      });
      status = response.status;
      if (!response.ok) {
        throw new ArchiveSearchError(
          `HTTP ${response.status}: ${response.statusText}`,
          url,
          response.status
        );
      }
      body = await response.text();
    } catch (error) {
      if (error instanceof ArchiveSearchError) {
        throw error;
      }
      throw new ArchiveSearchError(`Search request failed: ${String(error)}`, url);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new ArchiveSearchError('Search response is not valid JSON', url, status);
    }

    return this.readPage(parsed, url, status);
  }

  private readPage(parsed: unknown, url: string, status: number): SearchPage {
    const response =
      typeof parsed === 'object' && parsed !== null && 'response' in parsed
        ? parsed.response
        : undefined;
    if (typeof response !== 'object' || response === null) {
      throw new ArchiveSearchError('Search response has no "response" object', url, status);
    }

    const count = 'numFound' in response ? toCount(response.numFound) : undefined;
    const docs = 'docs' in response ? response.docs : undefined;
    if (count === undefined || !Array.isArray(docs)) {
      throw new ArchiveSearchError('Search response is missing numFound or docs', url, status);
    }

    const results = docs.filter(isSearchResult);
    if (results.length < docs.length) {
      logger.warn(`Skipped ${docs.length - results.length} search docs without an identifier`);
    }

    return { numFound: count, docs: results, skipped: docs.length - results.length };
  }
}
