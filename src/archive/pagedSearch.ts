import { logger } from '../utils/logger';
import { MediaType, SearchPage, SearchQuery, SearchResult } from '../types';

export interface PageSource {
  fetchPage(query: SearchQuery, page: number): Promise<SearchPage>;
}

type IteratorState =
  | { kind: 'needFetch'; lastPage: number }
  | { kind: 'hasBuffered'; lastPage: number; buffer: SearchResult[]; morePages: boolean }
  | { kind: 'exhausted' };

export function createQuery(
  clauses: ReadonlyArray<readonly [string, string]>,
  pageSize: number
): SearchQuery {
  return Object.freeze({
    clauses: Object.freeze(clauses.map(([field, value]) => Object.freeze([field, value] as const))),
    pageSize,
  });
}

export function scopedQuery(collection: string, mediatype: MediaType, pageSize: number): SearchQuery {
  return createQuery(
    [
      ['collection', collection],
      ['mediatype', mediatype],
    ],
    pageSize
  );
}

/**
 * Single pass over every result of a query, fetching one page at a time and
 * holding at most one page in memory.
 */
export class PagedSearchIterator implements AsyncIterator<SearchResult> {
  private state: IteratorState;
  private pagesFetched = 0;

  constructor(
    private source: PageSource,
    private query: SearchQuery
  ) {
    this.state = query.pageSize > 0 ? { kind: 'needFetch', lastPage: 0 } : { kind: 'exhausted' };
  }

  get fetchCount(): number {
    return this.pagesFetched;
  }

  async next(): Promise<IteratorResult<SearchResult, undefined>> {
    while (this.state.kind === 'needFetch') {
      const page = this.state.lastPage + 1;
      const { numFound, docs, skipped = 0 } = await this.source.fetchPage(this.query, page);
      this.pagesFetched++;
      const morePages = page * this.query.pageSize < numFound;
      logger.debug(`Page ${page}: ${docs.length} docs of ${numFound}, more pages: ${morePages}`);
      // only a page the server sent empty ends the traversal
      this.state =
        docs.length === 0 && skipped > 0 && morePages
          ? { kind: 'needFetch', lastPage: page }
          : { kind: 'hasBuffered', lastPage: page, buffer: [...docs], morePages };
    }

    if (this.state.kind === 'exhausted' || this.state.buffer.length === 0) {
      this.state = { kind: 'exhausted' };
      return { done: true, value: undefined };
    }

    const { buffer, lastPage, morePages } = this.state;
    const value = buffer.shift();
    if (buffer.length === 0) {
      this.state = morePages ? { kind: 'needFetch', lastPage } : { kind: 'exhausted' };
    }
    if (value === undefined) {
      return { done: true, value: undefined };
    }
    return { done: false, value };
  }
}

/**
 * Re-iterable view of a query. Every `for await` starts over at page 1.
 */
export class PagedSearch implements AsyncIterable<SearchResult> {
  constructor(
    private source: PageSource,
    readonly query: SearchQuery
  ) {}

  [Symbol.asyncIterator](): PagedSearchIterator {
    return new PagedSearchIterator(this.source, this.query);
  }
}

export async function fetchAll(source: PageSource, query: SearchQuery): Promise<SearchResult[]> {
  const docs: SearchResult[] = [];
  for await (const doc of new PagedSearch(source, query)) {
    docs.push(doc);
  }
  return docs;
}

export function fetchCollections(
  source: PageSource,
  collection: string,
  pageSize: number
): PagedSearch {
  return new PagedSearch(source, scopedQuery(collection, MediaType.COLLECTION, pageSize));
}

export function fetchEbooks(source: PageSource, collection: string, pageSize: number): PagedSearch {
  return new PagedSearch(source, scopedQuery(collection, MediaType.TEXTS, pageSize));
}

export async function fetchDocument(
  source: PageSource,
  identifier: string
): Promise<SearchResult | null> {
  const { numFound, docs } = await source.fetchPage(createQuery([['identifier', identifier]], 1), 1);
  return numFound > 0 && docs.length > 0 ? docs[0] : null;
}
