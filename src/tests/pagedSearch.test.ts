import {
  PageSource,
  PagedSearch,
  PagedSearchIterator,
  createQuery,
  fetchAll,
  fetchCollections,
  fetchDocument,
  fetchEbooks,
  scopedQuery,
} from '../archive/pagedSearch';
import { MediaType, SearchPage, SearchQuery, SearchResult } from '../types';

class FakePageSource implements PageSource {
  readonly requests: Array<{ query: SearchQuery; page: number }> = [];

  constructor(
    private numFound: number,
    private failOnPage?: number
  ) {}

  async fetchPage(query: SearchQuery, page: number): Promise<SearchPage> {
    this.requests.push({ query, page });
    if (page === this.failOnPage) {
      throw new Error(`page ${page} unavailable`);
    }
    const start = (page - 1) * query.pageSize;
    const end = Math.min(start + query.pageSize, this.numFound);
    const docs: SearchResult[] = [];
    for (let i = start; i < end; i++) {
      docs.push({ identifier: `item-${i}` });
    }
    return { numFound: this.numFound, docs };
  }

  get pages(): number[] {
    return this.requests.map(r => r.page);
  }
}

async function collect(iterable: AsyncIterable<SearchResult>): Promise<string[]> {
  const ids: string[] = [];
  for await (const doc of iterable) {
    ids.push(doc.identifier);
  }
  return ids;
}

describe('PagedSearch', () => {
  const query = scopedQuery('test-collection', MediaType.TEXTS, 50);

  it('should yield every result across pages in server order', async () => {
    const source = new FakePageSource(120);

    const ids = await collect(new PagedSearch(source, query));

    expect(ids).toHaveLength(120);
    expect(ids[0]).toBe('item-0');
    expect(ids[49]).toBe('item-49');
    expect(ids[50]).toBe('item-50');
    expect(ids[119]).toBe('item-119');
    expect(ids).toEqual(Array.from({ length: 120 }, (_, i) => `item-${i}`));
    expect(source.pages).toEqual([1, 2, 3]);
  });

  it('should stop fetching when page * pageSize reaches numFound exactly', async () => {
    const source = new FakePageSource(100);

    const ids = await collect(new PagedSearch(source, query));

    expect(ids).toHaveLength(100);
    expect(source.pages).toEqual([1, 2]);
  });

  it('should finish after one request when nothing matches', async () => {
    const source = new FakePageSource(0);

    expect(await collect(new PagedSearch(source, query))).toEqual([]);
    expect(source.pages).toEqual([1]);
  });

  it('should not request anything for a page size of zero', async () => {
    const source = new FakePageSource(10);

    const ids = await collect(new PagedSearch(source, createQuery([['collection', 'x']], 0)));

    expect(ids).toEqual([]);
    expect(source.requests).toHaveLength(0);
  });

  it('should restart from page 1 on each traversal', async () => {
    const source = new FakePageSource(70);
    const search = new PagedSearch(source, query);

    const first = await collect(search);
    const second = await collect(search);

    expect(second).toEqual(first);
    expect(source.pages).toEqual([1, 2, 1, 2]);
  });

  it('should end early when the server returns an empty page', async () => {
    const source = new FakePageSource(120);
    source.fetchPage = async (q, page) => {
      source.requests.push({ query: q, page });
      return page === 1
        ? { numFound: 120, docs: [{ identifier: 'only' }] }
        : { numFound: 120, docs: [] };
    };

    expect(await collect(new PagedSearch(source, query))).toEqual(['only']);
    expect(source.pages).toEqual([1, 2]);
  });

  it('should keep paging past a page whose docs were all dropped', async () => {
    const pages: Record<number, SearchPage> = {
      1: { numFound: 6, docs: [{ identifier: 'p1a' }, { identifier: 'p1b' }], skipped: 0 },
      2: { numFound: 6, docs: [], skipped: 2 },
      3: { numFound: 6, docs: [{ identifier: 'p3a' }, { identifier: 'p3b' }], skipped: 0 },
    };
    const source = new FakePageSource(6);
    source.fetchPage = async (q, page) => {
      source.requests.push({ query: q, page });
      return pages[page];
    };

    const ids = await collect(new PagedSearch(source, createQuery([['collection', 'x']], 2)));

    expect(ids).toEqual(['p1a', 'p1b', 'p3a', 'p3b']);
    expect(source.pages).toEqual([1, 2, 3]);
  });

  it('should stop on a dropped last page', async () => {
    const source = new FakePageSource(4);
    source.fetchPage = async (q, page) => {
      source.requests.push({ query: q, page });
      return page === 1
        ? { numFound: 4, docs: [{ identifier: 'a' }, { identifier: 'b' }] }
        : { numFound: 4, docs: [], skipped: 2 };
    };

    const ids = await collect(new PagedSearch(source, createQuery([['collection', 'x']], 2)));

    expect(ids).toEqual(['a', 'b']);
    expect(source.pages).toEqual([1, 2]);
  });

  it('should propagate fetch errors without retrying', async () => {
    const source = new FakePageSource(120, 2);
    const seen: string[] = [];

    await expect(
      (async () => {
        for await (const doc of new PagedSearch(source, query)) {
          seen.push(doc.identifier);
        }
      })()
    ).rejects.toThrow('page 2 unavailable');

    expect(seen).toHaveLength(50);
    expect(source.pages).toEqual([1, 2]);
  });
});

describe('PagedSearchIterator', () => {
  it('should keep reporting done after exhaustion without new requests', async () => {
    const source = new FakePageSource(2);
    const iterator = new PagedSearchIterator(source, createQuery([['collection', 'x']], 5));

    expect(await iterator.next()).toEqual({ done: false, value: { identifier: 'item-0' } });
    expect(await iterator.next()).toEqual({ done: false, value: { identifier: 'item-1' } });
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
    expect(iterator.fetchCount).toBe(1);
    expect(source.pages).toEqual([1]);
  });

  it('should fetch lazily, one page at a time', async () => {
    const source = new FakePageSource(4);
    const iterator = new PagedSearchIterator(source, createQuery([['collection', 'x']], 2));

    expect(source.requests).toHaveLength(0);
    await iterator.next();
    expect(source.pages).toEqual([1]);
    await iterator.next();
    expect(source.pages).toEqual([1]);
    await iterator.next();
    expect(source.pages).toEqual([1, 2]);
  });
});

describe('query helpers', () => {
  it('should freeze queries', () => {
    const query = createQuery([['identifier', 'abc']], 1);

    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.clauses)).toBe(true);
    expect(Object.isFrozen(query.clauses[0])).toBe(true);
  });

  it('should scope collections and ebooks by media type', () => {
    const source = new FakePageSource(0);

    expect(fetchCollections(source, 'parent', 50).query).toEqual({
      clauses: [
        ['collection', 'parent'],
        ['mediatype', 'collection'],
      ],
      pageSize: 50,
    });
    expect(fetchEbooks(source, 'parent', 100).query).toEqual({
      clauses: [
        ['collection', 'parent'],
        ['mediatype', 'texts'],
      ],
      pageSize: 100,
    });
  });

  it('should collect all results eagerly', async () => {
    const source = new FakePageSource(7);

    const docs = await fetchAll(source, createQuery([['collection', 'x']], 3));

    expect(docs.map(d => d.identifier)).toEqual([
      'item-0',
      'item-1',
      'item-2',
      'item-3',
      'item-4',
      'item-5',
      'item-6',
    ]);
    expect(source.pages).toEqual([1, 2, 3]);
  });

  it('should look up a single document by identifier', async () => {
    const source = new FakePageSource(3);

    const doc = await fetchDocument(source, 'item-0');

    expect(doc).toEqual({ identifier: 'item-0' });
    expect(source.requests[0].query).toEqual({ clauses: [['identifier', 'item-0']], pageSize: 1 });
    expect(source.requests[0].page).toBe(1);
  });

  it('should return null for an unknown document', async () => {
    expect(await fetchDocument(new FakePageSource(0), 'missing')).toBeNull();
  });
});
