import type { RequestInit, Response } from 'node-fetch';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export enum MediaType {
  COLLECTION = 'collection',
  TEXTS = 'texts',
}

export enum OutputFormat {
  JSON = 'json',
  TSV = 'tsv',
}

export enum Command {
  LIST_COLLECTIONS = 'list-collections',
  LIST_EBOOKS = 'list-ebooks',
  EBOOK = 'ebook',
  CLIO = 'clio',
}

export type QueryClause = readonly [field: string, value: string];

export interface SearchQuery {
  readonly clauses: readonly QueryClause[];
  readonly pageSize: number;
}

/**
 * A search document as the archive returns it. Only `identifier` is relied
 * upon; every other field is passed through untouched.
 */
export interface SearchResult {
  identifier: string;
  [field: string]: unknown;
}

export interface SearchPage {
  numFound: number;
  docs: SearchResult[];
  /** Docs the server sent that were dropped for lacking an identifier. */
  skipped?: number;
}

export interface DerivedLinks {
  thumbnail: string;
  poster: string;
  pdf: string;
  iframe: string;
}

export type MarcSubfieldDict = Record<string, string>;

export interface MarcDataFieldDict {
  ind1: string;
  ind2: string;
  subfields: MarcSubfieldDict[];
}

export type MarcFieldDict = Record<string, string | MarcDataFieldDict>;

export interface MarcDict {
  leader: string;
  fields: MarcFieldDict[];
}

export interface CollectionSummary {
  identifier: string;
  description: string;
}

export type EbookRecord = SearchResult & {
  links: DerivedLinks;
  clioId?: string | null;
  clio?: MarcDict;
};

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ToolConfig {
  searchUrl: string;
  clioBaseUrl: string;
  defaultCollection: string;
  collectionPageSize: number;
  ebookPageSize: number;
  retryMarginSeconds: number;
  userAgent: string;
  logLevel?: string;
}
