import { ArchiveSearchClient, ArchiveSearchError, buildQuery } from './archive/searchClient';
import {
  PagedSearch,
  PagedSearchIterator,
  createQuery,
  fetchAll,
  fetchCollections,
  fetchDocument,
  fetchEbooks,
} from './archive/pagedSearch';
import { deriveLinks } from './archive/links';
import { extractCatalogId } from './catalog/catalogId';
import { CatalogResolver } from './catalog/catalogResolver';
import { MarcParseError, MarcRecord, parseMarc } from './catalog/marc';
import { augmentEbook, augmentEbooks, summarizeCollection } from './output/records';
import { writeJsonArray } from './output/jsonStream';
import { writeTsv } from './output/tsv';
import { ConfigManager } from './config/configManager';
import { runCommand, DocumentNotFoundError } from './commands';
import { logger } from './utils/logger';

// Export the building blocks for programmatic usage
export {
  ArchiveSearchClient,
  ArchiveSearchError,
  buildQuery,
  PagedSearch,
  PagedSearchIterator,
  createQuery,
  fetchAll,
  fetchCollections,
  fetchDocument,
  fetchEbooks,
  deriveLinks,
  extractCatalogId,
  CatalogResolver,
  MarcParseError,
  MarcRecord,
  parseMarc,
  augmentEbook,
  augmentEbooks,
  summarizeCollection,
  writeJsonArray,
  writeTsv,
  ConfigManager,
  runCommand,
  DocumentNotFoundError,
  logger,
};

export type { PageSource } from './archive/pagedSearch';
export * from './types';
