import { ToolConfig } from '../types';

export const defaultConfig: ToolConfig = {
  searchUrl: 'https://archive.org/advancedsearch.php',
  clioBaseUrl: 'https://clio.columbia.edu',
  defaultCollection: 'ColumbiaUniversityLibraries',
  collectionPageSize: 50,
  ebookPageSize: 100,
  retryMarginSeconds: 1,
  userAgent: 'ia-ebooks/1.0',
};

export const CONFIG_FILENAME = 'ia-ebooks.config.json';

export const ENV_KEYS = {
  SEARCH_URL: 'IA_SEARCH_URL',
  CLIO_BASE_URL: 'CLIO_BASE_URL',
  COLLECTION: 'IA_COLLECTION',
  RETRY_MARGIN: 'CLIO_RETRY_MARGIN_SECONDS',
  LOG_LEVEL: 'LOG_LEVEL',
};
