import { PageSource } from '../archive/pagedSearch';
import { CatalogResolver } from '../catalog/catalogResolver';
import { OutputFormat, OutputSink, ToolConfig } from '../types';

export interface CommandContext {
  search: PageSource;
  resolver: CatalogResolver;
  config: ToolConfig;
  out: OutputSink;
}

export interface CommandOptions {
  collection: string;
  format: OutputFormat;
  withClio: boolean;
  identifier?: string;
}
