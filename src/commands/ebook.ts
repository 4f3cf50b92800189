import { fetchDocument } from '../archive/pagedSearch';
import { extractCatalogId } from '../catalog/catalogId';
import { augmentEbook } from '../output/records';
import { formatJson } from '../output/jsonStream';
import { writeTsv } from '../output/tsv';
import { OutputFormat } from '../types';
import { CommandContext, CommandOptions } from './types';

export class DocumentNotFoundError extends Error {
  constructor(readonly identifier: string) {
    super(`No archive document with identifier "${identifier}"`);
    this.name = 'DocumentNotFoundError';
  }
}

export async function showEbook(
  ctx: CommandContext,
  options: CommandOptions & { identifier: string }
): Promise<number> {
  const doc = await fetchDocument(ctx.search, options.identifier);
  if (!doc) {
    throw new DocumentNotFoundError(options.identifier);
  }

  if (options.format === OutputFormat.JSON) {
    const record = await augmentEbook(doc, options.withClio ? ctx.resolver : undefined);
    ctx.out.write(`${formatJson(record)}\n`);
    return 1;
  }

  return writeTsv(['identifier', 'clio_id'], [[doc.identifier, extractCatalogId(doc)]], ctx.out);
}
