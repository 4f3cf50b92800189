import { fetchEbooks } from '../archive/pagedSearch';
import { extractCatalogId } from '../catalog/catalogId';
import { augmentEbooks } from '../output/records';
import { writeJsonArray } from '../output/jsonStream';
import { writeTsv } from '../output/tsv';
import { OutputFormat } from '../types';
import { CommandContext, CommandOptions } from './types';

export async function listEbooks(ctx: CommandContext, options: CommandOptions): Promise<number> {
  const docs = fetchEbooks(ctx.search, options.collection, ctx.config.ebookPageSize);

  if (options.format === OutputFormat.JSON) {
    return writeJsonArray(augmentEbooks(docs, options.withClio ? ctx.resolver : undefined), ctx.out);
  }

  async function* rows() {
    for await (const doc of docs) {
      yield [doc.identifier, extractCatalogId(doc)];
    }
  }
  return writeTsv(['identifier', 'clio_id'], rows(), ctx.out);
}
