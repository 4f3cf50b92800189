import { fetchCollections } from '../archive/pagedSearch';
import { summarizeCollection } from '../output/records';
import { writeJsonArray } from '../output/jsonStream';
import { writeTsv } from '../output/tsv';
import { OutputFormat, SearchResult } from '../types';
import { CommandContext, CommandOptions } from './types';

async function* summaries(docs: AsyncIterable<SearchResult>) {
  for await (const doc of docs) {
    yield summarizeCollection(doc);
  }
}

export async function listCollections(ctx: CommandContext, options: CommandOptions): Promise<number> {
  const docs = fetchCollections(ctx.search, options.collection, ctx.config.collectionPageSize);

  if (options.format === OutputFormat.JSON) {
    return writeJsonArray(summaries(docs), ctx.out);
  }

  async function* rows() {
    for await (const { identifier, description } of summaries(docs)) {
      yield [identifier, description];
    }
  }
  return writeTsv(['identifier', 'description'], rows(), ctx.out);
}
