import { formatJson } from '../output/jsonStream';
import { writeTsv } from '../output/tsv';
import { OutputFormat } from '../types';
import { CommandContext, CommandOptions } from './types';

export async function showClioRecord(
  ctx: CommandContext,
  options: CommandOptions & { identifier: string }
): Promise<number> {
  const record = await ctx.resolver.fetchRecord(options.identifier);

  if (options.format === OutputFormat.JSON) {
    ctx.out.write(`${formatJson(record.toDict())}\n`);
    return 1;
  }

  return writeTsv(['clio_id', 'title'], [[options.identifier, record.title()]], ctx.out);
}
