import { Command } from '../types';
import { showClioRecord } from './clio';
import { showEbook } from './ebook';
import { listCollections } from './listCollections';
import { listEbooks } from './listEbooks';
import { CommandContext, CommandOptions } from './types';

export { DocumentNotFoundError } from './ebook';
export type { CommandContext, CommandOptions } from './types';

function requireIdentifier(command: Command, options: CommandOptions): CommandOptions & { identifier: string } {
  const { identifier } = options;
  if (identifier === undefined) {
    throw new Error(`The ${command} command needs an identifier`);
  }
  return { ...options, identifier };
}

/** Runs one command and resolves to the number of records written. */
export async function runCommand(
  command: Command,
  ctx: CommandContext,
  options: CommandOptions
): Promise<number> {
  switch (command) {
    case Command.LIST_COLLECTIONS:
      return listCollections(ctx, options);
    case Command.LIST_EBOOKS:
      return listEbooks(ctx, options);
    case Command.EBOOK:
      return showEbook(ctx, requireIdentifier(command, options));
    case Command.CLIO:
      return showClioRecord(ctx, requireIdentifier(command, options));
  }
}
