import { Command, OutputFormat } from './types';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  command?: Command;
  identifier?: string;
  collection?: string;
  format: OutputFormat;
  withClio: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `usage: ia-ebooks [command] [identifier] [-C collection] [-F json|tsv] [--clio] [-v]

commands:
  list-collections   list collection identifiers and descriptions; identifiers can be used with -C
                     (an identifier after the command is ignored)
  list-ebooks        list all ebooks in a collection
  ebook <id>         get one ebook by archive identifier
  clio <id>          get one CLIO catalog record by bib id

options:
  -C, --collection   collection to query (default: ColumbiaUniversityLibraries)
  -F, --format       json (default) or tsv (of identifiers)
      --clio         add CLIO catalog data to ebooks
  -v, --verbose      log requests to stderr
  -h, --help         show this message
`;

const COMMANDS: readonly string[] = Object.values(Command);
const FORMATS: readonly string[] = Object.values(OutputFormat);

function isCommand(value: string): value is Command {
  return COMMANDS.includes(value);
}

function isFormat(value: string): value is OutputFormat {
  return FORMATS.includes(value);
}

/**
 * Parses argv (without the node and script entries). Flags accept both
 * `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { format: OutputFormat.JSON, withClio: false, verbose: false, help: false };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const takeValue = (): string => {
      if (eq !== -1) {
        return arg.slice(eq + 1);
      }
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new UsageError(`${flag} expects a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '-C':
      case '--collection':
        args.collection = takeValue();
        break;
      case '-F':
      case '--format': {
        const format = takeValue();
        if (!isFormat(format)) {
          throw new UsageError(`unknown format "${format}", expected one of: ${FORMATS.join(', ')}`);
        }
        args.format = format;
        break;
      }
      case '--clio':
        args.withClio = true;
        break;
      case '-v':
      case '--verbose':
        args.verbose = true;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      default:
        throw new UsageError(`unknown option ${flag}`);
    }
  }

  if (positionals.length > 2) {
    throw new UsageError(`unexpected argument "${positionals[2]}"`);
  }

  const [command, identifier] = positionals;
  if (command === undefined || command === 'help') {
    return { ...args, help: true };
  }
  if (!isCommand(command)) {
    throw new UsageError(`unknown command "${command}"`);
  }

  args.command = command;
  args.identifier = identifier;

  if (command === Command.LIST_EBOOKS && identifier !== undefined) {
    throw new UsageError('use the collection flag "-C" to scope the ebook list to a collection');
  }
  if ((command === Command.EBOOK || command === Command.CLIO) && identifier === undefined) {
    throw new UsageError('an identifier is required to fetch a single document');
  }

  return args;
}
