#!/usr/bin/env node
import dotenv from 'dotenv';
import { ArchiveSearchClient, ArchiveSearchError } from './archive/searchClient';
import { CatalogResolver } from './catalog/catalogResolver';
import { ConfigManager } from './config/configManager';
import { DocumentNotFoundError, runCommand } from './commands';
import { CliArgs, USAGE, UsageError, parseCliArgs } from './args';
import { FetchFn, OutputSink, SleepFn } from './types';
import { LogLevel, logger, parseLogLevel } from './utils/logger';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface RunOptions {
  out?: OutputSink;
  err?: OutputSink;
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
}

export async function run(argv: readonly string[], options: RunOptions = {}): Promise<number> {
  const out = options.out ?? process.stdout;
  const err = options.err ?? process.stderr;

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      err.write(`${USAGE}\nerror: ${error.message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help || args.command === undefined) {
    out.write(USAGE);
    return EXIT_OK;
  }

  const configManager = new ConfigManager(options.configPath, options.env ?? process.env);
  const config = await configManager.loadConfig();
  const validation = configManager.validateConfig();
  if (!validation.valid) {
    validation.errors.forEach(message => logger.error(message));
    return EXIT_FAILURE;
  }

  const level = args.verbose ? LogLevel.DEBUG : parseLogLevel(config.logLevel);
  if (level !== undefined) {
    logger.setLogLevel(level);
  }

  const search = new ArchiveSearchClient({
    searchUrl: config.searchUrl,
    userAgent: config.userAgent,
    fetchFn: options.fetchFn,
  });
  const resolver = new CatalogResolver({
    baseUrl: config.clioBaseUrl,
    userAgent: config.userAgent,
    retryMarginSeconds: config.retryMarginSeconds,
    fetchFn: options.fetchFn,
    sleep: options.sleep,
  });

  try {
    const count = await runCommand(
      args.command,
      { search, resolver, config, out },
      {
        collection: args.collection ?? config.defaultCollection,
        format: args.format,
        withClio: args.withClio,
        identifier: args.identifier,
      }
    );
    logger.debug(`${args.command}: wrote ${count} record(s)`);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ArchiveSearchError) {
      logger.error(`Archive search failed (${error.url}): ${error.message}`);
    } else if (error instanceof DocumentNotFoundError) {
      logger.error(error.message);
    } else {
      logger.error(`${args.command} failed:`, error);
    }
    return EXIT_FAILURE;
  }
}

/**
 * A closed stdout (`ia-ebooks list-ebooks | head`) ends the run quietly.
 */
export function exitQuietlyOnBrokenPipe(
  stream: NodeJS.WritableStream,
  exit: (code: number) => void = code => process.exit(code)
): void {
  stream.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EPIPE') {
      exit(EXIT_OK);
      return;
    }
    logger.error('Output failed:', error);
    exit(EXIT_FAILURE);
  });
}

if (require.main === module) {
  dotenv.config();
  exitQuietlyOnBrokenPipe(process.stdout);

  process.on('unhandledRejection', error => {
    logger.error('Unhandled rejection:', error);
    process.exit(EXIT_FAILURE);
  });

  run(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    error => {
      logger.error('ia-ebooks failed:', error);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
