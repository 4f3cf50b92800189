import fetch from 'node-fetch';
import { logger } from '../utils/logger';
import { FetchFn, SleepFn } from '../types';
import { MarcParseError, MarcRecord, parseMarc } from './marc';

const TOO_MANY_REQUESTS = 429;
const MAX_ATTEMPTS = 2;
export const MIN_RETRY_MARGIN_SECONDS = 1;

export const defaultSleep: SleepFn = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface CatalogResolverOptions {
  baseUrl: string;
  userAgent: string;
  /** Seconds added to the server's Retry-After before retrying; never below 1. */
  retryMarginSeconds?: number;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
}

export interface FetchRecordOptions {
  /** Seconds to wait before the first request. */
  delaySeconds?: number;
}

/**
 * Reads a Retry-After header given in seconds. HTTP-date values and garbage
 * count as zero, so the wait falls back to the safety margin alone.
 */
export function parseRetryAfter(value: string | null): number {
  if (value === null || !/^\s*\d+\s*$/.test(value)) {
    return 0;
  }
  return Number(value.trim());
}

export class CatalogResolver {
  private baseUrl: string;
  private userAgent: string;
  private retryMarginSeconds: number;
  private fetchFn: FetchFn;
  private sleep: SleepFn;

  constructor(options: CatalogResolverOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.userAgent = options.userAgent;
    this.retryMarginSeconds = Math.max(
      MIN_RETRY_MARGIN_SECONDS,
      options.retryMarginSeconds ?? MIN_RETRY_MARGIN_SECONDS
    );
    this.fetchFn = options.fetchFn ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  recordUrl(catalogId: string): string {
    return `${this.baseUrl}/catalog/${encodeURIComponent(catalogId)}.marc`;
  }

  /**
   * Fetches the MARC record for a CLIO bib id. A 429 on the first attempt is
   * retried once after Retry-After plus the margin; any other unparseable
   * response yields {@link MarcRecord.empty}. Transport errors propagate.
   */
  async fetchRecord(catalogId: string, options: FetchRecordOptions = {}): Promise<MarcRecord> {
    const url = this.recordUrl(catalogId);
    let delaySeconds = options.delaySeconds;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      if (delaySeconds !== undefined && delaySeconds > 0) {
        await this.sleep(delaySeconds * 1000);
      }

      logger.debug(`Fetching catalog record: ${url}`);
      const response = await this.fetchFn(url, {
        headers: { 'User-Agent': this.userAgent },
      });
      const body = Buffer.from(await response.arrayBuffer());

      try {
        return parseMarc(body);
      } catch (error) {
        if (!(error instanceof MarcParseError)) {
          throw error;
        }

        if (attempt < MAX_ATTEMPTS && response.status === TOO_MANY_REQUESTS) {
          delaySeconds = parseRetryAfter(response.headers.get('retry-after')) + this.retryMarginSeconds;
          logger.warn(`CLIO rate limiting, waiting ${delaySeconds}s: ${url}`);
          logger.warn(JSON.stringify(response.headers.raw()));
          continue;
        }

        const reason = attempt > 1 ? 'still unavailable after one retry' : error.message;
        logger.warn(`No catalog record (${reason}): ${url}`);
        return MarcRecord.empty();
      }
    }

    return MarcRecord.empty();
  }
}
