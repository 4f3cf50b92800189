import fs from 'fs-extra';
import path from 'path';
import { ToolConfig } from '../types';
import { CONFIG_FILENAME, ENV_KEYS, defaultConfig } from './default';
import { logger } from '../utils/logger';
import { MIN_RETRY_MARGIN_SECONDS } from '../catalog/catalogResolver';

const STRING_KEYS = ['searchUrl', 'clioBaseUrl', 'defaultCollection', 'userAgent', 'logLevel'] as const;
const NUMBER_KEYS = ['collectionPageSize', 'ebookPageSize', 'retryMarginSeconds'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: ToolConfig;
  private configPath: string;
  private env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.config = { ...defaultConfig };
    this.configPath = configPath || path.join(process.cwd(), CONFIG_FILENAME);
    this.env = env;
  }

  async loadConfig(): Promise<ToolConfig> {
    let fileConfig: Partial<ToolConfig> = {};

    if (await fs.pathExists(this.configPath)) {
      const raw: unknown = await fs.readJson(this.configPath);
      if (!isRecord(raw)) {
        throw new Error(`Configuration file must contain a JSON object: ${this.configPath}`);
      }
      fileConfig = this.pickKnownKeys(raw);
      logger.info(`Loaded configuration from ${this.configPath}`);
    }

    this.config = { ...defaultConfig, ...fileConfig, ...this.readEnv() };
    return this.config;
  }

  validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const key of ['searchUrl', 'clioBaseUrl'] as const) {
      try {
        new URL(this.config[key]);
      } catch {
        errors.push(`${key} must be an absolute URL, got "${this.config[key]}"`);
      }
    }

    if (!this.config.defaultCollection || this.config.defaultCollection.trim() === '') {
      errors.push('defaultCollection is required');
    }

    for (const key of ['collectionPageSize', 'ebookPageSize'] as const) {
      if (!Number.isInteger(this.config[key]) || this.config[key] < 1) {
        errors.push(`${key} must be a positive integer`);
      }
    }

    if (
      !Number.isFinite(this.config.retryMarginSeconds) ||
      this.config.retryMarginSeconds < MIN_RETRY_MARGIN_SECONDS
    ) {
      errors.push(`retryMarginSeconds must be at least ${MIN_RETRY_MARGIN_SECONDS}`);
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  private pickKnownKeys(raw: Record<string, unknown>): Partial<ToolConfig> {
    const picked: Partial<ToolConfig> = {};

    for (const key of STRING_KEYS) {
      const value = raw[key];
      if (typeof value === 'string') {
        picked[key] = value;
      } else if (value !== undefined) {
        logger.warn(`Ignoring config key "${key}": expected a string`);
      }
    }

    for (const key of NUMBER_KEYS) {
      const value = raw[key];
      if (typeof value === 'number') {
        picked[key] = value;
      } else if (value !== undefined) {
        logger.warn(`Ignoring config key "${key}": expected a number`);
      }
    }

    return picked;
  }

  private readEnv(): Partial<ToolConfig> {
    const overrides: Partial<ToolConfig> = {};

    const searchUrl = this.env[ENV_KEYS.SEARCH_URL];
    if (searchUrl) overrides.searchUrl = searchUrl;

    const clioBaseUrl = this.env[ENV_KEYS.CLIO_BASE_URL];
    if (clioBaseUrl) overrides.clioBaseUrl = clioBaseUrl;

    const collection = this.env[ENV_KEYS.COLLECTION];
    if (collection) overrides.defaultCollection = collection;

    const margin = this.env[ENV_KEYS.RETRY_MARGIN];
    if (margin) {
      const parsed = Number(margin);
      if (Number.isFinite(parsed)) {
        overrides.retryMarginSeconds = parsed;
      } else {
        logger.warn(`Ignoring ${ENV_KEYS.RETRY_MARGIN}="${margin}": not a number`);
      }
    }

    const logLevel = this.env[ENV_KEYS.LOG_LEVEL];
    if (logLevel) overrides.logLevel = logLevel;

    return overrides;
  }
}
