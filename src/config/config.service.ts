import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import { readFile, access } from 'node:fs/promises';
import { dirname, resolve, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { homedir } from 'node:os';
import type {
  AiReviewConfig,
  ApiConfig,
  ConfigOverrides,
  ReviewSettings,
} from './config.types.js';
import {
  DEFAULT_API_URL,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
  HOSTED_API_DOMAINS,
  MAX_CONCURRENCY,
} from '../constants.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '..', '..');
const CONFIG_FILE_NAME = 'aireview.config.json';
const USER_CONFIG_DIR = join(homedir(), '.aireview');
const USER_CONFIG_PATH = join(USER_CONFIG_DIR, CONFIG_FILE_NAME);
const CWD_CONFIG_PATH = resolve(CONFIG_FILE_NAME);

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/** True when the URL points at a hosted service that needs an API key. */
export function requiresApiKey(url: string): boolean {
  return HOSTED_API_DOMAINS.some((domain) => url.includes(domain));
}

@Injectable()
export class ConfigService {
  private config: AiReviewConfig | null = null;

  constructor(@Inject(ConsoleLogger) private readonly logger: ConsoleLogger) {
    this.logger.setContext(ConfigService.name);
  }

  async loadConfig(configPath?: string): Promise<AiReviewConfig> {
    const { parsed, source } = await this.resolveBaseConfig(configPath);
    const config = this.parseConfig(parsed, source);
    this.applyEnvOverrides(config);
    this.validateConfig(config, source);
    this.config = config;
    return this.config;
  }

  /** Layer command-line values over the loaded config and re-validate. */
  applyOverrides(overrides: ConfigOverrides): AiReviewConfig {
    const config = this.getConfig();
    const next: AiReviewConfig = {
      api: { ...config.api, endpoints: [...config.api.endpoints] },
      review: { ...config.review },
    };
    if (overrides.url !== undefined) next.api.url = overrides.url.trim();
    if (overrides.endpoints !== undefined && overrides.endpoints.length > 0) {
      next.api.endpoints = overrides.endpoints.map((e) => e.trim());
    }
    if (overrides.apiKey !== undefined && overrides.apiKey.trim() !== '') {
      next.api.apiKey = overrides.apiKey.trim();
    }
    if (overrides.model !== undefined) next.api.model = overrides.model.trim();
    if (overrides.timeoutMs !== undefined) {
      next.api.timeoutMs = overrides.timeoutMs;
    }
    if (overrides.maxFileSize !== undefined) {
      next.review.maxFileSize = overrides.maxFileSize;
    }
    if (overrides.concurrency !== undefined) {
      next.review.concurrency = overrides.concurrency;
    }
    if (overrides.includeTests !== undefined) {
      next.review.includeTests = overrides.includeTests;
    }
    this.validateConfig(next, 'command line');
    this.config = next;
    return next;
  }

  getConfig(): AiReviewConfig {
    if (!this.config) {
      throw new Error('Config not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  private async resolveBaseConfig(
    configPath?: string,
  ): Promise<{ parsed: unknown; source: string }> {
    if (configPath) {
      return this.loadFromFile(resolve(configPath));
    }
    const configJson = process.env.CONFIG_JSON;
    if (configJson && configJson.trim() !== '') {
      return this.parseConfigJson(configJson);
    }
    if (await this.fileExists(CWD_CONFIG_PATH)) {
      return this.loadFromFile(CWD_CONFIG_PATH);
    }
    if (await this.fileExists(USER_CONFIG_PATH)) {
      return this.loadFromFile(USER_CONFIG_PATH);
    }
    return this.loadFromFile(resolve(PROJECT_ROOT, CONFIG_FILE_NAME));
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async loadFromFile(
    filePath: string,
  ): Promise<{ parsed: unknown; source: string }> {
    const content = await readFile(filePath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const msg = error instanceof SyntaxError ? error.message : String(error);
      throw new Error(`Failed to parse config file "${filePath}": ${msg}`);
    }
    return { parsed, source: filePath };
  }

  private parseConfigJson(configJson: string): {
    parsed: unknown;
    source: string;
  } {
    let parsed: unknown;
    try {
      parsed = JSON.parse(configJson);
    } catch (error) {
      const msg = error instanceof SyntaxError ? error.message : String(error);
      throw new Error(
        `Failed to parse CONFIG_JSON environment variable: ${msg}`,
      );
    }
    return { parsed, source: 'CONFIG_JSON env' };
  }

  /** Structural parse: checks field types and fills defaults. Ranges are checked later. */
  private parseConfig(raw: unknown, source: string): AiReviewConfig {
    if (!isRecord(raw)) {
      throw new Error(`Invalid config (${source}): must be a JSON object`);
    }
    const api = raw.api ?? {};
    const review = raw.review ?? {};
    if (!isRecord(api)) {
      throw new Error(`Invalid config (${source}): "api" must be an object`);
    }
    if (!isRecord(review)) {
      throw new Error(`Invalid config (${source}): "review" must be an object`);
    }
    return {
      api: this.parseApiConfig(api, source),
      review: this.parseReviewSettings(review, source),
    };
  }

  private parseApiConfig(api: RawObject, source: string): ApiConfig {
    const url = this.optionalString(api, 'url', 'api', source) ?? DEFAULT_API_URL;
    const endpoints = api.endpoints ?? [];
    if (!isStringArray(endpoints)) {
      throw new Error(
        `Invalid config (${source}): "api.endpoints" must be an array of strings`,
      );
    }
    const model = this.optionalString(api, 'model', 'api', source);
    if (model === undefined) {
      throw new Error(`Invalid config (${source}): "api.model" is required`);
    }
    return {
      url: url.trim(),
      endpoints: endpoints.map((e) => e.trim()),
      apiKey: this.optionalString(api, 'apiKey', 'api', source),
      model: model.trim(),
      timeoutMs:
        this.optionalNumber(api, 'timeoutMs', 'api', source) ??
        DEFAULT_TIMEOUT_MS,
      maxTokens:
        this.optionalNumber(api, 'maxTokens', 'api', source) ??
        DEFAULT_MAX_TOKENS,
      temperature:
        this.optionalNumber(api, 'temperature', 'api', source) ??
        DEFAULT_TEMPERATURE,
    };
  }

  private parseReviewSettings(
    review: RawObject,
    source: string,
  ): ReviewSettings {
    const settings: ReviewSettings = {
      concurrency:
        this.optionalNumber(review, 'concurrency', 'review', source) ??
        DEFAULT_CONCURRENCY,
      maxFileSize:
        this.optionalNumber(review, 'maxFileSize', 'review', source) ??
        DEFAULT_MAX_FILE_SIZE,
      includeTests: false,
    };
    if (review.includeTests !== undefined) {
      if (typeof review.includeTests !== 'boolean') {
        throw new Error(
          `Invalid config (${source}): "review.includeTests" must be a boolean`,
        );
      }
      settings.includeTests = review.includeTests;
    }
    for (const field of ['extensions', 'sensitivePatterns'] as const) {
      const value = review[field];
      if (value === undefined) continue;
      if (!isStringArray(value)) {
        throw new Error(
          `Invalid config (${source}): "review.${field}" must be an array of strings`,
        );
      }
      settings[field] = value;
    }
    return settings;
  }

  private optionalString(
    obj: RawObject,
    key: string,
    section: string,
    source: string,
  ): string | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      throw new Error(
        `Invalid config (${source}): "${section}.${key}" must be a string`,
      );
    }
    return value;
  }

  private optionalNumber(
    obj: RawObject,
    key: string,
    section: string,
    source: string,
  ): number | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new Error(
        `Invalid config (${source}): "${section}.${key}" must be a number`,
      );
    }
    return value;
  }

  private static readonly SAFE_MODEL = /^[^\n\r]{1,100}$/;

  private applyEnvOverrides(config: AiReviewConfig): void {
    const apiKey = process.env.AIREVIEW_API_KEY;
    if (apiKey && apiKey.trim() !== '') {
      config.api.apiKey = apiKey.trim();
    }
    const endpoints = process.env.AIREVIEW_ENDPOINTS;
    if (endpoints && endpoints.trim() !== '') {
      const list = endpoints
        .split(',')
        .map((e) => e.trim())
        .filter(Boolean);
      if (list.length > 0) config.api.endpoints = list;
    }
    const model = process.env.AIREVIEW_MODEL;
    if (model && model.trim() !== '') {
      const trimmed = model.trim();
      if (ConfigService.SAFE_MODEL.test(trimmed)) {
        config.api.model = trimmed;
      } else {
        this.logger.warn(
          'Ignoring invalid AIREVIEW_MODEL env (must be 1-100 chars, no newlines)',
        );
      }
    }
    const timeout = process.env.AIREVIEW_TIMEOUT_MS;
    if (timeout && timeout.trim() !== '') {
      const parsed = Number(timeout.trim());
      if (isPositiveInteger(parsed)) {
        config.api.timeoutMs = parsed;
      } else {
        this.logger.warn(
          'Ignoring invalid AIREVIEW_TIMEOUT_MS env (must be a positive integer)',
        );
      }
    }
    const concurrency = process.env.AIREVIEW_CONCURRENCY;
    if (concurrency && concurrency.trim() !== '') {
      const parsed = Number(concurrency.trim());
      if (isPositiveInteger(parsed) && parsed <= MAX_CONCURRENCY) {
        config.review.concurrency = parsed;
      } else {
        this.logger.warn(
          `Ignoring invalid AIREVIEW_CONCURRENCY env (must be an integer between 1 and ${MAX_CONCURRENCY})`,
        );
      }
    }
  }

  private validateConfig(config: AiReviewConfig, source: string): void {
    const { api, review } = config;
    if (api.url === '' && api.endpoints.length === 0) {
      throw new Error(
        `Invalid config (${source}): "api.url" or "api.endpoints" must be set`,
      );
    }
    const urls = api.url === '' ? api.endpoints : [api.url, ...api.endpoints];
    for (const url of urls) {
      if (!this.isHttpUrl(url)) {
        throw new Error(
          `Invalid config (${source}): endpoint "${url}" is not a valid http(s) URL`,
        );
      }
    }
    if (!ConfigService.SAFE_MODEL.test(api.model)) {
      throw new Error(
        `Invalid config (${source}): "api.model" must be a string of 1-100 chars with no newlines`,
      );
    }
    if (!isPositiveInteger(api.timeoutMs)) {
      throw new Error(
        `Invalid config (${source}): "api.timeoutMs" must be a positive integer`,
      );
    }
    if (!isPositiveInteger(api.maxTokens)) {
      throw new Error(
        `Invalid config (${source}): "api.maxTokens" must be a positive integer`,
      );
    }
    if (api.temperature < 0 || api.temperature > 2) {
      throw new Error(
        `Invalid config (${source}): "api.temperature" must be between 0 and 2`,
      );
    }
    if (!isPositiveInteger(review.maxFileSize)) {
      throw new Error(
        `Invalid config (${source}): "review.maxFileSize" must be a positive integer`,
      );
    }
    if (
      !isPositiveInteger(review.concurrency) ||
      review.concurrency > MAX_CONCURRENCY
    ) {
      throw new Error(
        `Invalid config (${source}): "review.concurrency" must be an integer between 1 and ${MAX_CONCURRENCY}`,
      );
    }
    if (review.sensitivePatterns !== undefined) {
      const MAX_SENSITIVE_PATTERNS = 20;
      if (review.sensitivePatterns.length > MAX_SENSITIVE_PATTERNS) {
        throw new Error(
          `Invalid config (${source}): "review.sensitivePatterns" exceeds maximum of ${MAX_SENSITIVE_PATTERNS} entries`,
        );
      }
      for (const p of review.sensitivePatterns) {
        let regex: RegExp;
        try {
          regex = new RegExp(p);
        } catch {
          throw new Error(
            `Invalid config (${source}): "review.sensitivePatterns" contains invalid regex: "${p}"`,
          );
        }
        if (this.isReDoSRisk(regex)) {
          throw new Error(
            `Invalid config (${source}): "review.sensitivePatterns" regex "${p}" is potentially unsafe (ReDoS risk). ` +
              `Avoid nested quantifiers like (a+)+ or (a|a)*b.`,
          );
        }
      }
    }
  }

  private isHttpUrl(value: string): boolean {
    try {
      const { protocol } = new URL(value);
      return protocol === 'http:' || protocol === 'https:';
    } catch {
      return false;
    }
  }

  /**
   * Heuristic for catastrophic backtracking: flags nested quantifiers such as
   * (a+)+ or ([^x]+)*. Quantified alternation like (foo|bar)+ is not flagged.
   */
  private isReDoSRisk(regex: RegExp): boolean {
    return /\([^)]*[+*][^)]*\)[+*{]/.test(regex.source);
  }
}
