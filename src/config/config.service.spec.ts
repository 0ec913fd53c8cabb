import { Test } from '@nestjs/testing';
import { ConsoleLogger } from '@nestjs/common';
import { ConfigService, requiresApiKey } from './config.service.js';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const REPO_CONFIG = fileURLToPath(new URL('../../aireview.config.json', import.meta.url));

const ENV_VARS = [
  'CONFIG_JSON',
  'AIREVIEW_API_KEY',
  'AIREVIEW_ENDPOINTS',
  'AIREVIEW_MODEL',
  'AIREVIEW_TIMEOUT_MS',
  'AIREVIEW_CONCURRENCY',
];

describe('ConfigService', () => {
  let service: ConfigService;
  let logger: ConsoleLogger;

  beforeEach(async () => {
    for (const name of ENV_VARS) delete process.env[name];
    logger = new ConsoleLogger();
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const module = await Test.createTestingModule({
      providers: [ConfigService, { provide: ConsoleLogger, useValue: logger }],
    }).compile();
    service = module.get(ConfigService);
  });

  afterEach(() => {
    for (const name of ENV_VARS) delete process.env[name];
    vi.restoreAllMocks();
  });

  it('should throw when getConfig() called before loadConfig()', () => {
    expect(() => service.getConfig()).toThrow('Config not loaded. Call loadConfig() first.');
  });

  it('should load the bundled config file', async () => {
    const config = await service.loadConfig(REPO_CONFIG);
    expect(config.api.url).toBe('http://127.0.0.1:1234/v1/chat/completions');
    expect(config.api.model).toBe('devstral-small-2507-mlx');
    expect(config.review.concurrency).toBe(3);
    expect(service.getConfig()).toBe(config);
  });

  describe('CONFIG_JSON env var', () => {
    it('should fill defaults around a minimal config', async () => {
      process.env.CONFIG_JSON = JSON.stringify({ api: { model: 'test-model' } });
      const config = await service.loadConfig();
      expect(config).toEqual({
        api: {
          url: 'http://127.0.0.1:1234/v1/chat/completions',
          endpoints: [],
          apiKey: undefined,
          model: 'test-model',
          timeoutMs: 30000,
          maxTokens: 2048,
          temperature: 0.2,
        },
        review: { concurrency: 3, maxFileSize: 1048576, includeTests: false },
      });
    });

    it('should throw on invalid JSON', async () => {
      process.env.CONFIG_JSON = '{not json';
      await expect(service.loadConfig()).rejects.toThrow(
        'Failed to parse CONFIG_JSON environment variable',
      );
    });

    it('should require a model', async () => {
      process.env.CONFIG_JSON = JSON.stringify({ api: { url: 'http://localhost:1234' } });
      await expect(service.loadConfig()).rejects.toThrow(
        'Invalid config (CONFIG_JSON env): "api.model" is required',
      );
    });

    it('should be ignored when an explicit path is given', async () => {
      process.env.CONFIG_JSON = JSON.stringify({ api: { model: 'from-env' } });
      const config = await service.loadConfig(REPO_CONFIG);
      expect(config.api.model).toBe('devstral-small-2507-mlx');
    });
  });

  describe('config file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'aireview-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    async function writeConfig(value: unknown): Promise<string> {
      const path = join(dir, 'aireview.config.json');
      await writeFile(path, typeof value === 'string' ? value : JSON.stringify(value));
      return path;
    }

    it('should name the file when it cannot be parsed', async () => {
      const path = await writeConfig('{"api": ');
      await expect(service.loadConfig(path)).rejects.toThrow(
        `Failed to parse config file "${path}"`,
      );
    });

    it('should read the endpoint list', async () => {
      const path = await writeConfig({
        api: { model: 'm', endpoints: [' http://a:1/v1 ', 'https://b/v1'] },
      });
      const config = await service.loadConfig(path);
      expect(config.api.endpoints).toEqual(['http://a:1/v1', 'https://b/v1']);
    });

    it('should reject a config with neither url nor endpoints', async () => {
      const path = await writeConfig({ api: { model: 'm', url: '' } });
      await expect(service.loadConfig(path)).rejects.toThrow(
        '"api.url" or "api.endpoints" must be set',
      );
    });

    it('should reject a non-http endpoint', async () => {
      const path = await writeConfig({ api: { model: 'm', endpoints: ['ftp://a'] } });
      await expect(service.loadConfig(path)).rejects.toThrow(
        'endpoint "ftp://a" is not a valid http(s) URL',
      );
    });

    it('should reject a field of the wrong type', async () => {
      const path = await writeConfig({ api: { model: 'm', timeoutMs: '30s' } });
      await expect(service.loadConfig(path)).rejects.toThrow('"api.timeoutMs" must be a number');
    });

    it('should reject concurrency above the ceiling', async () => {
      const path = await writeConfig({ api: { model: 'm' }, review: { concurrency: 65 } });
      await expect(service.loadConfig(path)).rejects.toThrow(
        '"review.concurrency" must be an integer between 1 and 64',
      );
    });

    it('should reject temperature out of range', async () => {
      const path = await writeConfig({ api: { model: 'm', temperature: 3 } });
      await expect(service.loadConfig(path)).rejects.toThrow(
        '"api.temperature" must be between 0 and 2',
      );
    });

    it('should reject an invalid sensitive pattern', async () => {
      const path = await writeConfig({
        api: { model: 'm' },
        review: { sensitivePatterns: ['[unclosed'] },
      });
      await expect(service.loadConfig(path)).rejects.toThrow('contains invalid regex');
    });

    it('should reject a sensitive pattern with nested quantifiers', async () => {
      const path = await writeConfig({
        api: { model: 'm' },
        review: { sensitivePatterns: ['(a+)+$'] },
      });
      await expect(service.loadConfig(path)).rejects.toThrow('ReDoS risk');
    });

    it('should accept quantified alternation in sensitive patterns', async () => {
      const path = await writeConfig({
        api: { model: 'm' },
        review: { sensitivePatterns: ['(token|passwd)s?'] },
      });
      const config = await service.loadConfig(path);
      expect(config.review.sensitivePatterns).toEqual(['(token|passwd)s?']);
    });
  });

  describe('environment overrides', () => {
    beforeEach(() => {
      process.env.CONFIG_JSON = JSON.stringify({ api: { model: 'base-model' } });
    });

    it('should apply every supported variable', async () => {
      process.env.AIREVIEW_API_KEY = 'test-secret';
      process.env.AIREVIEW_ENDPOINTS = 'http://a:1/v1, http://b:2/v1,';
      process.env.AIREVIEW_MODEL = 'env-model';
      process.env.AIREVIEW_TIMEOUT_MS = '5000';
      process.env.AIREVIEW_CONCURRENCY = '8';

      const config = await service.loadConfig();

      expect(config.api.apiKey).toBe('test-secret');
      expect(config.api.endpoints).toEqual(['http://a:1/v1', 'http://b:2/v1']);
      expect(config.api.model).toBe('env-model');
      expect(config.api.timeoutMs).toBe(5000);
      expect(config.review.concurrency).toBe(8);
    });

    it('should warn and keep the file value for invalid numbers', async () => {
      process.env.AIREVIEW_TIMEOUT_MS = 'soon';
      process.env.AIREVIEW_CONCURRENCY = '0';

      const config = await service.loadConfig();

      expect(config.api.timeoutMs).toBe(30000);
      expect(config.review.concurrency).toBe(3);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('applyOverrides', () => {
    beforeEach(async () => {
      process.env.CONFIG_JSON = JSON.stringify({ api: { model: 'base-model' } });
      await service.loadConfig();
    });

    it('should layer command-line values over the loaded config', () => {
      const config = service.applyOverrides({
        endpoints: ['http://a/v1', 'http://b/v1'],
        apiKey: 'test-secret',
        concurrency: 5,
        includeTests: true,
      });
      expect(config.api.endpoints).toEqual(['http://a/v1', 'http://b/v1']);
      expect(config.api.apiKey).toBe('test-secret');
      expect(config.review.concurrency).toBe(5);
      expect(config.review.includeTests).toBe(true);
      expect(service.getConfig()).toBe(config);
    });

    it('should keep the previous config when an override is invalid', () => {
      expect(() => service.applyOverrides({ concurrency: 100 })).toThrow(
        'Invalid config (command line): "review.concurrency" must be an integer between 1 and 64',
      );
      expect(service.getConfig().review.concurrency).toBe(3);
    });

    it('should ignore an empty endpoint list', () => {
      const config = service.applyOverrides({ endpoints: [] });
      expect(config.api.endpoints).toEqual([]);
      expect(config.api.url).toBe('http://127.0.0.1:1234/v1/chat/completions');
    });
  });
});

describe('requiresApiKey', () => {
  it('should flag hosted services', () => {
    expect(requiresApiKey('https://api.openai.com/v1/chat/completions')).toBe(true);
    expect(requiresApiKey('https://api.anthropic.com/v1/messages')).toBe(true);
  });

  it('should not flag local servers', () => {
    expect(requiresApiKey('http://127.0.0.1:1234/v1/chat/completions')).toBe(false);
  });
});
