import { mkdtempSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { beforeAll, describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  let directory: string;

  beforeAll(() => {
    directory = mkdtempSync(path.join(os.tmpdir(), 'config-'));
  });

  function writeYaml(name: string, content: string): string {
    const filePath = path.join(directory, name);
    writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  it('merges the file with defaults and the environment', () => {
    const configPath = writeYaml('pipeline.yaml', [
      'batch:',
      '  concurrency: 5',
      'retry:',
      '  maxAttempts: 4',
      'wordpress:',
      '  url: https://blog.test',
      '  status: draft'
    ].join('\n'));

    const config = loadConfig(configPath, {
      OPENAI_API_KEY: 'test-key',
      WORDPRESS_USERNAME: 'editor',
      WORDPRESS_APP_PASSWORD: 'test-secret',
      PIPELINE_CONCURRENCY: '2'
    });

    expect(config.batch.concurrency).toBe(2);
    expect(config.retry).toEqual({ maxAttempts: 4, initialDelayMs: 1000, callTimeoutMs: 180_000 });
    expect(config.wordpress).toEqual({
      url: 'https://blog.test',
      username: 'editor',
      appPassword: 'test-secret',
      status: 'draft'
    });
    expect(config.platforms.openai.apiKey).toBe('test-key');
    expect(config.platforms.unsplash.apiKey).toBe('');
  });

  it('lets the environment override the WordPress URL', () => {
    const configPath = writeYaml('url.yaml', 'wordpress:\n  url: https://blog.test\n');

    expect(loadConfig(configPath, { WORDPRESS_URL: 'https://staging.blog.test' }).wordpress.url)
      .toBe('https://staging.blog.test');
  });

  it('falls back to defaults when the file is missing', () => {
    const config = loadConfig(path.join(directory, 'missing.yaml'), {});

    expect(config.cache.fileName).toBe('content-cache.db');
    expect(config.generation.model).toBe('openai:gpt-4o-mini');
    expect(config.generation.defaultWordCount).toBe(3200);
    expect(config.batch.concurrency).toBe(3);
    expect(config.media).toEqual({ minWidth: 1200, minHeight: 630, candidates: 4 });
  });

  it('reports invalid values with their path', () => {
    const configPath = writeYaml('invalid.yaml', 'batch:\n  concurrency: 0\n');

    expect(() => loadConfig(configPath, {})).toThrow(ConfigError);
    expect(() => loadConfig(configPath, {})).toThrow(/batch\.concurrency/);
  });

  it('rejects malformed YAML', () => {
    const configPath = writeYaml('broken.yaml', 'batch: [unclosed\n');

    expect(() => loadConfig(configPath, {})).toThrow(ConfigError);
  });
});
