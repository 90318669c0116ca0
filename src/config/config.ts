import { existsSync, readFileSync } from 'fs';
import * as YAML from 'yaml';
import { config as dotenvConfig } from 'dotenv';
import { Logger } from '../utils/logger.js';
import { ConfigError } from '../errors.js';
import { ConfigSchema, type Config } from './types.js';

const logger = new Logger('Config');

// Load .env file if it exists
dotenvConfig({ override: false });

type Env = Record<string, string | undefined>;

export function loadConfig(configPath: string, env: Env = process.env): Config {
  const raw = loadYamlConfig(configPath);

  const envConcurrency = env.PIPELINE_CONCURRENCY
    ? parseInt(env.PIPELINE_CONCURRENCY, 10)
    : undefined;

  const merged = {
    ...raw,
    batch: {
      ...section(raw.batch),
      ...(envConcurrency ? { concurrency: envConcurrency } : {})
    },
    wordpress: {
      ...section(raw.wordpress),
      url: env.WORDPRESS_URL || section(raw.wordpress).url,
      username: env.WORDPRESS_USERNAME || '',
      appPassword: env.WORDPRESS_APP_PASSWORD || ''
    },
    // API keys only ever come from the environment
    platforms: {
      openai: { ...section(section(raw.platforms).openai), apiKey: env.OPENAI_API_KEY || '' },
      unsplash: { ...section(section(raw.platforms).unsplash), apiKey: env.UNSPLASH_ACCESS_KEY || '' },
      youtube: { ...section(section(raw.platforms).youtube), apiKey: env.YOUTUBE_API_KEY || '' }
    }
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${configPath}: ${issues}`);
  }

  return parsed.data;
}

function loadYamlConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    logger.warn(`Config file ${configPath} not found, using defaults`);
    return {};
  }

  try {
    const fileContent = readFileSync(configPath, 'utf8');
    const config: unknown = YAML.parse(fileContent) ?? {};
    logger.info(`Loaded configuration from ${configPath}`);
    return section(config);
  } catch (error) {
    logger.error(`Failed to load config file ${configPath}:`, error);
    throw new ConfigError(`Failed to load config file ${configPath}`, { cause: error });
  }
}

function section(value: unknown): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}
