/**
 * Configuration Loader
 *
 * Loads `.env`, resolves the config file location, validates the file with
 * the zod schema and creates a default config when none exists.
 */

import { existsSync, readFileSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { Platform } from '../platform/types.js';
import { createLogger } from '../utils/logger.js';
import { createSystemConfigSchema, ModelDefinitionSchema, type SystemConfig, type SystemConfigInput } from './schema.js';

const logger = createLogger('config');

export const CONFIG_FILENAME = 'local-ai-config.json';

const here = dirname(fileURLToPath(import.meta.url));

/**
 * Load KEY=VALUE pairs from `.env` in `dir` without overriding variables
 * that are already set.
 */
export function loadEnvFile(dir: string = process.cwd()): void {
  const envPath = join(dir, '.env');

  if (!existsSync(envPath)) {
    return;
  }

  const content = readFileSync(envPath, 'utf-8');

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    const value = trimmed.slice(eqIndex + 1).trim();

    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}

export function getConfigPath(platform: Platform): string {
  return process.env.LOCAL_AI_CONFIG || join(platform.defaultConfigDir(), CONFIG_FILENAME);
}

/**
 * Model definitions shipped with the package, used to seed a new config.
 */
export function loadDefaultModels(): SystemConfigInput['models'] {
  // src/config and dist/src/config both need to find <root>/config
  const candidates = [join(here, '..', '..', 'config'), join(here, '..', '..', '..', 'config')];
  const file = candidates.map((dir) => join(dir, 'default-models.json')).find((p) => existsSync(p));

  if (!file) {
    logger.warn('default-models.json not found, starting with no model definitions');
    return [];
  }

  const parsed = z.array(ModelDefinitionSchema).safeParse(JSON.parse(readFileSync(file, 'utf-8')));
  if (!parsed.success) {
    throw new ConfigurationError(`${file}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate raw config data. Environment overrides apply on top of the file.
 */
export function parseConfig(raw: unknown, platform: Platform, source: string = 'config'): SystemConfig {
  const parsed = createSystemConfigSchema(platform).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`${source}: ${formatIssues(parsed.error)}`);
  }

  const config = parsed.data;
  if (process.env.LLAMA_SERVER_PATH) {
    config.server.llamaServerPath = process.env.LLAMA_SERVER_PATH;
  }
  return config;
}

export function createDefaultConfig(platform: Platform): SystemConfig {
  return parseConfig(
    {
      models: loadDefaultModels(),
      server: { defaultModel: 'qwen2.5-3b' },
    },
    platform,
    'default config'
  );
}

/**
 * Load configuration from file, creating (and saving) the default one if
 * the file does not exist.
 */
export async function loadConfig(platform: Platform, configPath: string = getConfigPath(platform)): Promise<SystemConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.info(`Config not found at ${configPath}, creating default`);
      const config = createDefaultConfig(platform);
      await saveConfig(config, configPath);
      return config;
    }
    throw new ConfigurationError(`Cannot read ${configPath}`, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`${configPath} is not valid JSON`, error);
  }

  return parseConfig(data, platform, configPath);
}

export async function saveConfig(config: SystemConfig, configPath: string): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  logger.debug(`Config saved to ${configPath}`);
}
