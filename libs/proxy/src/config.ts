/**
 * Configuration loader
 *
 * Resolution order (later wins): defaults < config file < environment < overrides.
 * The result is validated once and handed to the engine as a static snapshot.
 */

import * as fs from 'node:fs';
import { ProxyConfigSchema, BlockPatternSchema, ENV_PREFIX } from '@portcullis/ipc';
import type { ProxyConfig, ProxyConfigInput } from '@portcullis/ipc';
import { ConfigValidationError } from './errors.js';

export interface LoadConfigOptions {
  /** JSON config file; a missing file is not an error */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ProxyConfigInput;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge plain objects; arrays and scalars from `source` replace those in `target`.
 */
function merge(target: JsonObject, source: JsonObject): JsonObject {
  const result: JsonObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] = isObject(existing) && isObject(value) ? merge(existing, value) : value;
  }
  return result;
}

function readConfigFile(configPath: string): JsonObject {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigValidationError(
      `Failed to read config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (!isObject(parsed)) {
    throw new ConfigValidationError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[`${ENV_PREFIX}${name}`];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigValidationError(`${ENV_PREFIX}${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Read the PORTCULLIS_* variables into a partial config.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): JsonObject {
  const blocklist = env[`${ENV_PREFIX}BLOCKLIST`];

  return merge(
    {},
    {
      port: envNumber(env, 'PORT'),
      host: env[`${ENV_PREFIX}HOST`] || undefined,
      logLevel: env[`${ENV_PREFIX}LOG_LEVEL`] || undefined,
      blocklist:
        blocklist !== undefined
          ? blocklist.split(',').map((p) => p.trim()).filter(Boolean)
          : undefined,
      rateLimit: {
        limit: envNumber(env, 'RATE_LIMIT'),
        windowSeconds: envNumber(env, 'RATE_WINDOW'),
      },
    },
  );
}

/**
 * Load and validate the proxy configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): ProxyConfig {
  let raw: JsonObject = {};

  if (options.configPath) {
    raw = merge(raw, readConfigFile(options.configPath));
  }
  raw = merge(raw, configFromEnv(options.env ?? process.env));
  if (options.overrides) {
    raw = merge(raw, { ...options.overrides });
  }

  const result = ProxyConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid configuration: ${result.error.issues
        .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
        .join('; ')}`,
      result.error.issues,
    );
  }
  return result.data;
}

/**
 * Load blocklist patterns from a file: either a JSON array of strings, or one
 * pattern per line with `#` comments.
 */
export function loadBlocklistFile(filePath: string): string[] {
  const content = fs.readFileSync(filePath, 'utf-8');
  const trimmed = content.trim();

  let candidates: unknown[];
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed)) {
      throw new ConfigValidationError(`Blocklist ${filePath} must be a JSON array`);
    }
    candidates = parsed;
  } else {
    candidates = content
      .split(/\r?\n/)
      .map((line) => line.replace(/#.*$/, '').trim())
      .filter((line) => line.length > 0);
  }

  return candidates.map((candidate, index) => {
    const result = BlockPatternSchema.safeParse(candidate);
    if (!result.success) {
      throw new ConfigValidationError(
        `Invalid blocklist entry #${index + 1} in ${filePath}: ${JSON.stringify(candidate)}`,
        result.error.issues,
      );
    }
    return result.data;
  });
}
