import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import type { FabricConfig, OverflowPolicy } from './config.js';
import { DEFAULT_FABRIC_CONFIG, OVERFLOW_POLICIES } from './config.js';
import { applyEnvOverrides } from './config-env-overlay.js';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';
import { LOG_LEVELS } from './logger.js';
import { isRecord } from './utils.js';

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: FabricConfig;
}

/** Returns an error message, or undefined when the value is acceptable. */
type FieldRule = (value: unknown) => string | undefined;

const positiveInteger: FieldRule = (value) =>
  typeof value === 'number' && Number.isInteger(value) && value > 0
    ? undefined
    : 'Must be a positive integer';

const oneOf = (allowed: readonly string[]): FieldRule => (value) =>
  typeof value === 'string' && allowed.includes(value)
    ? undefined
    : `Must be one of: ${allowed.join(', ')}`;

/** Every section is optional; every key within a section is optional. */
const SCHEMA: Record<keyof FabricConfig, Record<string, FieldRule>> = {
  mailbox: { capacity: positiveInteger, overflow: oneOf(OVERFLOW_POLICIES) },
  history: { capacity: positiveInteger, ttlMs: positiveInteger },
  requestReply: { timeoutMs: positiveInteger },
  logging: { level: oneOf(LOG_LEVELS) },
};

/** Section and field names, for resolving case-folded env override paths. */
const CONFIG_KEYS: readonly string[] = Object.entries(SCHEMA)
  .flatMap(([section, rules]) => [section, ...Object.keys(rules)]);

function isSectionName(key: string): key is keyof FabricConfig {
  return key in SCHEMA;
}

function isOverflowPolicy(value: unknown): value is OverflowPolicy {
  return typeof value === 'string' && OVERFLOW_POLICIES.some((p) => p === value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((l) => l === value);
}

function numberOr<T extends number | undefined>(value: unknown, fallback: T): number | T {
  return typeof value === 'number' ? value : fallback;
}

/**
 * Validate an already-parsed config value and fill defaults.
 * Rejects unknown keys at every level (strict mode).
 */
export function validateFabricConfigObject(parsed: unknown): ConfigValidationResult {
  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  const errors: ConfigValidationError[] = [];

  for (const [key, section] of Object.entries(parsed)) {
    if (!isSectionName(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
      continue;
    }
    if (!isRecord(section)) {
      errors.push({ path: key, message: `Section "${key}" must be an object` });
      continue;
    }

    const rules = SCHEMA[key];
    for (const [field, value] of Object.entries(section)) {
      const rule = rules[field];
      const path = `${key}.${field}`;
      if (!rule) {
        errors.push({ path, message: `Unknown key: "${path}"` });
        continue;
      }
      const problem = rule(value);
      if (problem) errors.push({ path, message: problem });
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const section = (name: keyof FabricConfig): Record<string, unknown> => {
    const value = parsed[name];
    return isRecord(value) ? value : {};
  };
  const mailbox = section('mailbox');
  const history = section('history');
  const requestReply = section('requestReply');
  const logging = section('logging');

  const capacity = numberOr(mailbox['capacity'], DEFAULT_FABRIC_CONFIG.mailbox.capacity);
  const ttlMs = numberOr(history['ttlMs'], DEFAULT_FABRIC_CONFIG.history.ttlMs);

  const config: FabricConfig = {
    mailbox: {
      ...(capacity !== undefined ? { capacity } : {}),
      overflow: isOverflowPolicy(mailbox['overflow'])
        ? mailbox['overflow']
        : DEFAULT_FABRIC_CONFIG.mailbox.overflow,
    },
    history: {
      capacity: numberOr(history['capacity'], DEFAULT_FABRIC_CONFIG.history.capacity),
      ...(ttlMs !== undefined ? { ttlMs } : {}),
    },
    requestReply: {
      timeoutMs: numberOr(requestReply['timeoutMs'], DEFAULT_FABRIC_CONFIG.requestReply.timeoutMs),
    },
    logging: {
      level: isLogLevel(logging['level']) ? logging['level'] : DEFAULT_FABRIC_CONFIG.logging.level,
    },
  };

  return { valid: true, errors, config };
}

/**
 * Parse and validate a JSON5 config string.
 */
export function validateFabricConfig(json5String: string): ConfigValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }
  return validateFabricConfigObject(parsed);
}

/**
 * Load a JSON5 config file, apply `PARLEY_*` environment overrides and
 * validate the result.
 *
 * @throws ConfigError when the file is unreadable or invalid.
 */
export function loadFabricConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): FabricConfig {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file: ${filePath}`, [], err);
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid JSON5 in ${filePath}`, [String(err)], err);
  }

  const overlaid = isRecord(parsed) ? applyEnvOverrides(parsed, env, CONFIG_KEYS) : parsed;
  const result = validateFabricConfigObject(overlaid);
  if (!result.config) {
    const problems = result.errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message));
    throw new ConfigError(`Invalid config in ${filePath}: ${problems.join('; ')}`, problems);
  }
  return result.config;
}
