import { isRecord } from './utils.js';

const PREFIX = 'PARLEY_';
const SEPARATOR = '__';

/**
 * Coerce a string value to a number, boolean, or leave as string.
 */
function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/**
 * Apply environment variable overrides to a plain config object.
 *
 * Variables must be prefixed with `PARLEY_`. Nesting is expressed with
 * double-underscore (`__`). Path segments are matched case-insensitively
 * against existing keys, then against `knownKeys`, so
 * `PARLEY_REQUESTREPLY__TIMEOUTMS=500` sets `requestReply.timeoutMs`.
 * Segments matching neither are created lowercase.
 *
 * @param config    The config object to mutate in-place.
 * @param env       Optional env map (defaults to `process.env`).
 * @param knownKeys Key spellings to use for keys the config does not have yet.
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: Record<string, string | undefined> = process.env,
  knownKeys: readonly string[] = [],
): Record<string, unknown> {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;

    const path = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split(SEPARATOR);

    if (path.some((segment) => segment === '')) continue;

    setNested(config, path, coerce(rawValue), knownKeys);
  }

  return config;
}

function matchKey(obj: Record<string, unknown>, segment: string, knownKeys: readonly string[]): string {
  const sameCase = (k: string): boolean => k.toLowerCase() === segment;
  return Object.keys(obj).find(sameCase) ?? knownKeys.find(sameCase) ?? segment;
}

function setNested(
  obj: Record<string, unknown>,
  path: string[],
  value: unknown,
  knownKeys: readonly string[],
): void {
  let current: Record<string, unknown> = obj;

  for (const segment of path.slice(0, -1)) {
    const key = matchKey(current, segment, knownKeys);
    const next = current[key];

    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  const last = path[path.length - 1];
  if (last !== undefined) {
    current[matchKey(current, last, knownKeys)] = value;
  }
}
