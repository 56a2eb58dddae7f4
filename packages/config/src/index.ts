/**
 * @backstop/config -- protocol configuration.
 *
 * Reads `backstop.config.json` (searched upward from the working directory)
 * and `BACKSTOP_*` environment overrides, merges them over the defaults and
 * validates the result.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';

import {
  BackstopErrorCode,
  LogLevel,
  ValidationError,
  isNonEmptyString,
  isPlainObject,
  parseLogLevel,
  validateIdentity,
  validateIntegerRange,
} from '@backstop/types';
import type { AccountId } from '@backstop/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Protocol-wide settings shared by the pool and every guarantee engine. */
export interface ProtocolConfig {
  /** Length of one reporting period in seconds. */
  periodSeconds: number;
  /** Minimum number of underwriters backing one venue. */
  minUnderwriters: number;
  /** Protocol cut taken from every fee payout, in basis points. */
  protocolFeeBps: number;
  /** Account receiving the protocol cut. */
  treasury: AccountId;
  /** Collateral account of the underwriter pool. */
  poolAddress: AccountId;
  /** Account allowed to bind guarantee engines to venues in the pool. */
  poolAdmin: AccountId;
  logLevel: LogLevel;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'backstop.config.json';

/** Thirty days. */
export const DEFAULT_PERIOD_SECONDS = 30 * 24 * 60 * 60;

export const DEFAULT_CONFIG: Readonly<ProtocolConfig> = Object.freeze({
  periodSeconds: DEFAULT_PERIOD_SECONDS,
  minUnderwriters: 2,
  protocolFeeBps: 0,
  treasury: 'treasury',
  poolAddress: 'underwriter-pool',
  poolAdmin: 'protocol-admin',
  logLevel: LogLevel.INFO,
});

const MAX_FEE_BPS = 10_000;

// ─── Validation ───────────────────────────────────────────────────────────────

/**
 * Check a complete config.
 *
 * @throws {ValidationError} `INVALID_CONFIG` naming the first bad field.
 */
export function validateConfig(config: ProtocolConfig): void {
  const wrap = (check: () => void): void => {
    try {
      check();
    } catch (e) {
      if (e instanceof ValidationError) {
        throw new ValidationError(`Invalid configuration: ${e.message}`, e.field, BackstopErrorCode.INVALID_CONFIG);
      }
      throw e;
    }
  };

  wrap(() => validateIntegerRange(config.periodSeconds, 1, Number.MAX_SAFE_INTEGER, 'periodSeconds'));
  wrap(() => validateIntegerRange(config.minUnderwriters, 1, 1_000, 'minUnderwriters'));
  wrap(() => validateIntegerRange(config.protocolFeeBps, 0, MAX_FEE_BPS, 'protocolFeeBps'));
  wrap(() => validateIdentity(config.treasury, 'treasury'));
  wrap(() => validateIdentity(config.poolAddress, 'poolAddress'));
  wrap(() => validateIdentity(config.poolAdmin, 'poolAdmin'));
  if (!Object.values(LogLevel).includes(config.logLevel)) {
    throw new ValidationError('Invalid configuration: logLevel is not a known level', 'logLevel', BackstopErrorCode.INVALID_CONFIG);
  }
  if (config.treasury === config.poolAddress) {
    throw new ValidationError(
      'Invalid configuration: treasury must differ from poolAddress',
      'treasury',
      BackstopErrorCode.INVALID_CONFIG,
    );
  }
}

/** Merge `overrides` over {@link DEFAULT_CONFIG} and validate. */
export function resolveConfig(overrides: Partial<ProtocolConfig> = {}): ProtocolConfig {
  const config: ProtocolConfig = {
    periodSeconds: overrides.periodSeconds ?? DEFAULT_CONFIG.periodSeconds,
    minUnderwriters: overrides.minUnderwriters ?? DEFAULT_CONFIG.minUnderwriters,
    protocolFeeBps: overrides.protocolFeeBps ?? DEFAULT_CONFIG.protocolFeeBps,
    treasury: overrides.treasury ?? DEFAULT_CONFIG.treasury,
    poolAddress: overrides.poolAddress ?? DEFAULT_CONFIG.poolAddress,
    poolAdmin: overrides.poolAdmin ?? DEFAULT_CONFIG.poolAdmin,
    logLevel: overrides.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
  validateConfig(config);
  return config;
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

function invalid(field: string, message: string): ValidationError {
  return new ValidationError(`Invalid configuration: ${field} ${message}`, field, BackstopErrorCode.INVALID_CONFIG);
}

/**
 * Turn untrusted JSON into a partial config, checking field types.
 * Unknown keys are rejected so typos do not pass silently.
 */
export function parseConfig(raw: unknown): Partial<ProtocolConfig> {
  if (!isPlainObject(raw)) {
    throw invalid('root', 'must be a JSON object');
  }

  const result: Partial<ProtocolConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'periodSeconds':
      case 'minUnderwriters':
      case 'protocolFeeBps':
        if (typeof value !== 'number') throw invalid(key, 'must be a number');
        result[key] = value;
        break;
      case 'treasury':
      case 'poolAddress':
      case 'poolAdmin':
        if (!isNonEmptyString(value)) throw invalid(key, 'must be a non-empty string');
        result[key] = value;
        break;
      case 'logLevel': {
        const level = typeof value === 'string' ? parseLogLevel(value) : undefined;
        if (level === undefined) throw invalid(key, 'must be one of debug, info, warn, error, silent');
        result.logLevel = level;
        break;
      }
      default:
        throw invalid(key, 'is not a recognised setting');
    }
  }
  return result;
}

/**
 * Read `BACKSTOP_*` overrides from an environment map.
 *
 * | Variable | Setting |
 * |---|---|
 * | `BACKSTOP_PERIOD_SECONDS` | periodSeconds |
 * | `BACKSTOP_MIN_UNDERWRITERS` | minUnderwriters |
 * | `BACKSTOP_PROTOCOL_FEE_BPS` | protocolFeeBps |
 * | `BACKSTOP_TREASURY` | treasury |
 * | `BACKSTOP_POOL_ADDRESS` | poolAddress |
 * | `BACKSTOP_POOL_ADMIN` | poolAdmin |
 * | `BACKSTOP_LOG_LEVEL` | logLevel |
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): Partial<ProtocolConfig> {
  const raw: Record<string, unknown> = {};
  const numeric: Array<[string, keyof ProtocolConfig]> = [
    ['BACKSTOP_PERIOD_SECONDS', 'periodSeconds'],
    ['BACKSTOP_MIN_UNDERWRITERS', 'minUnderwriters'],
    ['BACKSTOP_PROTOCOL_FEE_BPS', 'protocolFeeBps'],
  ];
  const text: Array<[string, keyof ProtocolConfig]> = [
    ['BACKSTOP_TREASURY', 'treasury'],
    ['BACKSTOP_POOL_ADDRESS', 'poolAddress'],
    ['BACKSTOP_POOL_ADMIN', 'poolAdmin'],
    ['BACKSTOP_LOG_LEVEL', 'logLevel'],
  ];

  for (const [name, key] of numeric) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) throw invalid(key, `from ${name} must be numeric (got "${value}")`);
    raw[key] = parsed;
  }
  for (const [name, key] of text) {
    const value = env[name];
    if (value !== undefined && value !== '') raw[key] = value;
  }
  return parseConfig(raw);
}

// ─── Files ────────────────────────────────────────────────────────────────────

/**
 * Search for `backstop.config.json` from `cwd` up to the filesystem root.
 * Returns the absolute path if found.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Load the effective configuration: defaults, then the config file (if
 * one is found from `cwd`), then environment overrides.
 *
 * @throws {ValidationError} If the file is not valid JSON or any value is invalid.
 */
export function loadConfig(options: { cwd?: string; env?: Record<string, string | undefined> } = {}): ProtocolConfig {
  const filePath = findConfigFile(options.cwd);
  let fromFile: Partial<ProtocolConfig> = {};
  if (filePath) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch {
      throw invalid('file', `${filePath} is not valid JSON`);
    }
    fromFile = parseConfig(parsed);
  }
  return resolveConfig({ ...fromFile, ...configFromEnv(options.env ?? process.env) });
}
