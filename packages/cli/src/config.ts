/**
 * `licensekit.config.json` support.
 *
 * The file is looked up from the working directory towards the filesystem
 * root. Key file paths inside it are relative to the file itself.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';

import { isCurveName, SUPPORTED_CURVES } from '@licensekit/crypto';
import type { CurveName } from '@licensekit/crypto';
import {
  ConfigError,
  LOG_LEVEL_NAMES,
  errorMessage,
  isNonEmptyString,
  isPlainObject,
  parseLogLevel,
} from '@licensekit/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Shape of a `licensekit.config.json` file. */
export interface LicenseKitConfig {
  /** PKCS#8 PEM used by `issue`. */
  privateKeyFile?: string;
  /** SPKI PEM used by `verify`. */
  publicKeyFile?: string;
  /** Environment variable holding the private key passphrase. */
  passphraseEnv?: string;
  /** Curve for `keygen`. */
  curve?: CurveName;
  /** `debug`, `info`, `warn`, `error` or `silent`. */
  logLevel?: string;
  /** Write indented license text. */
  pretty?: boolean;
}

export interface LoadedConfig {
  /** Absolute path of the file that was read. */
  path: string;
  config: LicenseKitConfig;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'licensekit.config.json';

/** Passphrase variable used when the config names none. */
export const DEFAULT_PASSPHRASE_ENV = 'LICENSEKIT_PASSPHRASE';

const KNOWN_KEYS = ['privateKeyFile', 'publicKeyFile', 'passphraseEnv', 'curve', 'logLevel', 'pretty'];

// ─── Validation ───────────────────────────────────────────────────────────────

function optionalString(raw: Record<string, unknown>, key: string, path?: string): string | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isNonEmptyString(value)) {
    throw new ConfigError(`"${key}" must be a non-empty string`, path);
  }
  return value;
}

/**
 * Check a parsed JSON value against {@link LicenseKitConfig}.
 *
 * @param path - Reported in errors.
 * @throws {ConfigError} On unknown keys or values of the wrong type.
 */
export function validateConfig(raw: unknown, path?: string): LicenseKitConfig {
  if (!isPlainObject(raw)) {
    throw new ConfigError('Configuration must be a JSON object', path);
  }

  const unknown = Object.keys(raw).filter((key) => !KNOWN_KEYS.includes(key));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown configuration key "${unknown[0]}"`, path, {
      hint: `Known keys: ${KNOWN_KEYS.join(', ')}.`,
    });
  }

  const config: LicenseKitConfig = {
    privateKeyFile: optionalString(raw, 'privateKeyFile', path),
    publicKeyFile: optionalString(raw, 'publicKeyFile', path),
    passphraseEnv: optionalString(raw, 'passphraseEnv', path),
    logLevel: optionalString(raw, 'logLevel', path),
  };

  if (config.logLevel !== undefined && parseLogLevel(config.logLevel) === undefined) {
    throw new ConfigError(`"logLevel" must be one of ${LOG_LEVEL_NAMES.join(', ')}`, path);
  }

  if (raw.curve !== undefined) {
    if (!isCurveName(raw.curve)) {
      throw new ConfigError(`"curve" must be one of ${SUPPORTED_CURVES.join(', ')}`, path);
    }
    config.curve = raw.curve;
  }

  if (raw.pretty !== undefined) {
    if (typeof raw.pretty !== 'boolean') {
      throw new ConfigError('"pretty" must be true or false', path);
    }
    config.pretty = raw.pretty;
  }

  return config;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for a `licensekit.config.json` starting from `cwd` and walking up
 * to the filesystem root. Returns the absolute path if found.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

/**
 * Find, read and validate the configuration. Key file paths come back
 * absolute. Returns `undefined` when there is no file.
 *
 * @throws {ConfigError} When the file is unreadable, not JSON or invalid.
 */
export function loadConfig(cwd?: string): LoadedConfig | undefined {
  const path = findConfigFile(cwd);
  if (!path) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not read configuration: ${errorMessage(err)}`, path, { cause: err });
  }

  const config = validateConfig(raw, path);
  const base = dirname(path);
  if (config.privateKeyFile !== undefined) {
    config.privateKeyFile = resolve(base, config.privateKeyFile);
  }
  if (config.publicKeyFile !== undefined) {
    config.publicKeyFile = resolve(base, config.publicKeyFile);
  }
  return { path, config };
}
