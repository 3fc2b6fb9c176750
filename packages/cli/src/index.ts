/**
 * The `licensekit` command line.
 *
 * {@link run} takes the arguments and returns what would be printed plus
 * the exit code; only `bin.ts` touches the process streams.
 *
 * @packageDocumentation
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import {
  DEFAULT_EXPIRATION,
  License,
  checkLicenseSignature,
  formatRfc1123,
  verifySublicenses,
} from '@licensekit/core';
import {
  SUPPORTED_CURVES,
  exportPrivateKey,
  exportPublicKey,
  generateKeyPair,
  isCurveName,
  loadPrivateKey,
  loadPublicKey,
} from '@licensekit/crypto';
import type { CurveName, EcPrivateKey, EcPublicKey } from '@licensekit/crypto';
import {
  ConfigError,
  LOG_LEVEL_NAMES,
  Logger,
  errorMessage,
  formatError,
  isLicenseKitError,
  parseLogLevel,
} from '@licensekit/types';

import { DEFAULT_PASSPHRASE_ENV, loadConfig } from './config';
import type { LicenseKitConfig } from './config';
import { failure, keyValue, setColorsEnabled, success, table, warning } from './format';
import { applyIssueSpec, parseIssueSpec } from './issue-spec';

export { CONFIG_FILE_NAME, DEFAULT_PASSPHRASE_ENV, findConfigFile, loadConfig, validateConfig } from './config';
export type { LicenseKitConfig, LoadedConfig } from './config';
export { parseIssueSpec, applyIssueSpec } from './issue-spec';
export type { IssueSpec } from './issue-spec';

export const VERSION = '0.1.0';

// ─── Argument parsing ─────────────────────────────────────────────────────────

export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(['help', 'version', 'json', 'sublicenses', 'compact', 'no-color']);

export function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  let command = '';

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i += 2;
      } else {
        flags[key] = true;
        i += 1;
      }
    } else if (command === '') {
      command = arg;
      i += 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { command, positional, flags };
}

/** A command was called the wrong way. */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function getFlag(parsed: ParsedArgs, key: string): string | undefined {
  const value = parsed.flags[key];
  return typeof value === 'string' ? value : undefined;
}

function hasFlag(parsed: ParsedArgs, key: string): boolean {
  return parsed.flags[key] !== undefined;
}

function requireFlag(parsed: ParsedArgs, key: string, description: string): string {
  const value = getFlag(parsed, key);
  if (!value) {
    throw new UsageError(`Missing required option: --${key} <${description}>`);
  }
  return value;
}

function requirePositional(parsed: ParsedArgs, description: string): string {
  const [value] = parsed.positional;
  if (value === undefined) {
    throw new UsageError(`Missing argument: <${description}>`);
  }
  return value;
}

// ─── Run context ──────────────────────────────────────────────────────────────

export interface RunOptions {
  /** Directory relative paths and the config lookup start from. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Environment the passphrase is read from. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** Use ANSI colors. Off by default. */
  color?: boolean;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

interface Context {
  cwd: string;
  env: Record<string, string | undefined>;
  config: LicenseKitConfig;
  log: Logger;
  out: string[];
  err: string[];
}

function resolvePath(ctx: Context, file: string): string {
  return path.resolve(ctx.cwd, file);
}

async function readLicense(ctx: Context, file: string): Promise<License> {
  return License.load(await fs.readFile(resolvePath(ctx, file), 'utf-8'));
}

function passphraseVariable(ctx: Context, parsed: ParsedArgs): string {
  return getFlag(parsed, 'passphrase-env') ?? ctx.config.passphraseEnv ?? DEFAULT_PASSPHRASE_ENV;
}

async function loadSigningKey(ctx: Context, parsed: ParsedArgs): Promise<EcPrivateKey> {
  const flag = getFlag(parsed, 'key');
  const file = flag !== undefined ? resolvePath(ctx, flag) : ctx.config.privateKeyFile;
  if (file === undefined) {
    throw new UsageError('No private key: pass --key <file> or set "privateKeyFile" in the configuration');
  }
  const passphrase = ctx.env[passphraseVariable(ctx, parsed)];
  return loadPrivateKey(await fs.readFile(file, 'utf-8'), passphrase || undefined);
}

async function loadVerificationKey(ctx: Context, parsed: ParsedArgs): Promise<EcPublicKey> {
  const flag = getFlag(parsed, 'key');
  const file = flag !== undefined ? resolvePath(ctx, flag) : ctx.config.publicKeyFile;
  if (file === undefined) {
    throw new UsageError('No public key: pass --key <file> or set "publicKeyFile" in the configuration');
  }
  return loadPublicKey(await fs.readFile(file, 'utf-8'));
}

// ─── Command: keygen ──────────────────────────────────────────────────────────

async function cmdKeygen(ctx: Context, parsed: ParsedArgs): Promise<number> {
  const outDir = resolvePath(ctx, requireFlag(parsed, 'out', 'dir'));
  const curveName = getFlag(parsed, 'curve') ?? ctx.config.curve ?? 'P-256';
  if (!isCurveName(curveName)) {
    throw new UsageError(`Unsupported curve "${curveName}". Use one of: ${SUPPORTED_CURVES.join(', ')}`);
  }
  const curve: CurveName = curveName;

  const variable = passphraseVariable(ctx, parsed);
  const passphrase = ctx.env[variable] || undefined;

  const { privateKey, publicKey } = generateKeyPair(curve);
  const privatePath = path.join(outDir, 'private.pem');
  const publicPath = path.join(outDir, 'public.pem');

  await fs.mkdir(outDir, { recursive: true });
  await fs.writeFile(privatePath, exportPrivateKey(privateKey, passphrase), { encoding: 'utf-8', mode: 0o600 });
  await fs.writeFile(publicPath, exportPublicKey(publicKey), 'utf-8');
  ctx.log.info('key pair generated', { curve, dir: outDir, encrypted: passphrase !== undefined });

  if (passphrase === undefined) {
    ctx.err.push(warning(`${variable} is not set; the private key is stored unencrypted`));
  }
  ctx.out.push(success(`Generated ${curve} key pair`));
  ctx.out.push(`  private key: ${privatePath}`);
  ctx.out.push(`  public key:  ${publicPath}`);
  return 0;
}

// ─── Command: issue ───────────────────────────────────────────────────────────

async function cmdIssue(ctx: Context, parsed: ParsedArgs): Promise<number> {
  const specPath = resolvePath(ctx, requireFlag(parsed, 'spec', 'file.json'));
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(specPath, 'utf-8'));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new UsageError(`${specPath} is not valid JSON: ${err.message}`);
    }
    throw err;
  }

  const spec = parseIssueSpec(raw);
  const builder = applyIssueSpec(spec);
  for (const file of spec.sublicenses ?? []) {
    builder.addSublicense(License.load(await fs.readFile(path.resolve(path.dirname(specPath), file), 'utf-8')));
  }

  const license = builder.createAndSign(await loadSigningKey(ctx, parsed));
  const text = license.toXml({ pretty: !hasFlag(parsed, 'compact') && (ctx.config.pretty ?? true) });
  ctx.log.info('license issued', { id: license.id, type: license.type, sublicenses: license.sublicenses.length });

  const out = getFlag(parsed, 'out');
  if (out === undefined) {
    ctx.out.push(text);
  } else {
    await fs.writeFile(resolvePath(ctx, out), text + '\n', 'utf-8');
    ctx.out.push(success(`Issued license ${license.id} to ${out}`));
  }
  return 0;
}

// ─── Command: verify ──────────────────────────────────────────────────────────

async function cmdVerify(ctx: Context, parsed: ParsedArgs): Promise<number> {
  const file = requirePositional(parsed, 'license.xml');
  const license = await readLicense(ctx, file);
  const key = await loadVerificationKey(ctx, parsed);

  const check = checkLicenseSignature(license, key);
  ctx.log.info('license verified', { file, id: license.id, reason: check.reason });
  let ok = check.valid;
  ctx.out.push(check.valid ? success(`Signature valid (${file})`) : failure(`Signature ${check.reason} (${file})`));

  if (hasFlag(parsed, 'sublicenses')) {
    const results = verifySublicenses(license, key);
    if (results.length === 0) {
      ctx.out.push('No sub-licenses');
    } else {
      ctx.out.push('');
      ctx.out.push(table(['Path', 'Id', 'Result'], results.map((r) => [r.path, r.license.id, r.reason])));
      ok = ok && results.every((r) => r.valid);
    }
  }
  return ok ? 0 : 1;
}

// ─── Command: show ────────────────────────────────────────────────────────────

function describeMap(entries: ReadonlyMap<string, string>): string {
  return entries.size === 0 ? '(none)' : [...entries].map(([k, v]) => `${k}=${v}`).join(', ');
}

async function cmdShow(ctx: Context, parsed: ParsedArgs): Promise<number> {
  const license = await readLicense(ctx, requirePositional(parsed, 'license.xml'));

  if (hasFlag(parsed, 'json')) {
    ctx.out.push(JSON.stringify(license.toJSON(), null, 2));
    return 0;
  }

  const expiration = license.expiration.getTime() === DEFAULT_EXPIRATION
    ? 'never'
    : formatRfc1123(license.expiration);
  const customer = license.customer
    ? [license.customer.name, license.customer.email && `<${license.customer.email}>`].filter(Boolean).join(' ')
    : '(none)';

  ctx.out.push(
    keyValue([
      ['Id', license.id],
      ['Type', license.type],
      ['Quantity', String(license.quantity)],
      ['Expires', expiration],
      ['Customer', customer],
      ['Features', describeMap(license.productFeatures)],
      ['Attributes', describeMap(license.additionalAttributes)],
      ['Sublicenses', String(license.sublicenses.length)],
      ['Version', String(license.version)],
      ['Signed', license.signature ? 'yes' : 'no'],
    ]),
  );
  return 0;
}

// ─── Command: help / version ──────────────────────────────────────────────────

const HELP = `licensekit - issue and verify signed license files

Usage: licensekit <command> [options]

Commands:

  keygen                        Generate an ECDSA key pair
    --out <dir>                   Directory for private.pem and public.pem (required)
    --curve <name>                ${SUPPORTED_CURVES.join(', ')} (default: P-256)
    --passphrase-env <var>        Variable holding the passphrase (default: ${DEFAULT_PASSPHRASE_ENV})

  issue                         Build and sign a license
    --spec <file.json>            License description (required)
    --key <file>                  Private key (default: privateKeyFile from config)
    --out <file>                  Write to a file instead of stdout
    --compact                     Write without indentation

  verify <license.xml>          Check a license signature
    --key <file>                  Public key (default: publicKeyFile from config)
    --sublicenses                 Also check every sub-license with the same key

  show <license.xml>            Print license fields
    --json                        Print as JSON

  help                          Show this help message
  version                       Show version information

Global options:
  --log-level <level>           ${LOG_LEVEL_NAMES.join(', ')} (default: warn)
  --no-color                    Disable colors`;

// ─── Main entry point ─────────────────────────────────────────────────────────

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function describeError(err: unknown): string {
  if (isLicenseKitError(err)) {
    return `Error: ${formatError(err)}`;
  }
  if (isErrnoException(err) && err.code === 'ENOENT') {
    return `Error: File not found: ${err.path ?? err.message}`;
  }
  return `Error: ${errorMessage(err)}`;
}

function joinLines(lines: string[]): string {
  return lines.map((line) => line + '\n').join('');
}

/**
 * Run one command.
 *
 * @param args - Arguments after the program name.
 */
export async function run(args: string[], options: RunOptions = {}): Promise<RunResult> {
  const parsed = parseArgs(args);
  const out: string[] = [];
  const err: string[] = [];
  setColorsEnabled(options.color === true && !hasFlag(parsed, 'no-color'));

  if (!parsed.command || parsed.command === 'help' || hasFlag(parsed, 'help')) {
    return { exitCode: 0, stdout: joinLines([HELP]), stderr: '' };
  }
  if (parsed.command === 'version' || hasFlag(parsed, 'version')) {
    return { exitCode: 0, stdout: joinLines([`licensekit v${VERSION}`]), stderr: '' };
  }

  let exitCode: number;
  try {
    const cwd = options.cwd ?? process.cwd();
    const loaded = loadConfig(cwd);
    const config = loaded?.config ?? {};

    const levelName = getFlag(parsed, 'log-level') ?? config.logLevel ?? 'warn';
    const level = parseLogLevel(levelName);
    if (level === undefined) {
      throw new ConfigError(`Unknown log level "${levelName}"`, undefined, {
        hint: `Use one of ${LOG_LEVEL_NAMES.join(', ')}.`,
      });
    }
    const log = new Logger({ level, component: 'cli', output: (entry) => err.push(JSON.stringify(entry)) });
    if (loaded) {
      log.debug('configuration loaded', { path: loaded.path });
    }

    const ctx: Context = { cwd, env: options.env ?? process.env, config, log: log.child(parsed.command), out, err };
    switch (parsed.command) {
      case 'keygen':
        exitCode = await cmdKeygen(ctx, parsed);
        break;
      case 'issue':
        exitCode = await cmdIssue(ctx, parsed);
        break;
      case 'verify':
        exitCode = await cmdVerify(ctx, parsed);
        break;
      case 'show':
        exitCode = await cmdShow(ctx, parsed);
        break;
      default:
        throw new UsageError(`Unknown command: '${parsed.command}'. Run 'licensekit help' for usage.`);
    }
  } catch (error) {
    err.push(describeError(error));
    exitCode = 1;
  }

  return { exitCode, stdout: joinLines(out), stderr: joinLines(err) };
}
