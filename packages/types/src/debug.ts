/**
 * Opt-in tracing for the licensekit libraries.
 *
 * Controlled by the `DEBUG` environment variable, e.g.
 * `DEBUG=licensekit:core`, `DEBUG=licensekit:*` or `DEBUG=*`. Patterns are
 * comma separated. When a namespace is not enabled every method is a no-op.
 *
 * @packageDocumentation
 */

/** Root namespace shared by all licensekit packages. */
export const DEBUG_ROOT = 'licensekit';

/**
 * Check whether debug output is enabled for `namespace`, or for any
 * licensekit namespace when it is omitted.
 */
export function isDebugEnabled(namespace?: string, env: string | undefined = process.env.DEBUG): boolean {
  if (!env) {
    return false;
  }

  const patterns = env.split(',').map((p) => p.trim()).filter(Boolean);

  for (const pattern of patterns) {
    if (pattern === '*') {
      return true;
    }

    if (pattern === DEBUG_ROOT || pattern === `${DEBUG_ROOT}:*`) {
      if (!namespace || namespace === DEBUG_ROOT || namespace.startsWith(`${DEBUG_ROOT}:`)) {
        return true;
      }
    }

    if (namespace && pattern === namespace) {
      return true;
    }

    // "licensekit:core:*" style prefix
    if (namespace && pattern.endsWith(':*')) {
      const prefix = pattern.slice(0, -2);
      if (namespace === prefix || namespace.startsWith(prefix + ':')) {
        return true;
      }
    }
  }

  return false;
}

/** The shape of a debug logger returned by {@link createDebugLogger}. */
export interface DebugLogger {
  /** Whether this namespace was enabled when the logger was created. */
  readonly enabled: boolean;
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Start a timer; the returned function logs the elapsed milliseconds. */
  time: (label: string) => () => void;
}

const noop = (): void => {};
const noopTimer = (): (() => void) => noop;

/**
 * Create a debug logger for `namespace`. The `DEBUG` variable is read once,
 * here.
 *
 * @example
 * ```typescript
 * const dbg = createDebugLogger('licensekit:crypto');
 * const stop = dbg.time('sign');
 * // ...
 * stop(); // [licensekit:crypto] sign: 1.92ms
 * ```
 */
export function createDebugLogger(namespace: string): DebugLogger {
  if (!isDebugEnabled(namespace)) {
    return {
      enabled: false,
      log: noop,
      warn: noop,
      error: noop,
      time: noopTimer,
    };
  }

  const prefix = `[${namespace}]`;
  const stamp = (): string => new Date().toISOString();

  return {
    enabled: true,
    log: (...args: unknown[]): void => {
      console.error(stamp(), prefix, ...args);
    },
    warn: (...args: unknown[]): void => {
      console.error(stamp(), prefix, 'WARN', ...args);
    },
    error: (...args: unknown[]): void => {
      console.error(stamp(), prefix, 'ERROR', ...args);
    },
    time: (label: string): (() => void) => {
      const start = performance.now();
      return (): void => {
        const elapsed = performance.now() - start;
        console.error(stamp(), prefix, `${label}: ${elapsed.toFixed(2)}ms`);
      };
    },
  };
}
