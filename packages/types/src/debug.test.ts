import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { isDebugEnabled, createDebugLogger } from './debug';

let originalDebug: string | undefined;

beforeEach(() => {
  originalDebug = process.env.DEBUG;
});

afterEach(() => {
  if (originalDebug === undefined) {
    delete process.env.DEBUG;
  } else {
    process.env.DEBUG = originalDebug;
  }
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// isDebugEnabled
// ---------------------------------------------------------------------------
describe('isDebugEnabled', () => {
  it('returns false when DEBUG is unset or empty', () => {
    expect(isDebugEnabled('licensekit:core', undefined)).toBe(false);
    expect(isDebugEnabled('licensekit:core', '')).toBe(false);
  });

  it('enables every licensekit namespace for the root pattern', () => {
    expect(isDebugEnabled(undefined, 'licensekit')).toBe(true);
    expect(isDebugEnabled('licensekit:crypto', 'licensekit')).toBe(true);
    expect(isDebugEnabled('licensekit:core', 'licensekit:*')).toBe(true);
  });

  it('does not enable foreign namespaces for the root pattern', () => {
    expect(isDebugEnabled('express:router', 'licensekit')).toBe(false);
  });

  it('enables everything for *', () => {
    expect(isDebugEnabled('anything', '*')).toBe(true);
  });

  it('matches exact namespaces only', () => {
    expect(isDebugEnabled('licensekit:core', 'licensekit:core')).toBe(true);
    expect(isDebugEnabled('licensekit:crypto', 'licensekit:core')).toBe(false);
  });

  it('supports prefix wildcards and comma separated lists', () => {
    expect(isDebugEnabled('licensekit:core:serializer', 'licensekit:core:*')).toBe(true);
    expect(isDebugEnabled('licensekit:xml', 'other, licensekit:xml')).toBe(true);
  });

  it('reads process.env.DEBUG by default', () => {
    process.env.DEBUG = 'licensekit:xml';
    expect(isDebugEnabled('licensekit:xml')).toBe(true);
    expect(isDebugEnabled('licensekit:core')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// createDebugLogger
// ---------------------------------------------------------------------------
describe('createDebugLogger', () => {
  it('is a silent no-op when disabled', () => {
    delete process.env.DEBUG;
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const dbg = createDebugLogger('licensekit:core');
    expect(dbg.enabled).toBe(false);
    dbg.log('a');
    dbg.warn('b');
    dbg.error('c');
    dbg.time('t')();
    expect(spy).not.toHaveBeenCalled();
  });

  it('writes prefixed lines to stderr when enabled', () => {
    process.env.DEBUG = 'licensekit:core';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const dbg = createDebugLogger('licensekit:core');
    expect(dbg.enabled).toBe(true);
    dbg.log('parsed', 3);
    expect(spy).toHaveBeenCalledOnce();
    const args = spy.mock.calls[0];
    expect(args[1]).toBe('[licensekit:core]');
    expect(args[2]).toBe('parsed');
    expect(args[3]).toBe(3);
  });

  it('tags warnings and errors', () => {
    process.env.DEBUG = '*';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const dbg = createDebugLogger('licensekit:crypto');
    dbg.warn('w');
    dbg.error('e');
    expect(spy.mock.calls[0][2]).toBe('WARN');
    expect(spy.mock.calls[1][2]).toBe('ERROR');
  });

  it('time() logs the elapsed milliseconds for the label', () => {
    process.env.DEBUG = '*';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stop = createDebugLogger('licensekit:crypto').time('sign');
    stop();
    expect(String(spy.mock.calls[0][2])).toMatch(/^sign: \d+\.\d{2}ms$/);
  });
});
