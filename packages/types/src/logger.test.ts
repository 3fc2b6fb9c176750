import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  Logger,
  createLogger,
  LogLevel,
  parseLogLevel,
  stderrOutput,
  LOG_LEVEL_NAMES,
} from './logger';
import type { LogEntry, LogOutput } from './logger';

// ─── Helpers ────────────────────────────────────────────────────────────────────

function captureLogger(
  level: LogLevel = LogLevel.DEBUG,
  component?: string,
): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const output: LogOutput = (entry) => entries.push(entry);
  const logger = new Logger({ level, component, output });
  return { logger, entries };
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe('LogLevel', () => {
  it('levels are ordered from least to most severe', () => {
    expect(LogLevel.DEBUG).toBeLessThan(LogLevel.INFO);
    expect(LogLevel.INFO).toBeLessThan(LogLevel.WARN);
    expect(LogLevel.WARN).toBeLessThan(LogLevel.ERROR);
    expect(LogLevel.ERROR).toBeLessThan(LogLevel.SILENT);
  });
});

describe('parseLogLevel', () => {
  it('resolves names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel(' silent ')).toBe(LogLevel.SILENT);
  });

  it('returns undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
  });

  it('lists every accepted name', () => {
    expect(LOG_LEVEL_NAMES).toEqual(['debug', 'info', 'warn', 'error', 'silent']);
  });
});

describe('Logger: entries', () => {
  it('builds an entry with level, message and timestamp', () => {
    const { logger, entries } = captureLogger();
    logger.info('license issued');
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe('INFO');
    expect(entries[0].message).toBe('license issued');
    expect(new Date(entries[0].timestamp).toISOString()).toBe(entries[0].timestamp);
  });

  it('merges contextual fields', () => {
    const { logger, entries } = captureLogger();
    logger.warn('signature mismatch', { file: 'a.xml', quantity: 5 });
    expect(entries[0].file).toBe('a.xml');
    expect(entries[0].quantity).toBe(5);
  });

  it('omits component when none is set', () => {
    const { logger, entries } = captureLogger();
    logger.error('x');
    expect('component' in entries[0]).toBe(false);
  });
});

describe('Logger: level filtering', () => {
  it('suppresses DEBUG and INFO when level is WARN', () => {
    const { logger, entries } = captureLogger(LogLevel.WARN);
    logger.debug('no');
    logger.info('no');
    logger.warn('yes');
    logger.error('yes');
    expect(entries.map((e) => e.level)).toEqual(['WARN', 'ERROR']);
  });

  it('SILENT suppresses all output', () => {
    const { logger, entries } = captureLogger(LogLevel.SILENT);
    logger.debug('no');
    logger.info('no');
    logger.warn('no');
    logger.error('no');
    expect(entries).toHaveLength(0);
  });

  it('setLevel changes the threshold at runtime', () => {
    const { logger, entries } = captureLogger(LogLevel.ERROR);
    logger.info('dropped');
    logger.setLevel(LogLevel.INFO);
    expect(logger.getLevel()).toBe(LogLevel.INFO);
    logger.info('kept');
    expect(entries.map((e) => e.message)).toEqual(['kept']);
  });
});

describe('Logger: child loggers', () => {
  it('prefixes the component with the parent component', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG, 'cli');
    logger.child('verify').child('sublicenses').info('checked');
    expect(entries[0].component).toBe('cli.verify.sublicenses');
  });

  it('inherits level and output', () => {
    const output = vi.fn();
    const parent = new Logger({ level: LogLevel.WARN, output });
    const child = parent.child('issue');
    child.info('no');
    child.warn('yes');
    expect(output).toHaveBeenCalledOnce();
  });
});

describe('output sinks', () => {
  it('defaults to JSON lines on stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger({ component: 'test' });
    logger.info('hello');
    expect(write).toHaveBeenCalledOnce();
    const line = String(write.mock.calls[0][0]);
    expect(line.endsWith('\n')).toBe(true);
    const parsed: unknown = JSON.parse(line);
    expect(parsed).toMatchObject({ level: 'INFO', message: 'hello', component: 'test' });
  });

  it('stderrOutput serialises the entry as one line', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    stderrOutput({ level: 'WARN', message: 'm', timestamp: '2030-01-01T00:00:00.000Z' });
    expect(write).toHaveBeenCalledWith('{"level":"WARN","message":"m","timestamp":"2030-01-01T00:00:00.000Z"}\n');
  });
});
