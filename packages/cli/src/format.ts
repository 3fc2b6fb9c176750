/**
 * Terminal formatting for command output. Colors are off unless the caller
 * turns them on, so captured output is plain text.
 *
 * @packageDocumentation
 */

// ─── ANSI color codes ─────────────────────────────────────────────────────────

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  gray: '\x1b[90m',
} as const;

let colorsEnabled = false;

/** Enable or disable ANSI color output globally. */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function getColorsEnabled(): boolean {
  return colorsEnabled;
}

function paint(code: string, text: string): string {
  return colorsEnabled ? `${code}${text}${colors.reset}` : text;
}

export function bold(text: string): string {
  return paint(colors.bold, text);
}

export function dim(text: string): string {
  return paint(colors.gray, text);
}

// ─── Status lines ─────────────────────────────────────────────────────────────

export function success(msg: string): string {
  return colorsEnabled ? `${paint(colors.green, '✔')} ${msg}` : `[OK] ${msg}`;
}

export function failure(msg: string): string {
  return colorsEnabled ? `${paint(colors.red, '✘')} ${msg}` : `[FAIL] ${msg}`;
}

export function warning(msg: string): string {
  return colorsEnabled ? `${paint(colors.yellow, '!')} ${msg}` : `[WARN] ${msg}`;
}

/** Strip all ANSI escape sequences from a string. */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// ─── Layout ───────────────────────────────────────────────────────────────────

function padVisible(text: string, width: number): string {
  const pad = width - stripAnsi(text).length;
  return pad > 0 ? text + ' '.repeat(pad) : text;
}

/**
 * Left-aligned columns with a two-space gutter and a rule under the header.
 * Trailing padding is trimmed from each line.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, col) =>
    rows.reduce((max, row) => Math.max(max, stripAnsi(row[col] ?? '').length), stripAnsi(h).length),
  );
  const line = (cells: string[]): string =>
    cells.map((cell, col) => padVisible(cell, widths[col] ?? 0)).join('  ').trimEnd();

  return [
    line(headers.map(bold)),
    dim(widths.map((w) => '-'.repeat(w)).join('  ')),
    ...rows.map(line),
  ].join('\n');
}

/** Aligned `key  value` lines. */
export function keyValue(pairs: [string, string][]): string {
  if (pairs.length === 0) {
    return '';
  }
  const width = Math.max(...pairs.map(([key]) => key.length));
  return pairs.map(([key, value]) => `${bold(key.padEnd(width))}  ${value}`).join('\n');
}
