import { randomBytes } from '@noble/hashes/utils';

/** The all-zero identifier, used when a license has no `<Id>`. */
export const EMPTY_GUID = '00000000-0000-0000-0000-000000000000';

const HEX32 = /^[0-9a-f]{32}$/i;
const DASHED = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function hyphenate(hex: string): string {
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-');
}

/**
 * Normalize an identifier to lowercase `8-4-4-4-12` form.
 *
 * Accepts 32 bare hex digits, the hyphenated form, and the hyphenated form
 * wrapped in braces or parentheses. Surrounding whitespace is ignored.
 * Returns `undefined` for anything else.
 */
export function parseGuid(text: string): string | undefined {
  let value = text.trim();
  if (HEX32.test(value)) {
    return hyphenate(value.toLowerCase());
  }
  const first = value.charAt(0);
  const last = value.charAt(value.length - 1);
  if ((first === '{' && last === '}') || (first === '(' && last === ')')) {
    value = value.slice(1, -1);
  }
  return DASHED.test(value) ? value.toLowerCase() : undefined;
}

export function isEmptyGuid(id: string): boolean {
  return id === EMPTY_GUID;
}

/** A random (version 4) identifier. */
export function generateGuid(): string {
  const bytes = randomBytes(16);
  bytes[6] = (bytes[6] & 0x0f) | 0x40;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;
  let hex = '';
  for (const byte of bytes) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return hyphenate(hex);
}
