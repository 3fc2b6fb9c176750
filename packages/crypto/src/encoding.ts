import { VerificationError } from '@licensekit/types';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Standard base64 (RFC 4648 section 4) with padding. */
export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
}

/**
 * Decode standard padded base64. Unlike `Buffer.from(s, 'base64')`, which
 * skips characters it does not recognise, any deviation from the canonical
 * alphabet and padding is rejected.
 *
 * @throws {VerificationError} When the text is not canonical base64.
 */
export function decodeBase64(text: string): Uint8Array {
  if (!BASE64_PATTERN.test(text)) {
    throw new VerificationError('Invalid base64 string', {
      hint: 'Signatures are standard base64 with "=" padding and no whitespace.',
      context: { length: text.length },
    });
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}

/** Lowercase hex encoding. */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (const byte of data) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return hex;
}

/** UTF-8 encode a string. */
export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
