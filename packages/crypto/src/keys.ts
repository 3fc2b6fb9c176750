/**
 * Key import and export.
 *
 * Keys travel as PEM (or bare base64 DER): SubjectPublicKeyInfo for public
 * keys, PKCS#8 for private keys, optionally passphrase encrypted. The
 * ASN.1 and PBES2 work is delegated to Node's KeyObject; the resulting
 * scalars and points feed the noble signer.
 *
 * @packageDocumentation
 */

import { createPrivateKey, createPublicKey } from 'crypto';
import type { JsonWebKey, KeyObject } from 'crypto';

import { KeyFormatError, errorMessage } from '@licensekit/types';

import { derivePublicKey, isCurveName } from './ecdsa';
import type { CurveName, EcPrivateKey, EcPublicKey } from './types';

const COORDINATE_BYTES: Record<CurveName, number> = {
  'P-256': 32,
  'P-384': 48,
  'P-521': 66,
};

/** Cipher used for passphrase-protected PKCS#8 exports. */
export const PRIVATE_KEY_CIPHER = 'aes-256-cbc';

function isPem(text: string): boolean {
  return text.trimStart().startsWith('-----BEGIN');
}

function fromBase64Url(value: string | undefined, field: string): Uint8Array {
  if (typeof value !== 'string' || value.length === 0) {
    throw new KeyFormatError(`EC key is missing its "${field}" component`);
  }
  return new Uint8Array(Buffer.from(value, 'base64url'));
}

function toBase64Url(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64url');
}

/** Left-pad big-endian bytes to `length`. */
function padStart(bytes: Uint8Array, length: number): Uint8Array {
  if (bytes.length >= length) {
    return bytes;
  }
  const out = new Uint8Array(length);
  out.set(bytes, length - bytes.length);
  return out;
}

function curveFromJwk(jwk: JsonWebKey): CurveName {
  const crv = jwk.crv;
  if (jwk.kty !== 'EC' || !isCurveName(crv)) {
    throw new KeyFormatError(`Unsupported key type: ${String(jwk.kty)} ${String(crv ?? '')}`.trim(), {
      hint: 'Use an EC key on P-256, P-384 or P-521.',
    });
  }
  return crv;
}

function assertEcKey(key: KeyObject): void {
  if (key.asymmetricKeyType !== 'ec') {
    throw new KeyFormatError(`Expected an EC key, got ${key.asymmetricKeyType ?? key.type}`, {
      hint: 'Use an EC key on P-256, P-384 or P-521.',
    });
  }
}

function pointFromJwk(jwk: JsonWebKey, curve: CurveName): Uint8Array {
  const size = COORDINATE_BYTES[curve];
  const x = padStart(fromBase64Url(jwk.x, 'x'), size);
  const y = padStart(fromBase64Url(jwk.y, 'y'), size);
  const point = new Uint8Array(1 + 2 * size);
  point[0] = 0x04;
  point.set(x, 1);
  point.set(y, 1 + size);
  return point;
}

function jwkFromPublicKey(key: EcPublicKey): JsonWebKey {
  const size = COORDINATE_BYTES[key.curve];
  if (key.point.length !== 1 + 2 * size || key.point[0] !== 0x04) {
    throw new KeyFormatError(`Public key is not an uncompressed ${key.curve} point`);
  }
  return {
    kty: 'EC',
    crv: key.curve,
    x: toBase64Url(key.point.subarray(1, 1 + size)),
    y: toBase64Url(key.point.subarray(1 + size)),
  };
}

/**
 * Load a private key from PEM or bare base64 PKCS#8 DER.
 *
 * @param text - The encoded key.
 * @param passphrase - Required when the key is encrypted.
 * @throws {KeyFormatError} When the key is malformed, encrypted without a
 *   passphrase, decrypted with the wrong one, or not on a supported curve.
 */
export function loadPrivateKey(text: string, passphrase?: string): EcPrivateKey {
  let key: KeyObject;
  try {
    key = isPem(text)
      ? createPrivateKey({ key: text, format: 'pem', passphrase })
      : createPrivateKey({ key: Buffer.from(text.trim(), 'base64'), format: 'der', type: 'pkcs8', passphrase });
  } catch (err) {
    throw new KeyFormatError(`Could not read private key: ${errorMessage(err)}`, {
      hint: passphrase === undefined
        ? 'Encrypted keys need the passphrase they were exported with.'
        : 'Check the passphrase and that the file holds a PKCS#8 EC key.',
      cause: err,
    });
  }
  assertEcKey(key);
  const jwk = key.export({ format: 'jwk' });
  const curve = curveFromJwk(jwk);
  return { curve, scalar: padStart(fromBase64Url(jwk.d, 'd'), COORDINATE_BYTES[curve]) };
}

/**
 * Load a public key from PEM or bare base64 SubjectPublicKeyInfo DER.
 *
 * @throws {KeyFormatError} When the key is malformed or not on a supported curve.
 */
export function loadPublicKey(text: string): EcPublicKey {
  let key: KeyObject;
  try {
    key = isPem(text)
      ? createPublicKey({ key: text, format: 'pem' })
      : createPublicKey({ key: Buffer.from(text.trim(), 'base64'), format: 'der', type: 'spki' });
  } catch (err) {
    throw new KeyFormatError(`Could not read public key: ${errorMessage(err)}`, { cause: err });
  }
  assertEcKey(key);
  const jwk = key.export({ format: 'jwk' });
  const curve = curveFromJwk(jwk);
  return { curve, point: pointFromJwk(jwk, curve) };
}

/**
 * Export a private key as PKCS#8 PEM, encrypted with
 * {@link PRIVATE_KEY_CIPHER} when a passphrase is given.
 */
export function exportPrivateKey(key: EcPrivateKey, passphrase?: string): string {
  const jwk: JsonWebKey = { ...jwkFromPublicKey(derivePublicKey(key)), d: toBase64Url(key.scalar) };
  let keyObject: KeyObject;
  try {
    keyObject = createPrivateKey({ key: jwk, format: 'jwk' });
  } catch (err) {
    throw new KeyFormatError(`Could not encode private key: ${errorMessage(err)}`, { cause: err });
  }
  const pem = passphrase === undefined
    ? keyObject.export({ type: 'pkcs8', format: 'pem' })
    : keyObject.export({ type: 'pkcs8', format: 'pem', cipher: PRIVATE_KEY_CIPHER, passphrase });
  return typeof pem === 'string' ? pem : pem.toString('utf8');
}

/** Export a public key as SubjectPublicKeyInfo PEM. */
export function exportPublicKey(key: EcPublicKey): string {
  let keyObject: KeyObject;
  try {
    keyObject = createPublicKey({ key: jwkFromPublicKey(key), format: 'jwk' });
  } catch (err) {
    throw new KeyFormatError(`Could not encode public key: ${errorMessage(err)}`, { cause: err });
  }
  const pem = keyObject.export({ type: 'spki', format: 'pem' });
  return typeof pem === 'string' ? pem : pem.toString('utf8');
}
