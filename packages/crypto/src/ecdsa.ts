import { p256 } from '@noble/curves/p256';
import { p384 } from '@noble/curves/p384';
import { p521 } from '@noble/curves/p521';
import type { CurveFn } from '@noble/curves/abstract/weierstrass';
import { sha512 } from '@noble/hashes/sha512';

import {
  KeyFormatError,
  LicenseKitErrorCode,
  SigningError,
  VerificationError,
  createDebugLogger,
  errorMessage,
} from '@licensekit/types';

import { toHex } from './encoding';
import type { CurveName, EcKeyPair, EcPrivateKey, EcPublicKey, Signer } from './types';

/** Object identifier of ecdsa-with-SHA512 (ANSI X9.62). */
export const ECDSA_WITH_SHA512 = '1.2.840.10045.4.3.4';

const dbg = createDebugLogger('licensekit:crypto');

const CURVES: Record<CurveName, CurveFn> = {
  'P-256': p256,
  'P-384': p384,
  'P-521': p521,
};

/** Curve names accepted by {@link generateKeyPair} and the key loaders. */
export const SUPPORTED_CURVES: readonly CurveName[] = ['P-256', 'P-384', 'P-521'];

export function isCurveName(value: unknown): value is CurveName {
  return typeof value === 'string' && SUPPORTED_CURVES.some((curve) => curve === value);
}

function curveOf(name: CurveName): CurveFn {
  return CURVES[name];
}

/** SHA-512 of `data` as lowercase hex. */
export function sha512Hex(data: Uint8Array): string {
  return toHex(sha512(data));
}

/**
 * Generate a fresh key pair from the platform CSPRNG.
 *
 * @example
 * ```typescript
 * const { privateKey, publicKey } = generateKeyPair();
 * const pem = exportPublicKey(publicKey);
 * ```
 */
export function generateKeyPair(curve: CurveName = 'P-256'): EcKeyPair {
  const fn = curveOf(curve);
  const scalar = fn.utils.randomPrivateKey();
  return {
    privateKey: { curve, scalar },
    publicKey: { curve, point: fn.getPublicKey(scalar, false) },
  };
}

/**
 * Derive the public half of a private key.
 *
 * @throws {KeyFormatError} When the scalar is not valid for its curve.
 */
export function derivePublicKey(privateKey: EcPrivateKey): EcPublicKey {
  const fn = curveOf(privateKey.curve);
  try {
    return { curve: privateKey.curve, point: fn.getPublicKey(privateKey.scalar, false) };
  } catch (err) {
    throw new KeyFormatError(`Invalid ${privateKey.curve} private key: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * ECDSA over SHA-512 on the NIST prime curves.
 *
 * Signatures are DER encoded and use deterministic RFC 6979 nonces, so the
 * same key and message always produce the same bytes. Verification accepts
 * high-S signatures produced by other libraries.
 */
export class EcdsaSigner implements Signer {
  sign(algorithmId: string, privateKey: EcPrivateKey, message: Uint8Array): Uint8Array {
    if (algorithmId !== ECDSA_WITH_SHA512) {
      throw new SigningError(
        `Unsupported signature algorithm: ${algorithmId}`,
        { hint: `Use ${ECDSA_WITH_SHA512} (ecdsa-with-SHA512).` },
        LicenseKitErrorCode.UNSUPPORTED_ALGORITHM,
      );
    }
    const fn = curveOf(privateKey.curve);
    const stop = dbg.time(`sign ${message.length} bytes on ${privateKey.curve}`);
    try {
      return fn.sign(sha512(message), privateKey.scalar).toDERRawBytes();
    } catch (err) {
      throw new SigningError(`ECDSA signing failed: ${errorMessage(err)}`, {
        hint: `Check that the private key is a valid ${privateKey.curve} key.`,
        cause: err,
      });
    } finally {
      stop();
    }
  }

  verify(algorithmId: string, publicKey: EcPublicKey, message: Uint8Array, signature: Uint8Array): boolean {
    if (algorithmId !== ECDSA_WITH_SHA512) {
      throw new VerificationError(
        `Unsupported signature algorithm: ${algorithmId}`,
        { hint: `Use ${ECDSA_WITH_SHA512} (ecdsa-with-SHA512).` },
        LicenseKitErrorCode.UNSUPPORTED_ALGORITHM,
      );
    }
    const fn = curveOf(publicKey.curve);
    try {
      fn.ProjectivePoint.fromHex(publicKey.point).assertValidity();
    } catch (err) {
      throw new VerificationError(`Invalid ${publicKey.curve} public key: ${errorMessage(err)}`, { cause: err });
    }
    // Malformed DER or out-of-range scalars make noble return false.
    const valid = fn.verify(signature, sha512(message), publicKey.point, { lowS: false });
    dbg.log('verify', { curve: publicKey.curve, bytes: message.length, valid });
    return valid;
  }
}

/** Shared default instance; the signer holds no state. */
export const defaultSigner: Signer = new EcdsaSigner();
