/**
 * Signing and verification of license records.
 *
 * Signing canonicalizes the record's fields; verification never does. It
 * re-writes the raw body retained when the record was parsed, so a license
 * verifies against the bytes that were actually issued.
 *
 * @packageDocumentation
 */

import {
  ECDSA_WITH_SHA512,
  decodeBase64,
  defaultSigner,
  encodeBase64,
  sha512Hex,
  utf8,
} from '@licensekit/crypto';
import type { EcPrivateKey, EcPublicKey, Signer } from '@licensekit/crypto';
import {
  LicenseKitErrorCode,
  SigningError,
  VerificationError,
  createDebugLogger,
  errorMessage,
  isLicenseKitError,
} from '@licensekit/types';
import { XmlElement, writeXml } from '@licensekit/xml';

import type { License } from './license';
import { parseLicense, persistedForm, toCanonicalForm } from './serializer';

const dbg = createDebugLogger('licensekit:core');

/** Signature algorithm used for every license. */
export const SIGNATURE_ALGORITHM = ECDSA_WITH_SHA512;

export interface ProtocolOptions {
  /** Signing capability. Defaults to the ECDSA/SHA-512 signer. */
  signer?: Signer;
}

export type SignatureCheckReason = 'valid' | 'signature-mismatch' | 'missing-signature' | 'missing-raw-body';

/** Outcome of {@link checkLicenseSignature}. */
export interface SignatureCheck {
  valid: boolean;
  reason: SignatureCheckReason;
  /** Set for the two "cannot verify" outcomes. */
  code?: LicenseKitErrorCode;
}

/** Result for one nested record, from {@link verifySublicenses}. */
export interface SublicenseCheck extends SignatureCheck {
  /** Position in the tree, e.g. `Sublicenses[0].Sublicenses[1]`. */
  path: string;
  license: License;
}

/** Either one key for every sub-license or a lookup per record. */
export type SublicenseKeyResolver = EcPublicKey | ((license: License, path: string) => EcPublicKey);

/** The exact bytes a signature covers: compact XML, UTF-8. */
export function signedBytes(body: XmlElement): Uint8Array {
  return utf8(writeXml(body));
}

/**
 * Sign a record and return the signed copy.
 *
 * The returned record is re-read from the signed text, so it owns a raw
 * body and verifies immediately. The input is not modified.
 *
 * @throws {SigningError} When the signer fails.
 */
export function signLicense(license: License, privateKey: EcPrivateKey, options?: ProtocolOptions): License {
  const signer = options?.signer ?? defaultSigner;
  const body = toCanonicalForm(license, false);
  const message = signedBytes(body);

  let signature: Uint8Array;
  try {
    signature = signer.sign(SIGNATURE_ALGORITHM, privateKey, message);
  } catch (err) {
    if (err instanceof SigningError) {
      throw err;
    }
    throw new SigningError(`Could not sign license: ${errorMessage(err)}`, {
      context: { id: license.id },
      cause: err,
    });
  }

  dbg.log('signed', { id: license.id, bytes: message.length });
  body.append(XmlElement.withText('Signature', encodeBase64(signature)));
  return parseLicense(writeXml(body));
}

/**
 * Check a record's signature and say why it failed.
 *
 * A record without a signature, or one that was never parsed, cannot be
 * verified; those are reported, not thrown. Sub-licenses are not checked.
 *
 * @throws {VerificationError} When the signature is not valid base64 or the
 *   key cannot be used.
 */
export function checkLicenseSignature(
  license: License,
  publicKey: EcPublicKey,
  options?: ProtocolOptions,
): SignatureCheck {
  if (!license.signature) {
    return { valid: false, reason: 'missing-signature', code: LicenseKitErrorCode.MISSING_SIGNATURE };
  }
  const body = license.rawBody;
  if (!body) {
    return { valid: false, reason: 'missing-raw-body', code: LicenseKitErrorCode.MISSING_RAW_BODY };
  }

  const signer = options?.signer ?? defaultSigner;
  const signature = decodeBase64(license.signature);
  let valid: boolean;
  try {
    valid = signer.verify(SIGNATURE_ALGORITHM, publicKey, signedBytes(body), signature);
  } catch (err) {
    if (isLicenseKitError(err)) {
      throw err;
    }
    throw new VerificationError(`Could not verify license: ${errorMessage(err)}`, {
      context: { id: license.id },
      cause: err,
    });
  }

  dbg.log('verified', { id: license.id, valid });
  return valid ? { valid: true, reason: 'valid' } : { valid: false, reason: 'signature-mismatch' };
}

/**
 * Verify a record's own signature. Returns false for a mismatch and for
 * records that cannot be verified.
 *
 * @throws {VerificationError} As {@link checkLicenseSignature}.
 */
export function verifyLicense(license: License, publicKey: EcPublicKey, options?: ProtocolOptions): boolean {
  return checkLicenseSignature(license, publicKey, options).valid;
}

/**
 * Check every nested sub-license, depth first, in document order. The
 * parent's own signature is not involved.
 */
export function verifySublicenses(
  license: License,
  keys: SublicenseKeyResolver,
  options?: ProtocolOptions,
): SublicenseCheck[] {
  const results: SublicenseCheck[] = [];
  const walk = (parent: License, prefix: string): void => {
    parent.sublicenses.forEach((child, index) => {
      const path = `${prefix}Sublicenses[${index}]`;
      const key = typeof keys === 'function' ? keys(child, path) : keys;
      results.push({ ...checkLicenseSignature(child, key, options), path, license: child });
      walk(child, `${path}.`);
    });
  };
  walk(license, '');
  return results;
}

/**
 * Hex SHA-512 over the stored forms of a record's sub-licenses, in order.
 *
 * Parent and child signatures are independent, so a signed sub-license can
 * be moved to another parent. Storing this digest as an additional
 * attribute of the parent before signing binds the set.
 */
export function computeSublicenseDigest(license: License): string {
  const text = license.sublicenses.map((child) => writeXml(persistedForm(child))).join('');
  return sha512Hex(utf8(text));
}
