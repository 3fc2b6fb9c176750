/**
 * @licensekit/crypto: the signing capability consumed by the license
 * protocol: ECDSA over SHA-512, key pairs, and PEM key import/export.
 *
 * @packageDocumentation
 */

export type { CurveName, EcPrivateKey, EcPublicKey, EcKeyPair, Signer } from './types';

export {
  ECDSA_WITH_SHA512,
  SUPPORTED_CURVES,
  EcdsaSigner,
  defaultSigner,
  generateKeyPair,
  derivePublicKey,
  isCurveName,
  sha512Hex,
} from './ecdsa';

export {
  loadPrivateKey,
  loadPublicKey,
  exportPrivateKey,
  exportPublicKey,
  PRIVATE_KEY_CIPHER,
} from './keys';

export { encodeBase64, decodeBase64, toHex, utf8 } from './encoding';
