/** Named curves the ECDSA signer supports. */
export type CurveName = 'P-256' | 'P-384' | 'P-521';

/** Parsed EC private key: the secret scalar, big-endian, padded to the curve size. */
export interface EcPrivateKey {
  readonly curve: CurveName;
  readonly scalar: Uint8Array;
}

/** Parsed EC public key: the uncompressed SEC1 point (`04 || x || y`). */
export interface EcPublicKey {
  readonly curve: CurveName;
  readonly point: Uint8Array;
}

/** A matching private/public key pair. */
export interface EcKeyPair {
  readonly privateKey: EcPrivateKey;
  readonly publicKey: EcPublicKey;
}

/**
 * The signing capability the license protocol consumes.
 *
 * Implementations must be stateless per call so one instance can be shared.
 * `verify` returns `false` for a signature that does not match, and throws
 * only when the algorithm or key cannot be used at all.
 */
export interface Signer {
  sign(algorithmId: string, privateKey: EcPrivateKey, message: Uint8Array): Uint8Array;
  verify(algorithmId: string, publicKey: EcPublicKey, message: Uint8Array, signature: Uint8Array): boolean;
}
