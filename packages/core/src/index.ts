/**
 * @licensekit/core: the signed license record model, its canonical XML
 * form, the sign/verify protocol and the builder.
 *
 * @packageDocumentation
 */

export { License } from './license';
export type { LicenseFields, XmlOutputOptions } from './license';

export { LicenseBuilder } from './builder';

export { LicenseType, isLicenseType, parseLicenseType } from './types';
export type { Customer, LicenseJson, StringMapInput } from './types';

export { toCanonicalForm, persistedForm, writeLicense, fromDocument, parseLicense } from './serializer';
export type { ParsedLicense } from './serializer';

export {
  SIGNATURE_ALGORITHM,
  signedBytes,
  signLicense,
  verifyLicense,
  checkLicenseSignature,
  verifySublicenses,
  computeSublicenseDigest,
} from './protocol';
export type {
  ProtocolOptions,
  SignatureCheck,
  SignatureCheckReason,
  SublicenseCheck,
  SublicenseKeyResolver,
} from './protocol';

export {
  DEFAULT_EXPIRATION,
  DEFAULT_EXPIRATION_STRING,
  formatRfc1123,
  parseRfc1123,
  isRepresentableDate,
  truncateToSeconds,
} from './date';

export { EMPTY_GUID, parseGuid, isEmptyGuid, generateGuid } from './guid';
