/**
 * @licensekit/types: errors, logging and guards shared by every package.
 *
 * @packageDocumentation
 */

export {
  LicenseKitErrorCode,
  LicenseKitError,
  MalformedRecordError,
  LicenseBuildError,
  SigningError,
  VerificationError,
  KeyFormatError,
  XmlParseError,
  ConfigError,
  formatError,
  isLicenseKitError,
  errorMessage,
} from './errors';
export type { LicenseKitErrorOptions } from './errors';

export { Logger, LogLevel, createLogger, parseLogLevel, stderrOutput, LOG_LEVEL_NAMES } from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

export { DEBUG_ROOT, isDebugEnabled, createDebugLogger } from './debug';
export type { DebugLogger } from './debug';

export {
  isNonEmptyString,
  isPlainObject,
  isNonNegativeInteger,
  isValidDate,
  isStringRecord,
  isStringArray,
  assertNever,
} from './guards';
