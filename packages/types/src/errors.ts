/**
 * Error code system for licensekit.
 *
 * Every error carries a stable code (LK_Exxx) that maps to one failure
 * mode, so callers can branch on `code` instead of parsing messages.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All licensekit error codes. */
export enum LicenseKitErrorCode {
  // Records (1xx)
  /** A persisted license could not be parsed into a record. */
  MALFORMED_RECORD = 'LK_E100',

  // Building (2xx)
  /** A builder setter received a value outside its type constraints. */
  INVALID_BUILD_INPUT = 'LK_E200',

  // Signing (3xx)
  /** The signer could not produce a signature. */
  SIGNING_FAILED = 'LK_E300',
  /** The requested signature algorithm is not supported. */
  UNSUPPORTED_ALGORITHM = 'LK_E301',

  // Verification (4xx)
  /** The signature or key material could not be decoded for verification. */
  VERIFICATION_FAILED = 'LK_E400',
  /** Verification was attempted on a record without a signature. */
  MISSING_SIGNATURE = 'LK_E401',
  /** Verification was attempted on a record that was never parsed. */
  MISSING_RAW_BODY = 'LK_E402',

  // Keys (5xx)
  /** Key material was malformed, encrypted without a passphrase, or on an unsupported curve. */
  INVALID_KEY = 'LK_E500',

  // Documents (6xx)
  /** The XML text was not well formed. */
  XML_PARSE_FAILED = 'LK_E600',

  // Configuration (7xx)
  /** A configuration file was unreadable or had invalid values. */
  INVALID_CONFIG = 'LK_E700',
}

// ─── Base class ─────────────────────────────────────────────────────────────────

/** Options for constructing a LicenseKitError. */
export interface LicenseKitErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: unknown;
}

/**
 * Base error class for all licensekit errors.
 *
 * @example
 * ```typescript
 * throw new LicenseKitError(
 *   LicenseKitErrorCode.INVALID_KEY,
 *   'Private key is encrypted',
 *   { hint: 'Pass the passphrase used when the key was exported' }
 * );
 * ```
 */
export class LicenseKitError extends Error {
  readonly code: LicenseKitErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: LicenseKitErrorCode, message: string, options?: LicenseKitErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LicenseKitError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /**
   * Return a structured JSON representation suitable for logging.
   */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Specialised errors ─────────────────────────────────────────────────────────

/**
 * A persisted license is structurally invalid. `field` names the offending
 * element as a path, e.g. `Sublicenses[1].Quantity`.
 */
export class MalformedRecordError extends LicenseKitError {
  readonly field: string;

  constructor(field: string, message: string, options?: LicenseKitErrorOptions) {
    super(LicenseKitErrorCode.MALFORMED_RECORD, message, {
      ...options,
      context: { field, ...options?.context },
    });
    this.name = 'MalformedRecordError';
    this.field = field;
  }
}

/** A builder setter received a value that cannot be represented. */
export class LicenseBuildError extends LicenseKitError {
  readonly field: string;

  constructor(field: string, message: string, options?: LicenseKitErrorOptions) {
    super(LicenseKitErrorCode.INVALID_BUILD_INPUT, message, {
      ...options,
      context: { field, ...options?.context },
    });
    this.name = 'LicenseBuildError';
    this.field = field;
  }
}

/** The signer failed to produce a signature. */
export class SigningError extends LicenseKitError {
  constructor(
    message: string,
    options?: LicenseKitErrorOptions,
    code: LicenseKitErrorCode = LicenseKitErrorCode.SIGNING_FAILED,
  ) {
    super(code, message, options);
    this.name = 'SigningError';
  }
}

/**
 * Signature or key material could not be decoded during verification.
 * A signature that simply does not match is not an error.
 */
export class VerificationError extends LicenseKitError {
  constructor(
    message: string,
    options?: LicenseKitErrorOptions,
    code: LicenseKitErrorCode = LicenseKitErrorCode.VERIFICATION_FAILED,
  ) {
    super(code, message, options);
    this.name = 'VerificationError';
  }
}

/** Key material could not be imported or exported. */
export class KeyFormatError extends LicenseKitError {
  constructor(message: string, options?: LicenseKitErrorOptions) {
    super(LicenseKitErrorCode.INVALID_KEY, message, options);
    this.name = 'KeyFormatError';
  }
}

/** XML text was not well formed. `line` and `column` are 1-based when known. */
export class XmlParseError extends LicenseKitError {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, position?: { line: number; column: number }, options?: LicenseKitErrorOptions) {
    super(LicenseKitErrorCode.XML_PARSE_FAILED, message, {
      ...options,
      context: position ? { ...position, ...options?.context } : options?.context,
    });
    this.name = 'XmlParseError';
    this.line = position?.line;
    this.column = position?.column;
  }
}

/** A configuration file could not be used. */
export class ConfigError extends LicenseKitError {
  readonly path?: string;

  constructor(message: string, path?: string, options?: LicenseKitErrorOptions) {
    super(LicenseKitErrorCode.INVALID_CONFIG, message, {
      ...options,
      context: path !== undefined ? { path, ...options?.context } : options?.context,
    });
    this.name = 'ConfigError';
    this.path = path;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Format an error for display: code and message, then the hint when present.
 *
 * @example
 * ```typescript
 * formatError(new MalformedRecordError('Quantity', 'Quantity must be an integer'));
 * // [LK_E100] Quantity must be an integer
 * ```
 */
export function formatError(error: LicenseKitError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/** Narrow an unknown thrown value to a LicenseKitError. */
export function isLicenseKitError(value: unknown): value is LicenseKitError {
  return value instanceof LicenseKitError;
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
