import type { XmlElement } from '@licensekit/xml';
import type { EcPrivateKey, EcPublicKey } from '@licensekit/crypto';

import { LicenseBuilder } from './builder';
import { DEFAULT_EXPIRATION, formatRfc1123 } from './date';
import { EMPTY_GUID } from './guid';
import { parseLicense, writeLicense } from './serializer';
import { checkLicenseSignature, signLicense } from './protocol';
import type { ProtocolOptions, SignatureCheck } from './protocol';
import { LicenseType } from './types';
import type { Customer, LicenseJson } from './types';
import { checkCount, checkExpiration, checkId, checkType } from './validate';

function copyCustomer(customer: Customer): Customer {
  const copy: { name?: string; email?: string } = {};
  if (customer.name !== undefined) {
    copy.name = customer.name;
  }
  if (customer.email !== undefined) {
    copy.email = customer.email;
  }
  return Object.freeze(copy);
}

/** Field values accepted by the {@link License} constructor. */
export interface LicenseFields {
  id?: string;
  type?: LicenseType;
  quantity?: number;
  /** Omitted means unset: nothing is written and the sentinel is reported. */
  expiration?: Date;
  customer?: Customer;
  productFeatures?: ReadonlyMap<string, string>;
  additionalAttributes?: ReadonlyMap<string, string>;
  sublicenses?: readonly License[];
  version?: number;
  signature?: string;
}

export interface XmlOutputOptions {
  /** Indent the output. Defaults to true. */
  pretty?: boolean;
}

/**
 * A license record.
 *
 * Instances are immutable: maps, lists, dates and the raw body are copied
 * in and handed out as copies or read-only views. Records built in memory
 * have no raw body and cannot be verified; records produced by
 * {@link License.load} (or by signing) keep the exact parsed element with
 * the signature removed, and verification runs over that element.
 *
 * @example
 * ```typescript
 * const license = License.builder()
 *   .as(LicenseType.Standard)
 *   .withMaximumUtilization(5)
 *   .createAndSign(privateKey);
 *
 * const text = license.toString();
 * License.load(text).verifySignature(publicKey); // true
 * ```
 */
export class License {
  readonly id: string;
  readonly type: LicenseType;
  readonly quantity: number;
  readonly customer: Customer | undefined;
  readonly productFeatures: ReadonlyMap<string, string>;
  readonly additionalAttributes: ReadonlyMap<string, string>;
  readonly sublicenses: readonly License[];
  readonly version: number;
  readonly signature: string | undefined;

  private readonly expirationTime: number | undefined;
  private readonly body: XmlElement | undefined;

  /**
   * Field values get the same checks as in {@link LicenseBuilder}; the
   * expiration is cut to whole seconds.
   *
   * @param rawBody - The parsed element without its signature. Only the
   *   serializer passes this.
   * @throws {LicenseBuildError} For a malformed id, type, count or expiration.
   */
  constructor(fields: LicenseFields = {}, rawBody?: XmlElement) {
    this.id = fields.id === undefined ? EMPTY_GUID : checkId(fields.id);
    this.type = fields.type === undefined ? LicenseType.None : checkType(fields.type);
    this.quantity = checkCount('quantity', fields.quantity ?? 0);
    this.expirationTime = fields.expiration ? checkExpiration(fields.expiration).getTime() : undefined;
    this.customer = fields.customer ? copyCustomer(fields.customer) : undefined;
    this.productFeatures = new Map<string, string>(fields.productFeatures ?? []);
    this.additionalAttributes = new Map<string, string>(fields.additionalAttributes ?? []);
    this.sublicenses = Object.freeze([...(fields.sublicenses ?? [])]);
    this.version = checkCount('version', fields.version ?? 0);
    this.signature = fields.signature;
    this.body = rawBody?.clone();
  }

  /** Parse persisted license text. */
  static load(text: string): License {
    return parseLicense(text);
  }

  static builder(): LicenseBuilder {
    return new LicenseBuilder();
  }

  /** The expiration instant; the sentinel when none was set. */
  get expiration(): Date {
    return new Date(this.expirationTime ?? DEFAULT_EXPIRATION);
  }

  /** Whether an `<Expiration>` element is written for this record. */
  get hasExpiration(): boolean {
    return this.expirationTime !== undefined;
  }

  get hasRawBody(): boolean {
    return this.body !== undefined;
  }

  /** A copy of the retained raw body, if this record was parsed. */
  get rawBody(): XmlElement | undefined {
    return this.body?.clone();
  }

  isExpired(now: Date = new Date()): boolean {
    return (this.expirationTime ?? DEFAULT_EXPIRATION) < now.getTime();
  }

  /** The same fields without signature or raw body. */
  withoutSignature(): License {
    return new License({ ...this.fields(), signature: undefined });
  }

  sign(privateKey: EcPrivateKey, options?: ProtocolOptions): License {
    return signLicense(this, privateKey, options);
  }

  verifySignature(publicKey: EcPublicKey, options?: ProtocolOptions): boolean {
    return checkLicenseSignature(this, publicKey, options).valid;
  }

  checkSignature(publicKey: EcPublicKey, options?: ProtocolOptions): SignatureCheck {
    return checkLicenseSignature(this, publicKey, options);
  }

  /** Field values, for copying into a new record. */
  fields(): LicenseFields {
    return {
      id: this.id,
      type: this.type,
      quantity: this.quantity,
      expiration: this.expirationTime === undefined ? undefined : new Date(this.expirationTime),
      customer: this.customer,
      productFeatures: this.productFeatures,
      additionalAttributes: this.additionalAttributes,
      sublicenses: this.sublicenses,
      version: this.version,
      signature: this.signature,
    };
  }

  toXml(options?: XmlOutputOptions): string {
    return writeLicense(this, options?.pretty ?? true);
  }

  toString(): string {
    return this.toXml();
  }

  toJSON(): LicenseJson {
    const json: LicenseJson = {
      id: this.id,
      type: this.type,
      quantity: this.quantity,
      expiration: formatRfc1123(this.expiration),
      productFeatures: Object.fromEntries(this.productFeatures),
      additionalAttributes: Object.fromEntries(this.additionalAttributes),
      sublicenses: this.sublicenses.map((s) => s.toJSON()),
      version: this.version,
    };
    if (this.customer) {
      json.customer = { ...this.customer };
    }
    if (this.signature !== undefined) {
      json.signature = this.signature;
    }
    return json;
  }
}
