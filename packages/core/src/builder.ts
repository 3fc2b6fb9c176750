import type { EcPrivateKey } from '@licensekit/crypto';

import { DEFAULT_EXPIRATION } from './date';
import { generateGuid } from './guid';
import { License } from './license';
import { signLicense } from './protocol';
import type { ProtocolOptions } from './protocol';
import { LicenseType } from './types';
import type { Customer, StringMapInput } from './types';
import { checkCount, checkExpiration, checkId, checkType } from './validate';

function isReadonlyMap(input: StringMapInput): input is ReadonlyMap<string, string> {
  return input instanceof Map;
}

function entriesOf(input: StringMapInput): Iterable<[string, string]> {
  return isReadonlyMap(input) ? input.entries() : Object.entries(input);
}

/**
 * A fluent builder for {@link License} records.
 *
 * Every setter returns `this` so calls can be chained in any order. Plain
 * setters overwrite; `with*` map and list setters replace the whole
 * collection and `add*` setters add one entry. Only type constraints are
 * checked; which fields a given license type needs is up to the caller.
 *
 * Pass maps as `Map` when key order matters and keys look like integers:
 * plain objects enumerate such keys in numeric order.
 *
 * @example
 * ```typescript
 * const license = new LicenseBuilder()
 *   .generateUniqueIdentifier()
 *   .as(LicenseType.Standard)
 *   .withMaximumUtilization(5)
 *   .licensedTo('Ada Lovelace', 'ada@example.com')
 *   .expiresAt(new Date('2030-01-01T00:00:00Z'))
 *   .addProductFeature('seats', '5')
 *   .createAndSign(privateKey);
 * ```
 */
export class LicenseBuilder {
  private _id: string | undefined;
  private _type: LicenseType | undefined;
  private _quantity = 0;
  private _expiration: Date | undefined;
  private _customer: Customer | undefined;
  private _productFeatures = new Map<string, string>();
  private _additionalAttributes = new Map<string, string>();
  private _sublicenses: License[] = [];
  private _version = 0;

  /**
   * Set the license identifier.
   *
   * @param id - A GUID in any of the usual forms (`d`, `n`, `b` or `p`).
   * @throws {LicenseBuildError} If `id` is not a GUID.
   */
  withUniqueIdentifier(id: string): this {
    this._id = checkId(id);
    return this;
  }

  /** Set a freshly generated random identifier. */
  generateUniqueIdentifier(): this {
    this._id = generateGuid();
    return this;
  }

  /**
   * Set the license type.
   *
   * @throws {LicenseBuildError} If `type` is not a {@link LicenseType}.
   */
  as(type: LicenseType): this {
    this._type = checkType(type);
    return this;
  }

  /**
   * Set the seat or usage count. 0 leaves it out of the document.
   *
   * @throws {LicenseBuildError} If `quantity` is not a non-negative safe integer.
   */
  withMaximumUtilization(quantity: number): this {
    this._quantity = checkCount('quantity', quantity);
    return this;
  }

  /**
   * Set the expiration. Milliseconds are dropped, since the document
   * carries whole seconds.
   *
   * @throws {LicenseBuildError} If `date` is invalid or outside years 1 to 9999.
   */
  expiresAt(date: Date): this {
    this._expiration = checkExpiration(date);
    return this;
  }

  /**
   * Set the customer, replacing any earlier one. Empty strings are not
   * written, so `licensedTo('', '')` reads back as a customer with neither
   * field.
   */
  licensedTo(name: string, email?: string): this {
    this._customer = email === undefined ? { name } : { name, email };
    return this;
  }

  /** Replace all product features. */
  withProductFeatures(features: StringMapInput): this {
    this._productFeatures = new Map(entriesOf(features));
    return this;
  }

  /** Add or overwrite one product feature. */
  addProductFeature(name: string, value: string): this {
    this._productFeatures.set(name, value);
    return this;
  }

  /** Replace all additional attributes. */
  withAdditionalAttributes(attributes: StringMapInput): this {
    this._additionalAttributes = new Map(entriesOf(attributes));
    return this;
  }

  /** Add or overwrite one additional attribute. */
  addAdditionalAttribute(name: string, value: string): this {
    this._additionalAttributes.set(name, value);
    return this;
  }

  /**
   * Replace all sub-licenses. Each is embedded as stored, signature
   * included, so sign children before adding them.
   */
  withSublicenses(sublicenses: Iterable<License>): this {
    this._sublicenses = [...sublicenses];
    return this;
  }

  addSublicense(sublicense: License): this {
    this._sublicenses.push(sublicense);
    return this;
  }

  /**
   * Set the document version. 0 leaves the `version` attribute out.
   *
   * @throws {LicenseBuildError} If `version` is not a non-negative safe integer.
   */
  withVersion(version: number): this {
    this._version = checkCount('version', version);
    return this;
  }

  /**
   * Reset the builder, clearing all previously set fields.
   *
   * @returns This builder instance for chaining.
   */
  reset(): this {
    this._id = undefined;
    this._type = undefined;
    this._quantity = 0;
    this._expiration = undefined;
    this._customer = undefined;
    this._productFeatures = new Map();
    this._additionalAttributes = new Map();
    this._sublicenses = [];
    this._version = 0;
    return this;
  }

  /**
   * Materialize an unsigned record. Unset expiration becomes the
   * "never expires" sentinel and unset type becomes `None`.
   */
  create(): License {
    return new License({
      id: this._id,
      type: this._type ?? LicenseType.None,
      quantity: this._quantity,
      expiration: this._expiration ?? new Date(DEFAULT_EXPIRATION),
      customer: this._customer,
      productFeatures: this._productFeatures,
      additionalAttributes: this._additionalAttributes,
      sublicenses: this._sublicenses,
      version: this._version,
    });
  }

  /**
   * {@link create} then sign.
   *
   * @throws {SigningError} When the signer fails.
   */
  createAndSign(privateKey: EcPrivateKey, options?: ProtocolOptions): License {
    return signLicense(this.create(), privateKey, options);
  }
}
