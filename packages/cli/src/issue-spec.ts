/**
 * The JSON document read by `licensekit issue --spec <file>`.
 *
 * ```json
 * {
 *   "generateId": true,
 *   "type": "Standard",
 *   "quantity": 5,
 *   "expiration": "2030-01-01T00:00:00Z",
 *   "customer": { "name": "Ada Lovelace", "email": "ada@example.com" },
 *   "features": { "seats": "5" },
 *   "attributes": { "region": "eu" },
 *   "version": 1,
 *   "sublicenses": ["addon.license.xml"]
 * }
 * ```
 *
 * @packageDocumentation
 */

import { LicenseBuilder, parseLicenseType } from '@licensekit/core';
import {
  LicenseBuildError,
  isNonEmptyString,
  isPlainObject,
  isStringArray,
  isStringRecord,
} from '@licensekit/types';

export interface IssueSpec {
  id?: string;
  generateId?: boolean;
  type?: string;
  quantity?: number;
  /** Anything `new Date()` reads; ISO 8601 is expected. */
  expiration?: string;
  customer?: { name: string; email?: string };
  features?: Record<string, string>;
  attributes?: Record<string, string>;
  version?: number;
  /** License files to embed, relative to the spec file. */
  sublicenses?: string[];
}

const FIELDS = [
  'id',
  'generateId',
  'type',
  'quantity',
  'expiration',
  'customer',
  'features',
  'attributes',
  'version',
  'sublicenses',
];

function wrongType(field: string, what: string): LicenseBuildError {
  return new LicenseBuildError(field, `"${field}" must be ${what}`);
}

/**
 * Check the shape of a parsed spec. Value ranges are left to the builder.
 *
 * @throws {LicenseBuildError} Naming the offending field.
 */
export function parseIssueSpec(raw: unknown): IssueSpec {
  if (!isPlainObject(raw)) {
    throw new LicenseBuildError('spec', 'Issue spec must be a JSON object');
  }
  for (const key of Object.keys(raw)) {
    if (!FIELDS.includes(key)) {
      throw new LicenseBuildError(key, `Unknown field "${key}"`, { hint: `Known fields: ${FIELDS.join(', ')}.` });
    }
  }

  const spec: IssueSpec = {};
  const { id, generateId, type, quantity, expiration, customer, features, attributes, version, sublicenses } = raw;

  if (id !== undefined) {
    if (typeof id !== 'string') {
      throw wrongType('id', 'a string');
    }
    spec.id = id;
  }
  if (generateId !== undefined) {
    if (typeof generateId !== 'boolean') {
      throw wrongType('generateId', 'true or false');
    }
    spec.generateId = generateId;
  }
  if (type !== undefined) {
    if (typeof type !== 'string') {
      throw wrongType('type', 'a string');
    }
    spec.type = type;
  }
  if (quantity !== undefined) {
    if (typeof quantity !== 'number') {
      throw wrongType('quantity', 'a number');
    }
    spec.quantity = quantity;
  }
  if (expiration !== undefined) {
    if (typeof expiration !== 'string') {
      throw wrongType('expiration', 'a date string');
    }
    spec.expiration = expiration;
  }
  if (customer !== undefined) {
    if (!isPlainObject(customer)) {
      throw wrongType('customer', 'an object with a "name"');
    }
    const { name, email } = customer;
    if (!isNonEmptyString(name)) {
      throw wrongType('customer.name', 'a non-empty string');
    }
    if (email !== undefined && typeof email !== 'string') {
      throw wrongType('customer.email', 'a string');
    }
    spec.customer = email === undefined ? { name } : { name, email };
  }
  if (features !== undefined) {
    if (!isStringRecord(features)) {
      throw wrongType('features', 'an object of string values');
    }
    spec.features = features;
  }
  if (attributes !== undefined) {
    if (!isStringRecord(attributes)) {
      throw wrongType('attributes', 'an object of string values');
    }
    spec.attributes = attributes;
  }
  if (version !== undefined) {
    if (typeof version !== 'number') {
      throw wrongType('version', 'a number');
    }
    spec.version = version;
  }
  if (sublicenses !== undefined) {
    if (!isStringArray(sublicenses)) {
      throw wrongType('sublicenses', 'a list of file paths');
    }
    spec.sublicenses = sublicenses;
  }
  return spec;
}

/**
 * Apply a spec to a builder. Sub-licenses are added separately, since
 * they have to be read from disk first.
 *
 * @throws {LicenseBuildError} For an unknown type or any value the builder rejects.
 */
export function applyIssueSpec(spec: IssueSpec, builder: LicenseBuilder = new LicenseBuilder()): LicenseBuilder {
  if (spec.id !== undefined) {
    builder.withUniqueIdentifier(spec.id);
  } else if (spec.generateId) {
    builder.generateUniqueIdentifier();
  }
  if (spec.type !== undefined) {
    const type = parseLicenseType(spec.type);
    if (type === undefined) {
      throw new LicenseBuildError('type', `Unknown license type "${spec.type}"`);
    }
    builder.as(type);
  }
  if (spec.quantity !== undefined) {
    builder.withMaximumUtilization(spec.quantity);
  }
  if (spec.expiration !== undefined) {
    builder.expiresAt(new Date(spec.expiration));
  }
  if (spec.customer) {
    builder.licensedTo(spec.customer.name, spec.customer.email);
  }
  if (spec.features) {
    builder.withProductFeatures(spec.features);
  }
  if (spec.attributes) {
    builder.withAdditionalAttributes(spec.attributes);
  }
  if (spec.version !== undefined) {
    builder.withVersion(spec.version);
  }
  return builder;
}
