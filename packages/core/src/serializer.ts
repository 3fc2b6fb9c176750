/**
 * Canonical XML form of a license.
 *
 * The element order and omission rules below are the compatibility
 * contract: the bytes a signer produced must be reproducible by every
 * verifier.
 *
 * ```xml
 * <License version="N">
 *   <Id/> <Type/> <Quantity/> <Customer/> <LicenseAttributes/>
 *   <Expiration/> <ProductFeatures/> <Sublicenses/> <Signature/>
 * </License>
 * ```
 *
 * @packageDocumentation
 */

import { MalformedRecordError, XmlParseError, createDebugLogger } from '@licensekit/types';
import { XmlElement, parseXml, writeXml } from '@licensekit/xml';

import { DEFAULT_EXPIRATION, formatRfc1123, parseRfc1123 } from './date';
import { isEmptyGuid, parseGuid } from './guid';
import { License } from './license';
import type { LicenseFields } from './license';
import { LicenseType, parseLicenseType } from './types';
import type { Customer } from './types';

const dbg = createDebugLogger('licensekit:core');

/** Result of {@link fromDocument}. */
export interface ParsedLicense {
  license: License;
  /** The parsed element with its `Signature` removed. */
  rawBody: XmlElement;
}

// ─── Writing ────────────────────────────────────────────────────────────────────

function mapBlock(blockName: string, itemName: string, entries: ReadonlyMap<string, string>): XmlElement {
  const block = new XmlElement(blockName);
  for (const [name, value] of entries) {
    block.append(XmlElement.withText(itemName, value, { name }));
  }
  return block;
}

function customerElement(customer: Customer): XmlElement {
  const element = new XmlElement('Customer');
  if (customer.name) {
    element.append(XmlElement.withText('Name', customer.name));
  }
  if (customer.email) {
    element.append(XmlElement.withText('Email', customer.email));
  }
  return element;
}

/**
 * Build the canonical element for a record's fields.
 *
 * Fields equal to their defaults are left out, so an all-default record is
 * `<License />`. Sub-licenses are embedded with their own signatures
 * (see {@link persistedForm}).
 */
export function toCanonicalForm(license: License, includeSignature: boolean): XmlElement {
  const root = new XmlElement('License');

  if (!isEmptyGuid(license.id)) {
    root.append(XmlElement.withText('Id', license.id));
  }
  if (license.type !== LicenseType.None) {
    root.append(XmlElement.withText('Type', license.type));
  }
  if (license.quantity !== 0) {
    root.append(XmlElement.withText('Quantity', String(license.quantity)));
  }
  if (license.customer) {
    root.append(customerElement(license.customer));
  }
  if (license.additionalAttributes.size > 0) {
    root.append(mapBlock('LicenseAttributes', 'Attribute', license.additionalAttributes));
  }
  if (license.hasExpiration) {
    root.append(XmlElement.withText('Expiration', formatRfc1123(license.expiration)));
  }
  if (license.productFeatures.size > 0) {
    root.append(mapBlock('ProductFeatures', 'Feature', license.productFeatures));
  }
  if (license.sublicenses.length > 0) {
    const block = new XmlElement('Sublicenses');
    for (const sublicense of license.sublicenses) {
      block.append(persistedForm(sublicense));
    }
    root.append(block);
  }

  if (license.version > 0) {
    root.setAttribute('version', String(license.version));
  }
  if (includeSignature && license.signature) {
    root.append(XmlElement.withText('Signature', license.signature));
  }
  return root;
}

/**
 * The element a record is stored as: its raw body when it was parsed,
 * its canonical form otherwise, followed by its signature.
 */
export function persistedForm(license: License): XmlElement {
  const element = license.rawBody ?? toCanonicalForm(license, false);
  if (license.signature) {
    element.append(XmlElement.withText('Signature', license.signature));
  }
  return element;
}

export function writeLicense(license: License, pretty: boolean): string {
  return writeXml(persistedForm(license), { pretty });
}

// ─── Reading ────────────────────────────────────────────────────────────────────

function childPath(path: string, name: string): string {
  return path ? `${path}.${name}` : name;
}

function parseCount(text: string, field: string): number {
  const trimmed = text.trim();
  const value = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(value)) {
    throw new MalformedRecordError(field, `${field} must be a non-negative integer, got "${text}"`);
  }
  return value;
}

function readMap(
  block: XmlElement | undefined,
  itemName: string,
  field: string,
): Map<string, string> | undefined {
  if (!block) {
    return undefined;
  }
  const entries = new Map<string, string>();
  block.elements(itemName).forEach((item, index) => {
    const name = item.attribute('name');
    const itemField = `${field}.${itemName}[${index}]`;
    if (name === undefined) {
      throw new MalformedRecordError(itemField, `${itemName} has no "name" attribute`);
    }
    if (entries.has(name)) {
      throw new MalformedRecordError(itemField, `Duplicate ${itemName} "${name}"`);
    }
    entries.set(name, item.value);
  });
  return entries;
}

function readCustomer(element: XmlElement | undefined): Customer | undefined {
  if (!element) {
    return undefined;
  }
  return {
    name: element.element('Name')?.value,
    email: element.element('Email')?.value,
  };
}

function detachSignature(body: XmlElement, path: string): string | undefined {
  const signatures = body.elements('Signature');
  if (signatures.length === 0) {
    return undefined;
  }
  const field = childPath(path, 'Signature');
  if (signatures.length > 1) {
    throw new MalformedRecordError(field, 'License has more than one Signature element');
  }
  const [signature] = signatures;
  const children = body.elements();
  if (children[children.length - 1] !== signature) {
    throw new MalformedRecordError(field, 'Signature must be the last element of a License');
  }
  body.remove(signature);
  return signature.value;
}

/**
 * Read a record from a `<License>` element.
 *
 * The element is not modified. Missing elements take their defaults;
 * present but malformed ones fail the whole record, sub-licenses included.
 *
 * @param path - Field path prefix used in error messages for nested records.
 * @throws {MalformedRecordError}
 */
export function fromDocument(element: XmlElement, path = ''): ParsedLicense {
  if (element.name !== 'License') {
    throw new MalformedRecordError(path || 'License', `Expected a <License> element, got <${element.name}>`);
  }

  const body = element.clone();
  const signature = detachSignature(body, path);
  const fields: LicenseFields = { signature };

  const version = body.attribute('version');
  if (version !== undefined) {
    fields.version = parseCount(version, childPath(path, 'version'));
  }

  const id = body.element('Id');
  if (id) {
    const parsed = parseGuid(id.value);
    if (parsed === undefined) {
      throw new MalformedRecordError(childPath(path, 'Id'), `Id is not a valid GUID: "${id.value}"`);
    }
    fields.id = parsed;
  }

  const type = body.element('Type');
  if (type) {
    const parsed = parseLicenseType(type.value);
    if (parsed === undefined) {
      throw new MalformedRecordError(childPath(path, 'Type'), `Unknown license type "${type.value}"`, {
        hint: `Expected one of ${Object.values(LicenseType).join(', ')}.`,
      });
    }
    fields.type = parsed;
  }

  const quantity = body.element('Quantity');
  if (quantity) {
    fields.quantity = parseCount(quantity.value, childPath(path, 'Quantity'));
  }

  const expiration = body.element('Expiration');
  if (expiration) {
    if (expiration.value === '') {
      fields.expiration = new Date(DEFAULT_EXPIRATION);
    } else {
      const parsed = parseRfc1123(expiration.value);
      if (!parsed) {
        throw new MalformedRecordError(
          childPath(path, 'Expiration'),
          `Expiration is not an RFC 1123 date: "${expiration.value}"`,
          { hint: 'Dates are written like "Tue, 01 Jan 2030 00:00:00 GMT".' },
        );
      }
      fields.expiration = parsed;
    }
  }

  fields.customer = readCustomer(body.element('Customer'));
  fields.additionalAttributes = readMap(
    body.element('LicenseAttributes'),
    'Attribute',
    childPath(path, 'LicenseAttributes'),
  );
  fields.productFeatures = readMap(body.element('ProductFeatures'), 'Feature', childPath(path, 'ProductFeatures'));

  const sublicenses = body.element('Sublicenses');
  if (sublicenses) {
    fields.sublicenses = sublicenses
      .elements('License')
      .map((child, index) => fromDocument(child, childPath(path, `Sublicenses[${index}]`)).license);
  }

  return { license: new License(fields, body), rawBody: body };
}

/**
 * Parse persisted license text.
 *
 * @throws {MalformedRecordError} When the text is not well-formed XML or
 *   any field is malformed.
 */
export function parseLicense(text: string): License {
  let root: XmlElement;
  try {
    root = parseXml(text);
  } catch (err) {
    if (err instanceof XmlParseError) {
      throw new MalformedRecordError('License', `License is not well-formed XML: ${err.message}`, {
        context: err.context,
        cause: err,
      });
    }
    throw err;
  }

  try {
    return fromDocument(root).license;
  } catch (err) {
    if (err instanceof MalformedRecordError) {
      dbg.warn('malformed license', err.field, err.message);
    }
    throw err;
  }
}
