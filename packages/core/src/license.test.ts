import { describe, it, expect } from 'vitest';
import { generateKeyPair } from '@licensekit/crypto';
import { LicenseBuildError } from '@licensekit/types';

import { LicenseBuilder } from './builder';
import { License } from './license';
import { LicenseType } from './types';

const ID = '0a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d';

describe('License', () => {
  it('builder() starts a new builder', () => {
    expect(License.builder()).toBeInstanceOf(LicenseBuilder);
  });

  it('writes indented text by default', () => {
    const license = License.builder().as(LicenseType.Trial).create();
    expect(license.toString()).toBe(
      '<License>\n  <Type>Trial</Type>\n  <Expiration>Fri, 31 Dec 9999 23:59:59 GMT</Expiration>\n</License>',
    );
    expect(license.toXml({ pretty: false })).toBe(
      '<License><Type>Trial</Type><Expiration>Fri, 31 Dec 9999 23:59:59 GMT</Expiration></License>',
    );
  });

  it('isExpired compares against the expiration', () => {
    const license = License.builder().expiresAt(new Date('2030-01-01T00:00:00Z')).create();
    expect(license.isExpired(new Date('2029-12-31T23:59:59Z'))).toBe(false);
    expect(license.isExpired(new Date('2030-01-01T00:00:01Z'))).toBe(true);
    expect(License.builder().create().isExpired(new Date(Date.UTC(9999, 0, 1)))).toBe(false);
  });

  it('hands out copies of mutable state', () => {
    const features = new Map([['seats', '5']]);
    const license = License.load(new License({ productFeatures: features, quantity: 1 }).toString());
    features.set('seats', '6');

    license.expiration.setTime(0);
    expect(license.expiration.getTime()).not.toBe(0);

    license.rawBody?.setValue('changed');
    expect(license.rawBody?.element('Quantity')?.value).toBe('1');

    const direct = new License({ productFeatures: features });
    features.clear();
    expect(direct.productFeatures.get('seats')).toBe('6');
  });

  it('withoutSignature drops the signature and raw body', () => {
    const signed = License.builder().withMaximumUtilization(3).createAndSign(generateKeyPair().privateKey);
    const stripped = signed.withoutSignature();
    expect(stripped.signature).toBeUndefined();
    expect(stripped.hasRawBody).toBe(false);
    expect(stripped.quantity).toBe(3);
    expect(signed.signature).toBeDefined();
  });

  it('sign and checkSignature delegate to the protocol', () => {
    const keys = generateKeyPair();
    const signed = License.builder().create().sign(keys.privateKey);
    expect(signed.checkSignature(keys.publicKey)).toEqual({ valid: true, reason: 'valid' });
  });

  it('toJSON gives a plain view', () => {
    const license = License.builder()
      .withUniqueIdentifier(ID)
      .as(LicenseType.Trial)
      .withMaximumUtilization(3)
      .licensedTo('Ada')
      .addProductFeature('seats', '3')
      .create();
    expect(license.toJSON()).toEqual({
      id: ID,
      type: 'Trial',
      quantity: 3,
      expiration: 'Fri, 31 Dec 9999 23:59:59 GMT',
      customer: { name: 'Ada' },
      productFeatures: { seats: '3' },
      additionalAttributes: {},
      sublicenses: [],
      version: 0,
    });
  });
});

describe('License constructor', () => {
  function fieldOf(fn: () => unknown): string {
    try {
      fn();
    } catch (err) {
      if (err instanceof LicenseBuildError) {
        return err.field;
      }
      throw err;
    }
    throw new Error('expected a LicenseBuildError');
  }

  it.each<[string, () => License]>([
    ['quantity', () => new License({ quantity: 1.5 })],
    ['quantity', () => new License({ quantity: -1 })],
    ['version', () => new License({ version: Number.NaN })],
    ['id', () => new License({ id: 'not-a-guid' })],
    ['expiration', () => new License({ expiration: new Date('garbage') })],
    ['expiration', () => new License({ expiration: new Date(Date.UTC(10000, 0, 1)) })],
  ])('rejects a bad %s like the builder does', (field, make) => {
    expect(fieldOf(make)).toBe(field);
  });

  it('normalizes the id and cuts the expiration to whole seconds', () => {
    const license = new License({
      id: ID.toUpperCase(),
      expiration: new Date('2030-01-01T00:00:00.750Z'),
    });
    expect(license.id).toBe(ID);
    expect(license.expiration.toISOString()).toBe('2030-01-01T00:00:00.000Z');
  });

  it('reads an all-empty customer back without fields', () => {
    const license = License.builder().licensedTo('', '').create();
    expect(license.toJSON().customer).toEqual({ name: '', email: '' });
    expect(License.load(license.toString()).toJSON().customer).toEqual({});
  });
});
