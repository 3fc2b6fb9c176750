import { describe, it, expect } from 'vitest';
import {
  isNonEmptyString,
  isPlainObject,
  isNonNegativeInteger,
  isValidDate,
  isStringRecord,
  isStringArray,
  assertNever,
} from './guards';

describe('isNonEmptyString', () => {
  it('rejects blank and non-string values', () => {
    expect(isNonEmptyString('a')).toBe(true);
    expect(isNonEmptyString('   ')).toBe(false);
    expect(isNonEmptyString('')).toBe(false);
    expect(isNonEmptyString(1)).toBe(false);
  });
});

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects', () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
  });

  it('rejects arrays, null, dates and primitives', () => {
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject('x')).toBe(false);
  });
});

describe('isNonNegativeInteger', () => {
  it('accepts zero and positive safe integers', () => {
    expect(isNonNegativeInteger(0)).toBe(true);
    expect(isNonNegativeInteger(5)).toBe(true);
  });

  it('rejects negatives, fractions, NaN and unsafe integers', () => {
    expect(isNonNegativeInteger(-1)).toBe(false);
    expect(isNonNegativeInteger(1.5)).toBe(false);
    expect(isNonNegativeInteger(Number.NaN)).toBe(false);
    expect(isNonNegativeInteger(2 ** 53)).toBe(false);
    expect(isNonNegativeInteger('5')).toBe(false);
  });
});

describe('isValidDate', () => {
  it('rejects invalid dates', () => {
    expect(isValidDate(new Date(0))).toBe(true);
    expect(isValidDate(new Date('nope'))).toBe(false);
    expect(isValidDate('2030-01-01')).toBe(false);
  });
});

describe('isStringRecord / isStringArray', () => {
  it('requires every value to be a string', () => {
    expect(isStringRecord({ seats: '5' })).toBe(true);
    expect(isStringRecord({ seats: 5 })).toBe(false);
    expect(isStringArray(['a', 'b'])).toBe(true);
    expect(isStringArray(['a', 1])).toBe(false);
    expect(isStringArray('a')).toBe(false);
  });
});

describe('assertNever', () => {
  it('throws with the unexpected value', () => {
    expect(() => assertNever('x' as never)).toThrow('Unexpected value: x');
  });
});
