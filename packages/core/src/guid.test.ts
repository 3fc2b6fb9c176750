import { describe, it, expect } from 'vitest';

import { EMPTY_GUID, generateGuid, isEmptyGuid, parseGuid } from './guid';

const NORMALIZED = '6f9619ff-8b86-d011-b42d-00cf4fc964ff';

describe('parseGuid', () => {
  it.each([
    ['hyphenated', '6F9619FF-8B86-D011-B42D-00CF4FC964FF'],
    ['bare digits', '6F9619FF8B86D011B42D00CF4FC964FF'],
    ['braces', '{6f9619ff-8b86-d011-b42d-00cf4fc964ff}'],
    ['parentheses', '(6f9619ff-8b86-d011-b42d-00cf4fc964ff)'],
    ['surrounding whitespace', '  6f9619ff-8b86-d011-b42d-00cf4fc964ff\n'],
  ])('normalizes the %s form', (_label, text) => {
    expect(parseGuid(text)).toBe(NORMALIZED);
  });

  it.each(['', 'not-a-guid', '{6f9619ff-8b86-d011-b42d-00cf4fc964ff)', '6f9619ff8b86-d011-b42d-00cf4fc964ff', 'g'.repeat(32)])(
    'rejects %j',
    (text) => {
      expect(parseGuid(text)).toBeUndefined();
    },
  );
});

describe('generateGuid', () => {
  it('produces random version 4 identifiers', () => {
    const id = generateGuid();
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(generateGuid()).not.toBe(id);
    expect(parseGuid(id)).toBe(id);
  });
});

describe('isEmptyGuid', () => {
  it('recognises only the all-zero identifier', () => {
    expect(isEmptyGuid(EMPTY_GUID)).toBe(true);
    expect(isEmptyGuid(NORMALIZED)).toBe(false);
  });
});
