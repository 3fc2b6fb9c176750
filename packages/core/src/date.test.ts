import { describe, it, expect } from 'vitest';

import {
  DEFAULT_EXPIRATION,
  DEFAULT_EXPIRATION_STRING,
  formatRfc1123,
  parseRfc1123,
  isRepresentableDate,
  truncateToSeconds,
} from './date';

describe('formatRfc1123', () => {
  it('writes day, date, month, year and time in GMT', () => {
    expect(formatRfc1123(new Date(Date.UTC(2030, 0, 1)))).toBe('Tue, 01 Jan 2030 00:00:00 GMT');
    expect(formatRfc1123(new Date(Date.UTC(2024, 1, 29, 7, 5, 9)))).toBe('Thu, 29 Feb 2024 07:05:09 GMT');
  });

  it('writes the sentinel as the fixed string', () => {
    expect(formatRfc1123(new Date(DEFAULT_EXPIRATION))).toBe(DEFAULT_EXPIRATION_STRING);
  });

  it('drops milliseconds', () => {
    expect(formatRfc1123(new Date(Date.UTC(2030, 0, 1, 0, 0, 0, 999)))).toBe('Tue, 01 Jan 2030 00:00:00 GMT');
  });

  it('pads years below 1000 to four digits', () => {
    const date = new Date(0);
    date.setUTCFullYear(999, 0, 1);
    expect(formatRfc1123(date)).toContain(' Jan 0999 00:00:00 GMT');
    expect(parseRfc1123(formatRfc1123(date))?.getTime()).toBe(date.getTime());
  });
});

describe('parseRfc1123', () => {
  it('reads what formatRfc1123 writes', () => {
    expect(parseRfc1123('Tue, 01 Jan 2030 00:00:00 GMT')?.getTime()).toBe(Date.UTC(2030, 0, 1));
    expect(parseRfc1123(DEFAULT_EXPIRATION_STRING)?.getTime()).toBe(DEFAULT_EXPIRATION);
  });

  it.each([
    ['ISO 8601', '2030-01-01T00:00:00Z'],
    ['a wrong day of week', 'Wed, 01 Jan 2030 00:00:00 GMT'],
    ['an impossible date', 'Sat, 30 Feb 2030 00:00:00 GMT'],
    ['hour 24', 'Tue, 01 Jan 2030 24:00:00 GMT'],
    ['a single-digit day', 'Tue, 1 Jan 2030 00:00:00 GMT'],
    ['a lowercase day name', 'tue, 01 Jan 2030 00:00:00 GMT'],
    ['another zone', 'Tue, 01 Jan 2030 00:00:00 UTC'],
    ['trailing text', 'Tue, 01 Jan 2030 00:00:00 GMT '],
    ['year zero', 'Sat, 01 Jan 0000 00:00:00 GMT'],
  ])('rejects %s', (_label, text) => {
    expect(parseRfc1123(text)).toBeUndefined();
  });
});

describe('isRepresentableDate', () => {
  it('accepts four-digit years only', () => {
    expect(isRepresentableDate(new Date(0))).toBe(true);
    expect(isRepresentableDate(new Date(DEFAULT_EXPIRATION))).toBe(true);
    expect(isRepresentableDate(new Date(Date.UTC(10000, 0, 1)))).toBe(false);
    expect(isRepresentableDate(new Date(Number.NaN))).toBe(false);
  });
});

describe('truncateToSeconds', () => {
  it('rounds toward the earlier second', () => {
    expect(truncateToSeconds(new Date(1500)).getTime()).toBe(1000);
    expect(truncateToSeconds(new Date(-1500)).getTime()).toBe(-2000);
  });
});
