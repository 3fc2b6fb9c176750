import { LicenseBuildError, isNonNegativeInteger, isValidDate } from '@licensekit/types';

import { isRepresentableDate, truncateToSeconds } from './date';
import { parseGuid } from './guid';
import { isLicenseType } from './types';
import type { LicenseType } from './types';

/** A count written as `<Quantity>` or `version`. */
export function checkCount(field: string, value: number): number {
  if (!isNonNegativeInteger(value)) {
    throw new LicenseBuildError(field, `${field} must be a non-negative integer, got ${String(value)}`);
  }
  return value;
}

/** The expiration to whole seconds. */
export function checkExpiration(date: Date): Date {
  if (!isValidDate(date) || !isRepresentableDate(date)) {
    throw new LicenseBuildError('expiration', 'Expiration must be a valid date between years 1 and 9999');
  }
  return truncateToSeconds(date);
}

/** The identifier in lowercase hyphenated form. */
export function checkId(id: string): string {
  const parsed = parseGuid(id);
  if (parsed === undefined) {
    throw new LicenseBuildError('id', `Not a valid GUID: "${id}"`);
  }
  return parsed;
}

export function checkType(type: LicenseType): LicenseType {
  if (!isLicenseType(type)) {
    throw new LicenseBuildError('type', `Unknown license type "${String(type)}"`);
  }
  return type;
}
