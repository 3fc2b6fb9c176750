/**
 * Value types of the license document model.
 *
 * @packageDocumentation
 */

/** License categories. The string values are the `<Type>` tokens. */
export enum LicenseType {
  None = 'None',
  Trial = 'Trial',
  Standard = 'Standard',
  Unrestricted = 'Unrestricted',
}

const LICENSE_TYPES: readonly LicenseType[] = [
  LicenseType.None,
  LicenseType.Trial,
  LicenseType.Standard,
  LicenseType.Unrestricted,
];

export function isLicenseType(value: unknown): value is LicenseType {
  return LICENSE_TYPES.some((t) => t === value);
}

/**
 * Resolve a `<Type>` token. Matching is case-insensitive on the names and
 * ignores surrounding whitespace; anything else yields `undefined`.
 */
export function parseLicenseType(token: string): LicenseType | undefined {
  const wanted = token.trim().toLowerCase();
  return LICENSE_TYPES.find((t) => t.toLowerCase() === wanted);
}

/**
 * The licensee. Both fields are optional; a customer with neither is still
 * written (as `<Customer />`), which differs from having no customer.
 */
export interface Customer {
  readonly name?: string;
  readonly email?: string;
}

/** A string map given either as a plain object or a `Map`. */
export type StringMapInput = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

/** Plain JSON view of a license, as returned by `License#toJSON`. */
export interface LicenseJson {
  id: string;
  type: LicenseType;
  quantity: number;
  expiration: string;
  customer?: { name?: string; email?: string };
  productFeatures: Record<string, string>;
  additionalAttributes: Record<string, string>;
  sublicenses: LicenseJson[];
  version: number;
  signature?: string;
}
