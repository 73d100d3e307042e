import type { JsonValue } from './json.js';

export interface FieldDifference {
  field: string;
  /** undefined when the field is absent from the first record */
  valueA: JsonValue | undefined;
  valueB: JsonValue | undefined;
}

export interface ComparisonReport {
  digestA: string;
  digestB: string;
  equal: boolean;
  differingFields: FieldDifference[];
}

export type VerifyFailureReason =
  | 'malformed-digest'
  | 'malformed-signature'
  | 'malformed-public-key'
  | 'bad-signature';

export type VerifyResult =
  | { valid: true }
  | { valid: false; reason: VerifyFailureReason; detail?: string };
