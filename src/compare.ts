import type { JsonValue, OracleRecord } from './types/json.js';
import type { SignedRecord } from './types/envelope.js';
import type { ComparisonReport, FieldDifference } from './types/report.js';
import { canonicalString, compareKeys } from './canonical.js';
import { digestHex, digestRecord } from './digest.js';

function fieldValue(record: Readonly<OracleRecord>, field: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(record, field) ? record[field] : undefined;
}

function sameValue(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return canonicalString(a) === canonicalString(b);
}

/**
 * Digest both records for the headline verdict, then walk the union of their
 * top-level keys in code point order and list every field that differs.
 * A field present on one side only counts as differing. Nested values are
 * compared by canonical form, so key order inside them does not matter.
 *
 * Diagnostic only: verification never consults this.
 */
export function compareRecords(a: Readonly<OracleRecord>, b: Readonly<OracleRecord>): ComparisonReport {
  const digestA = digestHex(digestRecord(a));
  const digestB = digestHex(digestRecord(b));

  const fields = [...new Set([...Object.keys(a), ...Object.keys(b)])].sort(compareKeys);
  const differingFields: FieldDifference[] = [];
  for (const field of fields) {
    const valueA = fieldValue(a, field);
    const valueB = fieldValue(b, field);
    if (!sameValue(valueA, valueB)) {
      differingFields.push({ field, valueA, valueB });
    }
  }

  return { digestA, digestB, equal: digestA === digestB, differingFields };
}

export function compareSignedRecords(a: SignedRecord, b: SignedRecord): ComparisonReport {
  return compareRecords(a.record, b.record);
}

function renderValue(value: JsonValue | undefined): string {
  return value === undefined ? '<absent>' : canonicalString(value);
}

/** Human-readable report lines. */
export function formatComparisonReport(report: ComparisonReport): string[] {
  const lines = [
    `Digest A: ${report.digestA}`,
    `Digest B: ${report.digestB}`,
    report.equal ? 'Digests match: records are identical' : 'Digests differ: records have been modified',
  ];
  if (report.differingFields.length === 0) {
    lines.push('No field differences.');
    return lines;
  }
  lines.push('Changed fields:');
  for (const diff of report.differingFields) {
    if (diff.valueA === undefined) {
      lines.push(`  - Field '${diff.field}' added with ${renderValue(diff.valueB)}`);
    } else if (diff.valueB === undefined) {
      lines.push(`  - Field '${diff.field}' removed (was ${renderValue(diff.valueA)})`);
    } else {
      lines.push(
        `  - Field '${diff.field}' changed from ${renderValue(diff.valueA)} to ${renderValue(diff.valueB)}`,
      );
    }
  }
  return lines;
}
