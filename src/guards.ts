import type { JsonObject, JsonValue, OracleRecord } from './types/json.js';
import type { KeystoreFile } from './types/keys.js';
import type { SignedRecordFile } from './types/envelope.js';
import { SIGNED_RECORD_FIELDS } from './versions.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Type guard for JsonValue. Rejects non-finite numbers, undefined members
 * and non-plain objects, i.e. anything canonicalString() would throw on.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isPlainObject(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isPlainObject(value) && isJsonValue(value);
}

/** A record is any JSON object; the alias keeps call sites readable. */
export function isOracleRecord(value: unknown): value is OracleRecord {
  return isJsonObject(value);
}

export function isKeystoreFile(value: unknown): value is KeystoreFile {
  if (!isPlainObject(value)) return false;
  return typeof value.private_key === 'string' && typeof value.public_key === 'string';
}

/** Structural check of the on-disk envelope. Does not decode or verify. */
export function isSignedRecordFile(value: unknown): value is SignedRecordFile {
  if (!isPlainObject(value)) return false;
  return (
    isJsonObject(value.data) &&
    typeof value.signature === 'string' &&
    typeof value.public_key === 'string'
  );
}

/**
 * A signed-record file with no other top-level fields. Use this to tell a
 * signed file from a bare record that happens to carry the same three keys.
 */
export function isExactSignedRecordFile(value: unknown): value is SignedRecordFile {
  if (!isSignedRecordFile(value)) return false;
  const known: readonly string[] = SIGNED_RECORD_FIELDS;
  const keys = Object.keys(value);
  return keys.length === known.length && keys.every(key => known.includes(key));
}
