import { SENTIMENT_LABELS } from './types/sentiment.js';
import { KEY_LENGTH, KEYSTORE_FIELDS, SIGNATURE_LENGTH, SIGNED_RECORD_FIELDS } from './versions.js';
import { decodeBase64 } from './encoding.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const ISO_8601_LOOSE = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:?\d{2})?)?$/;

const TEXT_FIELDS = ['text', 'content'] as const;
const TIMESTAMP_FIELDS = ['date', 'timestamp', 'created_at'] as const;

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/** Collect every location holding a value canonicalString() would reject. */
function findNonJsonValues(value: unknown, path: string, errors: string[]): void {
  if (value === null) return;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return;
    case 'number':
      if (!Number.isFinite(value)) errors.push(`Non-finite number at ${path}`);
      return;
    case 'object':
      if (Array.isArray(value)) {
        value.forEach((item: unknown, i) => findNonJsonValues(item, `${path}[${i}]`, errors));
        return;
      }
      {
        const proto: unknown = Object.getPrototypeOf(value);
        if (proto !== Object.prototype && proto !== null) {
          errors.push(`Non-plain object at ${path}`);
          return;
        }
      }
      for (const [key, val] of Object.entries(value)) {
        findNonJsonValues(val, `${path}.${key}`, errors);
      }
      return;
    default:
      errors.push(`Unsupported ${typeof value} at ${path}`);
  }
}

function checkBase64Field(
  obj: Record<string, unknown>,
  field: string,
  expectedLength: number,
  errors: string[],
  lengthProblems: string[],
): void {
  const value = obj[field];
  if (typeof value !== 'string') {
    errors.push(`Missing or invalid field: ${field}`);
    return;
  }
  const bytes = decodeBase64(value);
  if (bytes === null) {
    errors.push(`${field} is not valid base64`);
  } else if (bytes.length !== expectedLength) {
    lengthProblems.push(`${field} must decode to ${expectedLength} bytes, got ${bytes.length}`);
  }
}

function checkSentimentConventions(record: Record<string, unknown>, warnings: string[]): void {
  if (typeof record.id !== 'string') {
    warnings.push('id should be a string');
  }
  if (!TEXT_FIELDS.some(f => typeof record[f] === 'string')) {
    warnings.push(`No text field (expected one of: ${TEXT_FIELDS.join(', ')})`);
  }
  const tsField = TIMESTAMP_FIELDS.find(f => record[f] !== undefined);
  if (tsField === undefined) {
    warnings.push(`No timestamp field (expected one of: ${TIMESTAMP_FIELDS.join(', ')})`);
  } else {
    const ts = record[tsField];
    if (typeof ts !== 'string' || !ISO_8601_LOOSE.test(ts)) {
      warnings.push(`${tsField} does not look like ISO 8601`);
    }
  }
  if (record.label !== undefined) {
    if (typeof record.label !== 'string') {
      warnings.push('label should be a string');
    } else if (!SENTIMENT_LABELS.some(l => l === record.label)) {
      warnings.push(`label "${record.label}" is not one of ${SENTIMENT_LABELS.join(', ')}`);
    }
  }
  if (record.score !== undefined) {
    if (typeof record.score !== 'number') {
      warnings.push('score should be a number');
    } else if (record.score < 0 || record.score > 1) {
      warnings.push(`score ${record.score} is outside 0.0-1.0`);
    }
  }
}

/**
 * A record must be a JSON object whose every value canonicalizes.
 * Collaborator conventions (id, text, timestamp, label, score) only warn:
 * the integrity core treats the record as opaque.
 */
export function validateRecord(input: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isObject(input)) {
    return { valid: false, errors: ['Record must be a JSON object'], warnings };
  }

  findNonJsonValues(input, '$', errors);
  checkSentimentConventions(input, warnings);

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Keystore files are strict: both keys present, valid base64, exactly 32 bytes.
 */
export function validateKeystoreFile(input: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isObject(input)) {
    return { valid: false, errors: ['Keystore must be a JSON object'], warnings };
  }

  const lengthErrors: string[] = [];
  for (const field of KEYSTORE_FIELDS) {
    checkBase64Field(input, field, KEY_LENGTH, errors, lengthErrors);
  }
  errors.push(...lengthErrors);

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Structural validation of a signed-record file. No signature verification.
 * Wrong decoded lengths are warnings: the verifier reports them as a failed
 * verification rather than a malformed file.
 */
export function validateSignedRecordFile(input: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isObject(input)) {
    return { valid: false, errors: ['Signed record must be a JSON object'], warnings };
  }

  if (!isObject(input.data)) {
    errors.push('Missing or invalid field: data (must be an object)');
  } else {
    findNonJsonValues(input.data, 'data', errors);
  }
  checkBase64Field(input, 'signature', SIGNATURE_LENGTH, errors, warnings);
  checkBase64Field(input, 'public_key', KEY_LENGTH, errors, warnings);

  const known: readonly string[] = SIGNED_RECORD_FIELDS;
  for (const key of Object.keys(input)) {
    if (!known.includes(key)) warnings.push(`Unknown field ignored: ${key}`);
  }

  return { valid: errors.length === 0, errors, warnings };
}
