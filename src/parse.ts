import type { OracleRecord } from './types/json.js';
import type { Keypair, KeystoreFile } from './types/keys.js';
import type { SignedRecord, SignedRecordFile } from './types/envelope.js';
import { validateKeystoreFile, validateRecord, validateSignedRecordFile } from './validate.js';
import { isKeystoreFile, isOracleRecord, isSignedRecordFile } from './guards.js';
import { bytesEqual, decodeBase64, encodeBase64 } from './encoding.js';
import { derivePublicKey } from './sign.js';
import { OracleError, ValidationError } from './errors.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: OracleError };

function invalid(what: string, errors: string[]): { ok: false; error: ValidationError } {
  return { ok: false, error: new ValidationError(`Invalid ${what}: ${errors.join('; ')}`, errors) };
}

/** Parse JSON text without throwing. */
export function parseJson(text: string): ParseResult<unknown> {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: new OracleError('Not valid JSON', { cause: err }) };
  }
}

/** Parse an unknown input into an OracleRecord. */
export function parseRecord(input: unknown): ParseResult<OracleRecord> {
  const validation = validateRecord(input);
  if (!validation.valid || !isOracleRecord(input)) {
    return invalid('record', validation.errors);
  }
  return { ok: true, value: input };
}

/**
 * Parse a keystore document into raw key bytes.
 * Rejects a public key that does not belong to the private key.
 */
export function parseKeystore(input: unknown): ParseResult<Keypair> {
  const validation = validateKeystoreFile(input);
  if (!validation.valid || !isKeystoreFile(input)) {
    return invalid('keystore', validation.errors);
  }

  const privateKey = decodeBase64(input.private_key);
  const publicKey = decodeBase64(input.public_key);
  // validation already guarantees both decode
  if (privateKey === null || publicKey === null) {
    return invalid('keystore', ['key is not valid base64']);
  }

  if (!bytesEqual(derivePublicKey(privateKey), publicKey)) {
    return invalid('keystore', ['public_key does not match private_key']);
  }
  return { ok: true, value: { privateKey, publicKey } };
}

export function toKeystoreFile(keypair: Keypair): KeystoreFile {
  return {
    private_key: encodeBase64(keypair.privateKey),
    public_key: encodeBase64(keypair.publicKey),
  };
}

/**
 * Parse an on-disk signed-record document.
 * Single dispatch: validate structure -> decode -> return typed or error.
 * Signature and key lengths are left for the verifier to judge.
 */
export function parseSignedRecordFile(input: unknown): ParseResult<SignedRecord> {
  const validation = validateSignedRecordFile(input);
  if (!validation.valid || !isSignedRecordFile(input) || !isOracleRecord(input.data)) {
    return invalid('signed record', validation.errors);
  }

  const signature = decodeBase64(input.signature);
  const publicKey = decodeBase64(input.public_key);
  if (signature === null || publicKey === null) {
    return invalid('signed record', ['signature or public_key is not valid base64']);
  }

  return { ok: true, value: { record: input.data, signature, publicKey } };
}

export function toSignedRecordFile(envelope: SignedRecord): SignedRecordFile {
  return {
    data: envelope.record,
    signature: encodeBase64(envelope.signature),
    public_key: encodeBase64(envelope.publicKey),
  };
}
