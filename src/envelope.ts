import type { JsonValue, OracleRecord } from './types/json.js';
import type { SignedRecord } from './types/envelope.js';
import type { VerifyResult } from './types/report.js';
import { digestHex, digestRecord } from './digest.js';
import { derivePublicKey, signDigest, verifyDigestDetailed } from './sign.js';
import { bytesEqual, encodeBase64 } from './encoding.js';
import { parseJson, parseSignedRecordFile, toSignedRecordFile } from './parse.js';
import { readTextFile, writeJsonFile } from './files.js';
import { EnvelopeFormatError, InvalidKeyError, ValidationError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

function deepFreeze(value: JsonValue): void {
  if (value === null || typeof value !== 'object') return;
  const children: JsonValue[] = Array.isArray(value) ? value : Object.values(value);
  children.forEach(deepFreeze);
  Object.freeze(value);
}

/**
 * canonicalize -> digest -> sign, bundled with the signer's public key.
 *
 * The public key is derived from the private key. When the caller also
 * passes one, it must match, so an envelope can never carry a key that
 * did not produce its signature.
 *
 * The envelope holds a frozen copy of the record: mutating the caller's
 * object afterwards does not affect what was signed.
 */
export function sealRecord(
  record: OracleRecord,
  privateKey: Uint8Array,
  publicKey?: Uint8Array,
): SignedRecord {
  const derived = derivePublicKey(privateKey);
  if (publicKey !== undefined && !bytesEqual(publicKey, derived)) {
    throw new InvalidKeyError('Public key does not correspond to the private key');
  }
  const frozen = structuredClone(record);
  deepFreeze(frozen);
  const signature = signDigest(digestRecord(frozen), privateKey);
  return Object.freeze({ record: frozen, signature, publicKey: derived });
}

/** Recompute the digest of the embedded record and check the signature. */
export function verifySignedRecord(envelope: SignedRecord): VerifyResult {
  return verifyDigestDetailed(digestRecord(envelope.record), envelope.signature, envelope.publicKey);
}

export function saveSignedRecord(
  envelope: SignedRecord,
  filePath: string,
  logger: Logger = silentLogger,
): void {
  writeJsonFile(filePath, toSignedRecordFile(envelope));
  logger.info('Signed record saved', { path: filePath, publicKey: encodeBase64(envelope.publicKey) });
}

/**
 * Read a signed-record file. The record is returned exactly as stored;
 * nothing is verified here.
 */
export function loadSignedRecord(filePath: string): SignedRecord {
  const json = parseJson(readTextFile(filePath));
  if (!json.ok) {
    throw new EnvelopeFormatError(filePath, ['not valid JSON']);
  }
  const parsed = parseSignedRecordFile(json.value);
  if (!parsed.ok) {
    const errors =
      parsed.error instanceof ValidationError ? parsed.error.errors : [parsed.error.message];
    throw new EnvelopeFormatError(filePath, errors);
  }
  return parsed.value;
}

export interface OpenedRecord {
  record: OracleRecord;
  valid: boolean;
  verification: VerifyResult;
  digestHex: string;
}

/**
 * Load, recompute and verify. The record comes back whatever the verdict
 * so the caller can inspect it. I/O and format problems throw; only a
 * signature that does not check out yields valid: false.
 */
export function openAndVerify(filePath: string): OpenedRecord {
  const envelope = loadSignedRecord(filePath);
  const digest = digestRecord(envelope.record);
  const verification = verifyDigestDetailed(digest, envelope.signature, envelope.publicKey);
  return {
    record: envelope.record,
    valid: verification.valid,
    verification,
    digestHex: digestHex(digest),
  };
}
