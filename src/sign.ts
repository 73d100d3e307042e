import {
  ExtendedPoint,
  etc,
  getPublicKey,
  sign as ed25519Sign,
  verify as ed25519Verify,
} from '@noble/ed25519';
import { sha512 } from '@noble/hashes/sha2';
import type { VerifyFailureReason, VerifyResult } from './types/report.js';
import { DIGEST_LENGTH, KEY_LENGTH, SIGNATURE_LENGTH } from './versions.js';
import { InvalidDigestError, InvalidKeyError, describeError } from './errors.js';

// @noble/ed25519 v2 needs a synchronous SHA-512 for its sync API
etc.sha512Sync = (...m: Uint8Array[]) => sha512(etc.concatBytes(...m));

function assertPrivateKey(privateKey: Uint8Array): void {
  if (privateKey.length !== KEY_LENGTH) {
    throw new InvalidKeyError(
      `Private key must be a ${KEY_LENGTH}-byte Ed25519 seed, got ${privateKey.length} bytes`,
    );
  }
}

/** Public key for a 32-byte seed. */
export function derivePublicKey(privateKey: Uint8Array): Uint8Array {
  assertPrivateKey(privateKey);
  return getPublicKey(privateKey);
}

/** True when the bytes decode to a point on the curve. */
export function isValidPublicKey(publicKey: Uint8Array): boolean {
  if (publicKey.length !== KEY_LENGTH) return false;
  try {
    ExtendedPoint.fromHex(publicKey);
    return true;
  } catch {
    return false;
  }
}

/**
 * Sign a 32-byte digest. Ed25519 is deterministic: no randomness is drawn
 * here, so the same digest and key always give the same signature.
 */
export function signDigest(digest: Uint8Array, privateKey: Uint8Array): Uint8Array {
  if (digest.length !== DIGEST_LENGTH) throw new InvalidDigestError(digest.length);
  assertPrivateKey(privateKey);
  return ed25519Sign(digest, privateKey);
}

function failure(reason: VerifyFailureReason, detail?: string): VerifyResult {
  return detail === undefined ? { valid: false, reason } : { valid: false, reason, detail };
}

/**
 * Check a signature over a digest. Untrusted input never throws: malformed
 * lengths and off-curve keys come back as failures with a reason. The
 * accept/reject decision is left entirely to the Ed25519 routine.
 */
export function verifyDigestDetailed(
  digest: Uint8Array,
  signature: Uint8Array,
  publicKey: Uint8Array,
): VerifyResult {
  if (digest.length !== DIGEST_LENGTH) {
    return failure('malformed-digest', `expected ${DIGEST_LENGTH} bytes, got ${digest.length}`);
  }
  if (signature.length !== SIGNATURE_LENGTH) {
    return failure('malformed-signature', `expected ${SIGNATURE_LENGTH} bytes, got ${signature.length}`);
  }
  if (publicKey.length !== KEY_LENGTH) {
    return failure('malformed-public-key', `expected ${KEY_LENGTH} bytes, got ${publicKey.length}`);
  }
  if (!isValidPublicKey(publicKey)) {
    return failure('malformed-public-key', 'not a valid Ed25519 point');
  }
  try {
    // strict RFC 8032 encodings: ZIP215 would accept a non-canonical R
    const ok = ed25519Verify(signature, digest, publicKey, { zip215: false });
    return ok ? { valid: true } : failure('bad-signature');
  } catch (err) {
    return failure('bad-signature', describeError(err));
  }
}

export function verifyDigest(
  digest: Uint8Array,
  signature: Uint8Array,
  publicKey: Uint8Array,
): boolean {
  return verifyDigestDetailed(digest, signature, publicKey).valid;
}
