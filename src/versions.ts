// ─── PROTOCOL IDENTIFIERS (SINGLE SOURCE OF TRUTH) ───

export const PROTOCOL = {
  CANONICAL: 'oracle-canonical-json.v1',
  DIGEST: 'sha256',
  SIGNATURE: 'ed25519',
} as const;

// ─── FIXED LENGTHS (bytes) ───

export const KEY_LENGTH = 32;
export const DIGEST_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;

// ─── FILE DEFAULTS ───

export const DEFAULT_KEYSTORE_PATH = 'oracle_keypair.json';

export const KEYSTORE_FIELDS = ['private_key', 'public_key'] as const;
export const SIGNED_RECORD_FIELDS = ['data', 'signature', 'public_key'] as const;

// ─── HELPERS ───

export function describeProtocol(): string {
  return `${PROTOCOL.CANONICAL} / ${PROTOCOL.DIGEST} / ${PROTOCOL.SIGNATURE}`;
}
