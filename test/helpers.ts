import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { OracleRecord } from '../src/types/json.js';
import type { Keypair } from '../src/types/keys.js';
import { isOracleRecord } from '../src/guards.js';
import { decodeBase64 } from '../src/encoding.js';

const fixturesDir = fileURLToPath(new URL('./fixtures/', import.meta.url));

export function readFixture(name: string): unknown {
  const value: unknown = JSON.parse(readFileSync(join(fixturesDir, name), 'utf8'));
  return value;
}

export function fixturePath(name: string): string {
  return join(fixturesDir, name);
}

interface GoldenVectors {
  keypair: { private_key: string; public_key: string };
  flat: { record: OracleRecord; canonical: string; digest: string; signature: string };
  tampered: { record: OracleRecord; digest: string };
  nested: { record: OracleRecord; canonical: string; byteLength: number; digest: string };
  empty: { digest: string };
}

function field(obj: unknown, key: string): unknown {
  return isOracleRecord(obj) ? obj[key] : undefined;
}

function str(obj: unknown, key: string): string {
  const value = field(obj, key);
  if (typeof value !== 'string') throw new Error(`fixture field ${key} must be a string`);
  return value;
}

function rec(obj: unknown, key: string): OracleRecord {
  const value = field(obj, key);
  if (!isOracleRecord(value)) throw new Error(`fixture field ${key} must be an object`);
  return value;
}

export function loadGoldenVectors(): GoldenVectors {
  const raw = readFixture('golden-vectors.json');
  const keypair = rec(raw, 'keypair');
  const flat = rec(raw, 'flat');
  const tampered = rec(raw, 'tampered');
  const nested = rec(raw, 'nested');
  const byteLength = nested.byteLength;
  if (typeof byteLength !== 'number') throw new Error('fixture field byteLength must be a number');
  return {
    keypair: { private_key: str(keypair, 'private_key'), public_key: str(keypair, 'public_key') },
    flat: {
      record: rec(flat, 'record'),
      canonical: str(flat, 'canonical'),
      digest: str(flat, 'digest'),
      signature: str(flat, 'signature'),
    },
    tampered: { record: rec(tampered, 'record'), digest: str(tampered, 'digest') },
    nested: {
      record: rec(nested, 'record'),
      canonical: str(nested, 'canonical'),
      byteLength,
      digest: str(nested, 'digest'),
    },
    empty: { digest: str(rec(raw, 'empty'), 'digest') },
  };
}

export function bytes(b64: string): Uint8Array {
  const decoded = decodeBase64(b64);
  if (decoded === null) throw new Error(`not base64: ${b64}`);
  return decoded;
}

export function goldenKeypair(): Keypair {
  const { keypair } = loadGoldenVectors();
  return { privateKey: bytes(keypair.private_key), publicKey: bytes(keypair.public_key) };
}

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'sentiment-oracle-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
