import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  loadSignedRecord,
  openAndVerify,
  saveSignedRecord,
  sealRecord,
  verifySignedRecord,
} from '../src/envelope.js';
import { compareRecords } from '../src/compare.js';
import { generateKeypair } from '../src/keys.js';
import { encodeBase64 } from '../src/encoding.js';
import { EnvelopeFormatError, InvalidKeyError, OracleIOError } from '../src/errors.js';
import { isOracleRecord } from '../src/guards.js';
import type { OracleRecord } from '../src/types/json.js';
import { goldenKeypair, loadGoldenVectors, makeTempDir, readFixture } from './helpers.js';

const golden = loadGoldenVectors();

describe('sealRecord', () => {
  it('produces the golden signature and derived public key', () => {
    const { privateKey } = goldenKeypair();
    const envelope = sealRecord(golden.flat.record, privateKey);
    expect(encodeBase64(envelope.signature)).toBe(golden.flat.signature);
    expect(encodeBase64(envelope.publicKey)).toBe(golden.keypair.public_key);
    expect(envelope.record).toEqual(golden.flat.record);
  });

  it('accepts a matching public key', () => {
    const { privateKey, publicKey } = generateKeypair();
    const envelope = sealRecord({ id: '1' }, privateKey, publicKey);
    expect(envelope.publicKey).toEqual(publicKey);
  });

  it('rejects a public key from another keypair', () => {
    const { privateKey } = generateKeypair();
    const { publicKey } = generateKeypair();
    expect(() => sealRecord({ id: '1' }, privateKey, publicKey)).toThrow(InvalidKeyError);
  });

  it('verifies after sealing', () => {
    const { privateKey } = generateKeypair();
    expect(verifySignedRecord(sealRecord({ id: '1', score: 0.5 }, privateKey))).toEqual({ valid: true });
  });

  it('is unaffected by later mutation of the caller record', () => {
    const { privateKey } = generateKeypair();
    const record: OracleRecord = { id: '1', label: 'POSITIVE', nested: { tags: ['a'] } };
    const envelope = sealRecord(record, privateKey);
    record.label = 'NEGATIVE';
    expect(envelope.record.label).toBe('POSITIVE');
    expect(verifySignedRecord(envelope).valid).toBe(true);
  });

  it('freezes the embedded record', () => {
    const { privateKey } = generateKeypair();
    const envelope = sealRecord({ id: '1', nested: { tags: ['a'] } }, privateKey);
    expect(Object.isFrozen(envelope.record)).toBe(true);
    const nested = envelope.record.nested;
    expect(nested !== null && typeof nested === 'object' && Object.isFrozen(nested)).toBe(true);
  });
});

describe('signed-record files', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  it('writes data, signature and public_key', () => {
    const path = join(dir, 'signed.json');
    saveSignedRecord(sealRecord(golden.flat.record, goldenKeypair().privateKey), path);
    const written: unknown = JSON.parse(readFileSync(path, 'utf8'));
    expect(written).toEqual({
      data: { id: '1', label: 'POSITIVE', score: 0.87 },
      signature: golden.flat.signature,
      public_key: golden.keypair.public_key,
    });
  });

  it('load(save(envelope)) equals the envelope', () => {
    const path = join(dir, 'signed.json');
    const record = readFixture('sentiment-record.json');
    if (!isOracleRecord(record)) throw new Error('bad fixture');
    const envelope = sealRecord(record, generateKeypair().privateKey);
    saveSignedRecord(envelope, path);
    const loaded = loadSignedRecord(path);
    expect(loaded.record).toEqual(envelope.record);
    expect(loaded.signature).toEqual(envelope.signature);
    expect(loaded.publicKey).toEqual(envelope.publicKey);
  });

  it('openAndVerify returns the record and a valid verdict', () => {
    const path = join(dir, 'signed.json');
    saveSignedRecord(sealRecord(golden.flat.record, goldenKeypair().privateKey), path);
    const opened = openAndVerify(path);
    expect(opened.valid).toBe(true);
    expect(opened.verification).toEqual({ valid: true });
    expect(opened.digestHex).toBe(golden.flat.digest);
    expect(opened.record).toEqual(golden.flat.record);
  });

  it('detects a label edited on disk without re-signing', () => {
    const path = join(dir, 'signed.json');
    const original = sealRecord(golden.flat.record, goldenKeypair().privateKey);
    saveSignedRecord(original, path);

    const onDisk: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (!onDisk || typeof onDisk !== 'object' || !('data' in onDisk)) throw new Error('bad file');
    writeFileSync(
      path,
      JSON.stringify({ ...onDisk, data: { id: '1', label: 'NEGATIVE', score: 0.87 } }, null, 2),
    );

    const opened = openAndVerify(path);
    expect(opened.valid).toBe(false);
    expect(opened.verification).toEqual({ valid: false, reason: 'bad-signature' });
    expect(opened.record.label).toBe('NEGATIVE');
    expect(opened.digestHex).toBe(golden.tampered.digest);

    const report = compareRecords(original.record, opened.record);
    expect(report.equal).toBe(false);
    expect(report.differingFields).toEqual([
      { field: 'label', valueA: 'POSITIVE', valueB: 'NEGATIVE' },
    ]);
  });

  it('reports a truncated signature as a failed verification', () => {
    const path = join(dir, 'signed.json');
    writeFileSync(
      path,
      JSON.stringify({
        data: golden.flat.record,
        signature: encodeBase64(new Uint8Array(63)),
        public_key: golden.keypair.public_key,
      }),
    );
    const opened = openAndVerify(path);
    expect(opened.valid).toBe(false);
    expect(opened.verification).toEqual({
      valid: false,
      reason: 'malformed-signature',
      detail: 'expected 64 bytes, got 63',
    });
  });

  it('throws OracleIOError for a missing file', () => {
    expect(() => openAndVerify(join(dir, 'absent.json'))).toThrow(OracleIOError);
  });

  it('throws EnvelopeFormatError listing structural problems', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, JSON.stringify({ data: 'not a record', signature: 7 }));
    try {
      loadSignedRecord(path);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EnvelopeFormatError);
      if (err instanceof EnvelopeFormatError) {
        expect(err.filePath).toBe(path);
        expect(err.errors).toEqual([
          'Missing or invalid field: data (must be an object)',
          'Missing or invalid field: signature',
          'Missing or invalid field: public_key',
        ]);
      }
    }
  });

  it('throws EnvelopeFormatError for invalid JSON', () => {
    const path = join(dir, 'garbage.json');
    writeFileSync(path, 'signed?');
    expect(() => loadSignedRecord(path)).toThrow(EnvelopeFormatError);
  });
});
