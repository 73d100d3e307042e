import type { OracleRecord } from '../types/json.js';
import type { ParsedArgs } from './args.js';
import { stringFlag } from './args.js';
import type { Logger } from '../logger.js';
import type { OracleConfig } from '../config.js';
import { canonicalString } from '../canonical.js';
import { digestHex, digestRecord } from '../digest.js';
import { encodeBase64 } from '../encoding.js';
import { generateKeypair, loadOrCreateKeypair, saveKeypair } from '../keys.js';
import { openAndVerify, saveSignedRecord, sealRecord } from '../envelope.js';
import { compareRecords, formatComparisonReport } from '../compare.js';
import { parseJson, parseRecord } from '../parse.js';
import { isExactSignedRecordFile } from '../guards.js';
import { fileExists, readTextFile } from '../files.js';
import { OracleError, ValidationError } from '../errors.js';

export const EXIT = {
  OK: 0,
  FAILED: 1,
  USAGE: 2,
  ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export interface CommandContext {
  args: ParsedArgs;
  config: OracleConfig;
  logger: Logger;
  print: (line: string) => void;
  usage: (message: string) => ExitCode;
}

/**
 * Read a JSON file holding either a bare record or a signed-record file;
 * for the latter the embedded `data` is returned. Only an object with
 * exactly the signed-file fields counts as signed.
 */
export function readRecordFile(filePath: string): OracleRecord {
  const json = parseJson(readTextFile(filePath));
  if (!json.ok) {
    throw new ValidationError(`${filePath} is not valid JSON`, [json.error.message]);
  }
  const candidate = isExactSignedRecordFile(json.value) ? json.value.data : json.value;
  const parsed = parseRecord(candidate);
  if (!parsed.ok) {
    throw new OracleError(`${filePath}: ${parsed.error.message}`, { cause: parsed.error });
  }
  return parsed.value;
}

export function runKeygen({ args, logger, print, usage }: CommandContext): ExitCode {
  const out = stringFlag(args.flags, 'out');
  if (!out) return usage('keygen requires --out <keystore>');
  if (fileExists(out) && args.flags.force !== true) {
    return usage(`${out} already exists (use --force to overwrite)`);
  }
  const keypair = generateKeypair();
  saveKeypair(keypair, out, logger);
  print(`Generated new keypair and saved to ${out}`);
  print(`Public key: ${encodeBase64(keypair.publicKey)}`);
  return EXIT.OK;
}

export function runSeal({ args, config, logger, print, usage }: CommandContext): ExitCode {
  const input = args.rest[0];
  const out = stringFlag(args.flags, 'out');
  if (!input || !out) return usage('seal requires <record.json> --out <signed.json>');

  const record = readRecordFile(input);
  const { keypair, created } = loadOrCreateKeypair(config.keystorePath, logger);
  if (created) print(`Created keystore ${config.keystorePath}`);

  const envelope = sealRecord(record, keypair.privateKey);
  saveSignedRecord(envelope, out, logger);
  print(`Digest: ${digestHex(digestRecord(envelope.record))}`);
  print(`Public key: ${encodeBase64(envelope.publicKey)}`);
  print(`Signed record saved to ${out}`);
  return EXIT.OK;
}

export function runVerify({ args, print, usage }: CommandContext): ExitCode {
  const input = args.rest[0];
  if (!input) return usage('verify requires <signed.json>');

  const opened = openAndVerify(input);
  print(`Digest: ${opened.digestHex}`);
  if (opened.verification.valid) {
    print('VALID: signed by the embedded key and unmodified');
  } else {
    const detail = opened.verification.detail ? `: ${opened.verification.detail}` : '';
    print(`INVALID (${opened.verification.reason}${detail})`);
  }

  const against = stringFlag(args.flags, 'against');
  if (against) {
    const report = compareRecords(readRecordFile(against), opened.record);
    formatComparisonReport(report).forEach(line => print(line));
  }
  return opened.valid ? EXIT.OK : EXIT.FAILED;
}

export function runCompare({ args, print, usage }: CommandContext): ExitCode {
  const [left, right] = args.rest;
  if (!left || !right) return usage('compare requires <a.json> <b.json>');

  const report = compareRecords(readRecordFile(left), readRecordFile(right));
  formatComparisonReport(report).forEach(line => print(line));
  return report.equal ? EXIT.OK : EXIT.FAILED;
}

export function runDigest({ args, print, usage }: CommandContext): ExitCode {
  const input = args.rest[0];
  if (!input) return usage('digest requires <record.json>');

  const record = readRecordFile(input);
  print(`Canonical: ${canonicalString(record)}`);
  print(`Digest: ${digestHex(digestRecord(record))}`);
  return EXIT.OK;
}
