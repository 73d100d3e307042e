// Protocol constants
export {
  PROTOCOL,
  KEY_LENGTH,
  DIGEST_LENGTH,
  SIGNATURE_LENGTH,
  DEFAULT_KEYSTORE_PATH,
  describeProtocol,
} from './versions.js';

// Types
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  OracleRecord,
  SentimentLabel,
  SentimentRecord,
  SignedRecord,
  SignedRecordFile,
  Keypair,
  KeystoreFile,
  FieldDifference,
  ComparisonReport,
  VerifyFailureReason,
  VerifyResult,
} from './types/index.js';
export { SENTIMENT_LABELS } from './types/index.js';

// Canonical encoding and digest
export { canonicalString, canonicalBytes, formatCanonicalNumber, compareKeys } from './canonical.js';
export { digest, digestRecord, digestHex } from './digest.js';
export { encodeBase64, decodeBase64, isStrictBase64 } from './encoding.js';

// Keys, signing, verification
export { generateKeypair, saveKeypair, loadKeypair, loadOrCreateKeypair } from './keys.js';
export type { KeystoreBootstrap } from './keys.js';
export { derivePublicKey, isValidPublicKey, signDigest, verifyDigest, verifyDigestDetailed } from './sign.js';

// Envelope lifecycle
export {
  sealRecord,
  verifySignedRecord,
  saveSignedRecord,
  loadSignedRecord,
  openAndVerify,
} from './envelope.js';
export type { OpenedRecord } from './envelope.js';

// Tamper detection
export { compareRecords, compareSignedRecords, formatComparisonReport } from './compare.js';

// Parsing and structural validation
export {
  parseJson,
  parseRecord,
  parseKeystore,
  parseSignedRecordFile,
  toKeystoreFile,
  toSignedRecordFile,
} from './parse.js';
export type { ParseResult } from './parse.js';
export { validateRecord, validateKeystoreFile, validateSignedRecordFile } from './validate.js';
export type { ValidationResult } from './validate.js';
export {
  isJsonValue,
  isJsonObject,
  isOracleRecord,
  isKeystoreFile,
  isSignedRecordFile,
  isExactSignedRecordFile,
} from './guards.js';

// Logging and configuration
export { createConsoleLogger, silentLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LogFields, LogSink } from './logger.js';
export { resolveConfig, ENV_KEYS } from './config.js';
export type { OracleConfig, ConfigOverrides } from './config.js';

// Errors
export {
  OracleError,
  EncodingError,
  KeyLoadError,
  InvalidKeyError,
  InvalidDigestError,
  OracleIOError,
  ValidationError,
  EnvelopeFormatError,
} from './errors.js';
