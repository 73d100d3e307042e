export type { JsonPrimitive, JsonValue, JsonObject, OracleRecord } from './json.js';
export type { SentimentLabel, SentimentRecord } from './sentiment.js';
export { SENTIMENT_LABELS } from './sentiment.js';
export type { SignedRecord, SignedRecordFile } from './envelope.js';
export type { Keypair, KeystoreFile } from './keys.js';
export type {
  FieldDifference,
  ComparisonReport,
  VerifyFailureReason,
  VerifyResult,
} from './report.js';
