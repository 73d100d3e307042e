import type { JsonValue, OracleRecord } from './json.js';

/** In-memory signed-record envelope. Raw key and signature bytes. */
export interface SignedRecord {
  readonly record: Readonly<OracleRecord>;
  readonly signature: Uint8Array;
  readonly publicKey: Uint8Array;
}

/** On-disk form: base64 signature and key, record kept verbatim under `data`. */
export interface SignedRecordFile {
  data: JsonValue;
  signature: string;
  public_key: string;
}
