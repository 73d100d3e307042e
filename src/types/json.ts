export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A record handed to the integrity core by an upstream collaborator.
 * Opaque apart from being a JSON object: every field is canonicalized and
 * hashed the same way.
 */
export type OracleRecord = JsonObject;
