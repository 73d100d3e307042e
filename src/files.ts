import { existsSync, readFileSync, writeFileSync } from 'fs';
import { OracleIOError } from './errors.js';

/**
 * Whole-file exchange. Each call is a single read or write; the handle is
 * opened and closed inside the fs call on every path, including errors.
 */
export function readTextFile(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new OracleIOError('Cannot read file', filePath, { cause: err });
  }
}

/** Pretty-printed JSON with a trailing newline; overwrites. */
export function writeJsonFile(filePath: string, value: unknown): void {
  const text = `${JSON.stringify(value, null, 2)}\n`;
  try {
    writeFileSync(filePath, text, 'utf8');
  } catch (err) {
    throw new OracleIOError('Cannot write file', filePath, { cause: err });
  }
}

export function fileExists(filePath: string): boolean {
  return existsSync(filePath);
}
