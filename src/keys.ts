import { utils } from '@noble/ed25519';
import type { Keypair } from './types/keys.js';
import { derivePublicKey } from './sign.js';
import { parseJson, parseKeystore, toKeystoreFile } from './parse.js';
import { fileExists, readTextFile, writeJsonFile } from './files.js';
import { KeyLoadError, OracleIOError } from './errors.js';
import { encodeBase64 } from './encoding.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

/** Fresh keypair from 32 CSPRNG bytes (crypto.getRandomValues). */
export function generateKeypair(): Keypair {
  const privateKey = utils.randomPrivateKey();
  return { privateKey, publicKey: derivePublicKey(privateKey) };
}

/** Write the keystore JSON, replacing any existing file. */
export function saveKeypair(keypair: Keypair, filePath: string, logger: Logger = silentLogger): void {
  writeJsonFile(filePath, toKeystoreFile(keypair));
  logger.info('Keypair saved', { path: filePath, publicKey: encodeBase64(keypair.publicKey) });
}

/**
 * Load a keystore. Every failure (missing file, bad JSON, wrong shape,
 * bad base64, wrong length, mismatched public key) is a KeyLoadError.
 */
export function loadKeypair(filePath: string): Keypair {
  let text: string;
  try {
    text = readTextFile(filePath);
  } catch (err) {
    if (err instanceof OracleIOError) {
      throw new KeyLoadError('Keystore not readable', filePath, { cause: err.cause });
    }
    throw err;
  }

  const json = parseJson(text);
  if (!json.ok) {
    throw new KeyLoadError('Keystore is not valid JSON', filePath, { cause: json.error.cause });
  }
  const parsed = parseKeystore(json.value);
  if (!parsed.ok) {
    throw new KeyLoadError(parsed.error.message, filePath);
  }
  return parsed.value;
}

export interface KeystoreBootstrap {
  keypair: Keypair;
  created: boolean;
}

/**
 * First-run bootstrap: reuse the keystore when it exists, otherwise generate
 * and persist one. An existing but broken keystore is an error, never
 * silently replaced.
 */
export function loadOrCreateKeypair(filePath: string, logger: Logger = silentLogger): KeystoreBootstrap {
  if (fileExists(filePath)) {
    const keypair = loadKeypair(filePath);
    logger.debug('Loaded existing keypair', { path: filePath });
    return { keypair, created: false };
  }
  logger.info('No keystore found, generating a new keypair', { path: filePath });
  const keypair = generateKeypair();
  saveKeypair(keypair, filePath, logger);
  return { keypair, created: true };
}
