export interface Keypair {
  /** 32-byte Ed25519 seed. */
  readonly privateKey: Uint8Array;
  readonly publicKey: Uint8Array;
}

export interface KeystoreFile {
  private_key: string;
  public_key: string;
}
