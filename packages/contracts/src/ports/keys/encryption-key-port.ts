/**
 * Supplies the symmetric key used to seal persisted session envelopes.
 * Implementations derive one key per salt so every envelope can carry its own salt.
 */
export interface EncryptionKey {
  deriveKey(salt: Uint8Array): Uint8Array;
}
