import type { StoreError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";
import type { DeviceIdentity, SessionRecord, StoredGrant } from "../../types/session.js";
import type { EncryptionKey } from "../keys/encryption-key-port.js";

export interface SessionStorePort {
  save(key: string, record: SessionRecord, encryptionKey?: EncryptionKey): Promise<Result<void, StoreError>>;
  load(key: string, encryptionKey?: EncryptionKey): Promise<SessionRecord | undefined>;
  clear(key: string, sequence?: number): Promise<Result<void, StoreError>>;
  /** Highest sequence written or cleared for `key`, read without decrypting anything. */
  lastSequence(key: string): Promise<number>;
  loadDevice(key: string): Promise<DeviceIdentity | undefined>;
  saveDevice(key: string, identity: DeviceIdentity): Promise<Result<void, StoreError>>;
  clearDevice(key: string): Promise<Result<void, StoreError>>;
  /** The grant slot survives `clear`; only `clearGrant` removes it. */
  loadGrant(key: string, encryptionKey?: EncryptionKey): Promise<StoredGrant | undefined>;
  saveGrant(key: string, grant: StoredGrant, encryptionKey?: EncryptionKey): Promise<Result<void, StoreError>>;
  clearGrant(key: string): Promise<Result<void, StoreError>>;
}
