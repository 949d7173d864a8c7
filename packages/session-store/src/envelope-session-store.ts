import {
  accountKey,
  createStoreError,
  describeCause,
  err,
  ok,
  type DeviceIdentity,
  type EncryptionKey,
  type Result,
  type SessionRecord,
  type SessionStorePort,
  type StoreError,
  type StoredGrant,
} from "@brokerkit/contracts";
import type { BrokerLogger } from "@brokerkit/telemetry";

import {
  decodeDevice,
  decodeEnvelope,
  decodeGrant,
  encodeDevice,
  encodeEnvelope,
  encodeGrant,
  readEnvelopeSequence,
} from "./envelope.js";
import { KeyedSerialQueue } from "./serial-queue.js";

export type EntrySlot = "session" | "device" | "grant";

/**
 * Shared envelope handling for session stores. Subclasses only move text in
 * and out of their medium; sequencing, encryption and validation live here.
 */
export abstract class EnvelopeSessionStore implements SessionStorePort {
  private readonly queue = new KeyedSerialQueue();
  private readonly watermarks = new Map<string, number>();

  protected constructor(protected readonly logger?: BrokerLogger) {}

  protected abstract readText(key: string, slot: EntrySlot): Promise<string | undefined>;
  protected abstract writeText(key: string, slot: EntrySlot, text: string): Promise<void>;
  protected abstract removeText(key: string, slot: EntrySlot): Promise<void>;

  save(key: string, record: SessionRecord, encryptionKey?: EncryptionKey): Promise<Result<void, StoreError>> {
    return this.queue.run(key, async () => {
      if (accountKey(record) !== key) {
        return err(
          createStoreError("store.write_failed", "Session record does not belong to the account key.", {
            key,
            recordKey: accountKey(record),
          }),
        );
      }

      const latest = await this.readSequence(key);
      if (record.sequence <= latest) {
        return err(
          createStoreError("store.stale_write", "A newer session write or clear already happened.", {
            key,
            sequence: record.sequence,
            latest,
          }),
        );
      }

      try {
        await this.writeText(key, "session", encodeEnvelope(key, record, encryptionKey));
      } catch (cause) {
        return err(
          createStoreError("store.write_failed", "Unable to persist session record.", {
            key,
            cause: describeCause(cause),
          }),
        );
      }

      this.watermarks.set(key, record.sequence);
      return ok(undefined);
    });
  }

  load(key: string, encryptionKey?: EncryptionKey): Promise<SessionRecord | undefined> {
    return this.queue.run(key, async () => {
      let text: string | undefined;
      try {
        text = await this.readText(key, "session");
      } catch (cause) {
        this.logger?.warn("session_store.load_discarded", { key, reason: "unreadable", cause: describeCause(cause) });
        return undefined;
      }
      if (text === undefined) {
        return undefined;
      }

      const decoded = decodeEnvelope(key, text, encryptionKey);
      if (!decoded.ok) {
        this.logger?.warn("session_store.load_discarded", { key, reason: decoded.reason });
        return undefined;
      }
      return decoded.record;
    });
  }

  clear(key: string, sequence?: number): Promise<Result<void, StoreError>> {
    return this.queue.run(key, async () => {
      const latest = await this.readSequence(key);
      try {
        await this.removeText(key, "session");
      } catch (cause) {
        return err(
          createStoreError("store.clear_failed", "Unable to remove session record.", {
            key,
            cause: describeCause(cause),
          }),
        );
      }
      this.watermarks.set(key, Math.max(latest, sequence ?? latest));
      return ok(undefined);
    });
  }

  lastSequence(key: string): Promise<number> {
    return this.queue.run(key, () => this.readSequence(key));
  }

  loadDevice(key: string): Promise<DeviceIdentity | undefined> {
    return this.queue.run(`${key}#device`, async () => {
      try {
        const text = await this.readText(key, "device");
        return text === undefined ? undefined : decodeDevice(text);
      } catch (cause) {
        this.logger?.warn("session_store.device_unreadable", { key, cause: describeCause(cause) });
        return undefined;
      }
    });
  }

  saveDevice(key: string, identity: DeviceIdentity): Promise<Result<void, StoreError>> {
    return this.queue.run(`${key}#device`, async () => {
      try {
        await this.writeText(key, "device", encodeDevice(identity));
        return ok(undefined);
      } catch (cause) {
        return err(
          createStoreError("store.write_failed", "Unable to persist device identity.", {
            key,
            cause: describeCause(cause),
          }),
        );
      }
    });
  }

  clearDevice(key: string): Promise<Result<void, StoreError>> {
    return this.queue.run(`${key}#device`, async () => {
      try {
        await this.removeText(key, "device");
        return ok(undefined);
      } catch (cause) {
        return err(
          createStoreError("store.clear_failed", "Unable to remove device identity.", {
            key,
            cause: describeCause(cause),
          }),
        );
      }
    });
  }

  loadGrant(key: string, encryptionKey?: EncryptionKey): Promise<StoredGrant | undefined> {
    return this.queue.run(`${key}#grant`, async () => {
      let text: string | undefined;
      try {
        text = await this.readText(key, "grant");
      } catch (cause) {
        this.logger?.warn("session_store.grant_discarded", { key, reason: "unreadable", cause: describeCause(cause) });
        return undefined;
      }
      if (text === undefined) {
        return undefined;
      }

      const decoded = decodeGrant(key, text, encryptionKey);
      if (!decoded.ok) {
        this.logger?.warn("session_store.grant_discarded", { key, reason: decoded.reason });
        return undefined;
      }
      return decoded.grant;
    });
  }

  saveGrant(key: string, grant: StoredGrant, encryptionKey?: EncryptionKey): Promise<Result<void, StoreError>> {
    return this.queue.run(`${key}#grant`, async () => {
      try {
        await this.writeText(key, "grant", encodeGrant(key, grant, encryptionKey));
        return ok(undefined);
      } catch (cause) {
        return err(
          createStoreError("store.write_failed", "Unable to persist provider grant.", {
            key,
            cause: describeCause(cause),
          }),
        );
      }
    });
  }

  clearGrant(key: string): Promise<Result<void, StoreError>> {
    return this.queue.run(`${key}#grant`, async () => {
      try {
        await this.removeText(key, "grant");
        return ok(undefined);
      } catch (cause) {
        return err(
          createStoreError("store.clear_failed", "Unable to remove provider grant.", {
            key,
            cause: describeCause(cause),
          }),
        );
      }
    });
  }

  private async readSequence(key: string): Promise<number> {
    const watermark = this.watermarks.get(key) ?? 0;
    let persisted: number | undefined;
    try {
      const text = await this.readText(key, "session");
      persisted = text === undefined ? undefined : readEnvelopeSequence(text);
    } catch (cause) {
      this.logger?.debug("session_store.sequence_unreadable", { key, cause: describeCause(cause) });
    }
    return Math.max(watermark, persisted ?? 0);
  }
}
