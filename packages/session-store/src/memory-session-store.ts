import type { BrokerLogger } from "@brokerkit/telemetry";

import { EnvelopeSessionStore, type EntrySlot } from "./envelope-session-store.js";

export interface MemorySessionStoreOptions {
  readonly logger?: BrokerLogger;
}

/** Keeps envelopes in a map. Used by tests and short-lived processes. */
export class MemorySessionStore extends EnvelopeSessionStore {
  private readonly texts = new Map<string, string>();

  constructor(options: MemorySessionStoreOptions = {}) {
    super(options.logger);
  }

  /** The stored envelope text for a session slot, as it would sit on disk. */
  rawEnvelope(key: string): string | undefined {
    return this.texts.get(`${key}#session`);
  }

  /** Replaces the stored envelope text directly. */
  overwriteEnvelope(key: string, text: string): void {
    this.texts.set(`${key}#session`, text);
  }

  protected async readText(key: string, slot: EntrySlot): Promise<string | undefined> {
    return this.texts.get(`${key}#${slot}`);
  }

  protected async writeText(key: string, slot: EntrySlot, text: string): Promise<void> {
    this.texts.set(`${key}#${slot}`, text);
  }

  protected async removeText(key: string, slot: EntrySlot): Promise<void> {
    this.texts.delete(`${key}#${slot}`);
  }
}
