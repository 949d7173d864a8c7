import { createHash } from "node:crypto";
import { inspect } from "node:util";

import { accountKey, systemClock, type Clock, type Credential } from "@brokerkit/contracts";

export interface CredentialVaultOptions {
  readonly clock?: Clock;
}

/**
 * Identifies one credential for the lifetime of its material. The generation
 * changes only when the secret material itself is replaced, not when a fresh
 * one-time code arrives with the same password.
 */
export interface CredentialHandle {
  readonly key: string;
  readonly generation: number;
}

interface VaultEntry {
  readonly credential: Credential;
  readonly fingerprint: string;
  readonly generation: number;
  readonly storedAt: string;
}

const materialOf = (credential: Credential): ReadonlyArray<string> => {
  switch (credential.kind) {
    case "password_mfa":
      return [credential.kind, credential.username, credential.password];
    case "api_key_hmac":
      return [credential.kind, credential.apiKey, credential.apiSecret];
    case "encrypted_oauth":
      return [credential.kind, credential.clientId, credential.passcode];
  }
};

const fingerprint = (credential: Credential): string =>
  createHash("sha256").update(materialOf(credential).join("\u0000")).digest("hex");

/**
 * Process-lifetime holder of raw credentials. Nothing here is ever written to
 * disk, and neither `JSON.stringify` nor `util.inspect` reveal the secrets.
 */
export class CredentialVault {
  private readonly entries = new Map<string, VaultEntry>();
  private readonly clock: Clock;
  private generations = 0;

  constructor(options: CredentialVaultOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  put(credential: Credential): CredentialHandle {
    const key = accountKey(credential);
    const print = fingerprint(credential);
    const existing = this.entries.get(key);
    const generation = existing && existing.fingerprint === print ? existing.generation : ++this.generations;

    this.entries.set(key, {
      credential: Object.freeze({ ...credential }),
      fingerprint: print,
      generation,
      storedAt: this.clock.now().toISOString(),
    });

    return { key, generation };
  }

  reveal(key: string): Credential | undefined {
    return this.entries.get(key)?.credential;
  }

  handle(key: string): CredentialHandle | undefined {
    const entry = this.entries.get(key);
    return entry ? { key, generation: entry.generation } : undefined;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  forget(key: string): boolean {
    return this.entries.delete(key);
  }

  keys(): ReadonlyArray<string> {
    return Array.from(this.entries.keys());
  }

  toJSON(): Record<string, unknown> {
    return {
      accounts: Array.from(this.entries.entries()).map(([key, entry]) => ({
        key,
        kind: entry.credential.kind,
        storedAt: entry.storedAt,
      })),
    };
  }

  [inspect.custom](): string {
    return `CredentialVault { accounts: ${this.entries.size} }`;
  }
}
