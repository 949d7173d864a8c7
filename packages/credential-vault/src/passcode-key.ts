import { scryptSync } from "node:crypto";
import { inspect } from "node:util";

import type { EncryptionKey } from "@brokerkit/contracts";

export interface ScryptParameters {
  readonly cost: number;
  readonly blockSize: number;
  readonly parallelization: number;
}

export const DEFAULT_SCRYPT_PARAMETERS: ScryptParameters = {
  cost: 2 ** 14,
  blockSize: 8,
  parallelization: 1,
};

const KEY_LENGTH = 32;

/**
 * Derives AES-256 keys from a caller passcode with scrypt, one key per salt.
 */
export class PasscodeKey implements EncryptionKey {
  private readonly derived = new Map<string, Uint8Array>();

  constructor(
    private readonly passcode: string,
    private readonly parameters: ScryptParameters = DEFAULT_SCRYPT_PARAMETERS,
  ) {
    if (passcode.length === 0) {
      throw new Error("PasscodeKey requires a non-empty passcode");
    }
  }

  deriveKey(salt: Uint8Array): Uint8Array {
    const cacheKey = Buffer.from(salt).toString("hex");
    const cached = this.derived.get(cacheKey);
    if (cached) {
      return cached;
    }

    const key = scryptSync(this.passcode, salt, KEY_LENGTH, {
      N: this.parameters.cost,
      r: this.parameters.blockSize,
      p: this.parameters.parallelization,
    });
    this.derived.set(cacheKey, key);
    return key;
  }

  toJSON(): string {
    return "[PasscodeKey]";
  }

  [inspect.custom](): string {
    return "PasscodeKey { [redacted] }";
  }
}
