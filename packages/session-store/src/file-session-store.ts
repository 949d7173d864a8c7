import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import type { BrokerLogger } from "@brokerkit/telemetry";

import { EnvelopeSessionStore, type EntrySlot } from "./envelope-session-store.js";

export interface FileSessionStoreOptions {
  readonly directory: string;
  readonly logger?: BrokerLogger;
  /** Permission bits for written files. Defaults to owner read/write only. */
  readonly fileMode?: number;
}

const isMissingFile = (cause: unknown): boolean =>
  cause instanceof Error && "code" in cause && cause.code === "ENOENT";

/**
 * One JSON file per account and slot. Writes land in a temporary file that is
 * renamed over the target, so readers see either the old or the new envelope.
 */
export class FileSessionStore extends EnvelopeSessionStore {
  private readonly directory: string;
  private readonly fileMode: number;

  constructor(options: FileSessionStoreOptions) {
    super(options.logger);
    this.directory = options.directory;
    this.fileMode = options.fileMode ?? 0o600;
  }

  pathFor(key: string, slot: EntrySlot): string {
    return path.join(this.directory, `${encodeURIComponent(key)}.${slot}.json`);
  }

  protected async readText(key: string, slot: EntrySlot): Promise<string | undefined> {
    try {
      return await readFile(this.pathFor(key, slot), "utf8");
    } catch (cause) {
      if (isMissingFile(cause)) {
        return undefined;
      }
      throw cause;
    }
  }

  protected async writeText(key: string, slot: EntrySlot, text: string): Promise<void> {
    const target = this.pathFor(key, slot);
    const temporary = `${target}.${randomUUID()}.tmp`;
    await mkdir(this.directory, { recursive: true, mode: 0o700 });
    try {
      await writeFile(temporary, text, { encoding: "utf8", mode: this.fileMode });
      await rename(temporary, target);
    } catch (cause) {
      await rm(temporary, { force: true });
      throw cause;
    }
  }

  protected async removeText(key: string, slot: EntrySlot): Promise<void> {
    await rm(this.pathFor(key, slot), { force: true });
  }
}
