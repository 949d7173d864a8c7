import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";

import { z } from "zod";

import {
  SESSION_SCHEMA_VERSION,
  type DeviceIdentity,
  type EncryptionKey,
  type SessionRecord,
  type StoredGrant,
} from "@brokerkit/contracts";

const CIPHER = "aes-256-gcm";
const IV_LENGTH = 12;
const SALT_LENGTH = 16;
const TAG_LENGTH = 16;

const isoTimestamp = z.string().datetime({ offset: true });

export const sessionRecordSchema = z.object({
  provider: z.string().min(1),
  accountId: z.string().min(1),
  kind: z.enum(["password_mfa", "api_key_hmac", "encrypted_oauth"]),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  expiresAt: isoTimestamp,
  issuedAt: isoTimestamp,
  deviceId: z.string().min(1),
  environment: z.enum(["sandbox", "live"]),
  sequence: z.number().int().nonnegative(),
});

const headerSchema = z.object({
  schemaVersion: z.number().int(),
  key: z.string().min(1),
  sequence: z.number().int().nonnegative(),
});

const plainEnvelopeSchema = headerSchema.extend({
  encoding: z.literal("plain"),
  record: z.unknown(),
});

const sealedFields = {
  salt: z.string().base64(),
  iv: z.string().base64(),
  tag: z.string().base64(),
  ciphertext: z.string().base64(),
};

const sealedEnvelopeSchema = headerSchema.extend({ encoding: z.literal(CIPHER), ...sealedFields });

const envelopeSchema = z.discriminatedUnion("encoding", [plainEnvelopeSchema, sealedEnvelopeSchema]);

const grantSchema = z.object({
  refreshToken: z.string().min(1),
  savedAt: isoTimestamp,
});

const grantHeaderSchema = z.object({
  schemaVersion: z.number().int(),
  key: z.string().min(1),
  slot: z.literal("grant"),
});

const grantEnvelopeSchema = z.discriminatedUnion("encoding", [
  grantHeaderSchema.extend({ encoding: z.literal("plain"), grant: z.unknown() }),
  grantHeaderSchema.extend({ encoding: z.literal(CIPHER), ...sealedFields }),
]);

const deviceSchema = z.object({
  schemaVersion: z.literal(SESSION_SCHEMA_VERSION),
  deviceId: z.string().min(1),
  createdAt: isoTimestamp,
});

export type DiscardReason =
  | "unparsable"
  | "schema_version_mismatch"
  | "invalid_envelope"
  | "key_mismatch"
  | "encryption_key_missing"
  | "unexpected_plaintext"
  | "integrity_check_failed"
  | "invalid_record";

export type DecodeOutcome =
  | { readonly ok: true; readonly record: SessionRecord }
  | { readonly ok: false; readonly reason: DiscardReason };

export type GrantDecodeOutcome =
  | { readonly ok: true; readonly grant: StoredGrant }
  | { readonly ok: false; readonly reason: DiscardReason };

interface SealedText {
  readonly salt: string;
  readonly iv: string;
  readonly tag: string;
  readonly ciphertext: string;
}

const additionalData = (key: string, sequence: number): Buffer =>
  Buffer.from(`${SESSION_SCHEMA_VERSION}|${key}|${sequence}`, "utf8");

const grantAdditionalData = (key: string): Buffer => Buffer.from(`${SESSION_SCHEMA_VERSION}|${key}|grant`, "utf8");

const parseJson = (text: string): { readonly ok: true; readonly value: unknown } | { readonly ok: false } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
};

const seal = (plaintext: string, aad: Buffer, encryptionKey: EncryptionKey): SealedText => {
  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(CIPHER, encryptionKey.deriveKey(salt), iv, { authTagLength: TAG_LENGTH });
  cipher.setAAD(aad);
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  return {
    salt: salt.toString("base64"),
    iv: iv.toString("base64"),
    tag: cipher.getAuthTag().toString("base64"),
    ciphertext: ciphertext.toString("base64"),
  };
};

const openSealed = (
  sealed: SealedText,
  aad: Buffer,
  encryptionKey: EncryptionKey,
): { readonly ok: true; readonly text: string } | { readonly ok: false } => {
  try {
    const salt = Buffer.from(sealed.salt, "base64");
    const decipher = createDecipheriv(
      CIPHER,
      encryptionKey.deriveKey(salt),
      Buffer.from(sealed.iv, "base64"),
      { authTagLength: TAG_LENGTH },
    );
    decipher.setAAD(aad);
    decipher.setAuthTag(Buffer.from(sealed.tag, "base64"));
    const plaintext = Buffer.concat([
      decipher.update(Buffer.from(sealed.ciphertext, "base64")),
      decipher.final(),
    ]);
    return { ok: true, text: plaintext.toString("utf8") };
  } catch {
    return { ok: false };
  }
};

export const encodeEnvelope = (key: string, record: SessionRecord, encryptionKey?: EncryptionKey): string => {
  const header = { schemaVersion: SESSION_SCHEMA_VERSION, key, sequence: record.sequence };

  if (!encryptionKey) {
    return JSON.stringify({ ...header, encoding: "plain", record });
  }
  return JSON.stringify({
    ...header,
    encoding: CIPHER,
    ...seal(JSON.stringify(record), additionalData(key, record.sequence), encryptionKey),
  });
};

/**
 * Decodes a persisted envelope. Every failure is reported as a discard
 * reason; nothing here throws.
 */
export const decodeEnvelope = (key: string, text: string, encryptionKey?: EncryptionKey): DecodeOutcome => {
  const json = parseJson(text);
  if (!json.ok) {
    return { ok: false, reason: "unparsable" };
  }

  const header = headerSchema.safeParse(json.value);
  if (!header.success) {
    return { ok: false, reason: "invalid_envelope" };
  }
  if (header.data.schemaVersion !== SESSION_SCHEMA_VERSION) {
    return { ok: false, reason: "schema_version_mismatch" };
  }

  const envelope = envelopeSchema.safeParse(json.value);
  if (!envelope.success) {
    return { ok: false, reason: "invalid_envelope" };
  }
  if (envelope.data.key !== key) {
    return { ok: false, reason: "key_mismatch" };
  }

  let candidate: unknown;
  if (envelope.data.encoding === "plain") {
    if (encryptionKey) {
      return { ok: false, reason: "unexpected_plaintext" };
    }
    candidate = envelope.data.record;
  } else {
    if (!encryptionKey) {
      return { ok: false, reason: "encryption_key_missing" };
    }
    const aad = additionalData(envelope.data.key, envelope.data.sequence);
    const opened = openSealed(envelope.data, aad, encryptionKey);
    if (!opened.ok) {
      return { ok: false, reason: "integrity_check_failed" };
    }
    const inner = parseJson(opened.text);
    if (!inner.ok) {
      return { ok: false, reason: "invalid_record" };
    }
    candidate = inner.value;
  }

  const record = sessionRecordSchema.safeParse(candidate);
  if (!record.success || record.data.sequence !== envelope.data.sequence) {
    return { ok: false, reason: "invalid_record" };
  }
  if (`${record.data.provider}:${record.data.accountId}` !== key) {
    return { ok: false, reason: "key_mismatch" };
  }

  return { ok: true, record: record.data };
};

/** Reads the sequence from an envelope header without opening it. */
export const readEnvelopeSequence = (text: string): number | undefined => {
  const json = parseJson(text);
  if (!json.ok) {
    return undefined;
  }
  const header = headerSchema.safeParse(json.value);
  return header.success ? header.data.sequence : undefined;
};

export const encodeGrant = (key: string, grant: StoredGrant, encryptionKey?: EncryptionKey): string => {
  const header = { schemaVersion: SESSION_SCHEMA_VERSION, key, slot: "grant" };

  if (!encryptionKey) {
    return JSON.stringify({ ...header, encoding: "plain", grant });
  }
  return JSON.stringify({
    ...header,
    encoding: CIPHER,
    ...seal(JSON.stringify(grant), grantAdditionalData(key), encryptionKey),
  });
};

export const decodeGrant = (key: string, text: string, encryptionKey?: EncryptionKey): GrantDecodeOutcome => {
  const json = parseJson(text);
  if (!json.ok) {
    return { ok: false, reason: "unparsable" };
  }
  const envelope = grantEnvelopeSchema.safeParse(json.value);
  if (!envelope.success) {
    return { ok: false, reason: "invalid_envelope" };
  }
  if (envelope.data.schemaVersion !== SESSION_SCHEMA_VERSION) {
    return { ok: false, reason: "schema_version_mismatch" };
  }
  if (envelope.data.key !== key) {
    return { ok: false, reason: "key_mismatch" };
  }

  let candidate: unknown;
  if (envelope.data.encoding === "plain") {
    if (encryptionKey) {
      return { ok: false, reason: "unexpected_plaintext" };
    }
    candidate = envelope.data.grant;
  } else {
    if (!encryptionKey) {
      return { ok: false, reason: "encryption_key_missing" };
    }
    const opened = openSealed(envelope.data, grantAdditionalData(key), encryptionKey);
    if (!opened.ok) {
      return { ok: false, reason: "integrity_check_failed" };
    }
    const inner = parseJson(opened.text);
    candidate = inner.ok ? inner.value : undefined;
  }

  const grant = grantSchema.safeParse(candidate);
  return grant.success ? { ok: true, grant: grant.data } : { ok: false, reason: "invalid_record" };
};

export const encodeDevice = (identity: DeviceIdentity): string =>
  JSON.stringify({ schemaVersion: SESSION_SCHEMA_VERSION, ...identity });

export const decodeDevice = (text: string): DeviceIdentity | undefined => {
  const json = parseJson(text);
  if (!json.ok) {
    return undefined;
  }
  const parsed = deviceSchema.safeParse(json.value);
  return parsed.success ? { deviceId: parsed.data.deviceId, createdAt: parsed.data.createdAt } : undefined;
};
