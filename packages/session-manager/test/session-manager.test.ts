import { createHmac } from "node:crypto";
import { inspect } from "node:util";

import { describe, expect, it, vi } from "vitest";

import type {
  ApiKeyHmacCredential,
  ChallengeDescriptor,
  Clock,
  EncryptedOAuthCredential,
  HttpRequest,
  PasswordMfaCredential,
} from "@brokerkit/contracts";
import { MemorySessionStore } from "@brokerkit/session-store";
import { createBrokerLogger } from "@brokerkit/telemetry";
import { RetryingExchange, TransportDispatcher } from "@brokerkit/transport";
import { ScriptedHttpClient, jsonReply } from "@brokerkit/transport/testing";

import {
  SessionManager,
  type ApiKeyHmacProfile,
  type EncryptedOAuthProfile,
  type PasswordMfaProfile,
  type ProviderProfile,
} from "../src/index.js";

class ManualClock implements Clock {
  constructor(private ms: number) {}

  now(): Date {
    return new Date(this.ms);
  }

  advance(seconds: number): void {
    this.ms += seconds * 1000;
  }
}

const START = Date.parse("2026-03-02T14:00:00.000Z");
const quietLogger = createBrokerLogger({ level: "error", sink: () => undefined });

const equitiesProfile: PasswordMfaProfile = {
  provider: "equities",
  kind: "password_mfa",
  clientId: "test-client",
  endpoints: { sandbox: "https://equities.sandbox.test", live: "https://equities.live.test" },
};

const exchangeProfile: ApiKeyHmacProfile = {
  provider: "exchange",
  kind: "api_key_hmac",
  endpoints: { sandbox: "https://exchange.sandbox.test", live: "https://exchange.live.test" },
};

const optionsProfile: EncryptedOAuthProfile = {
  provider: "options",
  kind: "encrypted_oauth",
  endpoints: { sandbox: "https://options.sandbox.test", live: "https://options.live.test" },
  scrypt: { cost: 1024, blockSize: 8, parallelization: 1 },
};

const PROFILES: ReadonlyArray<ProviderProfile> = [equitiesProfile, exchangeProfile, optionsProfile];

const passwordCredential: PasswordMfaCredential = {
  provider: "equities",
  accountId: "acct-1",
  kind: "password_mfa",
  username: "trader@example.test",
  password: "test-password",
  secondFactor: { type: "otp", code: "123456" },
};

const hmacCredential: ApiKeyHmacCredential = {
  provider: "exchange",
  accountId: "acct-2",
  kind: "api_key_hmac",
  apiKey: "test-key-id",
  apiSecret: "test-secret",
};

const oauthCredential: EncryptedOAuthCredential = {
  provider: "options",
  accountId: "acct-3",
  kind: "encrypted_oauth",
  clientId: "test-client@example",
  passcode: "test-passcode",
  refreshToken: "enrol-refresh",
};

const tokenReply = (accessToken: string, refreshToken = "refresh-1", expiresIn = 3600) =>
  jsonReply(200, { access_token: accessToken, refresh_token: refreshToken, expires_in: expiresIn, token_type: "Bearer" });

const bodyOf = (request: HttpRequest | undefined): unknown => JSON.parse(request?.body ?? "null");

const setup = (options: { store?: MemorySessionStore; clock?: ManualClock; http?: ScriptedHttpClient } = {}) => {
  const clock = options.clock ?? new ManualClock(START);
  const http = options.http ?? new ScriptedHttpClient();
  const store = options.store ?? new MemorySessionStore({ logger: quietLogger });
  const exchange = new RetryingExchange({
    httpClient: http,
    clock,
    sleep: async () => undefined,
    random: () => 0.5,
    logger: quietLogger,
  });
  let devices = 0;
  const manager = new SessionManager({
    profiles: PROFILES,
    store,
    exchange,
    clock,
    generateDeviceId: () => `device-${++devices}`,
    telemetry: { logger: quietLogger },
  });
  return { manager, http, store, clock, exchange };
};

describe("SessionManager with password and MFA providers", () => {
  it("logs in once and then reuses the session without network", async () => {
    const { manager, http, store } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"));

    const first = await manager.authenticate(passwordCredential);
    if (!first.ok) {
      throw new Error(first.error.message);
    }
    expect(first.value.expiresAt).toBe("2026-03-02T15:00:00.000Z");
    expect(first.value.sequence).toBe(1);
    expect(bodyOf(http.requests[0])).toEqual({
      grant_type: "password",
      client_id: "test-client",
      scope: "internal",
      expires_in: 86_400,
      username: "trader@example.test",
      password: "test-password",
      device_token: "device-1",
      mfa_code: "123456",
    });

    const second = await manager.authenticate(passwordCredential);
    expect(second.ok && second.value).toBe(first.value);
    expect(http.requests).toHaveLength(1);
    expect(manager.getState(passwordCredential)).toBe("authenticated");

    const persisted = await store.load("equities:acct-1");
    expect(persisted?.accessToken).toBe("access-1");
    expect(persisted?.refreshToken).toBe("refresh-1");
    expect(await store.loadDevice("equities:acct-1")).toEqual({
      deviceId: "device-1",
      createdAt: "2026-03-02T14:00:00.000Z",
    });
  });

  it("restores a persisted session in a new process without network", async () => {
    const store = new MemorySessionStore({ logger: quietLogger });
    const before = setup({ store });
    before.http.on("POST", "/oauth2/token", tokenReply("access-1"));
    await before.manager.authenticate(passwordCredential);

    const after = setup({ store });
    const restored = await after.manager.authenticate(passwordCredential);

    expect(restored.ok && restored.value.sequence).toBe(1);
    expect(after.http.requests).toHaveLength(0);
    expect(after.manager.getState(passwordCredential)).toBe("authenticated");
  });

  it("shares one login among concurrent callers", async () => {
    const { manager, http } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"));

    const results = await Promise.all([
      manager.authenticate(passwordCredential),
      manager.authenticate(passwordCredential),
      manager.authenticate(passwordCredential),
    ]);

    expect(http.callsTo("POST", "/oauth2/token")).toHaveLength(1);
    const contexts = results.map((result) => (result.ok ? result.value : undefined));
    expect(contexts[0]).toBeDefined();
    expect(contexts[1]).toBe(contexts[0]);
    expect(contexts[2]).toBe(contexts[0]);
  });

  it("does not hand a login for one environment to a caller asking for another", async () => {
    const { manager, http } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"), tokenReply("access-2"));

    const [sandbox, live] = await Promise.all([
      manager.authenticate(passwordCredential),
      manager.authenticate(passwordCredential, { environment: "live" }),
    ]);

    expect(sandbox.ok && sandbox.value.environment).toBe("sandbox");
    expect(live.ok && live.value.environment).toBe("live");
    expect(http.requests.map((request) => new URL(request.url).origin)).toEqual([
      "https://equities.sandbox.test",
      "https://equities.live.test",
    ]);
  });

  it("treats a session inside the skew window as expired and refreshes it", async () => {
    const { manager, http, store, clock } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"), tokenReply("access-2", "refresh-2"));

    const first = await manager.authenticate(passwordCredential);
    if (!first.ok) {
      throw new Error(first.error.message);
    }

    clock.advance(3600 - 31);
    expect(manager.getState(passwordCredential)).toBe("authenticated");

    clock.advance(2);
    expect(manager.getState(passwordCredential)).toBe("expired");
    expect(first.value.sign({ url: "https://equities.sandbox.test/v1/orders", method: "GET", headers: {} })).toEqual({
      ok: false,
      error: expect.objectContaining({ code: "auth.unauthenticated", message: "Session has expired." }),
    });

    const refreshed = await manager.authenticate(passwordCredential);
    expect(refreshed.ok && refreshed.value.expiresAt).toBe("2026-03-02T15:59:31.000Z");
    expect(bodyOf(http.requests[1])).toEqual({
      grant_type: "refresh_token",
      client_id: "test-client",
      scope: "internal",
      expires_in: 86_400,
      refresh_token: "refresh-1",
      device_token: "device-1",
    });

    const persisted = await store.load("equities:acct-1");
    expect(persisted?.accessToken).toBe("access-2");
    expect(persisted?.sequence).toBe(2);
  });

  it("falls back to a full login when refresh is refused", async () => {
    const { manager, http, clock } = setup();
    http.on(
      "POST",
      "/oauth2/token",
      tokenReply("access-1"),
      jsonReply(400, { error: "invalid_grant" }),
      tokenReply("access-3"),
    );

    await manager.authenticate(passwordCredential);
    clock.advance(3600);

    const result = await manager.authenticate(passwordCredential);

    expect(result.ok).toBe(true);
    expect(http.callsTo("POST", "/oauth2/token").map((request) => bodyOf(request))).toEqual([
      expect.objectContaining({ grant_type: "password" }),
      expect.objectContaining({ grant_type: "refresh_token", refresh_token: "refresh-1" }),
      expect.objectContaining({ grant_type: "password" }),
    ]);
  });

  it("discards a corrupted stored session and logs in", async () => {
    const { manager, http, store } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"));
    store.overwriteEnvelope("equities:acct-1", "{not json");

    const result = await manager.authenticate(passwordCredential);

    expect(result.ok).toBe(true);
    expect(http.callsTo("POST", "/oauth2/token")).toHaveLength(1);
  });

  it("logs in against the endpoint of the requested environment", async () => {
    const { manager, http } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"));

    await manager.authenticate(passwordCredential);
    const live = await manager.authenticate(passwordCredential, { environment: "live" });

    expect(live.ok && live.value.baseUrl).toBe("https://equities.live.test");
    expect(http.requests.map((request) => new URL(request.url).origin)).toEqual([
      "https://equities.sandbox.test",
      "https://equities.live.test",
    ]);
  });

  it("reports mfa_required with the challenge when no code is available", async () => {
    const { manager, http } = setup();
    http.on("POST", "/oauth2/token", jsonReply(200, { mfa_required: true, mfa_type: "sms" }));
    const { secondFactor: _unused, ...withoutCode } = passwordCredential;

    const result = await manager.authenticate(withoutCode);

    expect(result).toEqual({
      ok: false,
      error: expect.objectContaining({
        code: "auth.mfa_required",
        challenge: {
          challengeId: "mfa:device-1",
          type: "mfa",
          channel: "sms",
          expiresAt: "2026-03-02T14:05:00.000Z",
        },
      }),
    });
    expect(manager.getState(withoutCode)).toBe("unauthenticated");
  });

  it("asks the challenge callback for a code and resends the login", async () => {
    const { manager, http } = setup();
    http.on(
      "POST",
      "/oauth2/token",
      jsonReply(200, { mfa_required: true, mfa_type: "app" }),
      tokenReply("access-1"),
    );
    const { secondFactor: _unused, ...withoutCode } = passwordCredential;
    const onChallenge = vi.fn(async (_challenge: ChallengeDescriptor) => " 654321 ");

    const result = await manager.authenticate(withoutCode, { onChallenge });

    expect(result.ok).toBe(true);
    expect(onChallenge).toHaveBeenCalledTimes(1);
    expect(onChallenge.mock.calls[0]?.[0]).toMatchObject({ type: "mfa", channel: "app" });
    expect(bodyOf(http.requests[1])).toMatchObject({ mfa_code: "654321" });
  });

  it("rejects a one-time code the provider refuses", async () => {
    const { manager, http } = setup();
    http.on("POST", "/oauth2/token", jsonReply(200, { mfa_required: true }));

    const result = await manager.authenticate(passwordCredential);

    expect(result).toEqual({
      ok: false,
      error: expect.objectContaining({ code: "auth.invalid_credential", message: "One-time code was rejected." }),
    });
    expect(http.requests).toHaveLength(1);
  });

  it("maps rejected credentials to invalid_credential", async () => {
    const { manager, http } = setup();
    http.on("POST", "/oauth2/token", jsonReply(401, { detail: "Unable to log in with provided credentials." }));

    const result = await manager.authenticate(passwordCredential);

    expect(result).toEqual({
      ok: false,
      error: expect.objectContaining({
        code: "auth.invalid_credential",
        message: "Login was rejected: Unable to log in with provided credentials.",
      }),
    });
  });

  it("surfaces an unreachable provider as network_failure after retries", async () => {
    const { manager, http } = setup();
    http.on("POST", "/oauth2/token", jsonReply(503, { error: "unavailable" }));

    const result = await manager.authenticate(passwordCredential);

    expect(result.ok || result.error.code).toBe("auth.network_failure");
    expect(result.ok || result.error.retryable).toBe(true);
    expect(http.requests).toHaveLength(3);
  });

  it("continues a device challenge on a later authenticate", async () => {
    const { manager, http } = setup();
    http
      .on(
        "POST",
        "/oauth2/token",
        jsonReply(200, {
          challenge: {
            id: "ch-1",
            type: "sms",
            status: "issued",
            remaining_attempts: 3,
            expires_at: "2026-03-02T14:05:00.000Z",
          },
        }),
        tokenReply("access-1"),
      )
      .on("POST", "/challenge/ch-1/respond", jsonReply(200, { status: "validated" }));
    const { secondFactor: _unused, ...withoutCode } = passwordCredential;

    const pending = await manager.authenticate(withoutCode);
    expect(pending).toEqual({
      ok: false,
      error: expect.objectContaining({
        code: "auth.device_verification_required",
        challenge: {
          challengeId: "ch-1",
          type: "device_verification",
          channel: "sms",
          expiresAt: "2026-03-02T14:05:00.000Z",
          remainingAttempts: 3,
        },
      }),
    });

    const completed = await manager.authenticate({ ...withoutCode, secondFactor: { type: "otp", code: "112233" } });

    expect(completed.ok).toBe(true);
    expect(bodyOf(http.callsTo("POST", "/challenge/ch-1/respond")[0])).toEqual({ response: "112233" });
    const replay = http.callsTo("POST", "/oauth2/token")[1];
    expect(replay?.headers["x-challenge-response-id"]).toBe("ch-1");
    expect(bodyOf(replay)).not.toHaveProperty("mfa_code");
    expect(bodyOf(replay)).toMatchObject({ device_token: "device-1" });
  });

  it("rejects credentials whose kind does not match the provider profile", async () => {
    const { manager, http } = setup();

    const result = await manager.authenticate({ ...passwordCredential, provider: "exchange" });
    const unknown = await manager.authenticate({ ...passwordCredential, provider: "futures" });

    expect(result.ok || result.error.code).toBe("auth.invalid_credential");
    expect(unknown.ok || unknown.error.message).toBe('No provider profile is configured for "futures".');
    expect(http.requests).toHaveLength(0);
  });
});

describe("SessionManager invalidation", () => {
  it("clears the session idempotently and refuses to sign with old contexts", async () => {
    const { manager, http, store } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"), tokenReply("access-2"));

    const first = await manager.authenticate(passwordCredential);
    if (!first.ok) {
      throw new Error(first.error.message);
    }

    await manager.invalidate(passwordCredential);
    await manager.invalidate(passwordCredential);

    expect(manager.getState(passwordCredential)).toBe("unauthenticated");
    expect(await store.load("equities:acct-1")).toBeUndefined();
    expect(first.value.sign({ url: "https://equities.sandbox.test/v1/orders", method: "GET", headers: {} })).toEqual({
      ok: false,
      error: expect.objectContaining({ code: "auth.unauthenticated", message: "Session was invalidated." }),
    });

    const again = await manager.authenticate(passwordCredential);
    expect(again.ok && again.value.sequence).toBe(4);
    expect(http.callsTo("POST", "/oauth2/token")).toHaveLength(2);
    expect(await store.loadDevice("equities:acct-1")).toEqual({
      deviceId: "device-1",
      createdAt: "2026-03-02T14:00:00.000Z",
    });
  });

  it("drops a login that completes after the account was invalidated", async () => {
    const { manager, http, store } = setup();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    http.on("POST", "/oauth2/token", async () => {
      await gate;
      return tokenReply("access-late");
    });

    const pending = manager.authenticate(passwordCredential);
    await vi.waitFor(() => expect(http.requests).toHaveLength(1));
    await manager.invalidate(passwordCredential);
    release();

    expect(await pending).toEqual({
      ok: false,
      error: expect.objectContaining({ code: "auth.unauthenticated" }),
    });
    expect(await store.load("equities:acct-1")).toBeUndefined();
    expect(manager.getState(passwordCredential)).toBe("unauthenticated");
  });

  it("forces a new device identity after resetDevice", async () => {
    const { manager, http, store } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"), tokenReply("access-2"));

    await manager.authenticate(passwordCredential);
    expect(await manager.resetDevice(passwordCredential)).toEqual({ ok: true, value: undefined });
    const result = await manager.authenticate(passwordCredential, { forceLogin: true });

    expect(result.ok && result.value.deviceId).toBe("device-2");
    expect(bodyOf(http.requests[1])).toMatchObject({ device_token: "device-2" });
    expect((await store.loadDevice("equities:acct-1"))?.deviceId).toBe("device-2");
  });

  it("forgets the credential on logout", async () => {
    const { manager, http } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"));

    const first = await manager.authenticate(passwordCredential);
    if (!first.ok) {
      throw new Error(first.error.message);
    }
    await manager.logout(passwordCredential);

    expect(manager.getState(passwordCredential)).toBe("unauthenticated");
    expect(await manager.recover(first.value)).toEqual({
      ok: false,
      error: expect.objectContaining({
        code: "auth.unauthenticated",
        message: "No credential is held for this account; authenticate first.",
      }),
    });
  });
});

describe("SessionManager recovery through the dispatcher", () => {
  it("logs in again when the provider rejects a live token", async () => {
    const { manager, http, exchange } = setup();
    http
      .on("POST", "/oauth2/token", tokenReply("access-1"), tokenReply("access-2"))
      .on("GET", "/v1/orders", jsonReply(401, { detail: "expired" }), jsonReply(200, { orders: [] }));
    const dispatcher = new TransportDispatcher({ authority: manager, exchange, telemetry: { logger: quietLogger } });

    const context = await manager.authenticate(passwordCredential);
    if (!context.ok) {
      throw new Error(context.error.message);
    }
    const result = await dispatcher.dispatch(context.value, { method: "GET", path: "/v1/orders" });

    expect(result.ok && result.value.data).toEqual({ orders: [] });
    expect(http.callsTo("GET", "/v1/orders").map((request) => request.headers.authorization)).toEqual([
      "Bearer access-1",
      "Bearer access-2",
    ]);
    expect(bodyOf(http.callsTo("POST", "/oauth2/token")[1])).toMatchObject({ grant_type: "password" });
  });

  it("answers a stale context with the current one", async () => {
    const { manager, http } = setup();
    http.on("POST", "/oauth2/token", tokenReply("access-1"), tokenReply("access-2"));

    const stale = await manager.authenticate(passwordCredential);
    await manager.invalidate(passwordCredential);
    const current = await manager.authenticate(passwordCredential);
    if (!stale.ok || !current.ok) {
      throw new Error("authentication failed");
    }

    const recovered = await manager.recover(stale.value);

    expect(recovered.ok && recovered.value).toBe(current.value);
    expect(http.requests).toHaveLength(2);
  });
});

describe("SessionManager with API key providers", () => {
  it("validates the key pair once and signs concurrent requests with increasing nonces", async () => {
    const { manager, http, exchange } = setup();
    http.on("POST", "/v1/heartbeat", jsonReply(200, { result: "ok" })).on("GET", "/v1/balances", jsonReply(200, []));
    const dispatcher = new TransportDispatcher({ authority: manager, exchange, telemetry: { logger: quietLogger } });

    const context = await manager.authenticate(hmacCredential);
    if (!context.ok) {
      throw new Error(context.error.message);
    }
    const results = await Promise.all(
      Array.from({ length: 5 }, () => dispatcher.dispatch(context.value, { method: "GET", path: "/v1/balances" })),
    );

    expect(results.every((result) => result.ok)).toBe(true);
    expect(http.requests.map((request) => request.headers["x-nonce"])).toEqual(
      Array.from({ length: 6 }, (_, index) => String(START + index)),
    );

    const heartbeat = http.callsTo("POST", "/v1/heartbeat")[0];
    const body = JSON.stringify({ request: "/v1/heartbeat" });
    expect(heartbeat?.body).toBe(body);
    expect(heartbeat?.headers["x-api-key"]).toBe("test-key-id");
    expect(heartbeat?.headers["x-signature"]).toBe(
      createHmac("sha384", "test-secret").update(`${START}${START}${body}`).digest("hex"),
    );
    expect(http.requests.flatMap((request) => Object.values(request.headers))).not.toContain("test-secret");

    const again = await manager.authenticate(hmacCredential);
    expect(again.ok && again.value).toBe(context.value);
    expect(http.callsTo("POST", "/v1/heartbeat")).toHaveLength(1);
  });

  it("revalidates when the stored key id belongs to another key pair", async () => {
    const store = new MemorySessionStore({ logger: quietLogger });
    const before = setup({ store });
    before.http.on("POST", "/v1/heartbeat", jsonReply(200, {}));
    await before.manager.authenticate(hmacCredential);

    const after = setup({ store });
    after.http.on("POST", "/v1/heartbeat", jsonReply(200, {}));
    const rotated = await after.manager.authenticate({ ...hmacCredential, apiKey: "test-key-id-2" });

    expect(rotated.ok).toBe(true);
    expect(after.http.callsTo("POST", "/v1/heartbeat")[0]?.headers["x-api-key"]).toBe("test-key-id-2");
  });
});

describe("SessionManager with encrypted OAuth providers", () => {
  it("enrols, restores after restart with the passcode and refuses a wrong passcode", async () => {
    const store = new MemorySessionStore({ logger: quietLogger });
    const clock = new ManualClock(START);
    const enrol = setup({ store, clock });
    enrol.http.on("POST", "/v1/oauth2/token", tokenReply("oauth-access-1", "oauth-refresh-1", 1800));

    const enrolled = await enrol.manager.authenticate(oauthCredential);
    expect(enrolled.ok).toBe(true);
    expect(enrol.http.requests[0]?.body).toBe(
      "grant_type=refresh_token&refresh_token=enrol-refresh&access_type=offline&client_id=test-client%40example",
    );
    expect(store.rawEnvelope("options:acct-3")).not.toContain("oauth-refresh-1");

    clock.advance(1800);
    const { refreshToken: _enrolment, ...withoutToken } = oauthCredential;

    const restarted = setup({ store, clock });
    restarted.http.on("POST", "/v1/oauth2/token", tokenReply("oauth-access-2", "oauth-refresh-1", 1800));
    const restored = await restarted.manager.authenticate(withoutToken);
    expect(restored.ok && restored.value.sequence).toBe(2);
    expect(restarted.http.requests[0]?.body).toBe(
      "grant_type=refresh_token&refresh_token=oauth-refresh-1&access_type=offline&client_id=test-client%40example",
    );

    const wrong = setup({ store, clock });
    const refused = await wrong.manager.authenticate({ ...withoutToken, passcode: "other-passcode" });
    expect(refused.ok || refused.error.code).toBe("auth.invalid_credential");
    expect(wrong.http.requests).toHaveLength(0);
  });

  it("logs in again from the stored grant after the provider rejects a live token", async () => {
    const { manager, http, exchange } = setup();
    http
      .on(
        "POST",
        "/v1/oauth2/token",
        tokenReply("oauth-access-1", "oauth-refresh-1", 1800),
        tokenReply("oauth-access-2", "oauth-refresh-2", 1800),
      )
      .on("GET", "/v1/accounts", jsonReply(401, { error: "invalid_token" }), jsonReply(200, { accounts: [] }));
    const dispatcher = new TransportDispatcher({ authority: manager, exchange, telemetry: { logger: quietLogger } });
    const { refreshToken: _enrolment, ...withoutToken } = oauthCredential;

    await manager.authenticate(oauthCredential);
    const context = await manager.authenticate(withoutToken);
    if (!context.ok) {
      throw new Error(context.error.message);
    }
    const result = await dispatcher.dispatch(context.value, { method: "GET", path: "/v1/accounts" });

    expect(result.ok && result.value.data).toEqual({ accounts: [] });
    expect(http.callsTo("GET", "/v1/accounts").map((request) => request.headers.authorization)).toEqual([
      "Bearer oauth-access-1",
      "Bearer oauth-access-2",
    ]);
    expect(http.callsTo("POST", "/v1/oauth2/token")[1]?.body).toBe(
      "grant_type=refresh_token&refresh_token=oauth-refresh-1&access_type=offline&client_id=test-client%40example",
    );
  });

  it("keeps the grant through invalidate and drops it once the provider refuses it", async () => {
    const { manager, http } = setup();
    http.on(
      "POST",
      "/v1/oauth2/token",
      tokenReply("oauth-access-1", "oauth-refresh-1", 1800),
      tokenReply("oauth-access-2", "oauth-refresh-2", 1800),
      jsonReply(400, { error: "invalid_grant" }),
    );
    const { refreshToken: _enrolment, ...withoutToken } = oauthCredential;

    await manager.authenticate(oauthCredential);
    await manager.invalidate(oauthCredential);
    const again = await manager.authenticate(withoutToken);

    expect(again.ok && again.value.sequence).toBe(3);
    expect(http.requests[1]?.body).toContain("refresh_token=oauth-refresh-1&");

    await manager.invalidate(oauthCredential);
    const refused = await manager.authenticate(withoutToken);
    expect(refused.ok || refused.error.message).toBe("Refresh token exchange was rejected (status 400).");
    expect(http.requests[2]?.body).toContain("refresh_token=oauth-refresh-2&");

    const afterRefusal = await manager.authenticate(withoutToken);
    expect(afterRefusal.ok || afterRefusal.error.code).toBe("auth.invalid_credential");
    expect(http.requests).toHaveLength(3);
  });

  it("deletes the grant on logout", async () => {
    const { manager, http } = setup();
    http.on("POST", "/v1/oauth2/token", tokenReply("oauth-access-1", "oauth-refresh-1", 1800));
    const { refreshToken: _enrolment, ...withoutToken } = oauthCredential;

    await manager.authenticate(oauthCredential);
    await manager.logout(oauthCredential);
    const result = await manager.authenticate(withoutToken);

    expect(result.ok || result.error.code).toBe("auth.invalid_credential");
    expect(http.requests).toHaveLength(1);
  });

  it("hides tokens from JSON and inspect output of the context", async () => {
    const { manager, http } = setup();
    http.on("POST", "/v1/oauth2/token", tokenReply("oauth-access-1", "oauth-refresh-1", 1800));

    const result = await manager.authenticate(oauthCredential);
    if (!result.ok) {
      throw new Error(result.error.message);
    }

    expect(JSON.parse(JSON.stringify(result.value))).toEqual({
      provider: "options",
      accountId: "acct-3",
      kind: "encrypted_oauth",
      environment: "sandbox",
      baseUrl: "https://options.sandbox.test",
      issuedAt: "2026-03-02T14:00:00.000Z",
      expiresAt: "2026-03-02T14:30:00.000Z",
    });
    expect(inspect(result.value)).toBe(
      "AuthenticatedContext { options:acct-3 sandbox until 2026-03-02T14:30:00.000Z }",
    );
  });
});
