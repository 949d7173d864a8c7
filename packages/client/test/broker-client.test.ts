import { existsSync, mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it } from "vitest";

import { loadBrokerConfig, type BrokerConfig, type EnvMap } from "@brokerkit/config";
import type { PasswordMfaCredential } from "@brokerkit/contracts";
import type { PasswordMfaProfile } from "@brokerkit/session-manager";
import { MemorySessionStore } from "@brokerkit/session-store";
import { createBrokerLogger } from "@brokerkit/telemetry";
import { ScriptedHttpClient, jsonReply } from "@brokerkit/transport/testing";

import { createBrokerClient } from "../src/index.js";

const equities: PasswordMfaProfile = {
  provider: "equities",
  kind: "password_mfa",
  clientId: "test-client",
  endpoints: { sandbox: "https://equities.sandbox.test", live: "https://equities.live.test" },
};

const credential: PasswordMfaCredential = {
  provider: "equities",
  accountId: "acct-1",
  kind: "password_mfa",
  username: "trader@example.test",
  password: "test-password",
  secondFactor: { type: "otp", code: "123456" },
};

const configFrom = (env: EnvMap): BrokerConfig => {
  const loaded = loadBrokerConfig(env);
  if (!loaded.ok) {
    throw new Error(loaded.error.message);
  }
  return loaded.value;
};

const tokenReply = jsonReply(200, { access_token: "access-1", refresh_token: "refresh-1", expires_in: 3600 });

const capturingLogger = () => {
  const lines: Record<string, unknown>[] = [];
  const logger = createBrokerLogger({
    level: "info",
    sink: (_level, line) => {
      const parsed: unknown = JSON.parse(line);
      if (parsed && typeof parsed === "object") {
        lines.push({ ...parsed });
      }
    },
  });
  return { logger, lines };
};

const fastScrypt = { cost: 1024, blockSize: 8, parallelization: 1 };

describe("createBrokerClient", () => {
  it("answers writes locally in dry-run mode and lets reads through", async () => {
    const http = new ScriptedHttpClient()
      .on("POST", "/oauth2/token", tokenReply)
      .on("GET", "/v1/positions", jsonReply(200, { positions: [] }));
    const { logger, lines } = capturingLogger();
    const client = createBrokerClient({
      config: configFrom({}),
      providers: [equities],
      store: new MemorySessionStore(),
      httpClient: http,
      telemetry: { logger },
    });

    const context = await client.authenticate(credential);
    if (!context.ok) {
      throw new Error(context.error.message);
    }
    const positions = await client.dispatch(context.value, { method: "GET", path: "/v1/positions" });
    const order = await client.dispatch(context.value, {
      method: "POST",
      path: "/v1/orders",
      body: { symbol: "ACME", quantity: 1 },
    });

    expect(positions.ok && positions.value.data).toEqual({ positions: [] });
    expect(order).toEqual({
      ok: true,
      value: { status: 200, headers: {}, data: { dryRun: true, method: "POST", path: "/v1/orders" }, attempts: 0 },
    });
    expect(http.callsTo("POST", "/v1/orders")).toHaveLength(0);
    expect(lines.find((line) => line.message === "dry_run.write_skipped")).toMatchObject({
      level: "info",
      component: "dry_run",
      provider: "equities",
      accountId: "acct-1",
      method: "POST",
      path: "/v1/orders",
    });
  });

  it("sends writes when dry-run is off", async () => {
    const http = new ScriptedHttpClient()
      .on("POST", "/oauth2/token", tokenReply)
      .on("POST", "/v1/orders", jsonReply(201, { id: "ord-1" }));
    const client = createBrokerClient({
      config: configFrom({ BROKERKIT_DRY_RUN: "false" }),
      providers: [equities],
      store: new MemorySessionStore(),
      httpClient: http,
      telemetry: { logger: capturingLogger().logger },
    });

    const context = await client.authenticate(credential);
    if (!context.ok) {
      throw new Error(context.error.message);
    }
    const order = await client.dispatch(context.value, { method: "POST", path: "/v1/orders", body: { symbol: "ACME" } });

    expect(order.ok && order.value.data).toEqual({ id: "ord-1" });
    expect(http.callsTo("POST", "/v1/orders")[0]?.headers.authorization).toBe("Bearer access-1");
  });

  it("logs in against the configured environment", async () => {
    const http = new ScriptedHttpClient().on("POST", "/oauth2/token", tokenReply);
    const client = createBrokerClient({
      config: configFrom({ BROKERKIT_ENVIRONMENT: "live" }),
      providers: [equities],
      store: new MemorySessionStore(),
      httpClient: http,
      telemetry: { logger: capturingLogger().logger },
    });

    const context = await client.authenticate(credential);

    expect(context.ok && context.value.environment).toBe("live");
    expect(http.requests[0]?.url).toBe("https://equities.live.test/oauth2/token");
  });

  it("persists sealed sessions in the configured directory across clients", async () => {
    const directory = mkdtempSync(join(tmpdir(), "brokerkit-client-"));
    const config = configFrom({ BROKERKIT_SESSION_DIR: directory, BROKERKIT_SESSION_PASSCODE: "test-passcode" });
    const sessionFile = join(directory, `${encodeURIComponent("equities:acct-1")}.session.json`);

    const firstHttp = new ScriptedHttpClient().on("POST", "/oauth2/token", tokenReply);
    const first = createBrokerClient({
      config,
      providers: [equities],
      httpClient: firstHttp,
      sessionKeyScrypt: fastScrypt,
      telemetry: { logger: capturingLogger().logger },
    });
    expect((await first.authenticate(credential)).ok).toBe(true);
    expect(readFileSync(sessionFile, "utf8")).not.toContain("access-1");

    const secondHttp = new ScriptedHttpClient();
    const second = createBrokerClient({
      config,
      providers: [equities],
      httpClient: secondHttp,
      sessionKeyScrypt: fastScrypt,
      telemetry: { logger: capturingLogger().logger },
    });
    expect((await second.authenticate(credential)).ok).toBe(true);
    expect(secondHttp.requests).toHaveLength(0);
    expect(second.getState(credential)).toBe("authenticated");

    await second.logout(credential);
    expect(second.getState(credential)).toBe("unauthenticated");
    expect(existsSync(sessionFile)).toBe(false);
  });
});
