import { describe, expect, it, vi } from "vitest";

import {
  REDACTED,
  SpanStatusCode,
  createBrokerLogger,
  getBrokerTracer,
  redactSecrets,
  runWithSpan,
  type BrokerLogLevel,
} from "../src/index.js";

const capture = (level: BrokerLogLevel = "info") => {
  const lines: Array<{ readonly level: BrokerLogLevel; readonly payload: unknown }> = [];
  const logger = createBrokerLogger({
    name: "test-service",
    level,
    sink: (lineLevel, line) => lines.push({ level: lineLevel, payload: JSON.parse(line) }),
  });
  return { logger, lines };
};

describe("createBrokerLogger", () => {
  it("writes one JSON object per line with context at the top level", () => {
    const { logger, lines } = capture();

    logger.child({ component: "session" }).info("session.authenticated", { account: "equities:acct-1" });

    expect(lines).toEqual([
      {
        level: "info",
        payload: {
          timestamp: expect.any(String),
          level: "info",
          message: "session.authenticated",
          service: "test-service",
          component: "session",
          account: "equities:acct-1",
        },
      },
    ]);
  });

  it("drops lines below the configured level", () => {
    const { logger, lines } = capture("warn");

    logger.debug("ignored");
    logger.info("ignored");
    logger.warn("kept");
    logger.error("kept too");

    expect(lines.map((line) => line.level)).toEqual(["warn", "error"]);
  });

  it("redacts credential fields wherever they appear", () => {
    const { logger, lines } = capture();

    logger.warn("login.failed", {
      username: "trader@example.test",
      password: "test-password",
      request: { headers: { authorization: "Bearer test-token", accept: "application/json" } },
      attempts: [{ mfa_code: "123456", status: 401 }],
    });

    expect(lines[0]?.payload).toMatchObject({
      username: "trader@example.test",
      password: REDACTED,
      request: { headers: { authorization: REDACTED, accept: "application/json" } },
      attempts: [{ mfa_code: REDACTED, status: 401 }],
    });
  });
});

describe("redactSecrets", () => {
  it("cuts cycles and keeps dates", () => {
    const when = new Date("2026-03-02T14:00:00.000Z");
    const node: Record<string, unknown> = { name: "root", when, apiSecret: "test-secret" };
    node.self = node;

    expect(redactSecrets(node)).toEqual({ name: "root", when, apiSecret: REDACTED, self: "[circular]" });
  });

  it("leaves unset sensitive fields alone", () => {
    expect(redactSecrets({ refreshToken: undefined, passcode: "test-passcode" })).toEqual({
      refreshToken: undefined,
      passcode: REDACTED,
    });
  });
});

describe("runWithSpan", () => {
  it("marks a failed result as an error without throwing", async () => {
    const statuses: unknown[] = [];

    const result = await runWithSpan(getBrokerTracer(), "session.authenticate", async (span) => {
      vi.spyOn(span, "setStatus").mockImplementation((status) => {
        statuses.push(status);
        return span;
      });
      return { ok: false as const, error: { code: "auth.unauthenticated", message: "Session has expired." } };
    });

    expect(result.ok).toBe(false);
    expect(statuses).toEqual([{ code: SpanStatusCode.ERROR, message: "auth.unauthenticated" }]);
  });

  it("marks a successful result as ok", async () => {
    const statuses: unknown[] = [];

    await runWithSpan(getBrokerTracer(), "transport.dispatch", async (span) => {
      vi.spyOn(span, "setStatus").mockImplementation((status) => {
        statuses.push(status);
        return span;
      });
      return { ok: true as const, value: 1 };
    });

    expect(statuses).toEqual([{ code: SpanStatusCode.OK }]);
  });

  it("reports and rethrows exceptions", async () => {
    const onError = vi.fn();

    await expect(
      runWithSpan(
        getBrokerTracer(),
        "transport.dispatch",
        async () => {
          throw new Error("boom");
        },
        { onError },
      ),
    ).rejects.toThrow("boom");
    expect(onError).toHaveBeenCalledWith(expect.objectContaining({ message: "boom" }), expect.anything());
  });
});
