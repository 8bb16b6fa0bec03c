import test from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import { createApp } from "./app.js";
import { loadOtpConfig, loadServerConfig } from "./lib/config.js";
import { EnrollmentService } from "./lib/enrollment.js";
import { InMemoryEnrollmentStore } from "./lib/enrollmentStore.js";
import { MetricsRegistry, createStructuredLogger } from "./lib/observability.js";
import { generateTotp } from "./lib/totp.js";

const secret = new Uint8Array(20).fill(1);
const startTime = 1_699_999_980;

type RequestOptions = { body?: unknown; token?: string };

function field(body: unknown, key: string): unknown {
  return body && typeof body === "object" ? Reflect.get(body, key) : undefined;
}

async function startApp() {
  let now = startTime;
  let shuttingDown = false;
  const metrics = new MetricsRegistry();
  const logger = createStructuredLogger("otp-test", "error", () => undefined);
  const enrollments = new EnrollmentService({
    store: new InMemoryEnrollmentStore(),
    config: loadOtpConfig({}),
    logger,
    random: (size) => new Uint8Array(size).fill(1),
    clock: () => now
  });
  const app = createApp({
    config: loadServerConfig({ JWT_SECRET: "test-secret", REQUEST_LOGS: "0" }),
    enrollments,
    logger,
    metrics,
    isShuttingDown: () => shuttingDown
  });
  const server = app.listen(0);
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server has no TCP address");
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const request = async (method: string, path: string, options: RequestOptions = {}) => {
    const headers: Record<string, string> = {};
    if (options.body !== undefined) headers["content-type"] = "application/json";
    if (options.token) headers.authorization = `Bearer ${options.token}`;
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body)
    });
    const text = await response.text();
    const body: unknown = response.headers.get("content-type")?.includes("application/json") ? JSON.parse(text) : text;
    return { status: response.status, body };
  };

  return {
    request,
    advance: (seconds: number) => {
      now += seconds;
    },
    shutDown: () => {
      shuttingDown = true;
    },
    codeAt: (offsetSec: number) => generateTotp(secret, { now: startTime + offsetSec }),
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  };
}

// First six-digit code outside the verify window at startTime (counters -2..+12 steps).
function codeOutsideWindow() {
  const windowCodes = new Set<string>();
  for (let k = -2; k <= 12; k += 1) {
    windowCodes.add(generateTotp(secret, { now: startTime + k * 30 }));
  }
  for (let candidate = 0; ; candidate += 1) {
    const code = String(candidate).padStart(6, "0");
    if (!windowCodes.has(code)) return code;
  }
}

test("payloads failing validation get 400", async () => {
  const server = await startApp();
  try {
    assert.deepEqual(await server.request("POST", "/api/otp/enroll", { body: {} }), {
      status: 400,
      body: { error: "Invalid payload" }
    });
    assert.deepEqual(await server.request("POST", "/api/otp/verify", { body: { label: "alice" } }), {
      status: 400,
      body: { error: "Invalid payload" }
    });
    assert.deepEqual(await server.request("POST", "/api/otp/enroll/confirm", { body: { label: " ", code: "123456" } }), {
      status: 400,
      body: { error: "Invalid payload" }
    });
  } finally {
    await server.close();
  }
});

test("enroll, confirm and verify issue a session token", async () => {
  const server = await startApp();
  try {
    assert.deepEqual(await server.request("POST", "/api/otp/verify", { body: { label: "alice", code: "123456" } }), {
      status: 404,
      body: { error: "Unknown principal" }
    });

    const enrolled = await server.request("POST", "/api/otp/enroll", { body: { label: "alice" } });
    assert.equal(enrolled.status, 201);
    assert.equal(field(enrolled.body, "secret"), "AEAQCAIBAEAQCAIBAEAQCAIBAEAQCAIB");
    assert.equal(
      field(enrolled.body, "uri"),
      "otpauth://totp/steptoken:alice?secret=AEAQCAIBAEAQCAIBAEAQCAIBAEAQCAIB&issuer=steptoken&algorithm=SHA1&digit=6&period=30"
    );

    assert.deepEqual(await server.request("POST", "/api/otp/verify", { body: { label: "alice", code: server.codeAt(0) } }), {
      status: 409,
      body: { error: "Enrollment is not confirmed" }
    });
    assert.deepEqual(
      await server.request("POST", "/api/otp/enroll/confirm", { body: { label: "alice", code: codeOutsideWindow() } }),
      { status: 401, body: { error: "Invalid code", kind: "InvalidThreshold" } }
    );
    assert.deepEqual(await server.request("POST", "/api/otp/enroll/confirm", { body: { label: "alice", code: "12345" } }), {
      status: 400,
      body: { error: "Invalid number of digits in the code. Must be 6, 7 or 8 digits", kind: "InvalidDigitCount" }
    });
    assert.deepEqual(
      await server.request("POST", "/api/otp/enroll/confirm", { body: { label: "alice", code: server.codeAt(0) } }),
      { status: 200, body: { label: "alice", steps: 2 } }
    );
    assert.deepEqual(await server.request("POST", "/api/otp/enroll", { body: { label: "alice" } }), {
      status: 409,
      body: { error: "Already enrolled" }
    });

    assert.deepEqual(await server.request("POST", "/api/otp/verify", { body: { label: "alice", code: server.codeAt(0) } }), {
      status: 401,
      body: { error: "Code already used" }
    });

    server.advance(30);
    const verified = await server.request("POST", "/api/otp/verify", { body: { label: "alice", code: server.codeAt(30) } });
    assert.equal(verified.status, 200);
    assert.equal(field(verified.body, "label"), "alice");
    assert.equal(field(verified.body, "steps"), 2);
    const token = field(verified.body, "token");
    assert.ok(typeof token === "string");
    assert.equal(token.split(".").length, 3);

    const me = await server.request("GET", "/api/auth/me", { token });
    assert.equal(me.status, 200);
    assert.equal(field(me.body, "label"), "alice");
    assert.equal(field(me.body, "steps"), 2);
    assert.equal(typeof field(me.body, "expiresAt"), "number");
  } finally {
    await server.close();
  }
});

test("session routes require a bearer token", async () => {
  const server = await startApp();
  try {
    assert.deepEqual(await server.request("GET", "/api/auth/me"), { status: 401, body: { error: "Missing token" } });
    assert.deepEqual(await server.request("GET", "/api/auth/me", { token: "not-a-jwt" }), {
      status: 401,
      body: { error: "Invalid token" }
    });
    assert.deepEqual(await server.request("DELETE", "/api/otp/enroll", { body: { code: "123456" } }), {
      status: 401,
      body: { error: "Missing token" }
    });
  } finally {
    await server.close();
  }
});

test("removing an enrollment needs a session and a fresh code", async () => {
  const server = await startApp();
  try {
    await server.request("POST", "/api/otp/enroll", { body: { label: "alice" } });
    await server.request("POST", "/api/otp/enroll/confirm", { body: { label: "alice", code: server.codeAt(0) } });
    server.advance(30);
    const verified = await server.request("POST", "/api/otp/verify", { body: { label: "alice", code: server.codeAt(30) } });
    const token = field(verified.body, "token");
    assert.ok(typeof token === "string");

    assert.deepEqual(await server.request("DELETE", "/api/otp/enroll", { token, body: {} }), {
      status: 400,
      body: { error: "Invalid payload" }
    });
    assert.deepEqual(await server.request("DELETE", "/api/otp/enroll", { token, body: { code: server.codeAt(30) } }), {
      status: 401,
      body: { error: "Code already used" }
    });

    server.advance(30);
    assert.deepEqual(await server.request("DELETE", "/api/otp/enroll", { token, body: { code: server.codeAt(60) } }), {
      status: 200,
      body: { label: "alice", steps: 2 }
    });
    assert.deepEqual(await server.request("POST", "/api/otp/verify", { body: { label: "alice", code: server.codeAt(60) } }), {
      status: 404,
      body: { error: "Unknown principal" }
    });
  } finally {
    await server.close();
  }
});

test("requests get 503 once shutdown starts", async () => {
  const server = await startApp();
  try {
    server.shutDown();
    assert.deepEqual(await server.request("POST", "/api/otp/enroll", { body: { label: "alice" } }), {
      status: 503,
      body: { error: "Server is shutting down" }
    });
    const health = await server.request("GET", "/health");
    assert.equal(health.status, 503);
    assert.equal(field(health.body, "ok"), false);
    assert.equal(field(health.body, "shuttingDown"), true);
  } finally {
    await server.close();
  }
});

test("request metrics label unknown paths with one series", async () => {
  const server = await startApp();
  try {
    for (let i = 0; i < 20; i += 1) {
      const response = await server.request("GET", `/junk-${i}`);
      assert.equal(response.status, 404);
    }
    await server.request("GET", "/health");

    const metrics = await server.request("GET", "/metrics");
    assert.equal(metrics.status, 200);
    assert.ok(typeof metrics.body === "string");
    const lines = metrics.body.split("\n");
    assert.deepEqual(
      lines.filter((line) => line.startsWith('otp_http_requests_total{method="GET",path="unmatched"')),
      ['otp_http_requests_total{method="GET",path="unmatched",status="4xx"} 20']
    );
    assert.equal(
      lines.some((line) => line.includes("/junk-")),
      false
    );
  } finally {
    await server.close();
  }
});
