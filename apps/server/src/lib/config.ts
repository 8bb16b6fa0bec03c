import { DEFAULT_DIGITS, isSupportedDigits, type Digits } from "./hotp.js";
import type { LogLevel } from "./observability.js";
import { DEFAULT_SECRET_BITS } from "./secret.js";
import { DEFAULT_DRIFT_STEPS, DEFAULT_PERIOD_SEC, DEFAULT_T0 } from "./totp.js";
import { DEFAULT_THRESHOLD } from "./verifier.js";

type Env = Record<string, string | undefined>;

export type OtpConfig = {
  period: number;
  t0: number;
  drift: number;
  threshold: number;
  digits: Digits;
  secretBits: number;
  issuer: string;
};

export type ServerConfig = {
  port: number;
  logLevel: LogLevel;
  requestLogs: boolean;
  jwtSecret: string;
  sessionTtlSec: number;
  rateLimit: {
    windowMs: number;
    maxRequests: number;
    verifyMaxRequests: number;
    trustProxy: boolean;
  };
};

function parsePositiveInt(raw: string | undefined, fallback: number) {
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) return fallback;
  if (value < 1) return fallback;
  return Math.floor(value);
}

function parseNonNegativeInt(raw: string | undefined, fallback: number) {
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) return fallback;
  return value;
}

function parseBoolean(raw: string | undefined, fallback = false) {
  if (!raw) return fallback;
  const normalized = raw.toLowerCase().trim();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

function parseDigits(raw: string | undefined): Digits {
  const value = Number(raw);
  return isSupportedDigits(value) ? value : DEFAULT_DIGITS;
}

function parseSecretBits(raw: string | undefined) {
  const value = parsePositiveInt(raw, DEFAULT_SECRET_BITS);
  return value % 8 === 0 ? value : DEFAULT_SECRET_BITS;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = String(raw || "info").toLowerCase();
  return normalized === "warn" || normalized === "error" ? normalized : "info";
}

export function loadOtpConfig(env: Env = process.env): OtpConfig {
  return {
    period: parsePositiveInt(env.OTP_PERIOD_SEC, DEFAULT_PERIOD_SEC),
    t0: parseNonNegativeInt(env.OTP_T0, DEFAULT_T0),
    drift: parseNonNegativeInt(env.OTP_DRIFT_STEPS, DEFAULT_DRIFT_STEPS),
    threshold: parsePositiveInt(env.OTP_THRESHOLD, DEFAULT_THRESHOLD),
    digits: parseDigits(env.OTP_DIGITS),
    secretBits: parseSecretBits(env.OTP_SECRET_BITS),
    issuer: env.OTP_ISSUER?.trim() || "steptoken"
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: parsePositiveInt(env.PORT, 8080),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    requestLogs: env.REQUEST_LOGS !== "0",
    jwtSecret: env.JWT_SECRET || "dev_secret",
    sessionTtlSec: parsePositiveInt(env.SESSION_TTL_SEC, 12 * 60 * 60),
    rateLimit: {
      windowMs: parsePositiveInt(env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000),
      maxRequests: parsePositiveInt(env.RATE_LIMIT_MAX, 300),
      verifyMaxRequests: parsePositiveInt(env.RATE_LIMIT_VERIFY_MAX, 25),
      trustProxy: parseBoolean(env.TRUST_PROXY, false)
    }
  };
}
