import { Counter } from "./counter.js";
import { DEFAULT_DIGITS, formatCode, hotp, type Digits } from "./hotp.js";

export const DEFAULT_PERIOD_SEC = 30;
export const DEFAULT_T0 = 0;
export const DEFAULT_DRIFT_STEPS = 2;

export type TotpSettings = {
  /** Seconds per time step ("X" in RFC 6238). */
  period: number;
  /** Unix time at which step 0 starts. */
  t0: number;
  /** Steps the derived counter is pulled back so the forward-only verifier also covers slow clients. */
  drift: number;
};

export type TotpCounterOptions = Partial<TotpSettings> & { now?: number };

export function unixNow() {
  return Math.floor(Date.now() / 1000);
}

function toUnsigned(name: string, value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
  return BigInt(value);
}

/**
 * Counter for the step containing `now`, minus `drift` steps.
 *
 * Times before `t0 + drift * period` clamp to step 0 rather than wrapping
 * around the unsigned range.
 */
export function totpCounter(options: TotpCounterOptions = {}) {
  const period = toUnsigned("period", options.period ?? DEFAULT_PERIOD_SEC);
  if (period === 0n) {
    throw new RangeError("period must be greater than zero");
  }
  const t0 = toUnsigned("t0", options.t0 ?? DEFAULT_T0);
  const drift = toUnsigned("drift", options.drift ?? DEFAULT_DRIFT_STEPS);
  const now = toUnsigned("now", options.now ?? unixNow());

  const elapsed = now >= t0 ? now - t0 : 0n;
  const step = elapsed / period;
  return Counter.fromBigInt(step >= drift ? step - drift : 0n);
}

/** Code a client authenticator shows at `now`; no drift is applied. */
export function generateTotp(
  secret: Uint8Array,
  options: { period?: number; t0?: number; digits?: Digits; now?: number } = {}
) {
  const digits = options.digits ?? DEFAULT_DIGITS;
  const counter = totpCounter({ period: options.period, t0: options.t0, drift: 0, now: options.now });
  return formatCode(hotp(secret, counter, digits), digits);
}
