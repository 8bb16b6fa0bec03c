import type { Counter } from "./counter.js";
import { failure, success, type Result } from "./errors.js";
import { hotp, isSupportedDigits, type Digits } from "./hotp.js";
import { totpCounter, type TotpSettings } from "./totp.js";

export const DEFAULT_THRESHOLD = 15;

const SMALLEST_CODE = 100000;
const LARGEST_CODE = 99999999;

export type VerifyOptions = {
  /** Counters tried, starting with the one given. */
  threshold?: number;
  /**
   * Digit count the code was issued with. When omitted it is inferred from the
   * decimal length of the submitted value, so codes with leading zeros cannot match.
   */
  digits?: Digits;
};

export type SubmittedCode = {
  code: number;
  digits: Digits;
};

function resolveDigits(submitted: number, explicit?: number): Result<Digits> {
  if (explicit !== undefined) {
    if (!isSupportedDigits(explicit)) {
      return failure("InvalidDigitCount", `Digit count must be 6, 7 or 8, got ${explicit}`);
    }
    if (!Number.isSafeInteger(submitted) || submitted < 0 || submitted >= 10 ** explicit) {
      return failure("InvalidDigitCount", `Code does not fit in ${explicit} digits`);
    }
    return success(explicit);
  }
  if (!Number.isSafeInteger(submitted) || submitted < SMALLEST_CODE || submitted > LARGEST_CODE) {
    return failure("InvalidDigitCount", "Invalid number of digits in the code. Must be 6, 7 or 8 digits");
  }
  const inferred = String(submitted).length;
  if (!isSupportedDigits(inferred)) {
    return failure("InvalidDigitCount", "Invalid number of digits in the code. Must be 6, 7 or 8 digits");
  }
  return success(inferred);
}

/**
 * Checks `submitted` against `counter`, `counter + 1`, ... for at most
 * `threshold` counters and returns how many increments the first match took.
 */
export function verify(
  secret: Uint8Array,
  counter: Counter,
  submitted: number,
  options: VerifyOptions = {}
): Result<number> {
  // A spent threshold wins over a malformed code.
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;
  if (!Number.isSafeInteger(threshold) || threshold < 1) {
    return failure("InvalidThreshold", "Invalid threshold");
  }

  const digits = resolveDigits(submitted, options.digits);
  if (!digits.ok) return digits;

  let current = counter;
  for (let remaining = threshold; remaining > 0; remaining -= 1) {
    if (hotp(secret, current, digits.value) === submitted) {
      return success(threshold - remaining);
    }
    current = current.increment();
  }
  return failure("InvalidThreshold", "Invalid code");
}

export function parseSubmittedCode(input: string): Result<SubmittedCode> {
  const trimmed = input.trim();
  if (!/^[0-9]+$/.test(trimmed)) {
    return failure("InvalidDigitCount", "Code must contain digits only");
  }
  const digits = trimmed.length;
  if (!isSupportedDigits(digits)) {
    return failure("InvalidDigitCount", "Invalid number of digits in the code. Must be 6, 7 or 8 digits");
  }
  return success({ code: Number(trimmed), digits });
}

export type TotpVerifyOptions = Partial<TotpSettings> & VerifyOptions & { now?: number };

export type TotpMatch = {
  steps: number;
  /** Counter the code was generated for. */
  counter: Counter;
};

export function verifyTotp(secret: Uint8Array, submitted: number, options: TotpVerifyOptions = {}): Result<TotpMatch> {
  const start = totpCounter({ period: options.period, t0: options.t0, drift: options.drift, now: options.now });
  const result = verify(secret, start, submitted, { threshold: options.threshold, digits: options.digits });
  if (!result.ok) return result;
  return success({ steps: result.value, counter: start.advance(result.value) });
}
