import { createHmac } from "crypto";
import type { Counter } from "./counter.js";
import { OtpError } from "./errors.js";

export type Digits = 6 | 7 | 8;

export const SUPPORTED_DIGITS: readonly Digits[] = [6, 7, 8];
export const DEFAULT_DIGITS: Digits = 6;

const SHA1_DIGEST_LENGTH = 20;

export function isSupportedDigits(value: number): value is Digits {
  return value === 6 || value === 7 || value === 8;
}

export function hmacSha1(key: Uint8Array, message: Uint8Array) {
  return createHmac("sha1", key).update(message).digest();
}

// RFC 4226 section 5.3
export function dynamicTruncation(hs: Uint8Array, digits: Digits) {
  if (hs.length !== SHA1_DIGEST_LENGTH) {
    throw new OtpError("InvalidBuffer", `HMAC-SHA1 digest must be ${SHA1_DIGEST_LENGTH} bytes, got ${hs.length}`);
  }
  const offset = hs[hs.length - 1] & 0x0f;
  const snum =
    ((hs[offset] & 0x7f) << 24) |
    ((hs[offset + 1] & 0xff) << 16) |
    ((hs[offset + 2] & 0xff) << 8) |
    (hs[offset + 3] & 0xff);
  return snum % 10 ** digits;
}

export function hotp(secret: Uint8Array, counter: Counter, digits: number = DEFAULT_DIGITS) {
  if (!isSupportedDigits(digits)) {
    throw new OtpError("InvalidDigitCount", `Digit count must be 6, 7 or 8, got ${digits}`);
  }
  return dynamicTruncation(hmacSha1(secret, counter.toBytes()), digits);
}

export function formatCode(code: number, digits: Digits) {
  return String(code).padStart(digits, "0");
}
