import { base32Encode } from "./base32.js";
import { DEFAULT_DIGITS, type Digits } from "./hotp.js";
import { DEFAULT_PERIOD_SEC } from "./totp.js";

export type TotpAlgorithm = "SHA1";

export type TotpUriParams = {
  issuer: string;
  /** Account name shown by the authenticator app. */
  label: string;
  secret: Uint8Array;
  digits?: Digits;
  period?: number;
  /** Only SHA1 is implemented; anything else is written as SHA1. */
  algorithm?: string;
};

export function normalizeAlgorithm(_requested?: string): TotpAlgorithm {
  return "SHA1";
}

// Key URI format understood by Google Authenticator and compatible apps.
export function buildTotpUri(params: TotpUriParams) {
  const issuer = encodeURIComponent(params.issuer);
  const label = encodeURIComponent(params.label);
  const secret = base32Encode(params.secret);
  const algorithm = normalizeAlgorithm(params.algorithm);
  const digits = params.digits ?? DEFAULT_DIGITS;
  const period = params.period ?? DEFAULT_PERIOD_SEC;
  return `otpauth://totp/${issuer}:${label}?secret=${secret}&issuer=${issuer}&algorithm=${algorithm}&digit=${digits}&period=${period}`;
}
