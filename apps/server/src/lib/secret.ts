import { randomBytes } from "crypto";
import { failure, success, toErrorMessage, type Result } from "./errors.js";

export const DEFAULT_SECRET_BITS = 160;

/** Cryptographically secure byte source. */
export type RandomSource = (size: number) => Uint8Array;

export const secureRandom: RandomSource = (size) => randomBytes(size);

export function generateSecret(options: { bits?: number; random?: RandomSource } = {}): Result<Uint8Array> {
  const bits = options.bits ?? DEFAULT_SECRET_BITS;
  if (!Number.isSafeInteger(bits) || bits < 8 || bits % 8 !== 0) {
    return failure("InvalidSecretLength", `Secret length must be a positive multiple of 8 bits, got ${bits}`);
  }
  const size = bits / 8;
  const random = options.random ?? secureRandom;

  let bytes: Uint8Array;
  try {
    bytes = random(size);
  } catch (error) {
    return failure("RandomSourceError", `Random source failed: ${toErrorMessage(error)}`, error);
  }
  if (bytes.length !== size) {
    return failure("RandomSourceError", `Random source returned ${bytes.length} bytes, expected ${size}`);
  }
  return success(Uint8Array.from(bytes));
}
