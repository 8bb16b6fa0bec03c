import { OtpError } from "./errors.js";

export const COUNTER_LENGTH = 8;

/**
 * Moving factor fed to HOTP: an unsigned 64-bit step number, serialised as
 * 8 big-endian bytes. Instances never change; `increment` returns a new one.
 */
export class Counter {
  private readonly value: bigint;

  private constructor(value: bigint) {
    this.value = value;
  }

  static fromBigInt(value: bigint) {
    return new Counter(BigInt.asUintN(64, value));
  }

  static fromNumber(value: number) {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`Counter value must be a safe integer, got ${value}`);
    }
    return Counter.fromBigInt(BigInt(value));
  }

  static fromBytes(bytes: Uint8Array) {
    if (bytes.length !== COUNTER_LENGTH) {
      throw new OtpError("InvalidBuffer", `Counter must be ${COUNTER_LENGTH} bytes, got ${bytes.length}`);
    }
    return new Counter(Buffer.from(bytes).readBigUInt64BE(0));
  }

  toBytes() {
    const out = Buffer.alloc(COUNTER_LENGTH);
    out.writeBigUInt64BE(this.value);
    return out;
  }

  toBigInt() {
    return this.value;
  }

  increment() {
    return Counter.fromBigInt(this.value + 1n);
  }

  advance(steps: number) {
    return Counter.fromBigInt(this.value + BigInt(steps));
  }

  equals(other: Counter) {
    return this.value === other.value;
  }

  compare(other: Counter) {
    if (this.value === other.value) return 0;
    return this.value < other.value ? -1 : 1;
  }

  toString() {
    return this.value.toString();
  }
}

export function increment(counter: Counter) {
  return counter.increment();
}
