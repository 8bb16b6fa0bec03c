import type { Digits } from "./hotp.js";

export type Enrollment = {
  label: string;
  secret: Uint8Array;
  digits: Digits;
  confirmed: boolean;
  /** Highest counter a code has been accepted for; codes at or below it are replays. */
  lastCounter: bigint | null;
  createdAt: string;
  updatedAt: string;
};

export interface EnrollmentStore {
  get(label: string): Promise<Enrollment | null>;
  put(enrollment: Enrollment): Promise<void>;
  delete(label: string): Promise<boolean>;
  count(): Promise<number>;
}

// Process memory only; secrets are lost on restart.
export class InMemoryEnrollmentStore implements EnrollmentStore {
  private items = new Map<string, Enrollment>();

  async get(label: string) {
    const found = this.items.get(label);
    return found ? { ...found, secret: Uint8Array.from(found.secret) } : null;
  }

  async put(enrollment: Enrollment) {
    this.items.set(enrollment.label, { ...enrollment, secret: Uint8Array.from(enrollment.secret) });
  }

  async delete(label: string) {
    return this.items.delete(label);
  }

  async count() {
    return this.items.size;
  }
}
