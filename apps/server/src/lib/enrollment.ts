import { base32Encode } from "./base32.js";
import type { OtpConfig } from "./config.js";
import type { Enrollment, EnrollmentStore } from "./enrollmentStore.js";
import { failure, httpStatusForOtpFailure, type OtpFailure, type Result } from "./errors.js";
import { KeyedMutex } from "./keyedMutex.js";
import type { Logger } from "./observability.js";
import { buildTotpUri } from "./provisioning.js";
import { renderQrSvg } from "./qrcode.js";
import { generateSecret, type RandomSource } from "./secret.js";
import { unixNow } from "./totp.js";
import { parseSubmittedCode, verifyTotp, type TotpMatch } from "./verifier.js";

export type EnrollmentGrant = {
  label: string;
  /** Base32 form, for manual entry in an authenticator app. */
  secret: string;
  uri: string;
  qrSvg: string;
};

export type BeginEnrollmentResult =
  | { status: "ok"; grant: EnrollmentGrant }
  | { status: "already_enrolled" }
  | { status: "failed"; error: OtpFailure };

export type CodeCheckResult =
  | { status: "ok"; label: string; steps: number; counter: string }
  | { status: "unknown_principal" }
  | { status: "not_confirmed" }
  | { status: "already_enrolled" }
  | { status: "replayed" }
  | { status: "rejected"; error: OtpFailure };

export type EnrollmentServiceOptions = {
  store: EnrollmentStore;
  config: OtpConfig;
  logger: Logger;
  random?: RandomSource;
  clock?: () => number;
};

export class EnrollmentService {
  private store: EnrollmentStore;
  private config: OtpConfig;
  private logger: Logger;
  private random?: RandomSource;
  private clock: () => number;
  private locks = new KeyedMutex();

  constructor(options: EnrollmentServiceOptions) {
    this.store = options.store;
    this.config = options.config;
    this.logger = options.logger;
    this.random = options.random;
    this.clock = options.clock || unixNow;
  }

  /** Issues a fresh secret; it only becomes usable once `confirm` sees a valid code. */
  async begin(label: string): Promise<BeginEnrollmentResult> {
    return this.locks.run<BeginEnrollmentResult>(label, async () => {
      const existing = await this.store.get(label);
      if (existing?.confirmed) {
        return { status: "already_enrolled" };
      }

      const secret = generateSecret({ bits: this.config.secretBits, random: this.random });
      if (!secret.ok) {
        this.logger.error("otp.enroll_failed", { label, kind: secret.error.kind, error: secret.error.cause });
        return { status: "failed", error: secret.error };
      }
      const uri = buildTotpUri({
        issuer: this.config.issuer,
        label,
        secret: secret.value,
        digits: this.config.digits,
        period: this.config.period
      });
      const qrSvg = renderQrSvg(uri);
      if (!qrSvg.ok) {
        this.logger.warn("otp.enroll_failed", { label, kind: qrSvg.error.kind });
        return { status: "failed", error: qrSvg.error };
      }

      const now = new Date().toISOString();
      await this.store.put({
        label,
        secret: secret.value,
        digits: this.config.digits,
        confirmed: false,
        lastCounter: null,
        createdAt: now,
        updatedAt: now
      });
      this.logger.info("otp.enroll_started", { label });
      return {
        status: "ok",
        grant: { label, secret: base32Encode(secret.value), uri, qrSvg: qrSvg.value }
      };
    });
  }

  async confirm(label: string, input: string): Promise<CodeCheckResult> {
    return this.locks.run<CodeCheckResult>(label, async () => {
      const enrollment = await this.store.get(label);
      if (!enrollment) return { status: "unknown_principal" };
      if (enrollment.confirmed) return { status: "already_enrolled" };
      return this.accept(enrollment, input, { confirmed: true });
    });
  }

  async authenticate(label: string, input: string): Promise<CodeCheckResult> {
    return this.locks.run<CodeCheckResult>(label, async () => {
      const enrollment = await this.store.get(label);
      if (!enrollment) return { status: "unknown_principal" };
      if (!enrollment.confirmed) return { status: "not_confirmed" };
      return this.accept(enrollment, input, {});
    });
  }

  /** Drops an enrollment after checking a current code for it. */
  async remove(label: string, input: string): Promise<CodeCheckResult> {
    return this.locks.run<CodeCheckResult>(label, async () => {
      const enrollment = await this.store.get(label);
      if (!enrollment) return { status: "unknown_principal" };
      const result = await this.accept(enrollment, input, {});
      if (result.status === "ok") {
        await this.store.delete(label);
        this.logger.info("otp.enroll_removed", { label });
      }
      return result;
    });
  }

  async enrolledCount() {
    return this.store.count();
  }

  private check(enrollment: Enrollment, input: string): Result<TotpMatch> {
    const parsed = parseSubmittedCode(input);
    if (!parsed.ok) return parsed;
    if (parsed.value.digits !== enrollment.digits) {
      return failure("InvalidDigitCount", `Code must have ${enrollment.digits} digits`);
    }
    return verifyTotp(enrollment.secret, parsed.value.code, {
      period: this.config.period,
      t0: this.config.t0,
      drift: this.config.drift,
      threshold: this.config.threshold,
      digits: enrollment.digits,
      now: this.clock()
    });
  }

  // Callers hold the label's lock.
  private async accept(
    enrollment: Enrollment,
    input: string,
    changes: Partial<Pick<Enrollment, "confirmed">>
  ): Promise<CodeCheckResult> {
    const label = enrollment.label;
    const match = this.check(enrollment, input);
    if (!match.ok) {
      this.logger.warn("otp.verify_rejected", { label, kind: match.error.kind });
      return { status: "rejected", error: match.error };
    }

    const counter = match.value.counter.toBigInt();
    if (enrollment.lastCounter !== null && counter <= enrollment.lastCounter) {
      this.logger.warn("otp.verify_replayed", { label, counter: counter.toString() });
      return { status: "replayed" };
    }

    await this.store.put({
      ...enrollment,
      ...changes,
      lastCounter: counter,
      updatedAt: new Date().toISOString()
    });
    this.logger.info("otp.verify_ok", { label, steps: match.value.steps });
    return { status: "ok", label, steps: match.value.steps, counter: counter.toString() };
  }
}

export function httpStatusForCheck(result: CodeCheckResult) {
  switch (result.status) {
    case "ok":
      return 200;
    case "unknown_principal":
      return 404;
    case "not_confirmed":
    case "already_enrolled":
      return 409;
    case "replayed":
      return 401;
    case "rejected":
      return httpStatusForOtpFailure(result.error.kind);
  }
}
