export type OtpErrorKind =
  | "InvalidDigitCount"
  | "InvalidThreshold"
  | "RandomSourceError"
  | "QrEncodingCapacityExceeded"
  | "InvalidSecretLength";

export type OtpFailure = {
  kind: OtpErrorKind;
  message: string;
  cause?: unknown;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: OtpFailure };

export function success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function failure<T = never>(kind: OtpErrorKind, message: string, cause?: unknown): Result<T> {
  const error: OtpFailure = cause === undefined ? { kind, message } : { kind, message, cause };
  return { ok: false, error };
}

/** Thrown for caller bugs only (bad buffer widths, unsupported digit counts passed to hotp). */
export class OtpError extends Error {
  kind: OtpErrorKind | "InvalidBuffer";

  constructor(kind: OtpErrorKind | "InvalidBuffer", message: string) {
    super(message);
    this.name = "OtpError";
    this.kind = kind;
  }
}

export class AppError extends Error {
  status: number;
  code: string;
  details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = "AppError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export function toErrorMessage(error: unknown) {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string") return error;
  return "Unexpected error";
}

export function toAppError(
  error: unknown,
  fallbackStatus = 400,
  fallbackCode = "BAD_REQUEST"
): AppError {
  if (error instanceof AppError) return error;
  return new AppError(fallbackStatus, fallbackCode, toErrorMessage(error));
}

export function httpStatusForOtpFailure(kind: OtpErrorKind) {
  switch (kind) {
    case "InvalidDigitCount":
    case "InvalidSecretLength":
      return 400;
    case "InvalidThreshold":
      return 401;
    case "QrEncodingCapacityExceeded":
      return 413;
    case "RandomSourceError":
      return 500;
  }
}

export function otpFailureToAppError(error: OtpFailure) {
  return new AppError(httpStatusForOtpFailure(error.kind), error.kind, error.message);
}
