import jwt, { type JwtPayload } from "jsonwebtoken";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "./observability.js";

export type SessionContext = {
  label: string;
  /** Forward steps the verifier needed when the session was issued. */
  steps: number;
  expiresAt: number;
};

type SessionAuthOptions = {
  secret: string;
  ttlSec: number;
  logger: Logger;
};

function isSessionContext(value: unknown): value is SessionContext {
  if (!value || typeof value !== "object") return false;
  return (
    "label" in value &&
    typeof value.label === "string" &&
    "steps" in value &&
    typeof value.steps === "number" &&
    "expiresAt" in value &&
    typeof value.expiresAt === "number"
  );
}

export function parseBearerToken(header: string | undefined) {
  const match = /^Bearer\s+(\S+)$/i.exec(header || "");
  return match ? match[1] : null;
}

export function getSessionContext(res: Response) {
  const session: unknown = res.locals.session;
  return isSessionContext(session) ? session : null;
}

export function createSessionAuth(options: SessionAuthOptions) {
  const signSession = (label: string, steps: number) =>
    jwt.sign({ sub: label, steps, amr: ["otp"] }, options.secret, { expiresIn: options.ttlSec });

  const resolveSession = (token: string): SessionContext | null => {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, options.secret);
    } catch (error) {
      options.logger.warn("auth.token_invalid", { reason: error instanceof Error ? error.name : String(error) });
      return null;
    }
    if (typeof decoded === "string") return null;
    const label = String(decoded.sub || "").trim();
    if (!label || typeof decoded.exp !== "number") return null;
    const steps = typeof decoded.steps === "number" ? decoded.steps : 0;
    return { label, steps, expiresAt: decoded.exp };
  };

  const sessionMiddleware = (req: Request, res: Response, next: NextFunction) => {
    const token = parseBearerToken(req.headers.authorization);
    if (!token) {
      options.logger.warn("auth.missing_token", { method: req.method, path: req.path });
      res.status(401).json({ error: "Missing token" });
      return;
    }
    const session = resolveSession(token);
    if (!session) {
      res.status(401).json({ error: "Invalid token" });
      return;
    }
    res.locals.session = session;
    next();
  };

  return { signSession, resolveSession, sessionMiddleware };
}
