import express from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { createSessionAuth, getSessionContext } from "./lib/auth.js";
import type { ServerConfig } from "./lib/config.js";
import { httpStatusForCheck, type CodeCheckResult, type EnrollmentService } from "./lib/enrollment.js";
import { httpStatusForOtpFailure, toAppError } from "./lib/errors.js";
import { MetricsRegistry, routeLabel, statusClass, type Logger } from "./lib/observability.js";

export type AppDependencies = {
  config: ServerConfig;
  enrollments: EnrollmentService;
  logger: Logger;
  metrics: MetricsRegistry;
  isShuttingDown: () => boolean;
};

const labelSchema = z.string().trim().min(1).max(128);
const codeSchema = z.string().trim().min(1).max(16);

function checkOutcome(result: CodeCheckResult) {
  return result.status === "rejected" ? result.error.kind : result.status;
}

function checkBody(result: CodeCheckResult) {
  switch (result.status) {
    case "ok":
      return { label: result.label, steps: result.steps };
    case "rejected":
      return { error: result.error.message, kind: result.error.kind };
    case "unknown_principal":
      return { error: "Unknown principal" };
    case "not_confirmed":
      return { error: "Enrollment is not confirmed" };
    case "already_enrolled":
      return { error: "Already enrolled" };
    case "replayed":
      return { error: "Code already used" };
  }
}

export function createApp(deps: AppDependencies) {
  const { config, enrollments, logger, metrics } = deps;
  const app = express();
  const sessions = createSessionAuth({ secret: config.jwtSecret, ttlSec: config.sessionTtlSec, logger });
  const startedAt = Date.now();

  app.use(cors());
  app.use(express.json({ limit: "16kb" }));

  if (config.rateLimit.trustProxy) {
    app.set("trust proxy", 1);
  }

  const apiLimiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.maxRequests,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: { error: "Too many requests. Try again later." }
  });

  const verifyLimiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.verifyMaxRequests,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: { error: "Too many verification attempts. Try again later." }
  });

  app.use("/api", apiLimiter);

  app.use((req, res, next) => {
    const startedNs = process.hrtime.bigint();
    metrics.incrementGauge("otp_http_in_flight_requests", 1);
    res.on("finish", () => {
      metrics.incrementGauge("otp_http_in_flight_requests", -1);
      const durationMs = Number(process.hrtime.bigint() - startedNs) / 1_000_000;
      metrics.incrementCounter("otp_http_requests_total", {
        method: req.method,
        path: routeLabel(req.route),
        status: statusClass(res.statusCode)
      });
      if (config.requestLogs && req.path !== "/metrics") {
        logger.info("http.request", {
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Math.round(durationMs),
          ip: req.ip
        });
      }
    });
    next();
  });

  app.get("/metrics", async (_req, res) => {
    const output = metrics.renderPrometheus([
      { name: "otp_enrolled_principals", value: await enrollments.enrolledCount() },
      { name: "otp_uptime_seconds", value: Math.floor((Date.now() - startedAt) / 1000) }
    ]);
    res.setHeader("Content-Type", "text/plain; version=0.0.4; charset=utf-8");
    res.status(200).send(output);
  });

  app.get("/health", (_req, res) => {
    const shuttingDown = deps.isShuttingDown();
    res.status(shuttingDown ? 503 : 200).json({
      ok: !shuttingDown,
      shuttingDown,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000)
    });
  });

  app.use((req, res, next) => {
    if (!deps.isShuttingDown() || req.path === "/health") {
      next();
      return;
    }
    res.status(503).json({ error: "Server is shutting down" });
  });

  app.post("/api/otp/enroll", async (req, res) => {
    const parsed = z.object({ label: labelSchema }).safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid payload" });
      return;
    }
    const result = await enrollments.begin(parsed.data.label);
    metrics.incrementCounter("otp_enrollments_total", {
      outcome: result.status === "failed" ? result.error.kind : result.status
    });
    if (result.status === "already_enrolled") {
      res.status(409).json({ error: "Already enrolled" });
      return;
    }
    if (result.status === "failed") {
      res.status(httpStatusForOtpFailure(result.error.kind)).json({ error: result.error.message, kind: result.error.kind });
      return;
    }
    res.status(201).json(result.grant);
  });

  app.post("/api/otp/enroll/confirm", verifyLimiter, async (req, res) => {
    const parsed = z.object({ label: labelSchema, code: codeSchema }).safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid payload" });
      return;
    }
    const result = await enrollments.confirm(parsed.data.label, parsed.data.code);
    metrics.incrementCounter("otp_verifications_total", { flow: "confirm", outcome: checkOutcome(result) });
    res.status(httpStatusForCheck(result)).json(checkBody(result));
  });

  app.post("/api/otp/verify", verifyLimiter, async (req, res) => {
    const parsed = z.object({ label: labelSchema, code: codeSchema }).safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid payload" });
      return;
    }
    const result = await enrollments.authenticate(parsed.data.label, parsed.data.code);
    metrics.incrementCounter("otp_verifications_total", { flow: "verify", outcome: checkOutcome(result) });
    if (result.status !== "ok") {
      res.status(httpStatusForCheck(result)).json(checkBody(result));
      return;
    }
    res.json({ ...checkBody(result), token: sessions.signSession(result.label, result.steps) });
  });

  app.get("/api/auth/me", sessions.sessionMiddleware, (_req, res) => {
    res.json(getSessionContext(res));
  });

  app.delete("/api/otp/enroll", verifyLimiter, sessions.sessionMiddleware, async (req, res) => {
    const session = getSessionContext(res);
    const parsed = z.object({ code: codeSchema }).safeParse(req.body);
    if (!session || !parsed.success) {
      res.status(400).json({ error: "Invalid payload" });
      return;
    }
    const result = await enrollments.remove(session.label, parsed.data.code);
    metrics.incrementCounter("otp_verifications_total", { flow: "remove", outcome: checkOutcome(result) });
    res.status(httpStatusForCheck(result)).json(checkBody(result));
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const appError = toAppError(error, 500, "INTERNAL_ERROR");
    logger.error("http.unhandled_error", { error });
    res.status(appError.status).json({ error: appError.message, code: appError.code });
  });

  return app;
}
