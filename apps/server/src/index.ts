import { createServer } from "http";
import { createApp } from "./app.js";
import { loadOtpConfig, loadServerConfig } from "./lib/config.js";
import { EnrollmentService } from "./lib/enrollment.js";
import { InMemoryEnrollmentStore } from "./lib/enrollmentStore.js";
import { MetricsRegistry, createStructuredLogger } from "./lib/observability.js";

const serverConfig = loadServerConfig();
const otpConfig = loadOtpConfig();
const logger = createStructuredLogger("steptoken-server", serverConfig.logLevel);
const metrics = new MetricsRegistry();
const shutdownTimeoutMs = Number(process.env.SHUTDOWN_TIMEOUT_MS || 10_000);
let shuttingDown = false;
let shutdownPromise: Promise<void> | null = null;

if (!process.env.JWT_SECRET) {
  logger.warn("config.default_jwt_secret");
}

const enrollments = new EnrollmentService({
  store: new InMemoryEnrollmentStore(),
  config: otpConfig,
  logger
});

const app = createApp({
  config: serverConfig,
  enrollments,
  logger,
  metrics,
  isShuttingDown: () => shuttingDown
});
const server = createServer(app);

server.listen(serverConfig.port, () => {
  logger.info("server.listening", {
    port: serverConfig.port,
    period: otpConfig.period,
    drift: otpConfig.drift,
    threshold: otpConfig.threshold,
    digits: otpConfig.digits
  });
});

process.on("SIGINT", () => {
  void gracefulShutdown("SIGINT");
});
process.on("SIGTERM", () => {
  void gracefulShutdown("SIGTERM");
});
process.on("uncaughtException", (error) => {
  logger.error("process.uncaught_exception", { error });
});
process.on("unhandledRejection", (reason) => {
  logger.error("process.unhandled_rejection", { error: reason });
});

async function gracefulShutdown(signal: string) {
  if (shutdownPromise) return shutdownPromise;
  shuttingDown = true;
  let exitCode = 0;
  shutdownPromise = (async () => {
    logger.info("shutdown.received", { signal, timeoutMs: shutdownTimeoutMs });
    const closed = new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    const timedOut = new Promise<"timeout">((resolve) => {
      setTimeout(() => resolve("timeout"), shutdownTimeoutMs).unref();
    });
    if ((await Promise.race([closed, timedOut])) === "timeout") {
      exitCode = 1;
      logger.warn("shutdown.close_timeout");
      server.closeAllConnections();
    }
    logger.info("shutdown.complete");
  })()
    .catch((error) => {
      exitCode = 1;
      logger.error("shutdown.failed", { error });
    })
    .finally(() => {
      process.exit(exitCode);
    });

  return shutdownPromise;
}
