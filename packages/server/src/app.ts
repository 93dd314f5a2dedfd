import { Hono } from "hono";
import { logger } from "hono/logger";
import { bodyLimit } from "hono/body-limit";
import { getConfig } from "./config.js";
import { createRequestLogger, getLogger } from "./lib/logger.js";
import { httpRequestDuration, httpRequestsTotal, registry } from "./lib/metrics.js";
import { UNEXPECTED_ERROR } from "./lib/http-errors.js";
import { createNotificationsRouter } from "./routes/notifications.js";
import { createPaymentsRouter } from "./routes/payments.js";
import type { Services } from "./services.js";

export interface AppOptions {
  /** Hono request logging; off in tests */
  requestLogging?: boolean;
}

/**
 * Build the HTTP app around a set of services
 */
export function createApp(services: Services, options: AppOptions = {}): Hono {
  const app = new Hono();

  if (options.requestLogging ?? true) {
    app.use("*", logger());
  }

  // HTTP RED metrics
  app.use("*", async (c, next) => {
    const endTimer = httpRequestDuration.startTimer();
    await next();
    const labels = {
      method: c.req.method,
      route: c.res.status === 404 ? "unmatched" : c.req.path,
      status: String(c.res.status),
    };
    httpRequestsTotal.inc(labels);
    endTimer(labels);
  });

  // Body size limit for API routes (1MB)
  app.use("/api/*", bodyLimit({ maxSize: 1024 * 1024 }));

  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      paymentMethods: services.payments.registry.keys(),
      channels: services.notifications.registry.keys(),
    });
  });

  app.get("/metrics", async (c) => {
    c.header("Content-Type", registry.contentType);
    return c.body(await registry.metrics());
  });

  app.route("/api/payments", createPaymentsRouter(services.payments));
  app.route("/api/notifications", createNotificationsRouter(services.notifications));

  app.onError((err, c) => {
    const requestId = c.req.header("x-request-id");
    const log = requestId ? createRequestLogger(requestId) : getLogger();
    log.error({ err }, "Unhandled error");

    return c.json(
      {
        status: "FAILED",
        error: UNEXPECTED_ERROR,
        ...(!getConfig().isProduction && { message: err.message }),
      },
      500
    );
  });

  app.notFound((c) => {
    return c.json(
      {
        error: "Not Found",
        message: `Route ${c.req.method} ${c.req.path} not found`,
      },
      404
    );
  });

  return app;
}
