import { serve } from "@hono/node-server";
import { getConfig } from "./config.js";
import { createApp } from "./app.js";
import { attachDispatchAudit } from "./lib/dispatch-audit.js";
import { initLogger } from "./lib/logger.js";
import { createServices } from "./services.js";

async function main() {
  const config = getConfig();
  const log = initLogger();

  const services = createServices(config);
  attachDispatchAudit(services.emitter, log);

  const app = createApp(services);

  log.info(`Starting Switchyard server on port ${config.port}...`);

  const server = serve({
    fetch: app.fetch,
    port: config.port,
  });

  log.info(`Switchyard server running at http://localhost:${config.port}`);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;

    log.info(`${signal} received. Starting graceful shutdown...`);

    services.emitter.removeAllListeners();

    server.close(() => {
      log.info("HTTP server closed.");
      process.exit(0);
    });

    // Force exit after 10 seconds if shutdown stalls
    const forceExitTimeout = setTimeout(() => {
      log.error("Forced shutdown after timeout.");
      process.exit(1);
    }, 10_000);
    forceExitTimeout.unref();
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
