/**
 * Dispatch audit listener
 *
 * Subscribes to every dispatch event: logs it and records Prometheus
 * counters. `domain` is the dispatcher's event source ("payments",
 * "notifications").
 */

import type { DispatchEmitter, DispatchEvent } from "@switchyard/core";
import type { Logger } from "pino";
import { getLogger } from "./logger.js";
import { dispatchCostTotal, dispatchTotal } from "./metrics.js";

export function recordDispatchEvent(event: DispatchEvent, log: Logger): void {
  const domain = event.source;

  switch (event.type) {
    case "dispatch.completed": {
      const { key, resultId, cost } = event.payload;
      dispatchTotal.inc({ domain, key, status: "completed" });
      dispatchCostTotal.inc({ domain, key }, cost);
      log.info({ domain, key, resultId, cost }, "Dispatch completed");
      break;
    }
    case "dispatch.rejected": {
      const { key, code, errors } = event.payload;
      dispatchTotal.inc({ domain, key: key ?? "unknown", status: "rejected" });
      log.warn({ domain, key, code, errors }, "Dispatch rejected");
      break;
    }
    case "dispatch.failed": {
      const { key, error } = event.payload;
      dispatchTotal.inc({ domain, key, status: "failed" });
      log.error({ domain, key, error }, "Dispatch failed");
      break;
    }
  }
}

/**
 * Attach the audit listener to an emitter. Returns the unsubscribe function.
 */
export function attachDispatchAudit(
  emitter: DispatchEmitter,
  log: Logger = getLogger()
): () => void {
  return emitter.onAll((event) => recordDispatchEvent(event, log));
}
