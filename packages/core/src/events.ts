/**
 * Event types for dispatch outcomes
 * Every call to `Dispatcher.dispatch` publishes exactly one of these
 */

import { nanoid } from "nanoid";
import type { DispatchErrorCode } from "./errors.js";

// ============================================================================
// Event Names (Constants)
// ============================================================================

export const EventNames = {
  DISPATCH_COMPLETED: "dispatch.completed",
  DISPATCH_REJECTED: "dispatch.rejected",
  DISPATCH_FAILED: "dispatch.failed",
} as const;

export type EventName = (typeof EventNames)[keyof typeof EventNames];

// ============================================================================
// Base Event Interface
// ============================================================================

/**
 * Base interface for all events
 */
export interface BaseEvent<T extends EventName = EventName> {
  /** Event type identifier */
  type: T;
  /** Unix timestamp when the event occurred */
  timestamp: number;
  /** Unique event ID */
  eventId: string;
  /** Dispatcher that generated the event (e.g. "payments") */
  source: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Dispatch Events
// ============================================================================

/**
 * Emitted when a handler executed successfully
 */
export interface DispatchCompletedEvent
  extends BaseEvent<typeof EventNames.DISPATCH_COMPLETED> {
  payload: {
    key: string;
    resultId: string;
    cost: number;
    providerReference?: string;
  };
}

/**
 * Emitted when the request was refused before execution
 * (unsupported discriminant, missing field, failed validation)
 */
export interface DispatchRejectedEvent
  extends BaseEvent<typeof EventNames.DISPATCH_REJECTED> {
  payload: {
    key: string | null;
    code: DispatchErrorCode;
    errors: string[];
  };
}

/**
 * Emitted when execution failed (simulated provider error or any
 * unexpected exception)
 */
export interface DispatchFailedEvent
  extends BaseEvent<typeof EventNames.DISPATCH_FAILED> {
  payload: {
    key: string;
    error: string;
  };
}

// ============================================================================
// Union Type
// ============================================================================

export type DispatchEvent =
  | DispatchCompletedEvent
  | DispatchRejectedEvent
  | DispatchFailedEvent;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a base event with common fields
 */
export function createBaseEvent<T extends EventName>(
  type: T,
  source: string
): Omit<BaseEvent<T>, "payload"> {
  return {
    type,
    timestamp: Date.now(),
    eventId: `evt_${nanoid(12)}`,
    source,
  };
}
