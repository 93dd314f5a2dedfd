/**
 * @switchyard/core
 *
 * Pluggable handler registry and dispatching service.
 */

// Types
export type { ExecutionResult, ExecutionStatus, Handler, ValidationResult } from "./types.js";
export { ExecutionStatuses } from "./types.js";

// Validation results
export {
  validationSuccess,
  validationFailure,
  toValidationResult,
  isBlank,
  requiredMessage,
  findMissingFields,
} from "./validation.js";

// Errors
export type { DispatchErrorCode } from "./errors.js";
export {
  DispatchErrorCodes,
  DispatchError,
  MissingFieldError,
  ValidationError,
  UnsupportedDiscriminantError,
  ProcessingError,
  RegistryConfigurationError,
  isDispatchError,
} from "./errors.js";

// Registry and dispatcher
export type { HandlerRegistryOptions } from "./registry.js";
export { HandlerRegistry } from "./registry.js";
export type { DispatcherOptions } from "./dispatcher.js";
export { Dispatcher } from "./dispatcher.js";

// Randomness, time, identifiers, money
export type { RandomSource, Clock } from "./random.js";
export { mathRandom, systemClock, sequenceRandom, shouldFail } from "./random.js";
export type { IdGenerator } from "./ids.js";
export { generateId, idGenerator } from "./ids.js";
export type { PercentageFee } from "./money.js";
export { percentageFee, addAmounts } from "./money.js";

// Events
export type {
  EventName,
  BaseEvent,
  DispatchEvent,
  DispatchCompletedEvent,
  DispatchRejectedEvent,
  DispatchFailedEvent,
} from "./events.js";
export { EventNames, createBaseEvent } from "./events.js";
export type { EventListener } from "./emitter.js";
export { DispatchEmitter, createEmitter } from "./emitter.js";
