/**
 * Core types for Switchyard dispatch
 *
 * A handler owns one discriminant value (a payment method, a notification
 * channel) and implements the validate / execute / estimateCost contract.
 */

// ============================================================================
// Results
// ============================================================================

/**
 * Outcome of `Handler.validate`.
 *
 * A valid result never carries errors; an invalid one always carries at least
 * one. Build it with `validationSuccess` / `validationFailure`.
 */
export type ValidationResult =
  | { readonly valid: true; readonly errors: readonly [] }
  | { readonly valid: false; readonly errors: readonly [string, ...string[]] };

/**
 * Terminal status of a dispatch
 */
export const ExecutionStatuses = ["COMPLETED", "FAILED"] as const;

export type ExecutionStatus = (typeof ExecutionStatuses)[number];

/**
 * Outcome of `Handler.execute`
 */
export interface ExecutionResult {
  /** COMPLETED for a successful execution */
  readonly status: ExecutionStatus;
  /** Unique transaction / notification identifier */
  readonly id: string;
  /** Fee or delivery cost charged for this execution */
  readonly cost: number;
  /** Unix timestamp (ms) when the execution finished */
  readonly timestamp: number;
  /** Reference handed back by the (simulated) provider */
  readonly providerReference?: string;
  /** Set when status is FAILED */
  readonly errorMessage?: string;
}

// ============================================================================
// Handler contract
// ============================================================================

/**
 * A stateless handler for a single discriminant value.
 *
 * Handlers are shared across all requests and must not keep per-request
 * state.
 */
export interface Handler<K extends string, Req, Res extends ExecutionResult> {
  /** Discriminant value this handler serves */
  readonly key: K;

  /** Fields that must be present and non-blank before `validate` runs */
  readonly requiredFields: readonly string[];

  /**
   * Apply the handler's rules to a request. Never throws and never draws
   * random numbers: equal input gives an equal result.
   */
  validate(request: Req): ValidationResult;

  /**
   * Execute a request that already passed validation.
   * Throws `ProcessingError` when the simulated provider fails.
   */
  execute(request: Req): Res;

  /**
   * Compute the cost of a request without executing it
   */
  estimateCost(request: Req): number;
}
