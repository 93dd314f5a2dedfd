/**
 * Dispatching service
 *
 * Resolves the handler for a request, checks required fields, validates and
 * executes. Every outcome is published on the optional emitter; errors are
 * always re-thrown unchanged.
 */

import type { DispatchEmitter } from "./emitter.js";
import {
  MissingFieldError,
  ProcessingError,
  ValidationError,
  isDispatchError,
} from "./errors.js";
import { createBaseEvent, EventNames } from "./events.js";
import type { HandlerRegistry } from "./registry.js";
import type { ExecutionResult, Handler } from "./types.js";
import { findMissingFields } from "./validation.js";

/**
 * Dispatcher options
 */
export interface DispatcherOptions {
  /** Name published as the event source (e.g. "payments") */
  source: string;
  /** Receives one event per dispatch */
  emitter?: DispatchEmitter;
}

export abstract class Dispatcher<
  K extends string,
  Req,
  Res extends ExecutionResult,
  H extends Handler<K, Req, Res> = Handler<K, Req, Res>,
> {
  readonly source: string;
  private readonly emitter?: DispatchEmitter;

  constructor(
    readonly registry: HandlerRegistry<K, H>,
    options: DispatcherOptions
  ) {
    this.source = options.source;
    this.emitter = options.emitter;
  }

  /**
   * Discriminant of a request
   */
  protected abstract keyOf(request: Req): string | null | undefined;

  /**
   * Read a named field of a request, for the required-field check
   */
  protected abstract readField(request: Req, field: string): string | undefined;

  /**
   * Resolve, check required fields, validate and execute a request
   *
   * @throws UnsupportedDiscriminantError when no handler matches
   * @throws MissingFieldError for the first missing or blank required field
   * @throws ValidationError when the handler rejects the request
   * @throws ProcessingError when execution fails
   */
  dispatch(request: Req): Res {
    const key = this.keyOf(request);
    try {
      const handler = this.registry.resolve(key);

      const [missing] = findMissingFields(handler.requiredFields, (field) =>
        this.readField(request, field)
      );
      if (missing !== undefined) {
        throw new MissingFieldError(missing);
      }

      const validation = handler.validate(request);
      if (!validation.valid) {
        throw new ValidationError(validation.errors);
      }

      const result = handler.execute(request);
      this.publishCompleted(handler.key, result);
      return result;
    } catch (error) {
      this.publishFailure(key, error);
      throw error;
    }
  }

  /**
   * Resolve the handler and return its cost estimate, without validating
   * or executing
   */
  estimateCost(request: Req): number {
    return this.registry.resolve(this.keyOf(request)).estimateCost(request);
  }

  private publishCompleted(key: K, result: Res): void {
    this.emitter?.emitSync({
      ...createBaseEvent(EventNames.DISPATCH_COMPLETED, this.source),
      payload: {
        key,
        resultId: result.id,
        cost: result.cost,
        providerReference: result.providerReference,
      },
    });
  }

  private publishFailure(key: string | null | undefined, error: unknown): void {
    if (!this.emitter) return;

    if (isDispatchError(error) && !(error instanceof ProcessingError)) {
      this.emitter.emitSync({
        ...createBaseEvent(EventNames.DISPATCH_REJECTED, this.source),
        payload: {
          key: key ?? null,
          code: error.code,
          errors:
            error instanceof ValidationError ? [...error.errors] : [error.message],
        },
      });
      return;
    }

    this.emitter.emitSync({
      ...createBaseEvent(EventNames.DISPATCH_FAILED, this.source),
      payload: {
        key: key ?? "unknown",
        error: error instanceof Error ? error.message : String(error),
      },
    });
  }
}
