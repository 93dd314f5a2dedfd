/**
 * Handler registry
 *
 * Maps every value of a closed discriminant set to exactly one handler. The
 * mapping is fixed at construction time and read-only afterwards.
 */

import {
  RegistryConfigurationError,
  UnsupportedDiscriminantError,
} from "./errors.js";

/**
 * Registry construction options
 */
export interface HandlerRegistryOptions<K extends string, H extends { readonly key: K }> {
  /** Human-readable name of the discriminant, used in error messages */
  label: string;
  /** The complete, closed set of discriminant values */
  keys: readonly K[];
  /** One handler per key */
  handlers: readonly H[];
}

export class HandlerRegistry<K extends string, H extends { readonly key: K }> {
  readonly label: string;
  private readonly entries: ReadonlyMap<string, H>;

  /**
   * @throws RegistryConfigurationError if a key has no handler or two
   * handlers claim the same key
   */
  constructor(options: HandlerRegistryOptions<K, H>) {
    this.label = options.label;

    const entries = new Map<string, H>();
    for (const handler of options.handlers) {
      if (entries.has(handler.key)) {
        throw new RegistryConfigurationError(
          `Duplicate handler for ${options.label} ${handler.key}`
        );
      }
      if (!options.keys.includes(handler.key)) {
        throw new RegistryConfigurationError(
          `Handler registered for undeclared ${options.label} ${handler.key}`
        );
      }
      entries.set(handler.key, handler);
    }

    const missing = options.keys.filter((key) => !entries.has(key));
    if (missing.length > 0) {
      throw new RegistryConfigurationError(
        `No handler registered for ${options.label}: ${missing.join(", ")}`
      );
    }

    this.entries = entries;
  }

  /**
   * Resolve a discriminant value to its handler
   *
   * @throws UnsupportedDiscriminantError for unknown, null or undefined keys
   */
  resolve(key: string | null | undefined): H {
    const handler = key == null ? undefined : this.entries.get(key);
    if (!handler) {
      throw new UnsupportedDiscriminantError(key, this.label);
    }
    return handler;
  }

  /**
   * Check whether a value is a registered discriminant
   */
  has(key: string | null | undefined): key is K {
    return key != null && this.entries.has(key);
  }

  /**
   * Registered discriminant values, in registration order
   */
  keys(): K[] {
    return Array.from(this.entries.values(), (handler) => handler.key);
  }

  /**
   * Registered handlers, in registration order
   */
  handlers(): H[] {
    return Array.from(this.entries.values());
  }
}
