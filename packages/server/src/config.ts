/**
 * Server configuration
 *
 * Parsed from environment variables with zod. `getConfig()` loads lazily from
 * `process.env`; tests swap it out with `setConfig(parseConfig({...}))`.
 */

import { z } from "zod";

const rate = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  logFormat: z.enum(["json", "pretty"]).default("json"),

  /** Failure rate for card, PayPal and bank transfer payments */
  paymentFailureRate: rate(0.1),
  /** Chance that a crypto payment hits network congestion */
  cryptoCongestionRate: rate(0.15),
  /** Failure rate of a crypto payment once congested */
  cryptoCongestionFailureRate: rate(0.3),
  /** Failure rate for every notification channel */
  notificationFailureRate: rate(0.05),
});

/**
 * Unvalidated settings: strings from the environment, or values from tests
 */
export type RawConfig = {
  [K in keyof z.input<typeof configSchema>]?: unknown;
};

export type Config = z.output<typeof configSchema> & {
  isProduction: boolean;
  isDevelopment: boolean;
};

/**
 * Validate raw values and apply defaults
 *
 * @throws ZodError listing every invalid setting
 */
export function parseConfig(raw: RawConfig): Config {
  const parsed = configSchema.parse(raw);
  return {
    ...parsed,
    isProduction: parsed.nodeEnv === "production",
    isDevelopment: parsed.nodeEnv === "development",
  };
}

/**
 * Map environment variables onto raw config keys
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RawConfig {
  return {
    port: emptyToUndefined(env.PORT),
    nodeEnv: emptyToUndefined(env.NODE_ENV),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
    logFormat: emptyToUndefined(env.LOG_FORMAT),
    paymentFailureRate: emptyToUndefined(env.PAYMENT_FAILURE_RATE),
    cryptoCongestionRate: emptyToUndefined(env.CRYPTO_CONGESTION_RATE),
    cryptoCongestionFailureRate: emptyToUndefined(env.CRYPTO_CONGESTION_FAILURE_RATE),
    notificationFailureRate: emptyToUndefined(env.NOTIFICATION_FAILURE_RATE),
  };
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = parseConfig(configFromEnv());
  }
  return _config;
}

export function setConfig(config: Config): void {
  _config = config;
}

/**
 * Forget the loaded config (for testing)
 */
export function resetConfig(): void {
  _config = null;
}
