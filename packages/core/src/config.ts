import { ControlPlaneConfigError, type ValidationIssue } from "@armada/errors";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Control plane configuration. Every field has a default so an empty
 * environment yields a runnable (if credential-less) control plane.
 */
export const ControlPlaneConfigSchema = z
  .object({
    port: z.number().int().min(0).max(65535).default(9243),
    path: z.string().startsWith("/").default("/ws/gateways/connect"),
    maxConnections: z.number().int().positive().default(1000),
    heartbeatIntervalMs: z.number().int().positive().default(20_000),
    heartbeatTimeoutMs: z.number().int().positive().default(30_000),
    /** Connection attempts allowed per source address per rolling 60s window */
    connectionRateLimit: z.number().int().positive().default(10),
    handshakeTimeoutMs: z.number().int().positive().default(10_000),
    writeTimeoutMs: z.number().int().positive().default(10_000),
    /** Base64-encoded 32-byte AES-256 key for stored gateway credentials */
    encryptionKey: z.string().min(1).optional(),
    adapterRequestTimeoutMs: z.number().int().positive().default(30_000),
    healthCheckTimeoutMs: z.number().int().positive().default(5_000),
    logLevel: z.enum(LOG_LEVELS).default("info"),
  })
  .refine((config) => config.heartbeatIntervalMs < config.heartbeatTimeoutMs, {
    message: "heartbeatIntervalMs must be smaller than heartbeatTimeoutMs",
    path: ["heartbeatIntervalMs"],
  });

export type ControlPlaneConfig = z.infer<typeof ControlPlaneConfigSchema>;
export type ControlPlaneConfigInput = z.input<typeof ControlPlaneConfigSchema>;

// ---------------------------------------------------------------------------
// Environment mapping
// ---------------------------------------------------------------------------

const NUMERIC_ENV = {
  port: "ARMADA_PORT",
  maxConnections: "ARMADA_MAX_CONNECTIONS",
  heartbeatIntervalMs: "ARMADA_HEARTBEAT_INTERVAL_MS",
  heartbeatTimeoutMs: "ARMADA_HEARTBEAT_TIMEOUT_MS",
  connectionRateLimit: "ARMADA_CONNECTION_RATE_LIMIT",
  handshakeTimeoutMs: "ARMADA_HANDSHAKE_TIMEOUT_MS",
  writeTimeoutMs: "ARMADA_WRITE_TIMEOUT_MS",
  adapterRequestTimeoutMs: "ARMADA_ADAPTER_TIMEOUT_MS",
  healthCheckTimeoutMs: "ARMADA_HEALTH_TIMEOUT_MS",
} as const satisfies Partial<Record<keyof ControlPlaneConfig, string>>;

const STRING_ENV = {
  path: "ARMADA_WS_PATH",
  encryptionKey: "ARMADA_ENCRYPTION_KEY",
  logLevel: "ARMADA_LOG_LEVEL",
} as const satisfies Partial<Record<keyof ControlPlaneConfig, string>>;

/**
 * Read ARMADA_* variables into a raw config object. Empty variables are
 * treated as unset. Numbers that do not parse are passed through as NaN
 * so the schema reports them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const raw: Record<string, unknown> = {};

  for (const [field, name] of Object.entries(NUMERIC_ENV)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") {
      raw[field] = Number(value);
    }
  }

  for (const [field, name] of Object.entries(STRING_ENV)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") {
      raw[field] = value.trim();
    }
  }

  return raw;
}

/**
 * Validate a config object, applying defaults.
 *
 * @throws ControlPlaneConfigError listing every failing field
 */
export function parseConfig(input: unknown): ControlPlaneConfig {
  const result = ControlPlaneConfigSchema.safeParse(input);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.join(".") || "(root)",
      message: issue.message,
      code: issue.code,
    }));
    throw new ControlPlaneConfigError(issues);
  }
  return result.data;
}

/**
 * Load configuration from the environment, with explicit overrides taking
 * precedence over ARMADA_* variables.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ControlPlaneConfigInput = {},
): ControlPlaneConfig {
  return parseConfig({ ...configFromEnv(env), ...overrides });
}
