/**
 * Process configuration from environment variables.
 */

import { z } from "zod";
import { DEFAULTS, ParticipantNameSchema } from "@lockstep/shared";
import { ConfigError } from "./errors.js";

const intMs = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const port = z.coerce.number().int().min(0).max(65535);

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  ROLE: z.enum(["authority", "follower"]),
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: port.default(7420),
  NAME: ParticipantNameSchema.default("lockstep"),
  MEDIA_REF: z.string().default(""),
  FOLLOW_MEDIA: flag.default("true"),
  STATUS_PORT: port.optional(),
  PROBE_INTERVAL_MS: positiveInt(DEFAULTS.PROBE_INTERVAL_MS),
  FULL_STATE_INTERVAL_MS: positiveInt(DEFAULTS.FULL_STATE_INTERVAL_MS),
  DRIFT_TOLERANCE_MS: intMs(DEFAULTS.DRIFT_TOLERANCE_MS),
  DEGRADED_TOLERANCE_MS: intMs(DEFAULTS.DEGRADED_TOLERANCE_MS),
  RATE_TOLERANCE: z.coerce.number().nonnegative().default(0.01),
  LIVENESS_WINDOW_MS: positiveInt(DEFAULTS.LIVENESS_WINDOW_MS),
  HANDSHAKE_TIMEOUT_MS: positiveInt(DEFAULTS.HANDSHAKE_TIMEOUT_MS),
  ECHO_WINDOW_MS: intMs(500),
  ACTION_QUEUE_SIZE: positiveInt(8),
  PLAYER_RETRY_ATTEMPTS: positiveInt(3),
  PLAYER_RETRY_BASE_MS: intMs(200),
  RECONNECT_BASE_MS: positiveInt(1000),
  RECONNECT_MAX_MS: positiveInt(30_000),
  RECONNECT_MAX_ATTEMPTS: positiveInt(10),
});

export type Config = z.infer<typeof EnvSchema>;

/** Unset and empty variables both fall back to the default */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Parse and validate the environment.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = EnvSchema.safeParse(withoutEmpty(env));
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  return result.data;
}
