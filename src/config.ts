/**
 * 環境変数から設定を読み込む
 */

import * as v from "valibot";
import type { LogLevel } from "./signaling/logger";
import type { DuplicateConnectionPolicy } from "./signaling/types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEV_SECRET = "local-dev-secret";

const IntegerFromEnv = (fallback: number, min: number) =>
  v.optional(
    v.pipe(v.string(), v.trim(), v.toNumber(), v.integer(), v.minValue(min)),
    String(fallback)
  );

const EnvSchema = v.object({
  ENVIRONMENT: v.optional(
    v.picklist(["local", "development", "staging", "production"]),
    "local"
  ),
  HOST: v.optional(v.pipe(v.string(), v.minLength(1)), "0.0.0.0"),
  PORT: IntegerFromEnv(8000, 0),
  JWT_SECRET: v.optional(v.pipe(v.string(), v.minLength(1))),
  JWT_ISSUER: v.optional(v.pipe(v.string(), v.minLength(1))),
  MAX_ROOMS: IntegerFromEnv(1000, 1),
  MAX_PARTICIPANTS_PER_MEETING: IntegerFromEnv(100, 1),
  AUTH_TIMEOUT_MS: IntegerFromEnv(5000, 1),
  HEARTBEAT_INTERVAL_MS: IntegerFromEnv(30000, 1),
  IDLE_TIMEOUT_MS: IntegerFromEnv(60000, 0),
  MAX_MESSAGE_BYTES: IntegerFromEnv(65536, 1),
  DUPLICATE_CONNECTION_POLICY: v.optional(
    v.picklist(["allow", "replace"]),
    "allow"
  ),
  LOG_LEVEL: v.optional(
    v.picklist(["debug", "info", "warn", "error", "silent"]),
    "info"
  ),
  MEETINGS_FILE: v.optional(v.pipe(v.string(), v.minLength(1))),
});

export type Environment = "local" | "development" | "staging" | "production";

export interface AppConfig {
  environment: Environment;
  host: string;
  port: number;
  jwtSecret: string;
  jwtIssuer?: string;
  maxRooms: number;
  maxParticipantsPerMeeting: number;
  authTimeoutMs: number;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  maxMessageBytes: number;
  duplicatePolicy: DuplicateConnectionPolicy;
  logLevel: LogLevel;
  meetingsFile?: string;
}

/**
 * 空文字列は未設定として扱う
 */
function withoutEmpty(
  env: Record<string, string | undefined>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = v.safeParse(EnvSchema, withoutEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration: ${v.summarize(parsed.issues)}`
    );
  }

  const values = parsed.output;
  if (values.ENVIRONMENT === "production" && !values.JWT_SECRET) {
    throw new ConfigError(
      "Invalid configuration: JWT_SECRET is required in production"
    );
  }

  return {
    environment: values.ENVIRONMENT,
    host: values.HOST,
    port: values.PORT,
    jwtSecret: values.JWT_SECRET ?? DEV_SECRET,
    jwtIssuer: values.JWT_ISSUER,
    maxRooms: values.MAX_ROOMS,
    maxParticipantsPerMeeting: values.MAX_PARTICIPANTS_PER_MEETING,
    authTimeoutMs: values.AUTH_TIMEOUT_MS,
    heartbeatIntervalMs: values.HEARTBEAT_INTERVAL_MS,
    idleTimeoutMs: values.IDLE_TIMEOUT_MS,
    maxMessageBytes: values.MAX_MESSAGE_BYTES,
    duplicatePolicy: values.DUPLICATE_CONNECTION_POLICY,
    logLevel: values.LOG_LEVEL,
    meetingsFile: values.MEETINGS_FILE,
  };
}
