/**
 * Probe configuration from environment variables.
 *
 * Required: HOST, PORT, USER, DATABASE, PASSWORD.
 * Optional: PGPROBE_CA_FILE, PGPROBE_TLS_INSECURE, PGPROBE_TIMEOUT_MS.
 *
 * Validation happens up front so a bad value fails before any socket is
 * opened. Every offending variable is reported at once.
 */

import { z } from "zod";

import { ConfigError } from "./errors.js";
import type { Config } from "./types.js";

const MIN_PORT = 1;
const MAX_PORT = 65535;

const requiredString = z
  .string({ required_error: "is required" })
  .min(1, "must not be empty");

const portSchema = z
  .string({ required_error: "is required" })
  .regex(/^\d+$/, "must be an integer")
  .transform(Number)
  .pipe(
    z
      .number()
      .min(MIN_PORT, `must be between ${MIN_PORT} and ${MAX_PORT}`)
      .max(MAX_PORT, `must be between ${MIN_PORT} and ${MAX_PORT}`),
  );

const envSchema = z.object({
  HOST: requiredString,
  PORT: portSchema,
  USER: requiredString,
  DATABASE: requiredString,
  PASSWORD: z.string({ required_error: "is required" }),
  PGPROBE_CA_FILE: z.string().min(1, "must not be empty").optional(),
  PGPROBE_TLS_INSECURE: z
    .enum(["0", "1", "false", "true"], {
      errorMap: () => ({ message: "must be 0, 1, false or true" }),
    })
    .optional()
    .transform((value) => value === "1" || value === "true"),
  PGPROBE_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, "must be a whole number of milliseconds")
    .transform(Number)
    .optional(),
});

export interface TransportSettings {
  rejectUnauthorized: boolean;
  caFile?: string;
  timeoutMs?: number;
}

export interface ProbeSettings {
  config: Config;
  transport: TransportSettings;
}

/**
 * Validate the environment and split it into connection config and
 * transport settings.
 *
 * @throws {ConfigError} listing every missing or invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): ProbeSettings {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`),
      { cause: result.error },
    );
  }

  const vars = result.data;
  return {
    config: {
      host: vars.HOST,
      port: vars.PORT,
      user: vars.USER,
      database: vars.DATABASE,
      password: vars.PASSWORD,
    },
    transport: {
      rejectUnauthorized: !vars.PGPROBE_TLS_INSECURE,
      caFile: vars.PGPROBE_CA_FILE,
      timeoutMs: vars.PGPROBE_TIMEOUT_MS,
    },
  };
}
