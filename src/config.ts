/**
 * Client configuration
 *
 * Layering: defaults, then environment, then explicit overrides.
 */

import {
  boolean,
  getDotPath,
  integer,
  maxValue,
  minLength,
  minValue,
  number,
  object,
  picklist,
  pipe,
  safeParse,
  string,
  type InferOutput,
} from "valibot";
import { PreconditionError } from "./errors";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

const timeoutSchema = pipe(number(), integer(), minValue(1));

export const configSchema = object({
  host: pipe(string(), minLength(1)),
  port: pipe(number(), integer(), minValue(1), maxValue(65535)),
  connectTimeoutMs: timeoutSchema,
  readTimeoutMs: timeoutSchema,
  logLevel: picklist(LOG_LEVELS),
  prettyLogs: boolean(),
});

export type ClientConfig = InferOutput<typeof configSchema>;

export const DEFAULT_CONFIG: ClientConfig = {
  host: "127.0.0.1",
  port: 21841,
  connectTimeoutMs: 30_000,
  readTimeoutMs: 30_000,
  logLevel: "info",
  prettyLogs: false,
};

const numeric = (raw: string | undefined): number | undefined =>
  raw === undefined || raw.trim() === "" ? undefined : Number(raw);

const fromEnv = (env: NodeJS.ProcessEnv): Record<string, unknown> => ({
  host: env.TICKWIRE_HOST,
  port: numeric(env.TICKWIRE_PORT),
  connectTimeoutMs: numeric(env.TICKWIRE_CONNECT_TIMEOUT_MS),
  readTimeoutMs: numeric(env.TICKWIRE_READ_TIMEOUT_MS),
  logLevel: env.LOG_LEVEL,
  prettyLogs:
    env.TICKWIRE_PRETTY_LOGS === undefined
      ? undefined
      : env.TICKWIRE_PRETTY_LOGS === "1",
});

const defined = (values: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));

export const resolveConfig = (
  overrides: Partial<ClientConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): ClientConfig => {
  const candidate = {
    ...DEFAULT_CONFIG,
    ...defined(fromEnv(env)),
    ...defined(overrides),
  };
  const result = safeParse(configSchema, candidate);
  if (!result.success) {
    const details = result.issues
      .map((issue) => `${getDotPath(issue) ?? "config"}: ${issue.message}`)
      .join("; ");
    throw new PreconditionError(`invalid client configuration: ${details}`);
  }
  return result.output;
};
