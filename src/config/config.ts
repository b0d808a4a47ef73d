/**
 * Configuration
 * Engine settings read from PORTFLOW_* environment variables and .env files
 */

import dotenv from "dotenv";
import { existsSync, readFileSync } from "fs";
import { DEFAULT_MAX_LOGS, LOG_LEVELS, type ConsoleLevel } from "../logging/logger";

export interface PortflowConfig {
  /** Console echo threshold for run logs */
  logLevel: ConsoleLevel;
  /** Retained log entries per run */
  maxLogs: number;
  /** Per-node timeout; 0 disables it */
  nodeTimeoutMs: number;
  /** Registered middleware ids wrapped around every node, outermost first */
  middleware: string[];
}

export const DEFAULT_CONFIG: PortflowConfig = {
  logLevel: "info",
  maxLogs: DEFAULT_MAX_LOGS,
  nodeTimeoutMs: 0,
  middleware: [],
};

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

export type Env = Record<string, string | undefined>;

const CONSOLE_LEVELS: ReadonlySet<string> = new Set([...LOG_LEVELS, "silent"]);

function isConsoleLevel(value: string): value is ConsoleLevel {
  return CONSOLE_LEVELS.has(value);
}

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  minimum: number,
  problems: string[],
): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) < minimum) {
    problems.push(`${name} must be an integer >= ${minimum}, got "${raw}"`);
    return fallback;
  }
  return Number(raw);
}

/**
 * Read configuration from an environment map. Every invalid variable is
 * reported in one ConfigError.
 */
export function loadConfig(env: Env = process.env): PortflowConfig {
  const problems: string[] = [];

  let logLevel = DEFAULT_CONFIG.logLevel;
  const rawLevel = env.PORTFLOW_LOG_LEVEL?.trim().toLowerCase();
  if (rawLevel) {
    if (isConsoleLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      problems.push(
        `PORTFLOW_LOG_LEVEL must be one of ${[...LOG_LEVELS, "silent"].join(", ")}, got "${rawLevel}"`,
      );
    }
  }

  const maxLogs = readInteger(
    env,
    "PORTFLOW_MAX_LOGS",
    DEFAULT_CONFIG.maxLogs,
    1,
    problems,
  );
  const nodeTimeoutMs = readInteger(
    env,
    "PORTFLOW_NODE_TIMEOUT_MS",
    DEFAULT_CONFIG.nodeTimeoutMs,
    0,
    problems,
  );

  const middleware = (env.PORTFLOW_MIDDLEWARE ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id !== "");

  if (problems.length > 0) throw new ConfigError(problems);

  return { logLevel, maxLogs, nodeTimeoutMs, middleware };
}

/**
 * Parse `.env` content with dotenv: `#` comments, `export` prefixes,
 * quoted and multi-line values.
 */
export function parseEnvFile(content: string): Record<string, string> {
  return dotenv.parse(content);
}

/**
 * Layer environment sources: explicit overrides win, then the process
 * environment, then values from a `.env` file (dotenv never overrides
 * variables that are already set).
 */
export function mergeEnv(
  processEnv: Env,
  fileEnv: Record<string, string> = {},
  overrides: Record<string, string> = {},
): Env {
  const merged: Env = { ...fileEnv };
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) merged[key] = value;
  }
  return { ...merged, ...overrides };
}

/** Returns undefined when the file does not exist */
export function loadEnvFile(path: string): Record<string, string> | undefined {
  if (!existsSync(path)) return undefined;
  return parseEnvFile(readFileSync(path, "utf-8"));
}
