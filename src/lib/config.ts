import { API_KEY_ENV, DEFAULT_API_BASE_URL, DEFAULT_POLL_INTERVAL_SECONDS, DEFAULT_PYTHON_BIN } from "./constants";
import { CliError } from "./errors";
import { parseMaybeNumber } from "./utils";

export interface LauncherConfig {
  apiKey?: string;
  apiBaseUrl: string;
  pollIntervalSeconds: number;
  pythonBin: string;
  debug: boolean;
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): LauncherConfig {
  const apiKey = env[API_KEY_ENV]?.trim();
  return {
    apiKey: apiKey ? apiKey : undefined,
    apiBaseUrl: env.LAMBDA_API_BASE_URL?.trim() || DEFAULT_API_BASE_URL,
    pollIntervalSeconds: env.GPULAUNCH_POLL_INTERVAL
      ? parsePositiveNumber(env.GPULAUNCH_POLL_INTERVAL, "GPULAUNCH_POLL_INTERVAL")
      : DEFAULT_POLL_INTERVAL_SECONDS,
    pythonBin: env.GPULAUNCH_PYTHON?.trim() || DEFAULT_PYTHON_BIN,
    debug: env.GPULAUNCH_DEBUG === "1" || env.GPULAUNCH_DEBUG === "true"
  };
}

export function parsePositiveNumber(input: string, label: string): number {
  const value = parseMaybeNumber(input);
  if (typeof value !== "number" || value <= 0) {
    throw new CliError({ kind: "validation", message: `${label} must be a positive number.` });
  }
  return value;
}

export function parsePositiveInteger(input: string, label: string): number {
  const value = parsePositiveNumber(input, label);
  if (!Number.isInteger(value)) {
    throw new CliError({ kind: "validation", message: `${label} must be an integer.` });
  }
  return value;
}
