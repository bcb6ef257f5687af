import { hostname } from "node:os";
import dotenv from "dotenv";
import { ConfigurationError } from "./errors.js";

dotenv.config({ path: process.env.ENV_FILE ?? ".env.local" });
dotenv.config();

export function getEnv(name: string, fallback?: string): string {
  const value = process.env[name] ?? fallback;
  if (value === undefined || value === "") {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function getOptionalEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function getBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const normalized = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigurationError(`Environment variable ${name} is not a boolean: ${raw}`);
}

export function getNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`Environment variable ${name} is not a number: ${raw}`);
  }
  return value;
}

export interface RunConfig {
  tool: string;
  outputRoot: string;
  ticket?: string;
  host: string;
  archive: boolean;
  metricsFile?: string;
}

export function loadRunConfig(tool: string): RunConfig {
  return {
    tool,
    outputRoot: getEnv("REPORT_OUTPUT_ROOT", "./reports"),
    ticket: getOptionalEnv("REPORT_TICKET"),
    host: getOptionalEnv("REPORT_HOST") ?? hostname(),
    archive: getBooleanEnv("REPORT_ARCHIVE", true),
    metricsFile: getOptionalEnv("REPORT_METRICS_FILE")
  };
}
