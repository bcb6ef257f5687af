import { readFile } from "node:fs/promises";
import type { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";

export type Thresholds<S extends z.ZodTypeAny> = Readonly<z.output<S>>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export function describeIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseThresholds<S extends z.ZodTypeAny>(raw: unknown, schema: S, source = "thresholds"): Thresholds<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}: ${describeIssues(parsed.error.issues)}`);
  }
  return deepFreeze(parsed.data);
}

export async function loadThresholds<S extends z.ZodTypeAny>(path: string, schema: S): Promise<Thresholds<S>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read thresholds file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stripBom(text));
  } catch (error) {
    throw new ConfigurationError(`Thresholds file ${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  return parseThresholds(raw, schema, `thresholds file ${path}`);
}
