import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigurationError, describeIssues, errorMessage } from "@opsreport/shared";
import { counterLimitSchema, type CounterLimit } from "./thresholds.js";

const catalogSchema = z.object({
  counters: z.record(
    z.string(),
    z.object({
      name: z.string(),
      limits: counterLimitSchema.optional()
    })
  )
});

export interface CounterCatalog {
  names: ReadonlyMap<string, string>;
  limits: ReadonlyMap<string, CounterLimit>;
}

/**
 * Turns \\HOST\processor(_total)\% processor time into
 * \processor(_total)\% processor time, lowercased for matching.
 */
export function normalizeCounterPath(raw: string): string {
  const trimmed = raw.trim();
  const match = /^\\\\[^\\]+(\\.*)$/.exec(trimmed);
  return (match?.[1] ?? trimmed).toLowerCase();
}

export function loadCounterCatalog(url: URL = new URL("./counters.json", import.meta.url)): CounterCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(url, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot load counter catalog ${url.pathname}: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid counter catalog ${url.pathname}: ${describeIssues(parsed.error.issues)}`);
  }

  const names = new Map<string, string>();
  const limits = new Map<string, CounterLimit>();
  for (const [path, entry] of Object.entries(parsed.data.counters)) {
    const key = normalizeCounterPath(path);
    names.set(key, entry.name);
    if (entry.limits) {
      limits.set(key, entry.limits);
    }
  }
  return { names, limits };
}

export function friendlyCounterName(catalog: CounterCatalog, normalized: string): string {
  return catalog.names.get(normalized) ?? normalized;
}

/** Catalog defaults, overridden per counter by the thresholds file. */
export function effectiveCounterLimits(
  catalog: CounterCatalog,
  overrides: Readonly<Record<string, CounterLimit>>
): Record<string, CounterLimit> {
  const merged: Record<string, CounterLimit> = Object.fromEntries(catalog.limits);
  for (const [path, limit] of Object.entries(overrides)) {
    merged[normalizeCounterPath(path)] = limit;
  }
  return merged;
}
