import { writeFile } from "node:fs/promises";
import { Counter, Gauge, Registry } from "prom-client";
import { IOError, errorMessage } from "./errors.js";
import type { Severity } from "./types.js";

export interface RunMetrics {
  registry: Registry;
  entitiesClassifiedTotal: Counter<string>;
  runDurationSeconds: Gauge<string>;
  lastRunTimestampSeconds: Gauge<string>;
}

// Each run gets its own registry: the tools are one-shot and nothing is scraped live.
export function createRunMetrics(): RunMetrics {
  const registry = new Registry();

  const entitiesClassifiedTotal = new Counter({
    name: "opsreport_entities_classified_total",
    help: "Entities classified in the run, by severity",
    labelNames: ["tool", "severity"],
    registers: [registry]
  });

  const runDurationSeconds = new Gauge({
    name: "opsreport_run_duration_seconds",
    help: "Wall time of the last report run",
    labelNames: ["tool"],
    registers: [registry]
  });

  const lastRunTimestampSeconds = new Gauge({
    name: "opsreport_last_run_timestamp_seconds",
    help: "Unix time the last report run finished",
    labelNames: ["tool"],
    registers: [registry]
  });

  return {
    registry,
    entitiesClassifiedTotal,
    runDurationSeconds,
    lastRunTimestampSeconds
  };
}

export function recordRun(
  metrics: RunMetrics,
  tool: string,
  counts: Record<Severity, number>,
  durationMs: number,
  finishedAt: Date
): void {
  for (const [severity, count] of Object.entries(counts)) {
    metrics.entitiesClassifiedTotal.labels(tool, severity).inc(count);
  }
  metrics.runDurationSeconds.labels(tool).set(durationMs / 1000);
  metrics.lastRunTimestampSeconds.labels(tool).set(Math.floor(finishedAt.getTime() / 1000));
}

export async function writeMetricsFile(metrics: RunMetrics, path: string): Promise<void> {
  const body = await metrics.registry.metrics();
  try {
    await writeFile(path, body, "utf8");
  } catch (error) {
    throw new IOError(`Cannot write metrics file ${path}: ${errorMessage(error)}`, { cause: error });
  }
}
