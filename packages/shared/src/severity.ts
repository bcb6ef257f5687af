import type { Severity } from "./types.js";

export const SEVERITY_ORDER: readonly Severity[] = ["failed", "warning", "stale", "ok"];

export const SEVERITY_LABELS: Record<Severity, string> = {
  failed: "Failed",
  warning: "Warning",
  stale: "Stale",
  ok: "OK"
};

export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}

export function compareSeverity(a: Severity, b: Severity): number {
  return severityRank(a) - severityRank(b);
}

export function emptySeverityCounts(): Record<Severity, number> {
  return { failed: 0, warning: 0, stale: 0, ok: 0 };
}

export function worstSeverity(severities: Iterable<Severity>): Severity {
  let worst: Severity = "ok";
  for (const severity of severities) {
    if (compareSeverity(severity, worst) < 0) {
      worst = severity;
    }
  }
  return worst;
}
