import { daysSince, formatDays, okRule, parseTimestamp, textAttribute, type ClassificationContext, type Rule } from "@opsreport/reporting-engine";
import type { EntityRecord } from "@opsreport/shared";
import type { BackupThresholds } from "./thresholds.js";

type BackupRule = Rule<BackupThresholds>;
type BackupContext = ClassificationContext<BackupThresholds>;

function resultIn(values: readonly string[], result: string): boolean {
  const normalized = result.toLowerCase();
  return values.some((value) => value.toLowerCase() === normalized);
}

function lastResult(entity: EntityRecord): string {
  return textAttribute(entity, "last_result");
}

export function daysSinceSuccess(entity: EntityRecord, now: Date): number | undefined {
  const lastSuccess = parseTimestamp(textAttribute(entity, "last_success"));
  return lastSuccess ? daysSince(lastSuccess, now) : undefined;
}

function malformedTimestamp(entity: EntityRecord): string | undefined {
  const lastSuccess = textAttribute(entity, "last_success");
  if (lastSuccess === "") {
    return "No last_success timestamp";
  }
  if (!parseTimestamp(lastSuccess)) {
    return `Malformed last_success timestamp "${lastSuccess}"`;
  }
  const lastRun = textAttribute(entity, "last_run");
  if (lastRun !== "" && !parseTimestamp(lastRun)) {
    return `Malformed last_run timestamp "${lastRun}"`;
  }
  return undefined;
}

function staleFor(limit: number | undefined, entity: EntityRecord, context: BackupContext): number | undefined {
  const days = daysSinceSuccess(entity, context.now);
  return limit !== undefined && days !== undefined && days >= limit ? days : undefined;
}

/** Ordered so status always outranks staleness: a failed job that is also stale reports as failed. */
export const backupRules: readonly BackupRule[] = [
  {
    id: "failed-result",
    severity: "failed",
    match: (entity, { thresholds }) => {
      const result = lastResult(entity);
      if (!resultIn(thresholds.fail_values, result)) return undefined;
      const notes = textAttribute(entity, "notes");
      return notes ? `Last result is ${result}: ${notes}` : `Last result is ${result}`;
    }
  },
  {
    id: "malformed-timestamp",
    severity: "failed",
    match: (entity) => malformedTimestamp(entity)
  },
  {
    id: "warning-result-escalated",
    severity: "failed",
    match: (entity, { thresholds }) =>
      thresholds.fail_on_warning_result && resultIn(thresholds.warning_values, lastResult(entity))
        ? `Last result is ${lastResult(entity)} (warnings treated as failures)`
        : undefined
  },
  {
    id: "warning-result",
    severity: "warning",
    match: (entity, { thresholds }) =>
      resultIn(thresholds.warning_values, lastResult(entity)) ? `Last result is ${lastResult(entity)}` : undefined
  },
  {
    id: "unknown-result",
    severity: "warning",
    match: (entity, { thresholds }) => {
      const result = lastResult(entity);
      if (resultIn(thresholds.success_values, result)) return undefined;
      return result ? `Unrecognized result "${result}"` : "No last_result reported";
    }
  },
  {
    id: "stale",
    severity: "stale",
    match: (entity, context) => {
      const days = staleFor(context.thresholds.stale_after_days, entity, context);
      return days === undefined ? undefined : `Stale: last success ${formatDays(days)} days ago`;
    }
  },
  {
    id: "approaching-stale",
    severity: "warning",
    match: (entity, context) => {
      const days = staleFor(context.thresholds.warn_after_days, entity, context);
      return days === undefined ? undefined : `Approaching stale: last success ${formatDays(days)} days ago`;
    }
  },
  okRule("Last result OK")
];
