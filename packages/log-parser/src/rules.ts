import { okRule, textAttribute, type ClassificationContext, type Rule } from "@opsreport/reporting-engine";
import type { EntityRecord } from "@opsreport/shared";
import type { CounterLimit, LogThresholds } from "./thresholds.js";

type LogRule = Rule<LogThresholds>;

interface Measurement {
  avg: number;
  max: number;
}

// Only reached after malformed-measurement has passed, so both values are numeric.
function measurement(entity: EntityRecord): Measurement {
  return { avg: Number(textAttribute(entity, "Avg")), max: Number(textAttribute(entity, "Max")) };
}

function limitFor(entity: EntityRecord, context: ClassificationContext<LogThresholds>): CounterLimit | undefined {
  const { counters } = context.thresholds;
  const counter = textAttribute(entity, "counter");
  return Object.hasOwn(counters, counter) ? counters[counter] : undefined;
}

function breachReason(entity: EntityRecord, { avg, max }: Measurement, limit: CounterLimit, level: "warn" | "alert"): string {
  const values = `avg=${avg.toFixed(1)}, max=${max.toFixed(1)}`;
  if ("warn_low" in limit) {
    return `Low ${entity.name} (${values})`;
  }
  return level === "alert" ? `High usage (${values})` : `Elevated usage (${values})`;
}

function breaches(limit: CounterLimit, { avg, max }: Measurement, level: "warn" | "alert"): boolean {
  if ("warn_low" in limit) {
    const floor = level === "alert" ? limit.alert_low : limit.warn_low;
    return avg <= floor || max <= floor;
  }
  const ceiling = level === "alert" ? limit.alert : limit.warn;
  return avg >= ceiling || max >= ceiling;
}

export function malformedMeasurement(entity: EntityRecord): string | undefined {
  for (const field of ["Avg", "Max"]) {
    const raw = textAttribute(entity, field);
    if (raw === "") {
      return `Missing ${field} measurement`;
    }
    if (!Number.isFinite(Number(raw))) {
      return `${field} is not a number: "${raw}"`;
    }
  }
  return undefined;
}

export const counterRules: readonly LogRule[] = [
  {
    id: "malformed-measurement",
    severity: "failed",
    match: (entity) => malformedMeasurement(entity)
  },
  {
    id: "counter-alert",
    severity: "failed",
    match: (entity, context) => {
      const limit = limitFor(entity, context);
      const values = measurement(entity);
      return limit && breaches(limit, values, "alert") ? breachReason(entity, values, limit, "alert") : undefined;
    }
  },
  {
    id: "counter-warn",
    severity: "warning",
    match: (entity, context) => {
      const limit = limitFor(entity, context);
      const values = measurement(entity);
      return limit && breaches(limit, values, "warn") ? breachReason(entity, values, limit, "warn") : undefined;
    }
  },
  {
    id: "no-threshold",
    severity: "ok",
    match: (entity, context) => (limitFor(entity, context) ? undefined : "No threshold set")
  },
  okRule("Within normal range", "counter-ok")
];
