import { formatDays, numberAttribute, textAttribute, type ClassificationContext, type Rule } from "@opsreport/reporting-engine";
import type { EntityRecord, Severity } from "@opsreport/shared";
import type { EndpointKind } from "./entities.js";
import type { EndpointThresholds } from "./thresholds.js";

type EndpointRule = Rule<EndpointThresholds>;
type Match = (entity: EntityRecord, context: ClassificationContext<EndpointThresholds>) => string | undefined;

function forKind(kind: EndpointKind, id: string, severity: Severity, match: Match): EndpointRule {
  return {
    id,
    severity,
    match: (entity, context) => (textAttribute(entity, "kind") === kind ? match(entity, context) : undefined)
  };
}

function percentRules(
  kind: "cpu" | "memory",
  attribute: string,
  label: { lower: string; title: string },
  limits: (thresholds: EndpointThresholds) => { warn: number; alert: number }
): EndpointRule[] {
  return [
    forKind(kind, `${kind}-unavailable`, "warning", (entity) =>
      numberAttribute(entity, attribute) === undefined ? `${label.title} unavailable` : undefined
    ),
    forKind(kind, `${kind}-alert`, "failed", (entity, { thresholds }) => {
      const value = numberAttribute(entity, attribute) ?? 0;
      return value >= limits(thresholds).alert ? `High ${label.lower}: ${value.toFixed(2)}%` : undefined;
    }),
    forKind(kind, `${kind}-warn`, "warning", (entity, { thresholds }) => {
      const value = numberAttribute(entity, attribute) ?? 0;
      return value >= limits(thresholds).warn ? `Elevated ${label.lower}: ${value.toFixed(2)}%` : undefined;
    }),
    forKind(kind, `${kind}-ok`, "ok", (entity) => `${label.title} OK: ${(numberAttribute(entity, attribute) ?? 0).toFixed(2)}%`)
  ];
}

export const endpointRules: readonly EndpointRule[] = [
  forKind("disk", "disk-no-data", "warning", (entity) =>
    numberAttribute(entity, "FreePercent") === undefined ? "No disk size/free data" : undefined
  ),
  forKind("disk", "disk-free-alert", "failed", (entity, { thresholds }) => {
    const free = numberAttribute(entity, "FreePercent");
    return free !== undefined && free < thresholds.disk_free_alert_pct ? `Low disk space: ${free.toFixed(2)}% free` : undefined;
  }),
  forKind("disk", "disk-free-warn", "warning", (entity, { thresholds }) => {
    const free = numberAttribute(entity, "FreePercent");
    return free !== undefined && free < thresholds.disk_free_warn_pct ? `Disk space getting low: ${free.toFixed(2)}% free` : undefined;
  }),
  forKind("disk", "disk-ok", "ok", () => "Disk space OK"),

  ...percentRules("cpu", "CpuLoadPercent", { lower: "CPU load", title: "CPU load" }, (t) => ({
    warn: t.cpu_warn_pct,
    alert: t.cpu_alert_pct
  })),
  ...percentRules("memory", "MemoryUsedPercent", { lower: "memory usage", title: "Memory usage" }, (t) => ({
    warn: t.mem_used_warn_pct,
    alert: t.mem_used_alert_pct
  })),

  forKind("services", "services-stopped", "warning", (entity) => {
    const count = numberAttribute(entity, "stopped_count") ?? 0;
    return count > 0 ? `${count} Automatic service(s) not running: ${textAttribute(entity, "stopped_names")}` : undefined;
  }),
  forKind("services", "services-ok", "ok", () => "All automatic services running"),

  forKind("reboot", "reboot-pending", "warning", (entity) => {
    if (entity.attributes.Pending !== true) return undefined;
    const reasons = textAttribute(entity, "Reasons");
    return reasons ? `Pending reboot detected: ${reasons}` : "Pending reboot detected";
  }),
  forKind("reboot", "reboot-ok", "ok", () => "No pending reboot"),

  forKind("defender", "realtime-disabled", "warning", (entity) =>
    entity.attributes.Available === true && entity.attributes.RealTimeProtectionEnabled === false
      ? "Real-time protection is disabled"
      : undefined
  ),
  forKind("defender", "defender-ok", "ok", (entity) =>
    entity.attributes.Available === true ? "Real-time protection enabled" : "Security agent status unavailable"
  ),

  forKind("uptime", "uptime-stale", "stale", (entity, { thresholds }) => {
    const hours = numberAttribute(entity, "UptimeHours");
    if (thresholds.max_uptime_days === undefined || hours === undefined) return undefined;
    const days = hours / 24;
    return days >= thresholds.max_uptime_days ? `Last boot ${formatDays(days)} days ago` : undefined;
  }),
  forKind("uptime", "uptime-ok", "ok", (entity) => {
    const hours = numberAttribute(entity, "UptimeHours");
    return hours === undefined ? "Uptime unavailable" : `Up ${formatDays(hours / 24)} days`;
  })
];
