import { z } from "zod";
import type { Thresholds } from "@opsreport/shared";

const percent = z.number().min(0).max(100);

export const endpointThresholdsSchema = z
  .object({
    disk_free_warn_pct: percent,
    disk_free_alert_pct: percent,
    cpu_warn_pct: percent,
    cpu_alert_pct: percent,
    mem_used_warn_pct: percent,
    mem_used_alert_pct: percent,
    service_allowlist: z.array(z.string()).default([]),
    max_uptime_days: z.number().positive().optional()
  })
  .superRefine((value, ctx) => {
    const ordered: Array<[keyof typeof value, boolean, string]> = [
      ["disk_free_alert_pct", value.disk_free_alert_pct <= value.disk_free_warn_pct, "must not exceed disk_free_warn_pct"],
      ["cpu_alert_pct", value.cpu_alert_pct >= value.cpu_warn_pct, "must not be below cpu_warn_pct"],
      ["mem_used_alert_pct", value.mem_used_alert_pct >= value.mem_used_warn_pct, "must not be below mem_used_warn_pct"]
    ];
    for (const [key, valid, message] of ordered) {
      if (!valid) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message });
      }
    }
  });

export type EndpointThresholds = Thresholds<typeof endpointThresholdsSchema>;
