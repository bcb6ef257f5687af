import { z } from "zod";
import type { Thresholds } from "@opsreport/shared";

const resultValues = (defaults: string[]) => z.array(z.string().min(1)).min(1).default(defaults);

export const backupThresholdsSchema = z
  .object({
    stale_after_days: z.number().positive(),
    warn_after_days: z.number().positive().optional(),
    success_values: resultValues(["success"]),
    warning_values: resultValues(["warning"]),
    fail_values: resultValues(["failed", "error"]),
    fail_on_warning_result: z.boolean().default(false)
  })
  .superRefine((value, ctx) => {
    if (value.warn_after_days !== undefined && value.warn_after_days >= value.stale_after_days) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["warn_after_days"],
        message: "must be lower than stale_after_days"
      });
    }
  });

export type BackupThresholds = Thresholds<typeof backupThresholdsSchema>;
