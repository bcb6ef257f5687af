import { z } from "zod";
import type { Thresholds } from "@opsreport/shared";

export const highLimitSchema = z.object({ warn: z.number(), alert: z.number() }).strict();
export const lowLimitSchema = z.object({ warn_low: z.number(), alert_low: z.number() }).strict();
export const counterLimitSchema = z.union([highLimitSchema, lowLimitSchema]);

export type CounterLimit = z.infer<typeof counterLimitSchema>;

export const logThresholdsSchema = z.object({
  counters: z.record(z.string(), counterLimitSchema).default({}),
  newest_event_limit: z.number().int().positive().default(20),
  message_max_length: z.number().int().positive().default(200)
});

export type LogThresholds = Thresholds<typeof logThresholdsSchema>;
