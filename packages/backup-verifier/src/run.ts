import { runPipeline, sortWorstFirst, textAttribute } from "@opsreport/reporting-engine";
import {
  loadThresholds,
  type ClassificationResult,
  type Logger,
  type ReportSection,
  type RunConfig,
  type RunSummary
} from "@opsreport/shared";
import { readJobs } from "./jobs.js";
import { backupRules, daysSinceSuccess } from "./rules.js";
import { backupThresholdsSchema } from "./thresholds.js";

export { parseJobsCsv, readJobs } from "./jobs.js";
export { backupRules, daysSinceSuccess } from "./rules.js";
export { backupThresholdsSchema, type BackupThresholds } from "./thresholds.js";

export const TOOL_NAME = "backup-verifier";

export interface BackupVerifierOptions {
  inputPath: string;
  thresholdsPath: string;
  run: RunConfig;
  logger: Logger;
  now?: Date;
}

function formatDuration(raw: string): string {
  const minutes = Number(raw);
  return raw !== "" && Number.isFinite(minutes) ? minutes.toFixed(1) : raw;
}

export function buildJobSections(results: readonly ClassificationResult[], now: Date): ReportSection[] {
  return [
    {
      id: "all-jobs",
      title: "All Jobs",
      columns: ["Job", "Last Result", "Last Run", "Last Success", "Days Since Success", "Duration (min)", "Notes"],
      rows: sortWorstFirst(results).map((result) => {
        const entity = { name: result.name, attributes: result.attributes };
        const days = daysSinceSuccess(entity, now);
        return [
          result.name,
          textAttribute(entity, "last_result"),
          textAttribute(entity, "last_run"),
          textAttribute(entity, "last_success"),
          days === undefined ? "" : days.toFixed(2),
          formatDuration(textAttribute(entity, "duration_minutes")),
          textAttribute(entity, "notes")
        ];
      })
    }
  ];
}

export async function runBackupVerifier(options: BackupVerifierOptions): Promise<RunSummary> {
  const { logger } = options;
  const now = options.now ?? new Date();

  const thresholds = await loadThresholds(options.thresholdsPath, backupThresholdsSchema);
  const jobs = await readJobs(options.inputPath);
  logger.info("jobs loaded", { input: options.inputPath, count: jobs.length });

  return runPipeline({
    title: "Backup Verification Report",
    entities: jobs,
    rules: backupRules,
    thresholds,
    run: options.run,
    logger,
    now,
    notes: [`Stale threshold: ${thresholds.stale_after_days} days since last successful backup`],
    buildSections: (results) => buildJobSections(results, now)
  });
}
