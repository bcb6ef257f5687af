import {
  createRunMetrics,
  recordRun,
  writeMetricsFile,
  type ClassificationResult,
  type EntityRecord,
  type Logger,
  type ReportSection,
  type RunConfig,
  type RunSummary
} from "@opsreport/shared";
import { archiveDirectory, createRunDirectory } from "./bundle.js";
import { classifyAll, type Rule } from "./classifier.js";
import { assertReportInvariants, buildReport } from "./report.js";
import { writeReport } from "./writer.js";

export interface PipelineOptions<T extends Readonly<Record<string, unknown>>> {
  title: string;
  entities: readonly EntityRecord[];
  rules: readonly Rule<T>[];
  thresholds: T;
  run: RunConfig;
  logger: Logger;
  now?: Date;
  notes?: string[];
  buildSections?: (results: readonly ClassificationResult[]) => ReportSection[];
}

export async function runPipeline<T extends Readonly<Record<string, unknown>>>(
  options: PipelineOptions<T>
): Promise<RunSummary> {
  const { run, logger } = options;
  const startedAt = Date.now();
  const now = options.now ?? new Date();

  const results = classifyAll(options.entities, options.rules, { now, thresholds: options.thresholds });
  for (const result of results) {
    if (result.severity !== "ok") {
      logger.debug("entity flagged", { entity: result.name, severity: result.severity, rule: result.ruleId });
    }
  }

  const report = buildReport(
    results,
    {
      tool: run.tool,
      title: options.title,
      generatedAt: now.toISOString(),
      host: run.host,
      ticket: run.ticket,
      thresholds: options.thresholds,
      notes: options.notes
    },
    options.buildSections?.(results) ?? []
  );
  assertReportInvariants(report, options.entities.length);

  const outputDir = await createRunDirectory(run.outputRoot, run.tool, run.ticket, now);
  const written = await writeReport(outputDir, report);
  logger.info("report written", { html: written.htmlPath, json: written.jsonPath, total: report.total });

  const archivePath = run.archive ? await archiveDirectory(outputDir) : undefined;
  if (archivePath) {
    logger.info("report archived", { archive: archivePath });
  }

  const metrics = createRunMetrics();
  recordRun(metrics, run.tool, report.counts, Date.now() - startedAt, new Date());
  if (run.metricsFile) {
    await writeMetricsFile(metrics, run.metricsFile);
  }

  return {
    outputDir,
    archivePath,
    total: report.total,
    counts: report.counts
  };
}
