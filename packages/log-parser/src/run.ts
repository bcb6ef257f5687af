import { join } from "node:path";
import { runPipeline, textAttribute } from "@opsreport/reporting-engine";
import {
  SEVERITY_LABELS,
  loadThresholds,
  parseThresholds,
  type ClassificationResult,
  type Logger,
  type ReportSection,
  type RunConfig,
  type RunSummary
} from "@opsreport/shared";
import { effectiveCounterLimits, loadCounterCatalog, type CounterCatalog } from "./counters.js";
import { readCsvRecords, type CsvRecord } from "./csv.js";
import { eventSummarySection, newestEventsSection } from "./events.js";
import { buildCounterEntities } from "./perf.js";
import { counterRules } from "./rules.js";
import { readSystemInfo } from "./system-info.js";
import { logThresholdsSchema, type LogThresholds } from "./thresholds.js";

export { loadCounterCatalog, normalizeCounterPath } from "./counters.js";
export { countByLevel, newestNoisyEvents } from "./events.js";
export { counterRules } from "./rules.js";
export { logThresholdsSchema, type LogThresholds } from "./thresholds.js";

export const TOOL_NAME = "log-parser";

export interface LogParserOptions {
  inputDir: string;
  thresholdsPath?: string;
  windowMinutes: number;
  run: RunConfig;
  logger: Logger;
  now?: Date;
}

function formatMeasure(raw: string): string {
  const value = Number(raw);
  return raw !== "" && Number.isFinite(value) ? value.toFixed(3) : raw;
}

export function performanceSection(results: readonly ClassificationResult[]): ReportSection {
  return {
    id: "performance",
    title: "Performance Summary",
    columns: ["Counter", "Avg", "Max", "Samples", "Status", "Notes"],
    rows: results.map((result) => {
      const entity = { name: result.name, attributes: result.attributes };
      return [
        result.name,
        formatMeasure(textAttribute(entity, "Avg")),
        formatMeasure(textAttribute(entity, "Max")),
        textAttribute(entity, "Samples"),
        SEVERITY_LABELS[result.severity],
        result.reason
      ];
    })
  };
}

async function resolveThresholds(path: string | undefined, catalog: CounterCatalog): Promise<LogThresholds> {
  const loaded = path ? await loadThresholds(path, logThresholdsSchema) : parseThresholds({}, logThresholdsSchema);
  return parseThresholds(
    { ...loaded, counters: effectiveCounterLimits(catalog, loaded.counters) },
    logThresholdsSchema,
    "effective log thresholds"
  );
}

export async function runLogParser(options: LogParserOptions): Promise<RunSummary> {
  const { inputDir, logger } = options;

  const catalog = loadCounterCatalog();
  const thresholds = await resolveThresholds(options.thresholdsPath, catalog);
  const systemInfo = await readSystemInfo(join(inputDir, "system_info.json"));
  const perf = await readCsvRecords(join(inputDir, "perf_summary.csv"));
  const systemEvents = await readCsvRecords(join(inputDir, "events_system.csv"), { optional: true });
  const applicationEvents = await readCsvRecords(join(inputDir, "events_application.csv"), { optional: true });
  logger.info("log inputs loaded", {
    input: inputDir,
    counters: perf.length,
    systemEvents: systemEvents.length,
    applicationEvents: applicationEvents.length
  });

  const logs: Array<[string, CsvRecord[]]> = [
    ["System", systemEvents],
    ["Application", applicationEvents]
  ];

  return runPipeline({
    title: "Log Report",
    entities: buildCounterEntities(perf, catalog),
    rules: counterRules,
    thresholds,
    run: { ...options.run, host: systemInfo.Hostname || options.run.host },
    logger,
    now: options.now,
    notes: [
      `OS: ${systemInfo.OS || "Unknown"}`,
      `Boot Time: ${systemInfo.BootTime || "Unknown"}`,
      `Window: Last ${options.windowMinutes} minutes`
    ],
    buildSections: (results) => [
      performanceSection(results),
      eventSummarySection(logs),
      ...logs.map(([log, events]) =>
        newestEventsSection(
          `newest-${log.toLowerCase()}`,
          log,
          events,
          thresholds.newest_event_limit,
          thresholds.message_max_length
        )
      )
    ]
  });
}
