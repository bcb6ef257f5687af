import { runPipeline, textAttribute } from "@opsreport/reporting-engine";
import {
  SEVERITY_LABELS,
  loadThresholds,
  type ClassificationResult,
  type Logger,
  type ReportSection,
  type RunConfig,
  type RunSummary
} from "@opsreport/shared";
import { readEndpointDocuments, type EndpointDocuments } from "./documents.js";
import { buildEndpointEntities, stoppedAutomaticServices } from "./entities.js";
import { endpointRules } from "./rules.js";
import { endpointThresholdsSchema, type EndpointThresholds } from "./thresholds.js";

export { readEndpointDocuments, type EndpointDocuments } from "./documents.js";
export { buildEndpointEntities, stoppedAutomaticServices } from "./entities.js";
export { endpointRules } from "./rules.js";
export { endpointThresholdsSchema, type EndpointThresholds } from "./thresholds.js";

export const TOOL_NAME = "endpoint-health";

export interface EndpointHealthOptions {
  inputDir: string;
  thresholdsPath: string;
  run: RunConfig;
  logger: Logger;
  now?: Date;
}

function display(value: unknown): string {
  return value === null || value === undefined ? "" : String(value);
}

export function buildEndpointSections(
  documents: EndpointDocuments,
  thresholds: EndpointThresholds,
  results: readonly ClassificationResult[]
): ReportSection[] {
  const diskResults = results.filter((result) => result.attributes.kind === "disk");
  const stopped = stoppedAutomaticServices(documents.services, thresholds.service_allowlist);
  const { defender } = documents;

  return [
    {
      id: "disks",
      title: "Disks",
      columns: ["Drive", "SizeGB", "FreeGB", "Free%", "Volume", "Status", "Notes"],
      rows: diskResults.map((result) => {
        const entity = { name: result.name, attributes: result.attributes };
        return [
          textAttribute(entity, "Drive"),
          textAttribute(entity, "SizeGB"),
          textAttribute(entity, "FreeGB"),
          textAttribute(entity, "FreePercent"),
          textAttribute(entity, "VolumeName"),
          SEVERITY_LABELS[result.severity],
          result.reason
        ];
      })
    },
    {
      id: "stopped-services",
      title: "Automatic Services Stopped",
      columns: ["Name", "DisplayName", "State", "StartMode"],
      rows: stopped.map((service) => [
        display(service.Name),
        display(service.DisplayName),
        display(service.State),
        display(service.StartMode)
      ])
    },
    {
      id: "defender",
      title: "Defender",
      columns: ["Available", "RealTimeProtectionEnabled", "AntivirusEnabled", "Notes"],
      rows: [
        [
          display(defender.Available),
          display(defender.RealTimeProtectionEnabled),
          display(defender.AntivirusEnabled),
          display(defender.Notes)
        ]
      ]
    }
  ];
}

export async function runEndpointHealth(options: EndpointHealthOptions): Promise<RunSummary> {
  const { logger } = options;

  const thresholds = await loadThresholds(options.thresholdsPath, endpointThresholdsSchema);
  const documents = await readEndpointDocuments(options.inputDir);
  const entities = buildEndpointEntities(documents, thresholds);
  logger.info("endpoint documents loaded", { input: options.inputDir, disks: documents.disks.length, entities: entities.length });

  const { systemInfo, reboot } = documents;
  return runPipeline({
    title: "Endpoint Health Report",
    entities,
    rules: endpointRules,
    thresholds,
    run: { ...options.run, host: systemInfo.Hostname ?? options.run.host },
    logger,
    now: options.now,
    notes: [
      `OS: ${display(systemInfo.OS) || "Unknown"}`,
      `Uptime (hrs): ${display(systemInfo.UptimeHours) || "Unknown"}`,
      reboot.Pending ? `Pending reboot: YES ${reboot.Reasons.join(", ")}`.trim() : "Pending reboot: No"
    ],
    buildSections: (results) => buildEndpointSections(documents, thresholds, results)
  });
}
