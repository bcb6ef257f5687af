import {
  SEVERITY_ORDER,
  emptySeverityCounts,
  severityRank,
  type ClassificationResult,
  type Report,
  type ReportSection,
  type RunMetadata,
  type Severity
} from "@opsreport/shared";

export function countBySeverity(results: readonly ClassificationResult[]): Record<Severity, number> {
  const counts = emptySeverityCounts();
  for (const result of results) {
    counts[result.severity] += 1;
  }
  return counts;
}

// Array.prototype.sort is stable, so input order survives within a severity.
export function sortWorstFirst(results: readonly ClassificationResult[]): ClassificationResult[] {
  return [...results].sort((a, b) => severityRank(a.severity) - severityRank(b.severity));
}

export function buildReport(
  results: readonly ClassificationResult[],
  metadata: RunMetadata,
  sections: ReportSection[] = []
): Report {
  const sorted = sortWorstFirst(results);
  return {
    metadata,
    total: sorted.length,
    counts: countBySeverity(sorted),
    groups: SEVERITY_ORDER.map((severity) => ({
      severity,
      results: sorted.filter((result) => result.severity === severity)
    })),
    results: sorted,
    sections
  };
}

export function assertReportInvariants(report: Report, inputCount: number): void {
  if (report.total !== inputCount || report.results.length !== inputCount) {
    throw new Error(`Report holds ${report.results.length} results for ${inputCount} input entities`);
  }
  const counted = SEVERITY_ORDER.reduce((sum, severity) => sum + report.counts[severity], 0);
  const grouped = report.groups.reduce((sum, group) => sum + group.results.length, 0);
  if (counted !== report.total || grouped !== report.total) {
    throw new Error(`Severity counts (${counted}) or groups (${grouped}) disagree with total ${report.total}`);
  }
}
