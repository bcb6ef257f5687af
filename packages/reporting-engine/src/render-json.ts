import type { Report } from "@opsreport/shared";

export function renderJson(report: Report): string {
  const document = {
    metadata: report.metadata,
    total: report.total,
    counts: report.counts,
    results: report.results,
    sections: report.sections
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}
