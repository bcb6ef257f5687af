import { SEVERITY_LABELS, SEVERITY_ORDER, type Report, type ReportGroup, type RunMetadata } from "@opsreport/shared";
import { STYLESHEET, badge, escapeHtml, makeTable } from "./html.js";

function formatThresholdValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map((item) => formatThresholdValue(item)).join(", ");
  }
  if (value !== null && typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

function renderMetadata(metadata: RunMetadata): string {
  const lines = [
    `<div><b>Generated:</b> ${escapeHtml(metadata.generatedAt)}</div>`,
    `<div><b>Host:</b> ${escapeHtml(metadata.host)}</div>`
  ];
  if (metadata.ticket) {
    lines.push(`<div><b>Ticket:</b> ${escapeHtml(metadata.ticket)}</div>`);
  }
  const thresholds = Object.entries(metadata.thresholds)
    .map(([key, value]) => `${key}=${formatThresholdValue(value)}`)
    .join("; ");
  if (thresholds) {
    lines.push(`<div><b>Thresholds:</b> ${escapeHtml(thresholds)}</div>`);
  }
  for (const note of metadata.notes ?? []) {
    lines.push(`<div>${escapeHtml(note)}</div>`);
  }
  return lines.join("\n    ");
}

function renderSummary(report: Report): string {
  const head = ["Total", ...SEVERITY_ORDER.map((severity) => SEVERITY_LABELS[severity])]
    .map((label) => `<th>${escapeHtml(label)}</th>`)
    .join("");
  const cells = [
    `<td data-count="total">${report.total}</td>`,
    ...SEVERITY_ORDER.map((severity) => `<td data-count="${severity}">${report.counts[severity]}</td>`)
  ].join("");
  return `<table class="summary"><thead><tr>${head}</tr></thead><tbody><tr>${cells}</tr></tbody></table>`;
}

function renderGroup(group: ReportGroup): string {
  const heading = `<h2 id="severity-${group.severity}">${escapeHtml(SEVERITY_LABELS[group.severity])} (${group.results.length})</h2>`;
  const table = makeTable(
    ["Status", "Entity", "Reason", "Rule"],
    group.results.map((result) => [badge(result.severity), result.name, result.reason, result.ruleId])
  );
  return `${heading}\n  ${table}`;
}

export function renderHtml(report: Report): string {
  const { metadata } = report;
  const groups = report.groups.map((group) => renderGroup(group)).join("\n\n  ");
  const sections = report.sections
    .map((section) => `<h2 id="section-${escapeHtml(section.id)}">${escapeHtml(section.title)}</h2>\n  ${makeTable(section.columns, section.rows)}`)
    .join("\n\n  ");

  return `<!doctype html>
<html>
<head>
  <meta charset="utf-8" />
  <title>${escapeHtml(metadata.title)} - ${escapeHtml(metadata.host)}</title>
  <style>${STYLESHEET}  </style>
</head>
<body>
  <h1>${escapeHtml(metadata.title)}</h1>
  <div class="meta">
    ${renderMetadata(metadata)}
  </div>

  <h2>Summary</h2>
  ${renderSummary(report)}

  ${groups}
${sections ? `\n  ${sections}\n` : ""}</body>
</html>
`;
}
