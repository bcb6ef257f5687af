import { SEVERITY_LABELS, type Severity } from "@opsreport/shared";

export type Cell = string | number | { html: string };

const ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;"
};

export function escapeHtml(value: unknown): string {
  const text = value === null || value === undefined ? "" : String(value);
  return text.replace(/[&<>"']/g, (char) => ENTITIES[char] ?? char);
}

function renderCell(cell: Cell): string {
  return typeof cell === "object" ? cell.html : escapeHtml(cell);
}

export function makeTable(headers: readonly string[], rows: readonly (readonly Cell[])[]): string {
  const head = headers.map((header) => `<th>${escapeHtml(header)}</th>`).join("");
  const body =
    rows.length === 0
      ? `<tr><td colspan="${headers.length}"><i>No data</i></td></tr>`
      : rows.map((row) => `<tr>${row.map((cell) => `<td>${renderCell(cell)}</td>`).join("")}</tr>`).join("");
  return `<table><thead><tr>${head}</tr></thead><tbody>${body}</tbody></table>`;
}

const BADGE_CLASS: Record<Severity, string> = {
  failed: "bad",
  warning: "warn",
  stale: "stale",
  ok: "ok"
};

export function badge(severity: Severity): { html: string } {
  return { html: `<span class="badge ${BADGE_CLASS[severity]}">${escapeHtml(SEVERITY_LABELS[severity])}</span>` };
}

export const STYLESHEET = `
    body { font-family: Segoe UI, Arial, sans-serif; margin: 24px; }
    h1 { margin-bottom: 6px; }
    .meta { color: #555; margin-bottom: 18px; }
    .badge { display: inline-block; padding: 2px 8px; border-radius: 999px; font-weight: 700; font-size: 12px; }
    .ok { background: #e9f7ef; }
    .warn { background: #fff4e5; }
    .stale { background: #eef2fb; }
    .bad { background: #fdecea; }
    table { border-collapse: collapse; width: 100%; margin: 10px 0 22px; }
    th, td { border: 1px solid #ddd; padding: 8px; font-size: 14px; vertical-align: top; }
    th { text-align: left; background: #f6f6f6; }
`;
