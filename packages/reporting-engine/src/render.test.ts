import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, it } from "node:test";
import { IOError, SEVERITY_ORDER, type ClassificationResult, type RunMetadata, type Severity } from "@opsreport/shared";
import { escapeHtml, makeTable } from "./html.js";
import { renderHtml } from "./render-html.js";
import { renderJson } from "./render-json.js";
import { buildReport } from "./report.js";
import { writeReport } from "./writer.js";

const scratchDirs: string[] = [];

async function scratchDir(prefix: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  scratchDirs.push(dir);
  return dir;
}

after(async () => {
  await Promise.all(scratchDirs.map((dir) => rm(dir, { recursive: true, force: true })));
});

const metadata: RunMetadata = {
  tool: "backup-verifier",
  title: "Backup Verification Report",
  generatedAt: "2026-01-20T00:00:00.000Z",
  host: "host-a",
  ticket: "INC-7",
  thresholds: { stale_after_days: 3, fail_values: ["failed", "error"] }
};

function result(name: string, severity: Severity, reason = "reason"): ClassificationResult {
  return { name, severity, reason, ruleId: "rule", attributes: { source: name } };
}

const report = buildReport(
  [result("nightly", "ok"), result("<script>", "failed", "Last result is Error: disk \"full\""), result("weekly", "stale")],
  metadata,
  [{ id: "extra", title: "Extra & more", columns: ["Key", "Value"], rows: [["a", "<b>"]] }]
);

function htmlCounts(html: string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const match of html.matchAll(/<td data-count="(\w+)">(\d+)<\/td>/g)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) {
      counts[key] = Number(value);
    }
  }
  return counts;
}

describe("report renderers", () => {
  it("escapes markup in values", () => {
    assert.equal(escapeHtml(`<a href='x'>"&"</a>`), "&lt;a href=&#x27;x&#x27;&gt;&quot;&amp;&quot;&lt;/a&gt;");
    assert.equal(escapeHtml(null), "");
  });

  it("renders a no-data row for empty tables", () => {
    assert.equal(
      makeTable(["A", "B"], []),
      '<table><thead><tr><th>A</th><th>B</th></tr></thead><tbody><tr><td colspan="2"><i>No data</i></td></tr></tbody></table>'
    );
  });

  it("emits full-fidelity JSON in worst-first order", () => {
    const parsed: unknown = JSON.parse(renderJson(report));
    assert.deepEqual(parsed, {
      metadata,
      total: 3,
      counts: { failed: 1, warning: 0, stale: 1, ok: 1 },
      results: [
        { name: "<script>", severity: "failed", reason: 'Last result is Error: disk "full"', ruleId: "rule", attributes: { source: "<script>" } },
        { name: "weekly", severity: "stale", reason: "reason", ruleId: "rule", attributes: { source: "weekly" } },
        { name: "nightly", severity: "ok", reason: "reason", ruleId: "rule", attributes: { source: "nightly" } }
      ],
      sections: [{ id: "extra", title: "Extra & more", columns: ["Key", "Value"], rows: [["a", "<b>"]] }]
    });
  });

  it("renders HTML whose summary counts match the JSON counts", () => {
    const html = renderHtml(report);
    const json = JSON.parse(renderJson(report)) as { total: number; counts: Record<Severity, number> };

    const counts = htmlCounts(html);
    assert.equal(counts.total, json.total);
    for (const severity of SEVERITY_ORDER) {
      assert.equal(counts[severity], json.counts[severity]);
    }
  });

  it("renders severity headings worst-first with escaped content and no external assets", () => {
    const html = renderHtml(report);

    const headings = [...html.matchAll(/<h2 id="severity-(\w+)">/g)].map((match) => match[1]);
    assert.deepEqual(headings, ["failed", "warning", "stale", "ok"]);
    assert.ok(html.includes('<h2 id="severity-failed">Failed (1)</h2>'));
    assert.ok(html.includes("<td>&lt;script&gt;</td>"));
    assert.ok(html.includes("<td>Last result is Error: disk &quot;full&quot;</td>"));
    assert.ok(html.includes('<h2 id="section-extra">Extra &amp; more</h2>'));
    assert.ok(html.includes("<div><b>Ticket:</b> INC-7</div>"));
    assert.ok(html.includes("<div><b>Thresholds:</b> stale_after_days=3; fail_values=failed, error</div>"));
    assert.equal(html.includes("<script"), false);
    assert.equal(html.includes("<link"), false);
  });

  it("writes both files into the target directory", async () => {
    const dir = await scratchDir("opsreport-render-");
    const written = await writeReport(dir, report);

    assert.equal(written.jsonPath, join(dir, "report.json"));
    assert.equal(await readFile(written.jsonPath, "utf8"), renderJson(report));
    assert.equal(await readFile(written.htmlPath, "utf8"), renderHtml(report));
  });

  it("raises IOError when the directory is not writable", async () => {
    const dir = await scratchDir("opsreport-render-");
    await assert.rejects(writeReport(join(dir, "missing", "nested"), report), IOError);
  });
});
