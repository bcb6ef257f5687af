import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, it } from "node:test";
import { InputError, createLogger, type RunConfig } from "@opsreport/shared";
import { runLogParser } from "./run.js";

const scratchDirs: string[] = [];

async function scratchDir(prefix: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  scratchDirs.push(dir);
  return dir;
}

after(async () => {
  await Promise.all(scratchDirs.map((dir) => rm(dir, { recursive: true, force: true })));
});

const logger = createLogger("log-parser", { sink: () => undefined });
const now = new Date("2026-01-20T12:00:00Z");

async function collectorOutput(withSystemInfo = true): Promise<{ inputDir: string; run: RunConfig }> {
  const inputDir = await scratchDir("opsreport-logs-");
  if (withSystemInfo) {
    await writeFile(
      join(inputDir, "system_info.json"),
      JSON.stringify({ Hostname: "WS-042", OS: "Windows Server 2022", BootTime: "2026-01-19T06:00:00" }),
      "utf8"
    );
  }
  await writeFile(
    join(inputDir, "perf_summary.csv"),
    [
      "Counter,Avg,Max,Samples",
      "\\\\WS-042\\Processor(_Total)\\% Processor Time,12.5,30,60",
      "\\\\WS-042\\Memory\\Available MBytes,300,700,60",
      "\\\\WS-042\\Memory\\% Committed Bytes In Use,broken,80,60"
    ].join("\n"),
    "utf8"
  );
  await writeFile(
    join(inputDir, "events_system.csv"),
    ["TimeCreated,LevelDisplayName,ProviderName,EventID,Message", "2026-01-20T09:00:00,Error,Disk,7,Bad block"].join("\n"),
    "utf8"
  );
  return {
    inputDir,
    run: { tool: "log-parser", outputRoot: join(inputDir, "reports"), host: "runner", archive: false }
  };
}

describe("log parser run", () => {
  it("classifies every counter and summarizes events", async () => {
    const { inputDir, run } = await collectorOutput();
    const thresholdsPath = join(inputDir, "thresholds.json");
    await writeFile(thresholdsPath, JSON.stringify({ counters: { "\\Processor(_Total)\\% Processor Time": { warn: 10, alert: 95 } } }), "utf8");

    const summary = await runLogParser({ inputDir, thresholdsPath, windowMinutes: 30, run, logger, now });

    assert.equal(summary.total, 3);
    assert.deepEqual(summary.counts, { failed: 2, warning: 1, stale: 0, ok: 0 });

    const report = JSON.parse(await readFile(join(summary.outputDir, "report.json"), "utf8")) as {
      metadata: { host: string; notes: string[] };
      results: Array<{ name: string; severity: string; reason: string }>;
      sections: Array<{ id: string; rows: string[][] }>;
    };
    assert.equal(report.metadata.host, "WS-042");
    assert.deepEqual(report.metadata.notes, ["OS: Windows Server 2022", "Boot Time: 2026-01-19T06:00:00", "Window: Last 30 minutes"]);
    assert.deepEqual(
      report.results.map((result) => [result.name, result.severity, result.reason]),
      [
        ["Memory Available MB", "failed", "Low Memory Available MB (avg=300.0, max=700.0)"],
        ["Memory % Committed Bytes In Use", "failed", 'Avg is not a number: "broken"'],
        ["CPU % Processor Time (Total)", "warning", "Elevated usage (avg=12.5, max=30.0)"]
      ]
    );
    assert.deepEqual(
      report.sections.map((section) => section.id),
      ["performance", "event-summary", "newest-system", "newest-application"]
    );
    assert.deepEqual(report.sections[0]?.rows[0], ["CPU % Processor Time (Total)", "12.500", "30.000", "60", "Warning", "Elevated usage (avg=12.5, max=30.0)"]);
    assert.deepEqual(report.sections[1]?.rows, [
      ["System", "0", "1", "0", "0", "0", "1"],
      ["Application", "0", "0", "0", "0", "0", "0"]
    ]);
  });

  it("runs without a thresholds file or system info", async () => {
    const { inputDir, run } = await collectorOutput(false);

    const summary = await runLogParser({ inputDir, windowMinutes: 60, run, logger, now });

    assert.deepEqual(summary.counts, { failed: 2, warning: 0, stale: 0, ok: 1 });
    const html = await readFile(join(summary.outputDir, "report.html"), "utf8");
    assert.ok(html.includes("<title>Log Report - runner</title>"));
    assert.ok(html.includes("<div>OS: Unknown</div>"));
  });

  it("aborts with InputError when the performance summary is missing", async () => {
    const inputDir = await scratchDir("opsreport-logs-");
    await assert.rejects(
      runLogParser({
        inputDir,
        windowMinutes: 60,
        run: { tool: "log-parser", outputRoot: inputDir, host: "runner", archive: false },
        logger,
        now
      }),
      InputError
    );
  });
});
