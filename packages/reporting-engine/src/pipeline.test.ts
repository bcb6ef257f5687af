import assert from "node:assert/strict";
import { access, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, it } from "node:test";
import { createLogger, type LogEvent, type RunConfig } from "@opsreport/shared";
import { okRule, textAttribute, type Rule } from "./classifier.js";
import { runPipeline } from "./pipeline.js";

const scratchDirs: string[] = [];

async function scratchDir(prefix: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  scratchDirs.push(dir);
  return dir;
}

after(async () => {
  await Promise.all(scratchDirs.map((dir) => rm(dir, { recursive: true, force: true })));
});

type Limits = { label: string };

const rules: Rule<Limits>[] = [
  {
    id: "down",
    severity: "failed",
    match: (entity) => (textAttribute(entity, "state") === "down" ? "is down" : undefined)
  },
  okRule("is up")
];

async function runConfig(overrides: Partial<RunConfig> = {}): Promise<RunConfig> {
  const root = await scratchDir("opsreport-pipeline-");
  return { tool: "test-tool", outputRoot: root, host: "host-a", archive: false, ...overrides };
}

describe("pipeline", () => {
  it("classifies, writes and summarizes one run", async () => {
    const events: LogEvent[] = [];
    const run = await runConfig({ ticket: "INC-1", archive: true });
    run.metricsFile = join(run.outputRoot, "opsreport.prom");

    const summary = await runPipeline({
      title: "Test Report",
      entities: [
        { name: "a", attributes: { state: "up" } },
        { name: "b", attributes: { state: "down" } }
      ],
      rules,
      thresholds: { label: "x" },
      run,
      logger: createLogger("test-tool", { level: "debug", sink: (event) => events.push(event) }),
      now: new Date("2026-01-20T09:05:03Z"),
      buildSections: (results) => [
        { id: "names", title: "Names", columns: ["Name"], rows: results.map((result) => [result.name]) }
      ]
    });

    assert.equal(summary.outputDir, join(run.outputRoot, "test-tool_INC-1_20260120-090503"));
    assert.equal(summary.archivePath, `${summary.outputDir}.zip`);
    assert.equal(summary.total, 2);
    assert.deepEqual(summary.counts, { failed: 1, warning: 0, stale: 0, ok: 1 });

    const json = JSON.parse(await readFile(join(summary.outputDir, "report.json"), "utf8")) as {
      metadata: { generatedAt: string; ticket: string };
      sections: Array<{ rows: string[][] }>;
    };
    assert.equal(json.metadata.generatedAt, "2026-01-20T09:05:03.000Z");
    assert.equal(json.metadata.ticket, "INC-1");
    assert.deepEqual(json.sections[0]?.rows, [["a"], ["b"]]);

    await access(join(summary.outputDir, "report.html"));
    assert.match(await readFile(run.metricsFile, "utf8"), /opsreport_entities_classified_total\{tool="test-tool",severity="failed"\} 1/);

    assert.deepEqual(
      events.map((event) => event.message),
      ["entity flagged", "report written", "report archived"]
    );
  });

  it("skips archiving when disabled", async () => {
    const summary = await runPipeline({
      title: "Test Report",
      entities: [],
      rules,
      thresholds: { label: "x" },
      run: await runConfig(),
      logger: createLogger("test-tool", { sink: () => undefined })
    });

    assert.equal(summary.archivePath, undefined);
    assert.equal(summary.total, 0);
  });
});
