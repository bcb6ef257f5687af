import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { ConfigurationError, type RunConfig } from "@opsreport/shared";
import { applyRunOverrides, parseToolArgs } from "./cli.js";

const base: RunConfig = { tool: "log-parser", outputRoot: "./reports", host: "host-a", archive: true };

describe("cli", () => {
  it("parses shared and tool-specific flags", () => {
    const args = parseToolArgs(["--input", "in", "--thresholds", "t.json", "--no-archive", "--minutes", "30"], ["minutes"]);

    assert.deepEqual(args, {
      input: "in",
      thresholds: "t.json",
      outdir: undefined,
      ticket: undefined,
      noArchive: true,
      extras: { minutes: "30" }
    });
  });

  it("rejects unknown flags as configuration errors", () => {
    assert.throws(() => parseToolArgs(["--minutes", "30"]), ConfigurationError);
  });

  it("lets flags override environment run config", () => {
    assert.deepEqual(applyRunOverrides(base, { outdir: "/tmp/r", ticket: "INC-9", noArchive: true }), {
      tool: "log-parser",
      outputRoot: "/tmp/r",
      host: "host-a",
      ticket: "INC-9",
      archive: false
    });
    assert.deepEqual(applyRunOverrides(base, {}), { ...base, ticket: undefined });
  });
});
