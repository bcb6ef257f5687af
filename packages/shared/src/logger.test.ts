import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createLogger, resolveLogLevel, type LogEvent } from "./logger.js";

describe("logger", () => {
  it("writes structured events with tool and fields", () => {
    const events: LogEvent[] = [];
    const logger = createLogger("backup-verifier", { level: "info", sink: (event) => events.push(event) });

    logger.info("report written", { total: 3 });

    assert.equal(events.length, 1);
    assert.equal(events[0]?.level, "info");
    assert.equal(events[0]?.message, "report written");
    assert.equal(events[0]?.tool, "backup-verifier");
    assert.equal(events[0]?.total, 3);
    assert.equal(typeof events[0]?.ts, "string");
  });

  it("drops events below the configured level", () => {
    const events: LogEvent[] = [];
    const logger = createLogger("log-parser", { level: "warn", sink: (event) => events.push(event) });

    logger.debug("ignored");
    logger.info("ignored");
    logger.warn("kept");
    logger.error("kept too");

    assert.deepEqual(
      events.map((event) => event.level),
      ["warn", "error"]
    );
  });

  it("resolves unknown levels to info", () => {
    assert.equal(resolveLogLevel(undefined), "info");
    assert.equal(resolveLogLevel("verbose"), "info");
    assert.equal(resolveLogLevel(" DEBUG "), "debug");
  });
});
