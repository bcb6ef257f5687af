import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, it } from "node:test";
import { InputError } from "@opsreport/shared";
import { parseJobsCsv, readJobs } from "./jobs.js";

const scratchDirs: string[] = [];

async function scratchDir(prefix: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  scratchDirs.push(dir);
  return dir;
}

after(async () => {
  await Promise.all(scratchDirs.map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("jobs CSV adapter", () => {
  it("reads rows into entity records, tolerating a BOM, quotes and short rows", () => {
    const csv = [
      "\uFEFFjob_name,last_run,last_result,last_success,duration_minutes,notes",
      'Nightly SQL,2026-01-20T01:00:00Z,Success,2026-01-20T01:30:00Z,30,"ok, verified"',
      "File Server,2026-01-19T01:00:00Z,Failed,,12",
      ""
    ].join("\n");

    const jobs = parseJobsCsv(csv);

    assert.deepEqual(jobs, [
      {
        name: "Nightly SQL",
        attributes: {
          row: 2,
          job_name: "Nightly SQL",
          last_run: "2026-01-20T01:00:00Z",
          last_result: "Success",
          last_success: "2026-01-20T01:30:00Z",
          duration_minutes: "30",
          notes: "ok, verified"
        }
      },
      {
        name: "File Server",
        attributes: {
          row: 3,
          job_name: "File Server",
          last_run: "2026-01-19T01:00:00Z",
          last_result: "Failed",
          last_success: "",
          duration_minutes: "12",
          notes: ""
        }
      }
    ]);
  });

  it("matches header names case-insensitively and names blank jobs by row", () => {
    const jobs = parseJobsCsv("JOB_NAME,Last_Result,LAST_SUCCESS\n,Success,2026-01-20\n");

    assert.equal(jobs.length, 1);
    assert.equal(jobs[0]?.name, "(unnamed job, row 2)");
    assert.equal(jobs[0]?.attributes.last_run, "");
    assert.equal(jobs[0]?.attributes.last_success, "2026-01-20");
  });

  it("keeps rows with a bare quote inside an unquoted field", () => {
    const csv = [
      "job_name,last_run,last_result,last_success,duration_minutes,notes",
      "Nightly SQL,2026-01-20T01:00:00Z,Success,2026-01-20T01:30:00Z,30,",
      'File Server,2026-01-19T01:00:00Z,Failed,2026-01-18T01:00:00Z,12,Share "D" offline',
      "Exchange,2026-01-20T02:00:00Z,Success,2026-01-20T02:10:00Z,10,"
    ].join("\n");

    const jobs = parseJobsCsv(csv);

    assert.deepEqual(
      jobs.map((job) => job.name),
      ["Nightly SQL", "File Server", "Exchange"]
    );
    assert.equal(jobs[1]?.attributes.notes, 'Share "D" offline');
    assert.equal(jobs[2]?.attributes.row, 4);
  });

  it("rejects files without the required columns", () => {
    assert.throws(
      () => parseJobsCsv("name,status\nx,ok\n"),
      (error: unknown) => {
        assert.ok(error instanceof InputError);
        assert.equal(error.message, "jobs CSV is missing column(s): job_name, last_result, last_success");
        return true;
      }
    );
  });

  it("rejects empty files", () => {
    assert.throws(() => parseJobsCsv(""), /jobs CSV is empty/);
  });

  it("raises InputError for a missing file", async () => {
    const dir = await scratchDir("opsreport-jobs-");
    await assert.rejects(readJobs(join(dir, "absent.csv")), InputError);
  });
});
