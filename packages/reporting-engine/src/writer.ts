import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { IOError, errorMessage, type Report } from "@opsreport/shared";
import { renderHtml } from "./render-html.js";
import { renderJson } from "./render-json.js";

export interface WrittenReport {
  jsonPath: string;
  htmlPath: string;
}

async function writeOutput(path: string, body: string): Promise<void> {
  try {
    await writeFile(path, body, "utf8");
  } catch (error) {
    throw new IOError(`Cannot write ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

export async function writeReport(dir: string, report: Report): Promise<WrittenReport> {
  const jsonPath = join(dir, "report.json");
  const htmlPath = join(dir, "report.html");
  await writeOutput(jsonPath, renderJson(report));
  await writeOutput(htmlPath, renderHtml(report));
  return { jsonPath, htmlPath };
}
