import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { InputError, errorMessage, type EntityRecord } from "@opsreport/shared";

export const JOB_COLUMNS = ["job_name", "last_run", "last_result", "last_success", "duration_minutes", "notes"] as const;

const REQUIRED_COLUMNS = ["job_name", "last_result", "last_success"];

const csvRowsSchema = z.array(z.array(z.string()));

export function parseJobsCsv(text: string, source = "jobs CSV"): EntityRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(text, { bom: true, trim: true, skip_empty_lines: true, relax_column_count: true, relax_quotes: true });
  } catch (error) {
    throw new InputError(`Cannot parse ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const rows = csvRowsSchema.parse(parsed);
  const [header, ...body] = rows;
  if (!header) {
    throw new InputError(`${source} is empty`);
  }

  const columns = header.map((column) => column.toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new InputError(`${source} is missing column(s): ${missing.join(", ")}`);
  }

  return body.map((cells, index) => {
    const attributes: Record<string, string | number> = { row: index + 2 };
    for (const column of JOB_COLUMNS) {
      const position = columns.indexOf(column);
      attributes[column] = position >= 0 ? (cells[position] ?? "") : "";
    }
    const name = String(attributes.job_name);
    return { name: name !== "" ? name : `(unnamed job, row ${index + 2})`, attributes };
  });
}

export async function readJobs(path: string): Promise<EntityRecord[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new InputError(`Cannot read jobs CSV ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseJobsCsv(text, `jobs CSV ${path}`);
}
