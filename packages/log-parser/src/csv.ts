import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { InputError, errorMessage } from "@opsreport/shared";

const recordsSchema = z.array(z.record(z.string(), z.string()));

export type CsvRecord = Record<string, string>;

export function parseCsvRecords(text: string, source: string): CsvRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      columns: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true
    });
  } catch (error) {
    throw new InputError(`Cannot parse ${source}: ${errorMessage(error)}`, { cause: error });
  }
  return recordsSchema.parse(parsed);
}

export async function readCsvRecords(path: string, options: { optional?: boolean } = {}): Promise<CsvRecord[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (options.optional && error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw new InputError(`Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseCsvRecords(text, path);
}
