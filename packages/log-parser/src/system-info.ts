import { readFile } from "node:fs/promises";
import { z } from "zod";
import { InputError, describeIssues, errorMessage, stripBom } from "@opsreport/shared";

export const systemInfoSchema = z
  .object({
    Hostname: z.string().nullish(),
    OS: z.string().nullish(),
    BootTime: z.string().nullish()
  })
  .passthrough();

export type SystemInfo = z.infer<typeof systemInfoSchema>;

/** Missing file yields an empty record; a present but broken one is an InputError. */
export async function readSystemInfo(path: string): Promise<SystemInfo> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw new InputError(`Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stripBom(text));
  } catch (error) {
    throw new InputError(`${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = systemInfoSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(`${path} has an unexpected shape: ${describeIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}
