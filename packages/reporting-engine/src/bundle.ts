import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import archiver from "archiver";
import { IOError, errorMessage } from "@opsreport/shared";
import { formatRunStamp } from "./timestamps.js";

export function slugify(value: string): string {
  return value
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function runDirectoryName(tool: string, ticket: string | undefined, now: Date): string {
  const ticketSlug = ticket ? slugify(ticket) : "";
  return [tool, ticketSlug, formatRunStamp(now)].filter((part) => part.length > 0).join("_");
}

export async function createRunDirectory(root: string, tool: string, ticket: string | undefined, now: Date): Promise<string> {
  const dir = join(root, runDirectoryName(tool, ticket, now));
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new IOError(`Cannot create output directory ${dir}: ${errorMessage(error)}`, { cause: error });
  }
  return dir;
}

// Closes the output stream and removes the file only when this run opened it.
async function discardPartialArchive(output: WriteStream, target: string, opened: () => boolean): Promise<void> {
  if (!output.closed) {
    await new Promise<void>((resolve) => {
      output.once("close", () => resolve());
      output.destroy();
    });
  }
  if (opened()) {
    await rm(target, { force: true });
  }
}

/** Zips the directory contents into a sibling `<dir>.zip` and returns its path. */
export async function archiveDirectory(dir: string): Promise<string> {
  const target = `${dir}.zip`;
  const output = createWriteStream(target);
  const archive = archiver("zip", { zlib: { level: 9 } });
  let opened = false;
  output.once("open", () => {
    opened = true;
  });

  try {
    await new Promise<void>((resolve, reject) => {
      output.on("close", () => resolve());
      output.on("error", reject);
      archive.on("warning", reject);
      archive.on("error", reject);

      archive.pipe(output);
      archive.directory(dir, false);
      archive.finalize().catch(reject);
    });
  } catch (error) {
    archive.unpipe(output);
    archive.abort();
    await discardPartialArchive(output, target, () => opened);
    throw new IOError(`Cannot archive ${dir}: ${errorMessage(error)}`, { cause: error });
  }
  return target;
}
