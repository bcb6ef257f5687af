import { parseArgs, type ParseArgsConfig } from "node:util";
import {
  ConfigurationError,
  ReportingError,
  errorMessage,
  exitCodeFor,
  type Logger,
  type RunConfig,
  type RunSummary
} from "@opsreport/shared";

export interface ToolArgs {
  input?: string;
  thresholds?: string;
  outdir?: string;
  ticket?: string;
  noArchive: boolean;
  extras: Record<string, string | undefined>;
}

function stringValue(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

/** Parses the flags every tool shares, plus any tool-specific string flags named in `extraOptions`. */
export function parseToolArgs(argv: string[], extraOptions: readonly string[] = []): ToolArgs {
  const options: NonNullable<ParseArgsConfig["options"]> = {
    input: { type: "string" },
    thresholds: { type: "string" },
    outdir: { type: "string" },
    ticket: { type: "string" },
    "no-archive": { type: "boolean" }
  };
  for (const name of extraOptions) {
    options[name] = { type: "string" };
  }

  let values: Record<string, unknown>;
  try {
    values = parseArgs({ args: argv, options, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw new ConfigurationError(`Invalid command line: ${errorMessage(error)}`, { cause: error });
  }

  return {
    input: stringValue(values.input),
    thresholds: stringValue(values.thresholds),
    outdir: stringValue(values.outdir),
    ticket: stringValue(values.ticket),
    noArchive: values["no-archive"] === true,
    extras: Object.fromEntries(extraOptions.map((name) => [name, stringValue(values[name])]))
  };
}

export interface RunOverrides {
  outdir?: string;
  ticket?: string;
  noArchive?: boolean;
}

export function applyRunOverrides(config: RunConfig, overrides: RunOverrides): RunConfig {
  return {
    ...config,
    outputRoot: overrides.outdir ?? config.outputRoot,
    ticket: overrides.ticket ?? config.ticket,
    archive: overrides.noArchive ? false : config.archive
  };
}

export function runCli(logger: Logger, main: () => Promise<RunSummary>): void {
  main()
    .then((summary) => {
      logger.info("run complete", {
        outputDir: summary.outputDir,
        archive: summary.archivePath,
        total: summary.total,
        counts: summary.counts
      });
    })
    .catch((error: unknown) => {
      logger.error("run failed", {
        error: errorMessage(error),
        code: error instanceof ReportingError ? error.code : "UNEXPECTED"
      });
      process.exitCode = exitCodeFor(error);
    });
}
