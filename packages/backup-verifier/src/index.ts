import { applyRunOverrides, parseToolArgs, runCli } from "@opsreport/reporting-engine";
import { createLogger, getEnv, loadRunConfig } from "@opsreport/shared";
import { TOOL_NAME, runBackupVerifier } from "./run.js";

const logger = createLogger(TOOL_NAME);

runCli(logger, async () => {
  const args = parseToolArgs(process.argv.slice(2));
  const run = applyRunOverrides(loadRunConfig(TOOL_NAME), args);

  return runBackupVerifier({
    inputPath: args.input ?? getEnv("BACKUP_INPUT_CSV"),
    thresholdsPath: args.thresholds ?? getEnv("BACKUP_THRESHOLDS", "./config/backup-thresholds.json"),
    run,
    logger
  });
});
