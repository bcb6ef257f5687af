import { applyRunOverrides, parseToolArgs, runCli } from "@opsreport/reporting-engine";
import { ConfigurationError, createLogger, getEnv, getNumberEnv, getOptionalEnv, loadRunConfig } from "@opsreport/shared";
import { TOOL_NAME, runLogParser } from "./run.js";

const logger = createLogger(TOOL_NAME);

runCli(logger, async () => {
  const args = parseToolArgs(process.argv.slice(2), ["minutes"]);
  const run = applyRunOverrides(loadRunConfig(TOOL_NAME), args);

  const rawMinutes = args.extras.minutes;
  const windowMinutes = rawMinutes === undefined ? getNumberEnv("LOG_WINDOW_MINUTES", 60) : Number(rawMinutes);
  if (!Number.isInteger(windowMinutes) || windowMinutes <= 0) {
    throw new ConfigurationError(`--minutes must be a positive integer: ${rawMinutes ?? windowMinutes}`);
  }

  return runLogParser({
    inputDir: args.input ?? getEnv("LOG_INPUT_DIR"),
    thresholdsPath: args.thresholds ?? getOptionalEnv("LOG_THRESHOLDS"),
    windowMinutes,
    run,
    logger
  });
});
