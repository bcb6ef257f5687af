import { applyRunOverrides, parseToolArgs, runCli } from "@opsreport/reporting-engine";
import { createLogger, getEnv, loadRunConfig } from "@opsreport/shared";
import { TOOL_NAME, runEndpointHealth } from "./run.js";

const logger = createLogger(TOOL_NAME);

runCli(logger, async () => {
  const args = parseToolArgs(process.argv.slice(2));
  const run = applyRunOverrides(loadRunConfig(TOOL_NAME), args);

  return runEndpointHealth({
    inputDir: args.input ?? getEnv("ENDPOINT_INPUT_DIR"),
    thresholdsPath: args.thresholds ?? getEnv("ENDPOINT_THRESHOLDS", "./config/endpoint-thresholds.json"),
    run,
    logger
  });
});
