import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";

runCli(process.argv).catch((error: unknown) => {
  logger.fatal({ err: error }, "Command aborted with an unexpected error");
  process.exitCode = 1;
});
