import { createConsoleLogger, InputNotFoundError, type Logger } from "@riskreg/register";

import type { ChartRasterizer } from "./chart-renderer";
import { runPipeline } from "./pipeline";
import { parseCliArgs, RunOptionsError, USAGE, type CliCommand } from "./run-options";

export type MainDeps = {
  logger?: Logger;
  rasterizer?: ChartRasterizer;
  printUsage?: (text: string) => void;
};

export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
  const logger = deps.logger ?? createConsoleLogger({ level: "info" });

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof RunOptionsError) {
      logger.error(error.message, { issues: error.issues });
      return 1;
    }
    throw error;
  }

  if (command.kind === "help") {
    (deps.printUsage ?? ((text: string) => process.stdout.write(text)))(USAGE);
    return 0;
  }

  try {
    await runPipeline(command.options, { logger, rasterizer: deps.rasterizer });
    return 0;
  } catch (error) {
    if (error instanceof InputNotFoundError) {
      return 1;
    }
    throw error;
  }
}
