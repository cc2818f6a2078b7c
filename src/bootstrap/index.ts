import "@/utils/env";

import { CommanderError } from "commander";
import logger, { setupLogger } from "@/logger";
import { parseCli } from "./cli";
import { resolveRuntimeOptions, type RuntimeOptions } from "./env";

/** Loads env files, parses the command line and configures logging. Exits on bad input. */
export default function bootstrap(argv: string[] = process.argv): RuntimeOptions {
  let options: RuntimeOptions;
  try {
    options = resolveRuntimeOptions(parseCli(argv, process.env.APP_VERSION));
  } catch (e) {
    if (e instanceof CommanderError) process.exit(e.exitCode);
    console.error("[Bootstrap]", e instanceof Error ? e.message : e);
    process.exit(1);
  }

  setupLogger({ logDir: options.logDir, verbose: options.verbose });
  logger.info("[Bootstrap]", `config: ${options.configFile}`);
  logger.info("[Bootstrap]", `control dir: ${options.controlDir}`);

  return options;
}
