import { Command, InvalidArgumentError } from "commander";

export type CliOptions = {
  config?: string;
  sessionId?: string;
  dataCenter?: string;
  checkInterval?: number;
  outputDir?: string;
  maxConcurrent?: number;
  verbose: boolean;
};

function positiveNumber(value: string) {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) throw new InvalidArgumentError("Must be a positive number.");
  return parsed;
}

function positiveInteger(value: string) {
  const parsed = positiveNumber(value);
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError("Must be a positive integer.");
  return parsed;
}

export function createProgram(version: string) {
  return new Command()
    .name("tiktok-live-monitor")
    .description("Watch TikTok accounts and record their live streams and audience events")
    .version(version)
    .option("-c, --config <file>", "Path to the account config file (default: streamers_config.json)")
    .option("-s, --session-id <id>", "Default sessionid cookie for accounts without their own")
    .option("-d, --data-center <idc>", "Default tt-target-idc routing hint, e.g. us-eastred")
    .option("-i, --check-interval <seconds>", "Seconds between liveness checks", positiveNumber)
    .option("-o, --output-dir <dir>", "Directory for recordings and session logs")
    .option("-m, --max-concurrent <count>", "Maximum concurrent recordings", positiveInteger)
    .option("-v, --verbose", "Enable debug logging", false)
    .exitOverride();
}

/** Parses `argv` in `process.argv` form. Throws `CommanderError` on bad input, --help and --version. */
export function parseCli(argv: string[], version = "0.0.0"): CliOptions {
  const program = createProgram(version);
  program.parse(argv);
  return program.opts<CliOptions>();
}
