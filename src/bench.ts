#!/usr/bin/env node
import "dotenv/config";
import { assertServiceCredentials, loadConfig } from "./config.js";
import { COMMANDS } from "./harness/index.js";
import { createCollaborators, createPipeline } from "./services.js";
import { getArgValue } from "./utils/args.js";
import { logger } from "./utils/logger.js";

const USAGE = `Usage: bench <load|evaluate|summary> [options]

  load       --users N --queries FILE --output DIR
  evaluate   --iterations N --cooldown MS --queries FILE --output DIR
  summary    --kind load|evaluate --output DIR

  --config PATH   config file (default: vulnguide.config.json)
  --json          print the analysis as JSON`;

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const command = argv[0] ? COMMANDS.get(argv[0]) : undefined;
  if (!command) {
    process.stderr.write(USAGE + "\n");
    return 2;
  }

  const config = loadConfig(getArgValue(argv, "--config"));

  return command(argv, {
    config,
    pipeline: () => {
      assertServiceCredentials(config);
      return createPipeline(config, createCollaborators(config));
    },
    print: (line) => process.stdout.write(line + "\n"),
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
