import "dotenv/config";
import { serve } from "@hono/node-server";
import { assertServiceCredentials, loadConfig } from "./config.js";
import { createApp } from "./server.js";
import { getArgValue } from "./utils/args.js";
import { createCollaborators, createPipeline } from "./services.js";
import { logger } from "./utils/logger.js";

function main(): void {
  const config = loadConfig(getArgValue(process.argv, "--config"));
  assertServiceCredentials(config);

  const pipeline = createPipeline(config, createCollaborators(config));
  const app = createApp({ pipeline, server: config.server });

  serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
    logger.info("VulnGuide listening", { host: config.server.host, port: info.port });
  });
}

try {
  main();
} catch (err: unknown) {
  logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
}
