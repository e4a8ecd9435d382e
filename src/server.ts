import { createApp } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { OrchestratorMetrics } from "./metrics";
import { Orchestrator } from "./orchestrator";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({
    name: "genomic-orchestrator",
    level: config.logLevel,
  });

  const shutdown = new AbortController();
  const orchestrator = new Orchestrator(config, {
    logger,
    metrics: new OrchestratorMetrics({ defaultMetrics: true }),
  });
  await orchestrator.start(shutdown.signal);

  const app = createApp(orchestrator, { shutdown: shutdown.signal });
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, "server ready");
  });

  // In-flight units are aborted as a group; nothing is rolled back.
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    shutdown.abort();
    orchestrator.stop();
    server.close((err) => {
      if (err) logger.error({ err }, "error while closing server");
      process.exit(err ? 1 : 0);
    });
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

main().catch((err) => {
  console.error("Fatal server error:", err);
  process.exit(1);
});
