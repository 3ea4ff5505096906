import { serve } from "@hono/node-server";
import { createRetrievalPipeline } from "@docqa/core";
import {
  closePool,
  errorContext,
  getPoolStatus,
  logger,
  parseEnvInt,
} from "@docqa/shared";
import { createApp } from "./app.js";

const log = logger.child({ service: "api" });

async function main(): Promise<void> {
  const pipeline = await createRetrievalPipeline();
  const app = createApp({
    retrieval: pipeline.orchestrator,
    passages: pipeline.index,
    circuitMetrics: () => pipeline.circuitMetrics(),
    poolStatus: getPoolStatus,
  });

  const port = parseEnvInt("PORT", 8787);
  const server = serve({ fetch: app.fetch, port }, (info) => {
    log.info("API listening", { port: info.port });
  });

  const shutdown = (signal: string) => {
    log.info("Shutting down", { signal });
    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error("Failed to close pool", errorContext(error));
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  log.error("API failed to start", errorContext(error));
  process.exit(1);
});
