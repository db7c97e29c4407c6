import "dotenv/config";
import {
  createKnowledgeStoreProvider,
  createResponder,
  errorMessage,
  loadConfig,
  loadKnowledgeStore,
  logger,
} from "@faqbot/core";
import { makeGeminiGenerator } from "@faqbot/adapter-gemini";
import { createApp } from "./app.js";
import { listen } from "./listen.js";

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;

  const store = createKnowledgeStoreProvider(() => loadKnowledgeStore(config.knowledgeFile));
  // Warm the store before accepting traffic. A failed load is retried per
  // request and answered with 503 until the file is fixed.
  await store.get().catch((err: unknown) => {
    logger.error(`Knowledge base unavailable at startup: ${errorMessage(err)}`);
  });

  const responder = createResponder({
    store,
    generator: makeGeminiGenerator(config.generator),
    minScore: config.minScore,
  });
  const app = createApp(responder, { corsOrigins: config.corsOrigins });

  const server = await listen(app, config.port);
  logger.info(`faqbot listening on :${config.port}`);
  server.on("error", (err) => {
    logger.error(`HTTP server error: ${errorMessage(err)}`);
    process.exit(1);
  });
}

main().catch((e: unknown) => {
  logger.error(`Startup failed: ${errorMessage(e)}`);
  process.exit(1);
});
