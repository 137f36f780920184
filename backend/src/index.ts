import * as Sentry from "@sentry/node";
import { serve } from "@hono/node-server";
import { ConfigurationError, describeError } from "@incident-relay/shared";

import { createApp } from "./app.js";
import { loadPollerConfig, loadServiceConfig, loadWorkerConfig } from "./config.js";
import { loadProjectEnv, readEnv } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { ClassificationPoller } from "./services/classification-poller.js";
import { GenerationWorker } from "./services/generation-worker.js";
import { createOpenAiIncidentClassifier } from "./services/incident-classifier.js";
import { InMemoryPostStore, type PostStore } from "./services/post-store.js";
import { SupabasePostStore } from "./services/supabase-post-store.js";
import { createOpenAiTextGenerator } from "./services/text-generator.js";

loadProjectEnv();

const sentryDsn = readEnv("SENTRY_DSN");
if (sentryDsn) {
  Sentry.init({
    dsn: sentryDsn,
    environment: readEnv("NODE_ENV") ?? "development",
  });
}

const main = async (): Promise<void> => {
  const serviceConfig = loadServiceConfig();
  const workerConfig = loadWorkerConfig(readEnv, logger);
  const pollerConfig = loadPollerConfig();

  let store: PostStore | null = SupabasePostStore.fromEnv();
  if (!store) {
    logger.warn("[bootstrap] SUPABASE_URL not configured; using in-memory post store");
    store = new InMemoryPostStore();
  }

  const generator = createOpenAiTextGenerator({
    apiKey: serviceConfig.openAiApiKey,
    model: serviceConfig.generationModel,
    logger,
  });
  const classifier = createOpenAiIncidentClassifier({
    apiKey: serviceConfig.openAiApiKey,
    model: serviceConfig.classifierModel,
    logger,
  });

  const worker = new GenerationWorker({ store, generator, config: workerConfig, logger });
  const poller = new ClassificationPoller({ store, classifier, config: pollerConfig, logger });

  const app = createApp({
    store,
    worker,
    adminToken: serviceConfig.adminToken,
    exposeErrors: serviceConfig.nodeEnv === "development",
    logger,
  });

  worker.start();
  poller.start();

  const server = serve(
    {
      fetch: app.fetch,
      port: serviceConfig.port,
    },
    (info) => {
      logger.info(`[bootstrap] incident relay listening on http://localhost:${info.port}`);
    }
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info(`[bootstrap] ${signal} received; shutting down`);
    await Promise.allSettled([poller.stop(), worker.stop()]);
    server.close();
    await Sentry.flush(2_000);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error(`[bootstrap] shutdown failed: ${describeError(error)}`, error);
        process.exitCode = 1;
      });
    });
  }
};

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error(`[bootstrap] invalid configuration: ${error.message}`);
  } else {
    logger.error(`[bootstrap] startup failed: ${describeError(error)}`, error);
  }

  process.exitCode = 1;
});
