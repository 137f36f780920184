import * as Sentry from "@sentry/node";
import { Hono } from "hono";
import { StoreFailureError } from "@incident-relay/shared";

import type { ServiceLogger } from "./lib/logger.js";
import { createAdminTokenMiddleware } from "./middleware/admin-token.js";
import { createIncidentRoutes } from "./routes/incidents.js";
import { createPostRoutes } from "./routes/posts.js";
import { errorBody } from "./routes/serializers.js";
import { createSimulateRoutes } from "./routes/simulate.js";
import type { GenerationWorker } from "./services/generation-worker.js";
import type { PostStore } from "./services/post-store.js";

export type AppDependencies = {
  store: PostStore;
  worker: Pick<GenerationWorker, "enqueue">;
  adminToken?: string | null;
  /** Include error messages in 500 responses. */
  exposeErrors?: boolean;
  logger?: ServiceLogger;
};

export const createApp = (deps: AppDependencies) => {
  const app = new Hono();
  const logger = deps.logger ?? console;

  app.get("/health", (c) => c.json({ status: "ok" }, 200));

  app.use("/api/simulate/*", createAdminTokenMiddleware(deps.adminToken ?? null));

  app.route("/api", createPostRoutes({ store: deps.store }));
  app.route("/api/simulate", createSimulateRoutes({ store: deps.store, worker: deps.worker }));
  app.route("/api/incidents", createIncidentRoutes({ store: deps.store }));

  app.notFound((c) => {
    return c.json(errorBody("NOT_FOUND", "Route not found"), 404);
  });

  app.onError((error, c) => {
    if (error instanceof StoreFailureError) {
      logger.error(`[http] ${c.req.method} ${c.req.path} store failure: ${error.message}`, error);
      return c.json(errorBody(error.code, "Post store is unavailable"), 503);
    }

    Sentry.captureException(error);
    logger.error(`[http] ${c.req.method} ${c.req.path} failed: ${error.message}`);

    const message = deps.exposeErrors ? error.message : "Unexpected server error";
    return c.json(errorBody("INTERNAL_SERVER_ERROR", message), 500);
  });

  return app;
};
