import { Hono } from "hono";
import { QueueClosedError, QueueFullError, SeedNotFoundError } from "@incident-relay/shared";

import type { GenerationWorker } from "../services/generation-worker.js";
import type { PostStore } from "../services/post-store.js";
import { errorBody } from "./serializers.js";

type SimulateRoutesOptions = {
  store: Pick<PostStore, "getLatestRealPost">;
  worker: Pick<GenerationWorker, "enqueue">;
};

type BurstRequestBody = {
  seed_post_id?: unknown;
};

const isPositiveInteger = (value: unknown): value is number => {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
};

export const createSimulateRoutes = (options: SimulateRoutesOptions) => {
  const simulateRoutes = new Hono();

  simulateRoutes.post("/burst", async (c) => {
    const body = (await c.req.json().catch(() => null)) as BurstRequestBody | null;
    if (!body) {
      return c.json(errorBody("INVALID_JSON", "Request body must be valid JSON"), 400);
    }

    let seedPostId: number;
    if (body.seed_post_id === "latest") {
      const latest = await options.store.getLatestRealPost();
      if (!latest) {
        const notFound = new SeedNotFoundError("latest");
        return c.json(errorBody(notFound.code, notFound.message), 404);
      }

      seedPostId = latest.id;
    } else if (isPositiveInteger(body.seed_post_id)) {
      seedPostId = body.seed_post_id;
    } else {
      return c.json(
        errorBody("INVALID_REQUEST", 'seed_post_id must be a positive integer or "latest"'),
        400
      );
    }

    try {
      options.worker.enqueue(seedPostId);
    } catch (error) {
      if (error instanceof QueueClosedError || error instanceof QueueFullError) {
        return c.json(errorBody(error.code, error.message), 503);
      }

      throw error;
    }

    return c.json({ status: "accepted", seed_post_id: seedPostId }, 202);
  });

  return simulateRoutes;
};
