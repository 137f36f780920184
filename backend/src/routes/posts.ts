import { Hono } from "hono";

import type { PostStore } from "../services/post-store.js";
import { errorBody, parseLimit, toPostJson } from "./serializers.js";

type PostRoutesOptions = {
  store: PostStore;
};

type ReportRequestBody = {
  text?: unknown;
};

const MAX_REPORT_CHARS = 2_000;
const DEFAULT_FEED_LIMIT = 50;
const MAX_FEED_LIMIT = 200;

export const createPostRoutes = (options: PostRoutesOptions) => {
  const postRoutes = new Hono();
  const store = options.store;

  postRoutes.post("/reports", async (c) => {
    const body = (await c.req.json().catch(() => null)) as ReportRequestBody | null;
    if (!body) {
      return c.json(errorBody("INVALID_JSON", "Request body must be valid JSON"), 400);
    }

    const text = typeof body.text === "string" ? body.text.trim() : "";
    if (text.length === 0) {
      return c.json(errorBody("INVALID_REQUEST", "text is required"), 400);
    }

    if (text.length > MAX_REPORT_CHARS) {
      return c.json(
        errorBody("INVALID_REQUEST", `text must be at most ${MAX_REPORT_CHARS} characters`),
        400
      );
    }

    const post = await store.createPost({ text, isSynthetic: false });
    return c.json(toPostJson(post), 201);
  });

  postRoutes.get("/posts", async (c) => {
    const limit = parseLimit(c.req.query("limit"), DEFAULT_FEED_LIMIT, MAX_FEED_LIMIT);
    if (limit === null) {
      return c.json(errorBody("INVALID_REQUEST", "limit must be a positive integer"), 400);
    }

    const posts = await store.listRecentPosts(limit);
    return c.json({ posts: posts.map(toPostJson) }, 200);
  });

  postRoutes.get("/posts/latest_real", async (c) => {
    const post = await store.getLatestRealPost();
    if (!post) {
      return c.json(errorBody("NOT_FOUND", "No real post yet"), 404);
    }

    return c.json(toPostJson(post), 200);
  });

  postRoutes.get("/posts/:id{[0-9]+}", async (c) => {
    const id = Number(c.req.param("id"));
    const post = await store.getPostById(id);
    if (!post) {
      return c.json(errorBody("NOT_FOUND", `Post ${id} not found`), 404);
    }

    return c.json(toPostJson(post), 200);
  });

  return postRoutes;
};
