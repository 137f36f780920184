import type { MiddlewareHandler } from "hono";
import { timingSafeEqual } from "node:crypto";

const unauthorizedResponse = {
  error: {
    code: "UNAUTHORIZED",
    message: "Missing or invalid admin token",
  },
};

const tokensMatch = (received: string, expected: string): boolean => {
  const receivedBuffer = Buffer.from(received, "utf8");
  const expectedBuffer = Buffer.from(expected, "utf8");
  if (receivedBuffer.length !== expectedBuffer.length) {
    return false;
  }

  return timingSafeEqual(receivedBuffer, expectedBuffer);
};

/** Requires `X-Admin-Token` when a token is configured; open otherwise. */
export const createAdminTokenMiddleware = (expectedToken: string | null): MiddlewareHandler => {
  return async (c, next) => {
    if (!expectedToken) {
      await next();
      return;
    }

    const received = c.req.header("x-admin-token");
    if (typeof received !== "string" || !tokensMatch(received, expectedToken)) {
      return c.json(unauthorizedResponse, 401);
    }

    await next();
  };
};
