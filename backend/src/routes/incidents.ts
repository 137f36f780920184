import { Hono } from "hono";

import type { PostStore } from "../services/post-store.js";
import { errorBody, parseLimit, toIncidentJson } from "./serializers.js";

type IncidentRoutesOptions = {
  store: Pick<PostStore, "listRecentIncidents">;
};

const DEFAULT_INCIDENT_LIMIT = 20;
const MAX_INCIDENT_LIMIT = 100;

export const createIncidentRoutes = (options: IncidentRoutesOptions) => {
  const incidentRoutes = new Hono();

  incidentRoutes.get("/", async (c) => {
    const limit = parseLimit(c.req.query("limit"), DEFAULT_INCIDENT_LIMIT, MAX_INCIDENT_LIMIT);
    if (limit === null) {
      return c.json(errorBody("INVALID_REQUEST", "limit must be a positive integer"), 400);
    }

    const incidents = await options.store.listRecentIncidents(limit);
    return c.json({ incidents: incidents.map(toIncidentJson) }, 200);
  });

  return incidentRoutes;
};
