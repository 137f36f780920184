import type { ConfirmedIncident, Post } from "@incident-relay/shared";

export type PostJson = {
  id: number;
  text: string;
  created_at: string;
  processed: boolean;
  is_simulated: boolean;
  persona: string | null;
  lang: string | null;
  seed_post_id: number | null;
  hashtags: string | null;
};

export type IncidentJson = {
  id: number;
  source_post_id: number;
  incident_type: string | null;
  summary: string | null;
  confidence: number;
  location_country: string | null;
  location_area: string | null;
  created_at: string;
};

export const toPostJson = (post: Post): PostJson => {
  return {
    id: post.id,
    text: post.text,
    created_at: post.createdAt,
    processed: post.processed,
    is_simulated: post.isSynthetic,
    persona: post.persona,
    lang: post.languageCode,
    seed_post_id: post.seedPostId,
    hashtags: post.hashtags,
  };
};

export const toIncidentJson = (incident: ConfirmedIncident): IncidentJson => {
  return {
    id: incident.id,
    source_post_id: incident.sourcePostId,
    incident_type: incident.incidentType,
    summary: incident.summary,
    confidence: incident.confidence,
    location_country: incident.country,
    location_area: incident.area,
    created_at: incident.createdAt,
  };
};

export const errorBody = (code: string, message: string) => {
  return {
    error: {
      code,
      message,
    },
  };
};

/** `?limit=` as a positive integer capped at `max`; null when malformed. */
export const parseLimit = (raw: string | undefined, fallback: number, max: number): number | null => {
  if (raw === undefined || raw.trim().length === 0) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    return null;
  }

  return Math.min(value, max);
};
