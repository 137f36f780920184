import {
  StoreFailureError,
  type ConfirmedIncident,
  type NewConfirmedIncident,
  type NewPost,
  type Post,
} from "@incident-relay/shared";

import { readEnv } from "../lib/env.js";
import type { PostStore } from "./post-store.js";

type SupabasePostRow = {
  id: number;
  text: string;
  created_at: string;
  processed: boolean | null;
  is_simulated: boolean | null;
  persona: string | null;
  lang: string | null;
  seed_post_id: number | null;
  hashtags: string | null;
};

type SupabaseIncidentRow = {
  id: number;
  source_post_id: number;
  incident_type: string | null;
  summary: string | null;
  confidence: number;
  location_country: string | null;
  location_area: string | null;
  created_at: string;
};

const POSTS_TABLE = "user_posts";
const INCIDENTS_TABLE = "confirmed_incidents";
const POST_COLUMNS = "id,text,created_at,processed,is_simulated,persona,lang,seed_post_id,hashtags";
const INCIDENT_COLUMNS =
  "id,source_post_id,incident_type,summary,confidence,location_country,location_area,created_at";

const toPost = (row: SupabasePostRow): Post => {
  return {
    id: row.id,
    text: row.text,
    createdAt: row.created_at,
    processed: row.processed === true,
    isSynthetic: row.is_simulated === true,
    persona: row.persona,
    languageCode: row.lang,
    seedPostId: row.seed_post_id,
    hashtags: row.hashtags,
  };
};

const toPostPayload = (post: NewPost) => {
  return {
    text: post.text,
    is_simulated: post.isSynthetic,
    persona: post.persona ?? null,
    lang: post.languageCode ?? null,
    seed_post_id: post.seedPostId ?? null,
    hashtags: post.hashtags ?? null,
  };
};

const toIncident = (row: SupabaseIncidentRow): ConfirmedIncident => {
  return {
    id: row.id,
    sourcePostId: row.source_post_id,
    incidentType: row.incident_type,
    confidence: row.confidence,
    country: row.location_country,
    area: row.location_area,
    summary: row.summary,
    createdAt: row.created_at,
  };
};

const toIncidentPayload = (incident: NewConfirmedIncident) => {
  return {
    source_post_id: incident.sourcePostId,
    incident_type: incident.incidentType,
    summary: incident.summary,
    confidence: incident.confidence,
    location_country: incident.country,
    location_area: incident.area,
  };
};

export class SupabasePostStore implements PostStore {
  public constructor(
    private readonly supabaseUrl: string,
    private readonly serviceRoleKey: string,
    private readonly fetcher: typeof fetch = fetch
  ) {}

  public static fromEnv(fetcher?: typeof fetch): SupabasePostStore | null {
    const supabaseUrl = readEnv("SUPABASE_URL");
    const serviceRoleKey = readEnv("SUPABASE_SERVICE_ROLE_KEY");

    if (!supabaseUrl || !serviceRoleKey) {
      return null;
    }

    return new SupabasePostStore(supabaseUrl.replace(/\/+$/, ""), serviceRoleKey, fetcher);
  }

  public async createPost(post: NewPost): Promise<Post> {
    const rows = await this.request<SupabasePostRow[]>("createPost", this.tableUrl(POSTS_TABLE), {
      method: "POST",
      headers: this.getHeaders({ representation: true }),
      body: JSON.stringify(toPostPayload(post)),
    });

    const row = rows[0];
    if (!row) {
      throw new StoreFailureError("createPost", null);
    }

    return toPost(row);
  }

  public async getPostById(id: number): Promise<Post | null> {
    const url = this.tableUrl(POSTS_TABLE);
    url.searchParams.set("id", `eq.${id}`);
    url.searchParams.set("select", POST_COLUMNS);
    url.searchParams.set("limit", "1");

    const rows = await this.request<SupabasePostRow[]>("getPostById", url, {
      method: "GET",
      headers: this.getHeaders(),
    });

    const row = rows[0];
    return row ? toPost(row) : null;
  }

  public async getLatestRealPost(): Promise<Post | null> {
    const url = this.tableUrl(POSTS_TABLE);
    url.searchParams.set("is_simulated", "eq.false");
    url.searchParams.set("select", POST_COLUMNS);
    url.searchParams.set("order", "created_at.desc,id.desc");
    url.searchParams.set("limit", "1");

    const rows = await this.request<SupabasePostRow[]>("getLatestRealPost", url, {
      method: "GET",
      headers: this.getHeaders(),
    });

    const row = rows[0];
    return row ? toPost(row) : null;
  }

  public async listUnprocessedPosts(limit: number, includeSynthetic: boolean): Promise<Post[]> {
    const url = this.tableUrl(POSTS_TABLE);
    url.searchParams.set("processed", "eq.false");
    if (!includeSynthetic) {
      url.searchParams.set("is_simulated", "eq.false");
    }
    url.searchParams.set("select", POST_COLUMNS);
    url.searchParams.set("order", "created_at.asc,id.asc");
    url.searchParams.set("limit", String(Math.max(0, Math.floor(limit))));

    const rows = await this.request<SupabasePostRow[]>("listUnprocessedPosts", url, {
      method: "GET",
      headers: this.getHeaders(),
    });

    return rows.map(toPost);
  }

  public async listRecentPosts(limit: number): Promise<Post[]> {
    const url = this.tableUrl(POSTS_TABLE);
    url.searchParams.set("select", POST_COLUMNS);
    url.searchParams.set("order", "created_at.desc,id.desc");
    url.searchParams.set("limit", String(Math.max(0, Math.floor(limit))));

    const rows = await this.request<SupabasePostRow[]>("listRecentPosts", url, {
      method: "GET",
      headers: this.getHeaders(),
    });

    return rows.map(toPost);
  }

  public async markPostProcessed(id: number): Promise<Post | null> {
    const url = this.tableUrl(POSTS_TABLE);
    url.searchParams.set("id", `eq.${id}`);
    url.searchParams.set("select", POST_COLUMNS);

    // Single PATCH: the flag only ever moves to true, so concurrent calls converge.
    const rows = await this.request<SupabasePostRow[]>("markPostProcessed", url, {
      method: "PATCH",
      headers: this.getHeaders({ representation: true }),
      body: JSON.stringify({ processed: true }),
    });

    const row = rows[0];
    return row ? toPost(row) : null;
  }

  public async createConfirmedIncident(incident: NewConfirmedIncident): Promise<ConfirmedIncident> {
    const rows = await this.request<SupabaseIncidentRow[]>(
      "createConfirmedIncident",
      this.tableUrl(INCIDENTS_TABLE),
      {
        method: "POST",
        headers: this.getHeaders({ representation: true }),
        body: JSON.stringify(toIncidentPayload(incident)),
      }
    );

    const row = rows[0];
    if (!row) {
      throw new StoreFailureError("createConfirmedIncident", null);
    }

    return toIncident(row);
  }

  public async listRecentIncidents(limit: number): Promise<ConfirmedIncident[]> {
    const url = this.tableUrl(INCIDENTS_TABLE);
    url.searchParams.set("select", INCIDENT_COLUMNS);
    url.searchParams.set("order", "created_at.desc,id.desc");
    url.searchParams.set("limit", String(Math.max(0, Math.floor(limit))));

    const rows = await this.request<SupabaseIncidentRow[]>("listRecentIncidents", url, {
      method: "GET",
      headers: this.getHeaders(),
    });

    return rows.map(toIncident);
  }

  private tableUrl(table: string): URL {
    return new URL(`${this.supabaseUrl}/rest/v1/${table}`);
  }

  private async request<T>(operation: string, url: URL, init: RequestInit): Promise<T> {
    let response: Response;
    try {
      response = await this.fetcher(url, init);
    } catch (error) {
      throw new StoreFailureError(operation, null, { cause: error });
    }

    if (!response.ok) {
      throw new StoreFailureError(operation, response.status);
    }

    try {
      return (await response.json()) as T;
    } catch (error) {
      throw new StoreFailureError(operation, response.status, { cause: error });
    }
  }

  private getHeaders(options: { representation?: boolean } = {}): Record<string, string> {
    return {
      apikey: this.serviceRoleKey,
      Authorization: `Bearer ${this.serviceRoleKey}`,
      ...(options.representation
        ? { "Content-Type": "application/json", Prefer: "return=representation" }
        : {}),
    };
  }
}
