import type {
  ConfirmedIncident,
  NewConfirmedIncident,
  NewPost,
  Post,
} from "@incident-relay/shared";

/**
 * Durable storage for posts and confirmed incidents.
 *
 * Implementations throw StoreFailureError when the backing store cannot be
 * reached. `markPostProcessed` must be safe under concurrent callers.
 */
export type PostStore = {
  createPost(post: NewPost): Promise<Post>;
  getPostById(id: number): Promise<Post | null>;
  /** Most recent non-synthetic post. */
  getLatestRealPost(): Promise<Post | null>;
  /** Oldest first. */
  listUnprocessedPosts(limit: number, includeSynthetic: boolean): Promise<Post[]>;
  /** Newest first. */
  listRecentPosts(limit: number): Promise<Post[]>;
  markPostProcessed(id: number): Promise<Post | null>;
  createConfirmedIncident(incident: NewConfirmedIncident): Promise<ConfirmedIncident>;
  /** Newest first. */
  listRecentIncidents(limit: number): Promise<ConfirmedIncident[]>;
};

type InMemoryPostStoreOptions = {
  now?: () => number;
};

const byCreatedAtThenId = (
  left: { createdAt: string; id: number },
  right: { createdAt: string; id: number }
): number => {
  const byTime = Date.parse(left.createdAt) - Date.parse(right.createdAt);
  return byTime !== 0 ? byTime : left.id - right.id;
};

const clampLimit = (limit: number): number => {
  return Number.isFinite(limit) ? Math.max(0, Math.floor(limit)) : 0;
};

/** Process-local store; used when no database is configured, and by tests. */
export class InMemoryPostStore implements PostStore {
  private nextPostId = 1;
  private nextIncidentId = 1;
  private readonly posts = new Map<number, Post>();
  private readonly incidents: ConfirmedIncident[] = [];
  private readonly now: () => number;

  public constructor(options: InMemoryPostStoreOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  public async createPost(post: NewPost): Promise<Post> {
    const created: Post = {
      id: this.nextPostId,
      text: post.text,
      createdAt: new Date(this.now()).toISOString(),
      processed: false,
      isSynthetic: post.isSynthetic,
      persona: post.persona ?? null,
      languageCode: post.languageCode ?? null,
      seedPostId: post.seedPostId ?? null,
      hashtags: post.hashtags ?? null,
    };

    this.nextPostId += 1;
    this.posts.set(created.id, created);
    return created;
  }

  public async getPostById(id: number): Promise<Post | null> {
    return this.posts.get(id) ?? null;
  }

  public async getLatestRealPost(): Promise<Post | null> {
    const real = [...this.posts.values()].filter((post) => !post.isSynthetic).sort(byCreatedAtThenId);
    return real.at(-1) ?? null;
  }

  public async listUnprocessedPosts(limit: number, includeSynthetic: boolean): Promise<Post[]> {
    return [...this.posts.values()]
      .filter((post) => !post.processed && (includeSynthetic || !post.isSynthetic))
      .sort(byCreatedAtThenId)
      .slice(0, clampLimit(limit));
  }

  public async listRecentPosts(limit: number): Promise<Post[]> {
    return [...this.posts.values()]
      .sort(byCreatedAtThenId)
      .reverse()
      .slice(0, clampLimit(limit));
  }

  public async markPostProcessed(id: number): Promise<Post | null> {
    const existing = this.posts.get(id);
    if (!existing) {
      return null;
    }

    if (existing.processed) {
      return existing;
    }

    const updated: Post = { ...existing, processed: true };
    this.posts.set(id, updated);
    return updated;
  }

  public async createConfirmedIncident(incident: NewConfirmedIncident): Promise<ConfirmedIncident> {
    const created: ConfirmedIncident = {
      id: this.nextIncidentId,
      sourcePostId: incident.sourcePostId,
      incidentType: incident.incidentType,
      confidence: incident.confidence,
      country: incident.country,
      area: incident.area,
      summary: incident.summary,
      createdAt: new Date(this.now()).toISOString(),
    };

    this.nextIncidentId += 1;
    this.incidents.push(created);
    return created;
  }

  public async listRecentIncidents(limit: number): Promise<ConfirmedIncident[]> {
    return [...this.incidents]
      .sort(byCreatedAtThenId)
      .reverse()
      .slice(0, clampLimit(limit));
  }
}
