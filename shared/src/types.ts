/** A report or generated post as stored by the post store. */
export interface Post {
  readonly id: number;
  readonly text: string;
  /** ISO-8601 creation time. */
  readonly createdAt: string;
  readonly processed: boolean;
  readonly isSynthetic: boolean;
  readonly persona: string | null;
  readonly languageCode: string | null;
  /** Lineage only: the seed may since have been removed. */
  readonly seedPostId: number | null;
  /** Hashtags appended to the text, space-joined. */
  readonly hashtags: string | null;
}

export type NewPost = {
  text: string;
  isSynthetic: boolean;
  persona?: string | null;
  languageCode?: string | null;
  seedPostId?: number | null;
  hashtags?: string | null;
};

export interface ClassificationResult {
  readonly isIncident: boolean;
  /** Integer in [0, 100]. */
  readonly confidence: number;
  readonly incidentType: string | null;
  readonly country: string | null;
  /** City, district, station or neighbourhood. */
  readonly area: string | null;
  readonly summary: string | null;
}

export interface ConfirmedIncident {
  readonly id: number;
  readonly sourcePostId: number;
  readonly incidentType: string | null;
  readonly confidence: number;
  readonly country: string | null;
  readonly area: string | null;
  readonly summary: string | null;
  readonly createdAt: string;
}

export type NewConfirmedIncident = {
  sourcePostId: number;
  incidentType: string | null;
  confidence: number;
  country: string | null;
  area: string | null;
  summary: string | null;
};

/** Category label → non-negative weight. Need not sum to 1. */
export type WeightMap = Readonly<Record<string, number>>;

export type RandomSource = () => number;

export type EmissionTiming =
  | { readonly mode: "rate"; readonly postsPerMinute: number }
  | { readonly mode: "window"; readonly windowMinutes: number };

export interface GenerationJobConfig {
  readonly count: number;
  readonly timing: EmissionTiming;
  readonly languageWeights: WeightMap;
  readonly personaWeights: WeightMap;
  readonly hashtagPool: readonly string[];
}
