import type { WeightMap } from "./types.js";

/** Style descriptors keyed by persona label. */
export const DEFAULT_PERSONA_STYLES: Readonly<Record<string, string>> = {
  "commuting office worker": "short and matter-of-fact, a few emoji",
  "local shopkeeper": "concrete details, short sentences",
  "college student": "casual slang, hashtags where they fit",
  "terminally online lurker": "vivid detail, mild exaggeration and swearing allowed, lots of emoji",
  "reporter tone": "factual statements, concise sentences",
  "resident representative": "informative, urges people to take care",
} as const;

export const DEFAULT_PERSONA_STYLE = "ordinary voice, plain wording";

export const DEFAULT_PERSONA_WEIGHTS: WeightMap = {
  "college student": 0.2,
  "commuting office worker": 0.1,
  "local shopkeeper": 0.1,
  "resident representative": 0.15,
  "reporter tone": 0.05,
  "terminally online lurker": 0.4,
} as const;

export const DEFAULT_LANGUAGE_WEIGHTS: WeightMap = {
  ko: 0.9,
  en: 0.1,
} as const;

export const DEFAULT_HASHTAGS: readonly string[] = ["#breaking", "#alert"];

export const HASHTAG_PROBABILITY = 0.6;
export const MAX_HASHTAGS_PER_POST = 2;

export const MIN_POST_CHARS = 40;
export const MAX_POST_CHARS = 120;

/** Floor for the window-mode mean wait, in seconds. */
export const MIN_MEAN_WAIT_SECONDS = 0.001;

export const CONFIDENCE_MIN = 0;
export const CONFIDENCE_MAX = 100;
