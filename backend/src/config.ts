import {
  ConfigurationError,
  DEFAULT_HASHTAGS,
  DEFAULT_LANGUAGE_WEIGHTS,
  DEFAULT_PERSONA_WEIGHTS,
  type EmissionTiming,
  type WeightMap,
} from "@incident-relay/shared";

import { readEnv } from "./lib/env.js";
import type { ServiceLogger } from "./lib/logger.js";
import type { ClassificationPollerConfig } from "./services/classification-poller.js";
import type { GenerationWorkerConfig } from "./services/generation-worker.js";
import { DEFAULT_CLASSIFIER_MODEL } from "./services/incident-classifier.js";
import { DEFAULT_GENERATION_MODEL } from "./services/text-generator.js";

type EnvReader = (key: string) => string | undefined;

type ConfigLogger = Pick<ServiceLogger, "warn">;

export type ServiceConfig = {
  openAiApiKey: string;
  generationModel: string;
  classifierModel: string;
  port: number;
  adminToken: string | null;
  nodeEnv: string;
};

const DEFAULT_SIM_COUNT = 60;
const DEFAULT_WINDOW_MINUTES = 20;
const DEFAULT_MAX_QUEUED_JOBS = 100;
const DEFAULT_POLL_INTERVAL_SEC = 300;
const DEFAULT_BATCH_LIMIT = 50;
const MAX_BATCH_LIMIT = 200;
const DEFAULT_CONFIDENCE_THRESHOLD = 80;
const DEFAULT_PORT = 3001;

const readTrimmed = (read: EnvReader, key: string): string | undefined => {
  const value = read(key)?.trim();
  return value && value.length > 0 ? value : undefined;
};

type IntegerBounds = {
  min: number;
  max?: number;
};

const parseInteger = (
  read: EnvReader,
  key: string,
  fallback: number,
  bounds: IntegerBounds
): number => {
  const raw = readTrimmed(read, key);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  const max = bounds.max ?? Number.MAX_SAFE_INTEGER;
  if (!Number.isInteger(value) || value < bounds.min || value > max) {
    const range = bounds.max === undefined ? `>= ${bounds.min}` : `${bounds.min}-${bounds.max}`;
    throw new ConfigurationError(`${key} must be an integer ${range}, got "${raw}"`);
  }

  return value;
};

const parseNonNegativeNumber = (read: EnvReader, key: string, fallback: number): number => {
  const raw = readTrimmed(read, key);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${key} must be a non-negative number, got "${raw}"`);
  }

  return value;
};

const parseBoolean = (read: EnvReader, key: string, fallback: boolean): boolean => {
  const raw = readTrimmed(read, key);
  if (raw === undefined) {
    return fallback;
  }

  const normalized = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }

  throw new ConfigurationError(`${key} must be a boolean, got "${raw}"`);
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const toWeight = (value: unknown): number | null => {
  const numeric = typeof value === "string" && value.trim().length > 0 ? Number(value) : value;
  return typeof numeric === "number" && Number.isFinite(numeric) ? numeric : null;
};

const splitWeightToken = (token: string): [string, string] | null => {
  const equalsIndex = token.lastIndexOf("=");
  const separatorIndex = equalsIndex !== -1 ? equalsIndex : token.lastIndexOf(":");
  if (separatorIndex <= 0) {
    return null;
  }

  return [token.slice(0, separatorIndex).trim(), token.slice(separatorIndex + 1).trim()];
};

/**
 * Parses a weight mapping from `{"ko":0.9,"en":0.1}` or `ko=0.9,en=0.1`
 * (`name:0.2` also accepted). Unusable tokens are skipped with a warning;
 * an empty result yields `fallback`.
 */
export const parseWeights = (
  raw: string | undefined,
  fallback: WeightMap,
  name: string,
  logger: ConfigLogger = console
): WeightMap => {
  const source = raw?.trim() ?? "";
  if (source.length === 0) {
    return fallback;
  }

  const parsed: Record<string, number> = {};
  const accept = (label: string, value: unknown): void => {
    const weight = toWeight(value);
    if (label.length === 0 || weight === null) {
      logger.warn(`[config] ${name}: skipping weight "${label}=${String(value)}"`);
      return;
    }

    parsed[label] = weight;
  };

  if (source.startsWith("{")) {
    let json: unknown;
    try {
      json = JSON.parse(source);
    } catch {
      logger.warn(`[config] ${name}: invalid JSON, using defaults`);
      return fallback;
    }

    if (!isRecord(json)) {
      logger.warn(`[config] ${name}: expected a JSON object, using defaults`);
      return fallback;
    }

    for (const [label, value] of Object.entries(json)) {
      accept(label.trim(), value);
    }
  } else {
    for (const token of source.split(",")) {
      const trimmed = token.trim();
      if (trimmed.length === 0) {
        continue;
      }

      const pair = splitWeightToken(trimmed);
      if (!pair) {
        logger.warn(`[config] ${name}: skipping token "${trimmed}"`);
        continue;
      }

      accept(pair[0], pair[1]);
    }
  }

  if (Object.keys(parsed).length === 0) {
    logger.warn(`[config] ${name}: no usable weights, using defaults`);
    return fallback;
  }

  return parsed;
};

const normalizeTag = (tag: string): string => {
  const trimmed = tag.trim();
  return trimmed.startsWith("#") ? trimmed : `#${trimmed}`;
};

/** `["#a","#b"]`, `#a,#b` or `#a #b`. An explicit `[]` disables hashtags. */
export const parseTags = (
  raw: string | undefined,
  fallback: readonly string[],
  logger: ConfigLogger = console
): readonly string[] => {
  const source = raw?.trim() ?? "";
  if (source.length === 0) {
    return fallback;
  }

  if (source.startsWith("[")) {
    let json: unknown;
    try {
      json = JSON.parse(source);
    } catch {
      logger.warn("[config] SIM_HASHTAGS: invalid JSON, using defaults");
      return fallback;
    }

    if (!Array.isArray(json)) {
      logger.warn("[config] SIM_HASHTAGS: expected a JSON array, using defaults");
      return fallback;
    }

    const tags = json
      .filter((entry): entry is string => typeof entry === "string" && entry.trim().length > 0)
      .map(normalizeTag);
    return [...new Set(tags)];
  }

  const tags = source
    .split(/[\s,]+/)
    .filter((entry) => entry.length > 0)
    .map(normalizeTag);
  return [...new Set(tags)];
};

const resolveTiming = (read: EnvReader): EmissionTiming => {
  const postsPerMinute = parseNonNegativeNumber(read, "SIM_POSTS_PER_MINUTE", 0);
  if (postsPerMinute > 0) {
    return { mode: "rate", postsPerMinute };
  }

  return {
    mode: "window",
    windowMinutes: parseNonNegativeNumber(read, "SIM_WINDOW_MINUTES", DEFAULT_WINDOW_MINUTES),
  };
};

export const loadWorkerConfig = (
  read: EnvReader = readEnv,
  logger: ConfigLogger = console
): GenerationWorkerConfig => {
  return {
    count: parseInteger(read, "SIM_COUNT", DEFAULT_SIM_COUNT, { min: 0 }),
    timing: resolveTiming(read),
    languageWeights: parseWeights(
      read("SIM_LANGUAGES"),
      DEFAULT_LANGUAGE_WEIGHTS,
      "SIM_LANGUAGES",
      logger
    ),
    personaWeights: parseWeights(
      read("SIM_PERSONAS"),
      DEFAULT_PERSONA_WEIGHTS,
      "SIM_PERSONAS",
      logger
    ),
    hashtagPool: parseTags(read("SIM_HASHTAGS"), DEFAULT_HASHTAGS, logger),
    maxQueuedJobs: parseInteger(read, "SIM_MAX_QUEUED_JOBS", DEFAULT_MAX_QUEUED_JOBS, { min: 1 }),
  };
};

export const loadPollerConfig = (read: EnvReader = readEnv): ClassificationPollerConfig => {
  return {
    pollIntervalMs:
      parseInteger(read, "WATCH_INTERVAL_SEC", DEFAULT_POLL_INTERVAL_SEC, { min: 1 }) * 1000,
    batchLimit: parseInteger(read, "WATCH_BATCH_LIMIT", DEFAULT_BATCH_LIMIT, {
      min: 1,
      max: MAX_BATCH_LIMIT,
    }),
    confidenceThreshold: parseInteger(
      read,
      "WATCH_CONFIDENCE_THRESHOLD",
      DEFAULT_CONFIDENCE_THRESHOLD,
      { min: 0, max: 100 }
    ),
    includeSynthetic: parseBoolean(read, "WATCH_INCLUDE_SIMULATED", false),
  };
};

export const loadServiceConfig = (read: EnvReader = readEnv): ServiceConfig => {
  const openAiApiKey = readTrimmed(read, "OPENAI_API_KEY");
  if (!openAiApiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required");
  }

  return {
    openAiApiKey,
    generationModel: readTrimmed(read, "GENERATION_MODEL") ?? DEFAULT_GENERATION_MODEL,
    classifierModel: readTrimmed(read, "CLASSIFIER_MODEL") ?? DEFAULT_CLASSIFIER_MODEL,
    port: parseInteger(read, "BACKEND_PORT", DEFAULT_PORT, { min: 1, max: 65_535 }),
    adminToken: readTrimmed(read, "ADMIN_TOKEN") ?? null,
    nodeEnv: readTrimmed(read, "NODE_ENV") ?? "development",
  };
};
