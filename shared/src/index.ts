export type {
  ClassificationResult,
  ConfirmedIncident,
  EmissionTiming,
  GenerationJobConfig,
  NewConfirmedIncident,
  NewPost,
  Post,
  RandomSource,
  WeightMap,
} from "./types.js";

export {
  CONFIDENCE_MAX,
  CONFIDENCE_MIN,
  DEFAULT_HASHTAGS,
  DEFAULT_LANGUAGE_WEIGHTS,
  DEFAULT_PERSONA_STYLE,
  DEFAULT_PERSONA_STYLES,
  DEFAULT_PERSONA_WEIGHTS,
  HASHTAG_PROBABILITY,
  MAX_HASHTAGS_PER_POST,
  MAX_POST_CHARS,
  MIN_MEAN_WAIT_SECONDS,
  MIN_POST_CHARS,
} from "./constants.js";

export {
  ClassificationFailureError,
  ConfigurationError,
  GenerationFailureError,
  InvalidDistributionError,
  InvalidScheduleError,
  PipelineError,
  QueueClosedError,
  QueueFullError,
  SeedNotFoundError,
  StoreFailureError,
  describeError,
  type PipelineErrorCode,
} from "./errors.js";

export {
  assertUsableDistribution,
  normalizeWeights,
  sampleWeighted,
  sampleWithoutReplacement,
  type NormalizedWeight,
} from "./weighted-sampler.js";

export { exponentialWait, ratePerSecondFor, scheduleWaits } from "./point-process.js";
