import {
  HASHTAG_PROBABILITY,
  InvalidScheduleError,
  MAX_HASHTAGS_PER_POST,
  QueueClosedError,
  assertUsableDistribution,
  describeError,
  ratePerSecondFor,
  sampleWeighted,
  sampleWithoutReplacement,
  scheduleWaits,
  type GenerationJobConfig,
  type Post,
  type RandomSource,
} from "@incident-relay/shared";

import type { ServiceLogger } from "../lib/logger.js";
import { abortableSleep } from "../lib/sleep.js";
import { PersonaCatalog } from "./persona-catalog.js";
import type { PostStore } from "./post-store.js";
import { SeedQueue } from "./seed-queue.js";
import {
  DEFAULT_LENGTH_CONSTRAINT,
  type LengthConstraint,
  type TextGenerator,
} from "./text-generator.js";

export type GenerationWorkerConfig = GenerationJobConfig & {
  maxQueuedJobs?: number;
};

export type GenerationJobOverrides = Partial<Pick<GenerationJobConfig, "count" | "timing">>;

type EmissionOutcome = "persisted" | "failed" | "cancelled";

export type GenerationJobReport = {
  seedPostId: number;
  outcome: "completed" | "cancelled" | "seed_not_found" | "store_failure";
  scheduled: number;
  persisted: number;
  failed: number;
  cancelled: number;
};

export type WorkerSleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type GenerationWorkerOptions = {
  store: PostStore;
  generator: TextGenerator;
  config: GenerationWorkerConfig;
  personaCatalog?: PersonaCatalog;
  random?: RandomSource;
  sleep?: WorkerSleep;
  lengthConstraint?: LengthConstraint;
  logger?: ServiceLogger;
  /** Called after each queued job finishes. */
  onJobSettled?: (report: GenerationJobReport) => void;
};

const DEFAULT_MAX_QUEUED_JOBS = 100;
const DEFAULT_STOP_TIMEOUT_MS = 5_000;

const validateConfig = (config: GenerationWorkerConfig): void => {
  if (!Number.isInteger(config.count) || config.count < 0) {
    throw new InvalidScheduleError(`count must be a non-negative integer, got ${config.count}`);
  }

  ratePerSecondFor(config.count, config.timing);
  assertUsableDistribution(config.personaWeights, "personas");
  assertUsableDistribution(config.languageWeights, "languages");
};

/**
 * Fans each queued seed post out into `count` synthetic posts. Every
 * emission waits its own exponential delay, then samples a persona and a
 * language, asks the generator for text and persists the result. Emissions
 * and jobs run concurrently; one failed emission never stops the others.
 */
export class GenerationWorker {
  private readonly store: PostStore;
  private readonly generator: TextGenerator;
  private readonly config: GenerationWorkerConfig;
  private readonly catalog: PersonaCatalog;
  private readonly random: RandomSource;
  private readonly sleep: WorkerSleep;
  private readonly lengthConstraint: LengthConstraint;
  private readonly logger: ServiceLogger;
  private readonly onJobSettled: ((report: GenerationJobReport) => void) | undefined;
  private readonly queue: SeedQueue<number>;
  private readonly abortController = new AbortController();
  private readonly inFlight = new Set<Promise<void>>();
  private loopPromise: Promise<void> | null = null;
  private stopped = false;

  public constructor(options: GenerationWorkerOptions) {
    validateConfig(options.config);

    this.store = options.store;
    this.generator = options.generator;
    this.config = options.config;
    this.catalog = options.personaCatalog ?? new PersonaCatalog();
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? abortableSleep;
    this.lengthConstraint = options.lengthConstraint ?? DEFAULT_LENGTH_CONSTRAINT;
    this.logger = options.logger ?? console;
    this.onJobSettled = options.onJobSettled;
    this.queue = new SeedQueue<number>(options.config.maxQueuedJobs ?? DEFAULT_MAX_QUEUED_JOBS);
  }

  public get isRunning(): boolean {
    return this.loopPromise !== null && !this.stopped;
  }

  public get queuedJobs(): number {
    return this.queue.size;
  }

  public get activeJobs(): number {
    return this.inFlight.size;
  }

  public get personaCatalog(): PersonaCatalog {
    return this.catalog;
  }

  /** Queues a seed for fan-out. Throws QueueClosedError after stop(), QueueFullError at capacity. */
  public enqueue(seedPostId: number): void {
    if (this.stopped) {
      throw new QueueClosedError();
    }

    this.queue.push(seedPostId);
    this.logger.info(`[generation-worker] enqueued seed=${seedPostId} queued=${this.queue.size}`);
  }

  public start(): void {
    if (this.stopped) {
      throw new QueueClosedError();
    }

    if (this.loopPromise) {
      return;
    }

    this.logger.info(
      `[generation-worker] started count=${this.config.count} timing=${this.describeTiming()}`
    );
    this.loopPromise = this.loop();
  }

  /**
   * Closes the queue and aborts every pending wait, then gives in-flight
   * work up to `timeoutMs` to settle. Generator calls already sent are not
   * cancelled.
   */
  public async stop(timeoutMs: number = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    if (!this.stopped) {
      this.stopped = true;
      this.queue.close();
      this.abortController.abort();
    }

    const drained = (async () => {
      await this.loopPromise;
      await Promise.allSettled([...this.inFlight]);
    })();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = await Promise.race([
      drained.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), timeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (timedOut) {
      this.logger.warn(
        `[generation-worker] stop timed out after ${timeoutMs}ms active_jobs=${this.inFlight.size}`
      );
      return;
    }

    this.logger.info("[generation-worker] stopped");
  }

  /** Runs one fan-out job to completion. Never rejects for item-level failures. */
  public async runJob(
    seedPostId: number,
    overrides: GenerationJobOverrides = {}
  ): Promise<GenerationJobReport> {
    const count = overrides.count ?? this.config.count;
    const timing = overrides.timing ?? this.config.timing;
    const signal = this.abortController.signal;
    const empty = { seedPostId, scheduled: 0, persisted: 0, failed: 0, cancelled: 0 };

    if (signal.aborted) {
      return { ...empty, outcome: "cancelled" };
    }

    let seed: Post | null;
    try {
      seed = await this.store.getPostById(seedPostId);
    } catch (error) {
      this.logger.error(
        `[generation-worker] seed=${seedPostId} lookup failed: ${describeError(error)}`,
        error
      );
      return { ...empty, outcome: "store_failure" };
    }

    if (!seed) {
      this.logger.warn(`[generation-worker] seed=${seedPostId} not found; skip`);
      return { ...empty, outcome: "seed_not_found" };
    }

    const waits = scheduleWaits(count, timing, this.random);
    this.logger.info(`[generation-worker] seed=${seedPostId} scheduled=${waits.length}`);

    const seedPost = seed;
    const outcomes = await Promise.all(
      waits.map((waitSeconds, index) => this.emit(seedPost, waitSeconds, index))
    );

    const report: GenerationJobReport = {
      seedPostId,
      outcome: outcomes.includes("cancelled") ? "cancelled" : "completed",
      scheduled: waits.length,
      persisted: outcomes.filter((outcome) => outcome === "persisted").length,
      failed: outcomes.filter((outcome) => outcome === "failed").length,
      cancelled: outcomes.filter((outcome) => outcome === "cancelled").length,
    };

    this.logger.info(
      `[generation-worker] seed=${seedPostId} outcome=${report.outcome} persisted=${report.persisted} failed=${report.failed} cancelled=${report.cancelled}`
    );

    return report;
  }

  private async loop(): Promise<void> {
    const signal = this.abortController.signal;

    while (!signal.aborted) {
      const seedPostId = await this.queue.take(signal);
      if (seedPostId === null) {
        return;
      }

      if (signal.aborted) {
        this.logger.warn(`[generation-worker] dropped seed=${seedPostId} during shutdown`);
        return;
      }

      this.track(seedPostId);
    }
  }

  private track(seedPostId: number): void {
    const job: Promise<void> = this.runJob(seedPostId)
      .then((report) => {
        this.onJobSettled?.(report);
      })
      .catch((error: unknown) => {
        this.logger.error(
          `[generation-worker] job for seed=${seedPostId} failed: ${describeError(error)}`,
          error
        );
      })
      .finally(() => {
        this.inFlight.delete(job);
      });

    this.inFlight.add(job);
  }

  private async emit(seed: Post, waitSeconds: number, index: number): Promise<EmissionOutcome> {
    const signal = this.abortController.signal;
    const label = `seed=${seed.id} emission=${index + 1}`;

    try {
      await this.sleep(waitSeconds * 1000, signal);
    } catch (error) {
      if (signal.aborted) {
        return "cancelled";
      }

      this.logger.error(`[generation-worker] ${label} wait failed: ${describeError(error)}`, error);
      return "failed";
    }

    if (signal.aborted) {
      return "cancelled";
    }

    try {
      const persona = sampleWeighted(this.config.personaWeights, this.random, "personas");
      const language = sampleWeighted(this.config.languageWeights, this.random, "languages");

      const isNewPersona = !this.catalog.has(persona);
      const styleHint = this.catalog.styleFor(persona);
      if (isNewPersona) {
        this.logger.info(`[generation-worker] registered persona="${persona}" with default style`);
      }

      const generated = await this.generator.generate({
        seedText: seed.text,
        persona,
        styleHint,
        language,
        lengthConstraint: this.lengthConstraint,
      });

      const hashtags = this.pickHashtags();
      const text = hashtags.length > 0 ? `${generated} ${hashtags.join(" ")}` : generated;

      const post = await this.store.createPost({
        text,
        isSynthetic: true,
        persona,
        languageCode: language,
        seedPostId: seed.id,
        hashtags: hashtags.length > 0 ? hashtags.join(" ") : null,
      });

      this.logger.info(
        `[generation-worker] ${label} post=${post.id} persona="${persona}" lang=${language}`
      );
      return "persisted";
    } catch (error) {
      this.logger.error(`[generation-worker] ${label} failed: ${describeError(error)}`, error);
      return "failed";
    }
  }

  /** 1-2 distinct tags with probability HASHTAG_PROBABILITY, otherwise none. */
  private pickHashtags(): string[] {
    const pool = this.config.hashtagPool;
    if (pool.length === 0 || this.random() >= HASHTAG_PROBABILITY) {
      return [];
    }

    const maxTags = Math.min(MAX_HASHTAGS_PER_POST, pool.length);
    const count = 1 + Math.min(maxTags - 1, Math.floor(this.random() * maxTags));
    return sampleWithoutReplacement(pool, count, this.random);
  }

  private describeTiming(): string {
    const timing = this.config.timing;
    return timing.mode === "rate"
      ? `rate:${timing.postsPerMinute}/min`
      : `window:${timing.windowMinutes}min`;
  }
}
