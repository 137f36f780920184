import {
  describeError,
  type ClassificationResult,
  type Post,
} from "@incident-relay/shared";

import type { ServiceLogger } from "../lib/logger.js";
import { abortableSleep } from "../lib/sleep.js";
import type { IncidentClassifier } from "./incident-classifier.js";
import type { PostStore } from "./post-store.js";

export type ClassificationPollerConfig = {
  pollIntervalMs: number;
  batchLimit: number;
  confidenceThreshold: number;
  includeSynthetic: boolean;
};

export type ClassificationBatchReport = {
  fetched: number;
  processed: number;
  incidents: number;
  classificationFailures: number;
  storeFailures: number;
  cancelled: boolean;
};

export type PollerSleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type ClassificationPollerOptions = {
  store: PostStore;
  classifier: IncidentClassifier;
  config: ClassificationPollerConfig;
  sleep?: PollerSleep;
  logger?: ServiceLogger;
};

export const isConfirmedIncident = (result: ClassificationResult, threshold: number): boolean => {
  return result.isIncident && result.confidence >= threshold;
};

const formatLocation = (result: ClassificationResult): string => {
  const parts = [result.country, result.area].filter((part): part is string => part !== null);
  return parts.length > 0 ? parts.join("/") : "unknown";
};

export class ClassificationPoller {
  private readonly store: PostStore;
  private readonly classifier: IncidentClassifier;
  private readonly config: ClassificationPollerConfig;
  private readonly sleep: PollerSleep;
  private readonly logger: ServiceLogger;
  private controller: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;

  public constructor(options: ClassificationPollerOptions) {
    this.store = options.store;
    this.classifier = options.classifier;
    this.config = options.config;
    this.sleep = options.sleep ?? abortableSleep;
    this.logger = options.logger ?? console;
  }

  public get isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * One polling pass. Posts are handled one at a time, oldest first; each
   * post that got past classification is marked processed whatever the
   * outcome.
   */
  public async runOnce(signal?: AbortSignal): Promise<ClassificationBatchReport> {
    const report: ClassificationBatchReport = {
      fetched: 0,
      processed: 0,
      incidents: 0,
      classificationFailures: 0,
      storeFailures: 0,
      cancelled: false,
    };

    if (signal?.aborted) {
      return { ...report, cancelled: true };
    }

    let posts: Post[];
    try {
      posts = await this.store.listUnprocessedPosts(
        this.config.batchLimit,
        this.config.includeSynthetic
      );
    } catch (error) {
      this.logger.error(
        `[classification-poller] listing unprocessed posts failed: ${describeError(error)}`,
        error
      );
      return { ...report, storeFailures: 1 };
    }

    report.fetched = posts.length;

    for (const post of posts) {
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }

      let result: ClassificationResult | null = null;
      try {
        result = await this.classifier.classify(post.text);
      } catch (error) {
        report.classificationFailures += 1;
        this.logger.error(
          `[classification-poller] post=${post.id} classification failed: ${describeError(error)}`,
          error
        );
      }

      // Cancelled mid-item: leave the post for the next pass.
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }

      if (result) {
        this.logger.info(
          `[classification-poller] post=${post.id} incident=${result.isIncident} confidence=${result.confidence}`
        );
      }

      if (result && isConfirmedIncident(result, this.config.confidenceThreshold)) {
        try {
          const incident = await this.store.createConfirmedIncident({
            sourcePostId: post.id,
            incidentType: result.incidentType,
            confidence: result.confidence,
            country: result.country,
            area: result.area,
            summary: result.summary,
          });
          report.incidents += 1;
          this.logger.warn(
            `[classification-poller] ALERT incident=${incident.id} post=${post.id} type=${result.incidentType ?? "unknown"} location=${formatLocation(result)} confidence=${result.confidence}`
          );
        } catch (error) {
          report.storeFailures += 1;
          this.logger.error(
            `[classification-poller] post=${post.id} incident insert failed: ${describeError(error)}`,
            error
          );
        }
      }

      try {
        await this.store.markPostProcessed(post.id);
        report.processed += 1;
      } catch (error) {
        report.storeFailures += 1;
        this.logger.error(
          `[classification-poller] post=${post.id} mark processed failed: ${describeError(error)}`,
          error
        );
      }
    }

    if (report.fetched > 0) {
      this.logger.info(
        `[classification-poller] batch fetched=${report.fetched} processed=${report.processed} incidents=${report.incidents} failures=${report.classificationFailures + report.storeFailures}`
      );
    }

    return report;
  }

  /** Polls until the signal aborts. */
  public async run(signal: AbortSignal): Promise<void> {
    this.logger.info(
      `[classification-poller] polling every ${this.config.pollIntervalMs}ms batch_limit=${this.config.batchLimit} threshold=${this.config.confidenceThreshold}`
    );

    while (!signal.aborted) {
      await this.runOnce(signal);

      if (signal.aborted) {
        break;
      }

      try {
        await this.sleep(this.config.pollIntervalMs, signal);
      } catch (error) {
        if (signal.aborted) {
          break;
        }

        this.logger.error(`[classification-poller] wait failed: ${describeError(error)}`, error);
      }
    }

    this.logger.info("[classification-poller] stopped");
  }

  /** Starting while a stop is still pending queues the new loop behind the old one. */
  public start(): void {
    if (this.controller) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    const previous = this.loopPromise ?? Promise.resolve();
    this.loopPromise = previous.then(() => this.run(controller.signal));
  }

  public async stop(): Promise<void> {
    const loop = this.loopPromise;
    this.controller?.abort();
    this.controller = null;

    await loop;
    if (this.loopPromise === loop) {
      this.loopPromise = null;
    }
  }
}
