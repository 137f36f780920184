export type PipelineErrorCode =
  | "CONFIGURATION"
  | "INVALID_DISTRIBUTION"
  | "INVALID_SCHEDULE"
  | "SEED_NOT_FOUND"
  | "GENERATION_FAILURE"
  | "CLASSIFICATION_FAILURE"
  | "STORE_FAILURE"
  | "QUEUE_CLOSED"
  | "QUEUE_FULL";

export class PipelineError extends Error {
  public constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/** Raised at startup; the process should not run with this configuration. */
export class ConfigurationError extends PipelineError {
  public constructor(message: string, code: PipelineErrorCode = "CONFIGURATION") {
    super(message, code);
    this.name = "ConfigurationError";
  }
}

export class InvalidDistributionError extends ConfigurationError {
  public constructor(public readonly distribution: string) {
    super(`Distribution "${distribution}" has no categories`, "INVALID_DISTRIBUTION");
    this.name = "InvalidDistributionError";
  }
}

export class InvalidScheduleError extends ConfigurationError {
  public constructor(message: string) {
    super(message, "INVALID_SCHEDULE");
    this.name = "InvalidScheduleError";
  }
}

export class SeedNotFoundError extends PipelineError {
  public constructor(public readonly seedPostId: number | "latest") {
    super(
      seedPostId === "latest" ? "No real post to use as seed" : `Seed post #${seedPostId} not found`,
      "SEED_NOT_FOUND"
    );
    this.name = "SeedNotFoundError";
  }
}

export class GenerationFailureError extends PipelineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, "GENERATION_FAILURE", options);
    this.name = "GenerationFailureError";
  }
}

export class ClassificationFailureError extends PipelineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CLASSIFICATION_FAILURE", options);
    this.name = "ClassificationFailureError";
  }
}

export class StoreFailureError extends PipelineError {
  public constructor(
    public readonly operation: string,
    public readonly status: number | null,
    options?: { cause?: unknown }
  ) {
    super(
      status === null
        ? `Post store ${operation} failed`
        : `Post store ${operation} failed: ${status}`,
      "STORE_FAILURE",
      options
    );
    this.name = "StoreFailureError";
  }
}

export class QueueClosedError extends PipelineError {
  public constructor() {
    super("Generation queue is closed", "QUEUE_CLOSED");
    this.name = "QueueClosedError";
  }
}

export class QueueFullError extends PipelineError {
  public constructor(public readonly capacity: number) {
    super(`Generation queue is full (${capacity} pending)`, "QUEUE_FULL");
    this.name = "QueueFullError";
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
};
