import { vi } from "vitest";
import type { ClassificationResult } from "@incident-relay/shared";

import type { IncidentClassifier } from "../services/incident-classifier.js";
import type { GenerationRequest, TextGenerator } from "../services/text-generator.js";

export const createSilentLogger = () => {
  return {
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string, error?: unknown) => void>(),
  };
};

export const createFakeGenerator = (
  impl: (request: GenerationRequest) => Promise<string> = async (request) =>
    `${request.persona} says: ${request.seedText}`
) => {
  const generate = vi.fn(impl);
  const generator: TextGenerator = { generate };
  return { generator, generate };
};

export const createFakeClassifier = (
  impl: (postText: string) => Promise<ClassificationResult>
) => {
  const classify = vi.fn(impl);
  const classifier: IncidentClassifier = { classify };
  return { classifier, classify };
};

export const incidentResult = (
  overrides: Partial<ClassificationResult> = {}
): ClassificationResult => {
  return {
    isIncident: true,
    confidence: 90,
    incidentType: "arson",
    country: "South Korea",
    area: "Mapo-gu",
    summary: "A car was set on fire near the station.",
    ...overrides,
  };
};

export const createJsonResponse = (payload: unknown, status = 200, headers?: Record<string, string>) => {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "Content-Type": "application/json",
      ...(headers ?? {}),
    },
  });
};

/** Resolves at once; records the requested delays. */
export const createImmediateSleep = () => {
  return vi.fn(async (_ms: number, _signal: AbortSignal): Promise<void> => undefined);
};
