import {
  ConfigurationError,
  GenerationFailureError,
  MAX_POST_CHARS,
  MIN_POST_CHARS,
} from "@incident-relay/shared";

import type { ServiceLogger } from "../lib/logger.js";
import {
  createChatCompletionClient,
  truncateDeterministically,
  type ChatCompletionClient,
  type ChatCompletionClientOptions,
} from "./chat-completions.js";

export type LengthConstraint = {
  minSentences: number;
  maxSentences: number;
  minChars: number;
  maxChars: number;
};

export type GenerationRequest = {
  seedText: string;
  persona: string;
  styleHint: string;
  language: string;
  lengthConstraint: LengthConstraint;
};

export type TextGenerator = {
  generate(request: GenerationRequest): Promise<string>;
};

export type TextGeneratorOptions = Omit<ChatCompletionClientOptions, "scope" | "logger"> & {
  model?: string;
  maxSeedChars?: number;
  logger?: Pick<ServiceLogger, "info" | "warn">;
  client?: ChatCompletionClient;
};

export const DEFAULT_GENERATION_MODEL = "gpt-4o-mini";
const DEFAULT_MAX_SEED_CHARS = 2_000;
const GENERATION_TEMPERATURE = 0.7;

export const DEFAULT_LENGTH_CONSTRAINT: LengthConstraint = {
  minSentences: 1,
  maxSentences: 2,
  minChars: MIN_POST_CHARS,
  maxChars: MAX_POST_CHARS,
};

const describeLength = (constraint: LengthConstraint): string => {
  return `${constraint.minSentences}-${constraint.maxSentences} sentences, ${constraint.minChars}-${constraint.maxChars} characters`;
};

export const buildSystemInstruction = (constraint: LengthConstraint): string => {
  return [
    "You write short social media posts reacting to an incident report.",
    "Keep the core facts of the seed post (what happened and roughly where) but rephrase them in new sentences.",
    `Length: ${describeLength(constraint)}.`,
    "Return only the post text: no quotes, no labels, no hashtags.",
  ].join(" ");
};

export const buildGenerationPrompt = (request: GenerationRequest, maxSeedChars: number): string => {
  return [
    `Seed: ${truncateDeterministically(request.seedText.trim(), maxSeedChars)}`,
    `Persona: ${request.persona} (${request.styleHint})`,
    `Language: ${request.language}`,
    `Rules: declarative statements, ${describeLength(request.lengthConstraint)}`,
  ].join("\n");
};

/** Drops wrapping quotes some models add around a single post. */
const cleanGeneratedText = (raw: string): string => {
  const trimmed = raw.trim();
  const quoted =
    trimmed.length >= 2 &&
    ((trimmed.startsWith('"') && trimmed.endsWith('"')) ||
      (trimmed.startsWith("“") && trimmed.endsWith("”")));

  return (quoted ? trimmed.slice(1, -1) : trimmed).trim();
};

export const createOpenAiTextGenerator = (options: TextGeneratorOptions): TextGenerator => {
  if (!options.client && options.apiKey.trim().length === 0) {
    throw new ConfigurationError("OPENAI_API_KEY is required for text generation");
  }

  const model = options.model ?? DEFAULT_GENERATION_MODEL;
  const maxSeedChars = options.maxSeedChars ?? DEFAULT_MAX_SEED_CHARS;
  const complete =
    options.client ??
    createChatCompletionClient({
      ...options,
      scope: "text-generator",
    });

  return {
    async generate(request: GenerationRequest): Promise<string> {
      let reply: string;
      try {
        reply = await complete({
          model,
          temperature: GENERATION_TEMPERATURE,
          messages: [
            { role: "system", content: buildSystemInstruction(request.lengthConstraint) },
            { role: "user", content: buildGenerationPrompt(request, maxSeedChars) },
          ],
        });
      } catch (error) {
        throw new GenerationFailureError(`Text generation failed for persona "${request.persona}"`, {
          cause: error,
        });
      }

      const text = cleanGeneratedText(reply);
      if (text.length === 0) {
        throw new GenerationFailureError(`Text generation returned no text for persona "${request.persona}"`);
      }

      return text;
    },
  };
};
