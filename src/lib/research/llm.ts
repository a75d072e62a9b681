/**
 * Text generation
 *
 * The engine treats text generation as a black box: a prompt goes in, text
 * comes out, or it fails. `createAiSdkGenerator` backs that with the AI SDK
 * and the configured provider; tests inject their own `TextGenerator`.
 *
 * @module research/llm
 */

import { generateText } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import { classifyError } from "../error-classification";
import type { PipelineConfig } from "../config-schemas";
import { GenerationError, errorMessage } from "./errors";

export interface GenerationConstraints {
  system?: string;
  maxOutputTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface TextGenerator {
  generate(prompt: string, constraints?: GenerationConstraints): Promise<string>;
}

// ============================================================================
// MODEL SELECTION
// ============================================================================

type LlmProvider = PipelineConfig["llmProvider"];

export interface ModelInfo {
  provider: LlmProvider;
  modelName: string;
  model: ReturnType<typeof openai> | ReturnType<typeof anthropic> | ReturnType<typeof google> | ReturnType<typeof mistral>;
}

function defaultModelName(provider: LlmProvider): string {
  switch (provider) {
    case "anthropic":
      return "claude-3-5-haiku-20241022";
    case "google":
      return "gemini-1.5-flash";
    case "mistral":
      return "mistral-small-latest";
    case "openai":
      return "gpt-4o-mini";
  }
}

export function getModel(config: PipelineConfig): ModelInfo {
  const provider = config.llmProvider;
  const modelName = config.llmModel ?? defaultModelName(provider);
  switch (provider) {
    case "anthropic":
      return { provider, modelName, model: anthropic(modelName) };
    case "google":
      return { provider, modelName, model: google(modelName) };
    case "mistral":
      return { provider, modelName, model: mistral(modelName) };
    case "openai":
      return { provider, modelName, model: openai(modelName) };
  }
}

// ============================================================================
// GENERATORS
// ============================================================================

/**
 * TextGenerator backed by the AI SDK. Each call is bounded by `llmTimeoutMs`
 * in addition to any caller signal.
 */
export function createAiSdkGenerator(config: PipelineConfig): TextGenerator {
  const modelInfo = getModel(config);
  console.log(`[LLM] Using ${modelInfo.provider}/${modelInfo.modelName}`);

  return {
    async generate(prompt, constraints = {}) {
      const timeout = AbortSignal.timeout(config.llmTimeoutMs);
      const abortSignal =
        constraints.signal && typeof AbortSignal.any === "function"
          ? AbortSignal.any([constraints.signal, timeout])
          : timeout;

      try {
        const result = await generateText({
          model: modelInfo.model,
          system: constraints.system,
          prompt,
          maxOutputTokens: constraints.maxOutputTokens ?? config.llmMaxOutputTokens,
          temperature: constraints.temperature,
          abortSignal,
        });
        return result.text;
      } catch (err) {
        throw new GenerationError(`${modelInfo.provider} generation failed: ${errorMessage(err)}`, 1, err);
      }
    },
  };
}

/**
 * Generator for deployments without a model: every call fails, so every
 * optional step takes its deterministic fallback.
 */
export function createUnavailableGenerator(): TextGenerator {
  return {
    async generate() {
      throw new GenerationError("No text generator configured", 1);
    },
  };
}

export interface RetryPrompt {
  prompt: string;
  /** Shorter prompt used for the single retry */
  simplifiedPrompt: string;
  constraints?: GenerationConstraints;
}

/**
 * Generate once; on failure retry exactly once with the simplified prompt.
 * A second failure (or an aborted run) throws `GenerationError`.
 */
export async function generateWithRetry(generator: TextGenerator, request: RetryPrompt): Promise<string> {
  try {
    return await generator.generate(request.prompt, request.constraints);
  } catch (firstError) {
    if (request.constraints?.signal?.aborted) {
      throw new GenerationError(`Generation aborted: ${errorMessage(firstError)}`, 1, firstError);
    }
    const classified = classifyError(firstError);
    console.warn(`[LLM] Generation failed (${classified.category}); retrying once with simplified prompt`);
    try {
      return await generator.generate(request.simplifiedPrompt, request.constraints);
    } catch (secondError) {
      throw new GenerationError(`Generation failed twice: ${errorMessage(secondError)}`, 2, secondError);
    }
  }
}

const API_KEY_ENV: Record<LlmProvider, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
  mistral: "MISTRAL_API_KEY",
};

/**
 * AI SDK generator when the provider's API key is set, otherwise the
 * unavailable generator (optional steps use their fallbacks).
 */
export function createDefaultGenerator(config: PipelineConfig, env: NodeJS.ProcessEnv = process.env): TextGenerator {
  const keyName = API_KEY_ENV[config.llmProvider];
  if (!env[keyName]) {
    console.warn(`[LLM] ${keyName} not set; text generation disabled, deterministic fallbacks in use`);
    return createUnavailableGenerator();
  }
  return createAiSdkGenerator(config);
}
