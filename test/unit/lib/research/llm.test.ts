import { beforeEach, describe, expect, it, vi } from "vitest";

const generateTextMock = vi.hoisted(() => vi.fn());
vi.mock("ai", () => ({ generateText: generateTextMock }));

import { DEFAULT_PIPELINE_CONFIG } from "@/lib/config-schemas";
import { GenerationError } from "@/lib/research/errors";
import {
  createAiSdkGenerator,
  createDefaultGenerator,
  createUnavailableGenerator,
  generateWithRetry,
  getModel,
} from "@/lib/research/llm";
import { scriptedGenerator } from "@test/helpers/test-helpers";

describe("getModel", () => {
  it("uses the provider default unless a model is configured", () => {
    expect(getModel(DEFAULT_PIPELINE_CONFIG).modelName).toBe("claude-3-5-haiku-20241022");
    expect(getModel({ ...DEFAULT_PIPELINE_CONFIG, llmProvider: "openai", llmModel: "gpt-4o" }).modelName).toBe("gpt-4o");
  });
});

describe("createAiSdkGenerator", () => {
  beforeEach(() => {
    generateTextMock.mockReset();
  });

  it("passes prompt and constraints to generateText", async () => {
    generateTextMock.mockResolvedValue({ text: "three sub-topics" });
    const generator = createAiSdkGenerator(DEFAULT_PIPELINE_CONFIG);

    const text = await generator.generate("Break down coral reefs", { system: "You plan research." });

    expect(text).toBe("three sub-topics");
    const [options] = generateTextMock.mock.calls[0];
    expect(options.prompt).toBe("Break down coral reefs");
    expect(options.system).toBe("You plan research.");
    expect(options.maxOutputTokens).toBe(1000);
    expect(options.abortSignal).toBeInstanceOf(AbortSignal);
  });

  it("wraps SDK failures in GenerationError", async () => {
    generateTextMock.mockRejectedValue(new Error("status 529 overloaded"));
    const generator = createAiSdkGenerator(DEFAULT_PIPELINE_CONFIG);

    try {
      await generator.generate("prompt");
      expect.unreachable("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(GenerationError);
      if (!(err instanceof GenerationError)) return;
      expect(err.message).toBe("anthropic generation failed: status 529 overloaded");
      expect(err.attempts).toBe(1);
    }
  });
});

describe("createDefaultGenerator", () => {
  beforeEach(() => {
    generateTextMock.mockReset();
  });

  it("disables generation when the provider key is missing", async () => {
    const generator = createDefaultGenerator(DEFAULT_PIPELINE_CONFIG, {});

    await expect(generator.generate("prompt")).rejects.toBeInstanceOf(GenerationError);
    expect(generateTextMock).not.toHaveBeenCalled();
  });

  it("uses the AI SDK when the key is set", async () => {
    generateTextMock.mockResolvedValue({ text: "ok" });
    const generator = createDefaultGenerator(DEFAULT_PIPELINE_CONFIG, { ANTHROPIC_API_KEY: "test-secret" });

    expect(await generator.generate("prompt")).toBe("ok");
  });
});

describe("generateWithRetry", () => {
  const request = { prompt: "full prompt", simplifiedPrompt: "short prompt" };

  it("returns the first successful answer", async () => {
    const generator = scriptedGenerator(() => "answer");

    expect(await generateWithRetry(generator, request)).toBe("answer");
    expect(generator.prompts).toEqual(["full prompt"]);
  });

  it("throws after the simplified retry also fails", async () => {
    const generator = createUnavailableGenerator();

    try {
      await generateWithRetry(generator, request);
      expect.unreachable("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(GenerationError);
      if (!(err instanceof GenerationError)) return;
      expect(err.attempts).toBe(2);
      expect(err.message).toBe("Generation failed twice: No text generator configured");
    }
  });

  it("does not retry once the caller's signal has aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const generator = scriptedGenerator(() => {
      throw new Error("aborted");
    });

    await expect(
      generateWithRetry(generator, { ...request, constraints: { signal: controller.signal } }),
    ).rejects.toBeInstanceOf(GenerationError);
    expect(generator.prompts).toEqual(["full prompt"]);
  });
});
