import { describe, it, expect } from "vitest";
import { GenerationFailureError, TimeoutError } from "@scholarqa/errors";
import { EstimatingTokenizer } from "@scholarqa/generation";
import { AnswerGenerator, extractAnswer } from "./answer-generator.js";
import { ANSWER_DELIMITER, buildPrompt } from "./prompt.js";
import { timeoutOnly } from "./service-call.js";
import { ScriptedModel, untilAborted } from "./testing/fakes.js";

const tokenizer = new EstimatingTokenizer();

describe("extractAnswer", () => {
  it("returns the trimmed text after the delimiter", () => {
    expect(extractAnswer("Question: why?\nAnswer:  Because.  ")).toEqual({
      kind: "found",
      answer: "Because.",
    });
  });

  it("uses the last occurrence of the delimiter", () => {
    expect(extractAnswer("Answer: echoed\nAnswer: final")).toEqual({ kind: "found", answer: "final" });
  });

  it("reports a missing delimiter with the raw text untouched", () => {
    expect(extractAnswer("  no marker here ")).toEqual({ kind: "not_found", raw: "  no marker here " });
  });

  it("treats a trailing delimiter as an empty answer", () => {
    expect(extractAnswer("Answer:")).toEqual({ kind: "found", answer: "" });
  });
});

describe("buildPrompt", () => {
  it("embeds the context and question and ends with the delimiter", () => {
    const prompt = buildPrompt("What is attention?", "[1] (Source: Paper)\nAttention is all you need.");

    expect(prompt).toContain("Context:\n[1] (Source: Paper)\nAttention is all you need.\n");
    expect(prompt).toContain("Question: What is attention?");
    expect(prompt.endsWith(`\n${ANSWER_DELIMITER}`)).toBe(true);
  });
});

describe("AnswerGenerator", () => {
  it("leaves a prompt within the input window untouched", () => {
    const generator = new AnswerGenerator(new ScriptedModel(async () => ""), tokenizer);

    expect(generator.preparePrompt("q", "ctx")).toBe(buildPrompt("q", "ctx"));
  });

  it("drops the start of an oversized prompt by default", () => {
    const generator = new AnswerGenerator(new ScriptedModel(async () => ""), tokenizer, {
      maxInputTokens: 10,
    });
    const full = buildPrompt("q", "x".repeat(400));

    const prompt = generator.preparePrompt("q", "x".repeat(400));

    expect(prompt).toBe(full.slice(-40));
    expect(prompt.endsWith(ANSWER_DELIMITER)).toBe(true);
  });

  it("keeps the start of an oversized prompt when truncating on the right", () => {
    const generator = new AnswerGenerator(new ScriptedModel(async () => ""), tokenizer, {
      maxInputTokens: 10,
      truncationSide: "right",
    });

    const prompt = generator.preparePrompt("q", "x".repeat(400));

    expect(prompt).toBe(buildPrompt("q", "x".repeat(400)).slice(0, 40));
  });

  it("passes generation parameters and extracts the answer", async () => {
    const model = new ScriptedModel(async (prompt) => `${prompt} Self-attention.`);
    const generator = new AnswerGenerator(model, tokenizer, {
      maxNewTokens: 32,
      temperature: 0.2,
      sample: false,
    });

    const extraction = await generator.generate("What is used?", "context");

    expect(extraction).toEqual({ kind: "found", answer: "Self-attention." });
    expect(model.params).toEqual([{ maxNewTokens: 32, temperature: 0.2, sample: false }]);
    expect(model.prompts).toEqual([buildPrompt("What is used?", "context")]);
  });

  it("answers with the raw output when the delimiter is missing", async () => {
    const generator = new AnswerGenerator(new ScriptedModel(async () => "just text"), tokenizer);

    expect(await generator.answer("q", "ctx")).toBe("just text");
  });

  it("wraps model errors in GenerationFailureError", async () => {
    const cause = new Error("boom");
    const generator = new AnswerGenerator(
      new ScriptedModel(async () => {
        throw cause;
      }),
      tokenizer,
    );

    const failure = generator.generate("q", "ctx");

    await expect(failure).rejects.toBeInstanceOf(GenerationFailureError);
    await expect(failure).rejects.toMatchObject({
      message: "Generation failed: boom",
      model: "scripted",
      code: "GENERATION_FAILURE",
      cause,
    });
  });

  it("lets a timeout propagate unchanged", async () => {
    const generator = new AnswerGenerator(
      new ScriptedModel((_prompt, signal) => untilAborted(signal, "late")),
      tokenizer,
      {},
      timeoutOnly(10),
    );

    const failure = generator.generate("q", "ctx");

    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    await expect(failure).rejects.toThrow("generate (scripted) timed out after 10ms");
  });
});
