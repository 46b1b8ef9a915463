import { describe, expect, it } from "vitest";
import {
  clampConfidence,
  extractJson,
  parseApplicationMessage,
  parseQuestionAnswers,
} from "../../src/llm/parse";
import { buildAnswersPrompt, buildMessagePrompt } from "../../src/llm/prompts";

describe("extractJson", () => {
  it("prefers a fenced json block", () => {
    const response = 'Here you go:\n```json\n{"message": "Hi", "nested": {"a": 1}}\n```\nGood luck {not json}';
    expect(extractJson(response)).toEqual({ message: "Hi", nested: { a: 1 } });
  });

  it("falls back to the outer brace span", () => {
    expect(extractJson('Sure! {"answers": {"Q": "A"}} Thanks')).toEqual({ answers: { Q: "A" } });
  });

  it("returns null for prose", () => {
    expect(extractJson("I cannot help with that.")).toBeNull();
  });
});

describe("parseApplicationMessage", () => {
  it("trims the message and fills defaults", () => {
    expect(parseApplicationMessage('{"message": "  I build APIs.  "}')).toEqual({
      message: "I build APIs.",
      addressedRequirements: [],
      matchingSkills: [],
      confidenceScore: 0,
    });
  });

  it("coerces and clamps the confidence score", () => {
    expect(parseApplicationMessage('{"message": "x", "confidenceScore": "140"}')?.confidenceScore).toBe(100);
    expect(parseApplicationMessage('{"message": "x", "confidenceScore": 67.5}')?.confidenceScore).toBe(68);
  });

  it("keeps the message when the confidence score is not a number", () => {
    expect(parseApplicationMessage('{"message": "x", "confidenceScore": "85%"}')).toEqual({
      message: "x",
      addressedRequirements: [],
      matchingSkills: [],
      confidenceScore: 0,
    });
  });

  it("rejects a response without a message", () => {
    expect(parseApplicationMessage('{"text": "Hello"}')).toBeNull();
  });
});

describe("parseQuestionAnswers", () => {
  it("turns scalar answers into strings", () => {
    expect(parseQuestionAnswers('{"answers": {"Years?": 5, "Relocate?": false, "City": "Austin"}}')).toEqual({
      "Years?": "5",
      "Relocate?": "false",
      City: "Austin",
    });
  });

  it("rejects nested answers", () => {
    expect(parseQuestionAnswers('{"answers": {"Q": {"a": 1}}}')).toBeNull();
  });
});

describe("clampConfidence", () => {
  it("bounds the score to 0-100", () => {
    expect(clampConfidence(-5)).toBe(0);
    expect(clampConfidence(Number.NaN)).toBe(0);
  });
});

describe("prompts", () => {
  it("includes the job and profile in the message prompt", () => {
    const prompt = buildMessagePrompt({
      profile: "Backend engineer",
      jobTitle: "API Developer",
      company: "Example Corp",
      jobDescription: "",
    });
    expect(prompt).toContain("- Title: API Developer");
    expect(prompt).toContain("- Description: (not available)");
  });

  it("lists every question with its options", () => {
    const prompt = buildAnswersPrompt({
      profile: "",
      jobTitle: "API Developer",
      company: "Example Corp",
      jobDescription: "Build APIs",
      questions: [{ text: "Work authorization", type: "select", options: ["Citizen", "Visa"], required: true }],
    });
    expect(prompt).toContain("1. Work authorization (select, required) Options: Citizen | Visa");
  });
});
