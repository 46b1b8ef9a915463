import { PassThrough } from "stream";
import { describe, expect, it } from "vitest";
import { confidenceLevel, createTerminalReviewGate, formatReviewSummary } from "../../src/cli/review";
import { buildFilter, jobFromUrl } from "../../src/cli/run";
import { defaultConfig } from "../../src/config";
import { ApplicationSession } from "../../src/core/applicationSession";
import { Question } from "../../src/types/application";
import { testJob } from "../helpers/fixtures";

function reviewSession(): ApplicationSession {
  const questions: Question[] = [
    {
      id: "q1-1",
      text: "Work authorization",
      type: "select",
      options: ["Citizen", "Visa holder"],
      required: true,
      answer: "",
      preFilled: false,
      pageIndex: 0,
      fieldRef: "control:auth",
    },
    {
      id: "q1-2",
      text: "Email address",
      type: "email",
      options: [],
      required: true,
      answer: "",
      preFilled: true,
      preFilledValue: "a@example.test",
      pageIndex: 0,
      fieldRef: "control:email",
    },
    {
      id: "q2-1",
      text: "Signature pad",
      type: "unknown",
      options: [],
      required: false,
      answer: "",
      preFilled: false,
      pageIndex: 1,
      fieldRef: "control:sig",
    },
  ];
  const session = new ApplicationSession(testJob());
  session.setForm(questions, 2);
  session.transition("readyForReview");
  session.setMessage("I build APIs.");
  session.setAnswer("q1-1", "Citizen");
  session.setMetadata({ matchingSkills: ["Node.js", "SQL"], addressedRequirements: [], confidenceScore: 64 });
  return session;
}

describe("confidenceLevel", () => {
  it("buckets the score", () => {
    expect(confidenceLevel(80)).toBe("High");
    expect(confidenceLevel(79)).toBe("Medium");
    expect(confidenceLevel(60)).toBe("Medium");
    expect(confidenceLevel(59)).toBe("Low");
  });
});

describe("formatReviewSummary", () => {
  it("lists reviewable questions without the pre-filled ones", () => {
    const session = reviewSession();

    const summary = formatReviewSummary(session, session.applicationMessage, { "q1-1": "Citizen" });

    expect(summary.split("\n")).toEqual([
      "Backend Engineer at Example Corp",
      "Confidence: 64 (Medium)",
      "Matching skills: Node.js, SQL",
      "",
      "Message:",
      "I build APIs.",
      "",
      "Questions (2, 1 unrecognised):",
      "  1. Work authorization [select, page 1, required]",
      "     options: Citizen | Visa holder",
      "     answer: Citizen",
      "  2. Signature pad [unknown, page 2]",
      "     answer: (none)",
    ]);
  });
});

describe("createTerminalReviewGate", () => {
  async function decide(line: string) {
    const input = new PassThrough();
    const output = new PassThrough();
    output.resume();
    const review = createTerminalReviewGate({ input, output }).review(reviewSession());
    input.write(line);
    return review;
  }

  it("approves with the session's draft", async () => {
    expect(await decide("a\n")).toEqual({
      outcome: "approve",
      message: "I build APIs.",
      answers: { "q1-1": "Citizen", "q2-1": "" },
    });
  });

  it("cancels", async () => {
    expect(await decide("c\n")).toEqual({ outcome: "cancel" });
  });

  it("cancels when the input ends before a choice", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    output.resume();
    const review = createTerminalReviewGate({ input, output }).review(reviewSession());
    input.end();
    expect(await review).toEqual({ outcome: "cancel" });
  });

  it("cancels when the input ends while editing the message", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    output.resume();
    const review = createTerminalReviewGate({ input, output }).review(reviewSession());
    input.end("m\n");
    expect(await review).toEqual({ outcome: "cancel" });
  });
});

describe("cli helpers", () => {
  it("builds a search filter from flags over the configured defaults", () => {
    const defaults = { ...defaultConfig().search, keywords: "typescript", maxResults: 25 };
    const filter = buildFilter(["--location", "Austin, Remote", "--remote", "--max", "7.9"], defaults);
    expect(filter).toEqual({
      keywords: "typescript",
      locations: ["Austin", "Remote"],
      remoteOnly: true,
      experienceLevels: [],
      maxResults: 7,
    });
  });

  it("turns a posting url into a job", () => {
    expect(jobFromUrl("linkedin", "https://www.linkedin.com/jobs/view/4012345678/?trk=x")).toEqual({
      platform: "linkedin",
      externalJobId: "4012345678",
      title: "Unknown title",
      company: "Unknown company",
      location: "Unknown",
      url: "https://www.linkedin.com/jobs/view/4012345678/",
    });
  });
});
