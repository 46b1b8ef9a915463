import { describe, expect, it } from "vitest";
import { ApplicationSession } from "../../src/core/applicationSession";
import { IllegalTransitionError, SessionLockedError } from "../../src/core/errors";
import { canTransition, isEditable, isTerminal, nextStatuses } from "../../src/core/transitions";
import { Question, SessionStatus } from "../../src/types/application";
import { testJob } from "../helpers/fixtures";

function questions(): Question[] {
  return [
    {
      id: "q1-1",
      text: "Years of experience?",
      type: "number",
      options: [],
      required: true,
      answer: "",
      preFilled: false,
      pageIndex: 0,
      fieldRef: "control:years",
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
  ];
}

function fixedClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
}

function readySession(): ApplicationSession {
  const session = new ApplicationSession(testJob(), fixedClock());
  session.setForm(questions(), 1);
  session.transition("readyForReview");
  return session;
}

describe("transitions", () => {
  it("allows only the lifecycle edges", () => {
    expect(nextStatuses("pending")).toEqual(["readyForReview", "failed"]);
    expect(canTransition("readyForReview", "approved")).toBe(true);
    expect(canTransition("readyForReview", "failed")).toBe(false);
    expect(canTransition("approved", "submitted")).toBe(false);
    expect(canTransition("submitting", "failed")).toBe(true);
  });

  it.each<SessionStatus>(["submitted", "failed", "cancelled"])("%s is terminal with no exits", (status) => {
    expect(isTerminal(status)).toBe(true);
    expect(nextStatuses(status)).toEqual([]);
  });

  it("permits edits only before approval", () => {
    expect(isEditable("pending")).toBe(true);
    expect(isEditable("readyForReview")).toBe(true);
    expect(isEditable("approved")).toBe(false);
  });
});

describe("ApplicationSession", () => {
  it("copies the job and starts pending", () => {
    const session = new ApplicationSession(testJob(), fixedClock());
    expect(session.status).toBe("pending");
    expect(session.externalJobId).toBe("4000000001");
    expect(session.startedAt.toISOString()).toBe("2026-01-01T00:00:00.000Z");
  });

  it("stamps approval and completion times", () => {
    const session = readySession();
    session.transition("approved");
    session.transition("submitting");
    session.transition("submitted");

    expect(session.approvedAt?.toISOString()).toBe("2026-01-01T00:00:01.000Z");
    expect(session.completedAt?.toISOString()).toBe("2026-01-01T00:00:02.000Z");
    expect(session.isTerminal).toBe(true);
  });

  it("rejects illegal transitions", () => {
    const session = readySession();
    expect(() => session.transition("submitted")).toThrow(IllegalTransitionError);
    expect(session.status).toBe("readyForReview");
  });

  it("records the failure reason", () => {
    const session = new ApplicationSession(testJob());
    session.fail("Application form did not open");
    expect(session.status).toBe("failed");
    expect(session.errorMessage).toBe("Application form did not open");
    expect(session.completedAt).toBeDefined();
  });

  it("refuses to answer a pre-filled question", () => {
    const session = readySession();
    session.setAnswer("q1-1", "5");
    expect(session.findQuestion("q1-1")?.answer).toBe("5");
    expect(() => session.setAnswer("q1-2", "b@example.test")).toThrow("pre-filled");
    expect(() => session.setAnswer("q9-9", "x")).toThrow("Unknown question");
  });

  it("locks the message and answers after approval", () => {
    const session = readySession();
    session.transition("approved");
    expect(() => session.setMessage("Changed")).toThrow(SessionLockedError);
    expect(() => session.setAnswer("q1-1", "6")).toThrow(SessionLockedError);
  });

  it("refuses to log actions once terminal", () => {
    const session = readySession();
    session.transition("cancelled");
    expect(() => session.logAction("fill", "late")).toThrow(SessionLockedError);
  });

  it("only accepts a form while pending", () => {
    const session = readySession();
    expect(() => session.setForm([], 1)).toThrow(SessionLockedError);
  });

  it("clamps and rounds the confidence score", () => {
    const session = readySession();
    session.setMetadata({ matchingSkills: ["TypeScript"], addressedRequirements: [], confidenceScore: 140 });
    expect(session.confidenceScore).toBe(100);
    session.setMetadata({ matchingSkills: [], addressedRequirements: [], confidenceScore: 72.6 });
    expect(session.confidenceScore).toBe(73);
  });

  it("does not share the question list with its caller", () => {
    const source = questions();
    const session = new ApplicationSession(testJob());
    session.setForm(source, 1);
    source[0].answer = "mutated";
    expect(session.findQuestion("q1-1")?.answer).toBe("");
  });

  it("snapshots without adapter locators", () => {
    const session = readySession();
    session.logAction("fill", "Years of experience?", { details: "5", durationMs: 12 });

    const snapshot = session.snapshot();

    expect(snapshot.status).toBe("readyForReview");
    expect(snapshot.questions[0]).not.toHaveProperty("fieldRef");
    expect(snapshot.actions[0]).toEqual({
      timestamp: "2026-01-01T00:00:01.000Z",
      type: "fill",
      description: "Years of experience?",
      success: true,
      details: "5",
      durationMs: 12,
    });
  });
});
