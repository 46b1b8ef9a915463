import { describe, expect, it } from "vitest";
import { fillQuestion, fitToLength, matchOption } from "../../src/forms/filler";
import { Question } from "../../src/types/application";
import { control, FakeApplicationPage, group, instantPacing } from "../helpers/fixtures";

function question(overrides: Partial<Question>): Question {
  return {
    id: "q1-1",
    text: "Question",
    type: "text",
    options: [],
    required: false,
    answer: "",
    preFilled: false,
    pageIndex: 0,
    fieldRef: "control:q",
    ...overrides,
  };
}

describe("matchOption", () => {
  const options = ["United States", "United Kingdom", "Canada"];

  it("prefers an exact case-insensitive match", () => {
    expect(matchOption(["Yes, sponsored", "Yes"], "yes")).toBe("Yes");
  });

  it("falls back to an option containing the answer", () => {
    expect(matchOption(options, "kingdom")).toBe("United Kingdom");
  });

  it("then to an answer containing the option", () => {
    expect(matchOption(options, "I live in Canada")).toBe("Canada");
  });

  it("returns null for blank or unmatched answers", () => {
    expect(matchOption(options, "  ")).toBeNull();
    expect(matchOption(options, "Mexico")).toBeNull();
  });
});

describe("fitToLength", () => {
  it("truncates only past the limit", () => {
    expect(fitToLength("abcdef", 4)).toBe("abcd");
    expect(fitToLength("abc", 4)).toBe("abc");
    expect(fitToLength("abc", undefined)).toBe("abc");
  });
});

describe("fillQuestion", () => {
  const pacing = instantPacing();

  it("types text answers cut to the field's length limit", async () => {
    const page = new FakeApplicationPage([]);
    const field = group("control:years", "Years", [control({ ref: "years" })]);

    const result = await fillQuestion(
      page,
      question({ answer: "5 years of experience", maxLength: 7 }),
      field,
      pacing
    );

    expect(result).toEqual({ success: true, skipped: false, details: "5 years" });
    expect(page.typed.get("years")).toBe("5 years");
    expect(page.clicks).toEqual(["years"]);
  });

  it("selects the matching option", async () => {
    const page = new FakeApplicationPage([]);
    const field = group("control:country", "Country", [
      control({ ref: "country", tag: "select", inputType: "", options: ["United States", "Canada"] }),
    ]);

    const result = await fillQuestion(page, question({ type: "select", answer: "canada" }), field, pacing);

    expect(result.details).toBe("Canada");
    expect(page.selected.get("country")).toBe("Canada");
  });

  it("fails a select answer that matches nothing", async () => {
    const page = new FakeApplicationPage([]);
    const field = group("control:country", "Country", [
      control({ ref: "country", tag: "select", inputType: "", options: ["United States"] }),
    ]);

    const result = await fillQuestion(page, question({ type: "select", answer: "Mexico" }), field, pacing);

    expect(result).toEqual({ success: false, skipped: false, details: 'No option matches "Mexico"' });
    expect(page.selected.size).toBe(0);
  });

  it("reads the first word of a yes/no answer", async () => {
    const page = new FakeApplicationPage([]);
    const field = group("control:relocate", "Relocate?", [
      control({ ref: "r-yes", inputType: "radio", label: "Yes" }),
      control({ ref: "r-no", inputType: "radio", label: "No" }),
    ]);

    const result = await fillQuestion(
      page,
      question({ type: "yesNo", answer: "No, I prefer remote work", options: ["Yes", "No"] }),
      field,
      pacing
    );

    expect(result.details).toBe("No");
    expect(page.clicks).toEqual(["r-no"]);
  });

  it("ticks a lone consent checkbox on an affirmative answer", async () => {
    const page = new FakeApplicationPage([]);
    const field = group("control:terms", "I agree to the terms", [
      control({ ref: "terms", inputType: "checkbox", label: "I agree" }),
    ]);

    const result = await fillQuestion(page, question({ type: "checkbox", answer: "yes" }), field, pacing);

    expect(result.success).toBe(true);
    expect(page.clicks).toEqual(["terms"]);
  });

  it("ticks listed checkboxes that are not already checked", async () => {
    const page = new FakeApplicationPage([]);
    page.checked.add("go");
    const field = group("control:langs", "Languages", [
      control({ ref: "go", inputType: "checkbox", label: "Go" }),
      control({ ref: "rust", inputType: "checkbox", label: "Rust" }),
      control({ ref: "java", inputType: "checkbox", label: "Java" }),
    ]);

    const result = await fillQuestion(page, question({ type: "checkbox", answer: "Go, Rust" }), field, pacing);

    expect(result.details).toBe("Go, Rust");
    expect(page.clicks).toEqual(["rust"]);
  });

  it("fails an empty answer without touching the page", async () => {
    const page = new FakeApplicationPage([]);
    const field = group("control:q", "Question", [control({ ref: "q" })]);

    const result = await fillQuestion(page, question({ answer: "   " }), field, pacing);

    expect(result).toEqual({ success: false, skipped: false, details: "No answer provided" });
    expect(page.clicks).toEqual([]);
  });

  it("skips file uploads and unknown fields", async () => {
    const page = new FakeApplicationPage([]);
    const field = group("control:q", "Question", [control({ ref: "q", inputType: "file" })]);

    expect(await fillQuestion(page, question({ type: "fileUpload", answer: "cv.pdf" }), field, pacing)).toEqual({
      success: true,
      skipped: true,
      details: "File uploads are not automated",
    });
    expect((await fillQuestion(page, question({ type: "unknown" }), field, pacing)).skipped).toBe(true);
  });
});
