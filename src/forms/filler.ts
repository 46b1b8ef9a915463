import { PacingGovernor } from "../automation/pacing";
import { AutomationPage, ControlSnapshot, FieldGroupSnapshot } from "../automation/session";
import { Question } from "../types/application";
import { isAffirmative, isNegative } from "./inspector";

export interface FillResult {
  success: boolean;
  /** True when the question type is never filled automatically. */
  skipped: boolean;
  details: string;
}

const TEXT_TYPES = new Set(["text", "textarea", "number", "phone", "email", "date"]);

/** Exact (case-insensitive) match first, then option-contains-answer, then answer-contains-option. */
export function matchOption(options: readonly string[], answer: string): string | null {
  const needle = answer.trim().toLowerCase();
  if (!needle) {
    return null;
  }
  const normalized = options.map((option) => ({ option, value: option.trim().toLowerCase() }));
  const exact = normalized.find((entry) => entry.value === needle);
  if (exact) {
    return exact.option;
  }
  const containing = normalized.find((entry) => entry.value.length > 0 && entry.value.includes(needle));
  if (containing) {
    return containing.option;
  }
  const contained = normalized.find((entry) => entry.value.length > 0 && needle.includes(entry.value));
  return contained ? contained.option : null;
}

export function fitToLength(value: string, maxLength: number | undefined): string {
  if (maxLength === undefined || value.length <= maxLength) {
    return value;
  }
  return value.slice(0, maxLength);
}

export async function typeInto(
  page: AutomationPage,
  control: ControlSnapshot,
  value: string,
  pacing: PacingGovernor,
  signal?: AbortSignal
): Promise<void> {
  await page.click(control.ref);
  await page.clear(control.ref);
  await pacing.typeText(value, (character) => page.typeCharacter(control.ref, character), signal);
}

export async function fillQuestion(
  page: AutomationPage,
  question: Readonly<Question>,
  group: FieldGroupSnapshot,
  pacing: PacingGovernor,
  signal?: AbortSignal
): Promise<FillResult> {
  if (question.type === "fileUpload") {
    return { success: true, skipped: true, details: "File uploads are not automated" };
  }
  if (question.type === "unknown") {
    return { success: true, skipped: true, details: "Unrecognised field type" };
  }

  const answer = question.answer.trim();
  if (!answer) {
    return failed("No answer provided");
  }

  if (TEXT_TYPES.has(question.type)) {
    const control = group.controls.find((item) => item.tag === "textarea" || (item.tag === "input" && isTextInput(item)));
    if (!control) {
      return failed("Text control not found");
    }
    const value = fitToLength(answer, question.maxLength);
    await typeInto(page, control, value, pacing, signal);
    return filled(value);
  }

  if (question.type === "select") {
    const control = group.controls.find((item) => item.tag === "select");
    const option = control ? matchOption(control.options, answer) : null;
    if (!control || !option) {
      return failed(`No option matches "${answer}"`);
    }
    await page.selectOption(control.ref, option);
    return filled(option);
  }

  if (question.type === "yesNo" || question.type === "radio") {
    const radios = group.controls.filter((item) => item.inputType === "radio");
    const target = question.type === "yesNo" ? pickBoolean(radios, answer) : pickByLabel(radios, answer);
    if (!target) {
      return failed(`No option matches "${answer}"`);
    }
    await page.click(target.ref);
    return filled(target.label);
  }

  const checkboxes = group.controls.filter((item) => item.inputType === "checkbox");
  const targets = checkboxTargets(checkboxes, answer);
  if (targets.length === 0) {
    return failed(`No option matches "${answer}"`);
  }
  for (const target of targets) {
    if (!(await page.isChecked(target.ref))) {
      await page.click(target.ref);
    }
  }
  return filled(targets.map((target) => target.label).join(", "));
}

function isTextInput(control: ControlSnapshot): boolean {
  return !["radio", "checkbox", "file", "submit", "button"].includes(control.inputType);
}

function pickByLabel(controls: ControlSnapshot[], answer: string): ControlSnapshot | undefined {
  const option = matchOption(
    controls.map((control) => control.label),
    answer
  );
  return option === null ? undefined : controls.find((control) => control.label === option);
}

function pickBoolean(controls: ControlSnapshot[], answer: string): ControlSnapshot | undefined {
  const head = answer.trim().split(/[\s,.!]+/)[0] ?? "";
  if (isAffirmative(head)) {
    return controls.find((control) => isAffirmative(control.label));
  }
  if (isNegative(head)) {
    return controls.find((control) => isNegative(control.label));
  }
  return pickByLabel(controls, answer);
}

function checkboxTargets(controls: ControlSnapshot[], answer: string): ControlSnapshot[] {
  // A lone checkbox is a consent toggle: any affirmative answer ticks it.
  if (controls.length === 1 && isAffirmative(answer)) {
    return controls;
  }
  const wanted = answer
    .split(/[,;\n]/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  const picked: ControlSnapshot[] = [];
  for (const part of wanted) {
    const target = pickByLabel(controls, part);
    if (target && !picked.includes(target)) {
      picked.push(target);
    }
  }
  return picked;
}

function filled(details: string): FillResult {
  return { success: true, skipped: false, details };
}

function failed(details: string): FillResult {
  return { success: false, skipped: false, details };
}
