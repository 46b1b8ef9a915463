import { ButtonSnapshot, ControlSnapshot, FieldGroupSnapshot } from "../automation/session";
import { MessageField, Question, QuestionType } from "../types/application";

export type NavigationKind = "submit" | "review" | "next" | "none";

export interface NavigationControl {
  kind: NavigationKind;
  ref: string;
  text: string;
}

export interface NavigationPatterns {
  submit: RegExp;
  review: RegExp;
  next: RegExp;
}

export const DEFAULT_NAVIGATION_PATTERNS: NavigationPatterns = {
  submit: /\bsubmit\b|\bsend (application|proposal)\b/i,
  review: /\breview\b/i,
  next: /\b(next|continue)\b/i,
};

const AFFIRMATIVE = new Set(["yes", "y", "true"]);
const NEGATIVE = new Set(["no", "n", "false"]);
const SINGLE_LINE_TYPES = new Map<string, QuestionType>([
  ["text", "text"],
  ["search", "text"],
  ["url", "text"],
  ["tel", "phone"],
  ["email", "email"],
  ["number", "number"],
  ["date", "date"],
]);
const MIN_LABEL_LENGTH = 3;

export function isAffirmative(value: string): boolean {
  return AFFIRMATIVE.has(value.trim().toLowerCase());
}

export function isNegative(value: string): boolean {
  return NEGATIVE.has(value.trim().toLowerCase());
}

export interface PageInspection {
  questions: Question[];
  /** Key of the group holding the cover message, when the page has one. */
  messageFieldRef?: string;
}

export interface InspectOptions {
  messageLabelPattern?: RegExp;
}

export function inspectPage(groups: FieldGroupSnapshot[], pageIndex: number, options: InspectOptions = {}): PageInspection {
  const questions: Question[] = [];
  let messageFieldRef: string | undefined;

  for (const group of groups) {
    const question = classifyGroup(group, pageIndex, `q${pageIndex + 1}-${questions.length + 1}`);
    if (!question) {
      continue;
    }
    const isText = question.type === "text" || question.type === "textarea";
    if (
      messageFieldRef === undefined &&
      isText &&
      options.messageLabelPattern &&
      options.messageLabelPattern.test(question.text)
    ) {
      messageFieldRef = question.fieldRef;
      continue;
    }
    questions.push(question);
  }

  return { questions, messageFieldRef };
}

/** Returns null for groups that carry no usable label or no controls. */
export function classifyGroup(group: FieldGroupSnapshot, pageIndex: number, id: string): Question | null {
  const text = group.label.trim();
  if (text.length < MIN_LABEL_LENGTH || group.controls.length === 0) {
    return null;
  }

  const base: Omit<Question, "type"> = {
    id,
    text,
    options: [],
    required: group.controls.some((control) => control.required),
    answer: "",
    preFilled: false,
    pageIndex,
    fieldRef: group.key,
  };

  const singleLine = group.controls.find((control) => control.tag === "input" && SINGLE_LINE_TYPES.has(control.inputType));
  if (singleLine) {
    const type = SINGLE_LINE_TYPES.get(singleLine.inputType) ?? "text";
    return withValue({ ...base, type }, singleLine.value, singleLine.maxLength);
  }

  const textarea = group.controls.find((control) => control.tag === "textarea");
  if (textarea) {
    return withValue({ ...base, type: "textarea" }, textarea.value, textarea.maxLength);
  }

  const select = group.controls.find((control) => control.tag === "select");
  if (select) {
    return withValue({ ...base, type: "select", options: [...select.options] }, select.value, null);
  }

  const radios = controlsOfType(group, "radio");
  if (radios.length > 0) {
    const options = radios.map((control) => control.label);
    const type: QuestionType = isYesNo(options) ? "yesNo" : "radio";
    const checked = radios.find((control) => control.checked);
    return withValue({ ...base, type, options }, checked ? checked.label : "", null);
  }

  const checkboxes = controlsOfType(group, "checkbox");
  if (checkboxes.length > 0) {
    const checked = checkboxes.filter((control) => control.checked).map((control) => control.label);
    return withValue(
      { ...base, type: "checkbox", options: checkboxes.map((control) => control.label) },
      checked.join(", "),
      null
    );
  }

  const file = controlsOfType(group, "file")[0];
  if (file) {
    return withValue({ ...base, type: "fileUpload" }, group.attachedFile || file.value, null);
  }

  return { ...base, type: "unknown" };
}

function controlsOfType(group: FieldGroupSnapshot, inputType: string): ControlSnapshot[] {
  return group.controls.filter((control) => control.tag === "input" && control.inputType === inputType);
}

function isYesNo(options: string[]): boolean {
  if (options.length !== 2) {
    return false;
  }
  const [first, second] = options;
  return (isAffirmative(first) && isNegative(second)) || (isNegative(first) && isAffirmative(second));
}

function withValue(question: Question, value: string, maxLength: number | null): Question {
  const trimmed = value.trim();
  const result: Question = { ...question };
  if (maxLength !== null) {
    result.maxLength = maxLength;
  }
  if (trimmed.length > 0) {
    result.preFilled = true;
    result.preFilledValue = trimmed;
  }
  return result;
}

export function classifyNavigation(
  buttons: ButtonSnapshot[],
  patterns: NavigationPatterns = DEFAULT_NAVIGATION_PATTERNS
): NavigationControl {
  const enabled = buttons.filter((button) => !button.disabled);
  const order: Array<Exclude<NavigationKind, "none">> = ["submit", "review", "next"];
  for (const kind of order) {
    const match = enabled.find((button) => patterns[kind].test(button.text) || patterns[kind].test(button.ariaLabel));
    if (match) {
      return { kind, ref: match.ref, text: match.text || match.ariaLabel };
    }
  }
  return { kind: "none", ref: "", text: "" };
}

export interface FormSurface {
  readFields(): Promise<FieldGroupSnapshot[]>;
  readButtons(): Promise<ButtonSnapshot[]>;
  advance(control: NavigationControl, signal?: AbortSignal): Promise<void>;
}

export interface TraversalOptions extends InspectOptions {
  maxPages: number;
  navigationPatterns?: NavigationPatterns;
  signal?: AbortSignal;
  onPage?: (pageIndex: number, questionCount: number, navigation: NavigationKind) => void;
}

export interface FormTraversal {
  questions: Question[];
  totalPages: number;
  messageField?: MessageField;
  reachedPageCap: boolean;
  finalNavigation: NavigationKind;
}

/**
 * Walks the form page by page without filling anything, stopping at the first
 * Submit control, at a page with no navigation, or at `maxPages`.
 */
export async function traverseForm(surface: FormSurface, options: TraversalOptions): Promise<FormTraversal> {
  const maxPages = Math.max(1, Math.floor(options.maxPages));
  const questions: Question[] = [];
  let messageField: MessageField | undefined;

  for (let pageIndex = 0; ; pageIndex += 1) {
    options.signal?.throwIfAborted();

    const inspection = inspectPage(await surface.readFields(), pageIndex, options);
    questions.push(...inspection.questions);
    if (!messageField && inspection.messageFieldRef !== undefined) {
      messageField = { pageIndex, fieldRef: inspection.messageFieldRef };
    }

    const navigation = classifyNavigation(await surface.readButtons(), options.navigationPatterns);
    options.onPage?.(pageIndex, inspection.questions.length, navigation.kind);

    const totalPages = pageIndex + 1;
    if (navigation.kind === "submit" || navigation.kind === "none") {
      return { questions, totalPages, messageField, reachedPageCap: false, finalNavigation: navigation.kind };
    }
    if (totalPages >= maxPages) {
      return { questions, totalPages, messageField, reachedPageCap: true, finalNavigation: navigation.kind };
    }
    await surface.advance(navigation, options.signal);
  }
}
