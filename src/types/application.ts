export type QuestionType =
  | "text"
  | "textarea"
  | "select"
  | "radio"
  | "checkbox"
  | "number"
  | "yesNo"
  | "phone"
  | "email"
  | "date"
  | "fileUpload"
  | "unknown";

export interface Question {
  id: string;
  text: string;
  type: QuestionType;
  options: string[];
  required: boolean;
  answer: string;
  preFilled: boolean;
  preFilledValue?: string;
  pageIndex: number;
  /** Adapter-owned locator handle. Stored by the session, never interpreted outside the adapter. */
  fieldRef: string;
  maxLength?: number;
}

export type SessionStatus =
  | "pending"
  | "readyForReview"
  | "approved"
  | "submitting"
  | "submitted"
  | "failed"
  | "cancelled";

export const TERMINAL_STATUSES: readonly SessionStatus[] = ["submitted", "failed", "cancelled"];

export type ActionType =
  | "navigate"
  | "findButton"
  | "surfaceOpen"
  | "formAnalyzed"
  | "fill"
  | "skip"
  | "nextPage"
  | "submit"
  | "success"
  | "approve"
  | "cancel"
  | "reviewWarning"
  | "error";

export interface ApplicationAction {
  readonly timestamp: string;
  readonly type: ActionType;
  readonly description: string;
  readonly success: boolean;
  readonly details?: string;
  readonly durationMs?: number;
}

export interface MessageField {
  pageIndex: number;
  fieldRef: string;
}

export interface ApplicationMetadata {
  matchingSkills: string[];
  addressedRequirements: string[];
  confidenceScore: number;
}
