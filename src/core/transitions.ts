import { SessionStatus, TERMINAL_STATUSES } from "../types/application";

const LEGAL_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  pending: ["readyForReview", "failed"],
  readyForReview: ["approved", "cancelled"],
  approved: ["submitting"],
  submitting: ["submitted", "failed"],
  submitted: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

export function nextStatuses(from: SessionStatus): readonly SessionStatus[] {
  return LEGAL_TRANSITIONS[from];
}

export function isTerminal(status: SessionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Statuses in which the message, answers and AI metadata may still be edited. */
export function isEditable(status: SessionStatus): boolean {
  return status === "pending" || status === "readyForReview";
}
