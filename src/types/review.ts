import { ApplicationSession } from "../core/applicationSession";

export interface ApprovalDecision {
  outcome: "approve";
  message: string;
  /** Edited answers keyed by question id. */
  answers: Record<string, string>;
}

export type ReviewDecision = ApprovalDecision | { outcome: "cancel" };

export interface ReviewGate {
  review(session: ApplicationSession): Promise<ReviewDecision>;
}
