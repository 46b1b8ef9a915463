import { AdapterRegistry } from "../connectors";
import { AiCollaborator } from "../llm";
import { AuditLogger } from "../logging/auditLogger";
import { createLogger, Logger } from "../logging/logger";
import { Job } from "../types/jobs";
import { ProgressReporter } from "../types/platform";
import { ApprovalDecision, ReviewGate } from "../types/review";
import { resolveAnswers, ResolutionSummary } from "./answerResolver";
import { ApplicationSession } from "./applicationSession";
import { errorMessage, SessionLockedError } from "./errors";
import { reportProgress } from "./progress";
import { canTransition } from "./transitions";

export interface PrepareContext {
  /** Free-text candidate profile. */
  profile: string;
  jobDescription?: string;
}

export interface FlowOptions {
  progress?: ProgressReporter;
  signal?: AbortSignal;
}

export interface SessionControllerDeps {
  registry: AdapterRegistry;
  ai: AiCollaborator;
  audit: AuditLogger;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Sequences one application through Prepare, answer resolution, human review,
 * Approve or Cancel, and Submit. Every session reaching a terminal status is
 * audited exactly once.
 */
export class SessionController {
  private registry: AdapterRegistry;
  private ai: AiCollaborator;
  private audit: AuditLogger;
  private logger: Logger;
  private clock?: () => Date;
  private finalized = new Set<string>();
  private lastResolution?: ResolutionSummary;

  constructor(deps: SessionControllerDeps) {
    this.registry = deps.registry;
    this.ai = deps.ai;
    this.audit = deps.audit;
    this.logger = deps.logger ?? createLogger("controller");
    this.clock = deps.clock;
  }

  /** Summary of the most recent answer resolution, if one ran. */
  get resolution(): ResolutionSummary | undefined {
    return this.lastResolution;
  }

  async prepare(job: Job, context: PrepareContext, options: FlowOptions = {}): Promise<ApplicationSession> {
    const adapter = this.registry.get(job.platform);
    this.lastResolution = undefined;

    const prepared = await adapter.prepareApplication(job, options.progress, options.signal);
    const session = prepared ?? new ApplicationSession(job, this.clock);
    if (!prepared) {
      this.forceFail(session, "Platform adapter is not ready");
    }

    if (session.status === "pending") {
      this.forceFail(session, "Preparation did not complete");
    }
    if (session.status !== "readyForReview") {
      this.finalize(session);
      return session;
    }

    reportProgress(options.progress, "Generating application message and answers", this.logger);
    this.lastResolution = await resolveAnswers(session, this.ai, {
      profile: context.profile,
      jobDescription: context.jobDescription ?? "",
      signal: options.signal,
      logger: this.logger,
    });

    if (options.signal?.aborted) {
      await this.cancel(session);
    }
    return session;
  }

  approve(session: ApplicationSession, decision: Omit<ApprovalDecision, "outcome">): void {
    if (session.status !== "readyForReview") {
      throw new SessionLockedError("approve", session.status);
    }

    session.setMessage(decision.message);
    for (const [questionId, answer] of Object.entries(decision.answers)) {
      const question = session.findQuestion(questionId);
      if (!question || question.preFilled) {
        continue;
      }
      session.setAnswer(questionId, answer);
    }

    const unanswered = session.questions.filter(
      (question) =>
        question.required &&
        !question.preFilled &&
        question.type !== "unknown" &&
        question.type !== "fileUpload" &&
        question.answer.trim().length === 0
    );
    if (unanswered.length > 0) {
      session.logAction("reviewWarning", `${unanswered.length} required questions have no answer`, {
        success: false,
        details: unanswered.map((question) => question.text).join("; "),
      });
    }

    session.logAction("approve", "Approved by reviewer");
    session.transition("approved");
  }

  async cancel(session: ApplicationSession): Promise<void> {
    if (session.status !== "readyForReview") {
      throw new SessionLockedError("cancel", session.status);
    }
    const adapter = this.registry.get(session.platform);
    await adapter.cancelApplication();
    session.logAction("cancel", "Cancelled by reviewer");
    session.transition("cancelled");
    this.finalize(session);
  }

  async submit(session: ApplicationSession, options: FlowOptions = {}): Promise<boolean> {
    if (session.status !== "approved") {
      throw new SessionLockedError("submit", session.status);
    }
    const adapter = this.registry.get(session.platform);
    try {
      await adapter.submitApplication(session, options.progress, options.signal);
    } catch (error) {
      this.forceFail(session, errorMessage(error));
    }
    if (!session.isTerminal) {
      this.forceFail(session, "Submission ended without a final status");
    }
    this.finalize(session);
    return session.status === "submitted";
  }

  async run(job: Job, context: PrepareContext, gate: ReviewGate, options: FlowOptions = {}): Promise<ApplicationSession> {
    const session = await this.prepare(job, context, options);
    if (session.status !== "readyForReview") {
      return session;
    }

    let decision;
    try {
      decision = await gate.review(session);
    } catch (error) {
      this.logger.error(`Review failed: ${errorMessage(error)}`);
      await this.cancel(session);
      throw error;
    }
    if (decision.outcome === "cancel" || options.signal?.aborted) {
      await this.cancel(session);
      return session;
    }

    this.approve(session, decision);
    await this.submit(session, options);
    return session;
  }

  private forceFail(session: ApplicationSession, reason: string): void {
    if (session.status === "approved") {
      session.transition("submitting");
    }
    if (!canTransition(session.status, "failed")) {
      return;
    }
    this.logger.error(`Application ${session.id} failed: ${reason}`);
    session.logAction("error", reason, { success: false });
    session.fail(reason);
  }

  private finalize(session: ApplicationSession): void {
    if (!session.isTerminal || this.finalized.has(session.id)) {
      return;
    }
    this.finalized.add(session.id);
    this.audit.record(session);
  }
}
