import crypto from "crypto";
import {
  ActionType,
  ApplicationAction,
  ApplicationMetadata,
  MessageField,
  Question,
  SessionStatus,
} from "../types/application";
import { Job, Platform } from "../types/jobs";
import { IllegalTransitionError, SessionLockedError } from "./errors";
import { canTransition, isEditable, isTerminal } from "./transitions";

export interface ActionOptions {
  success?: boolean;
  details?: string;
  durationMs?: number;
}

export interface SessionSnapshot {
  sessionId: string;
  platform: Platform;
  externalJobId: string;
  jobTitle: string;
  company: string;
  jobUrl: string;
  status: SessionStatus;
  startedAt: string;
  approvedAt?: string;
  completedAt?: string;
  applicationMessage: string;
  matchingSkills: string[];
  addressedRequirements: string[];
  confidenceScore: number;
  totalPages: number;
  currentPage: number;
  questions: Array<Omit<Question, "fieldRef">>;
  actions: ApplicationAction[];
  errorMessage?: string;
}

type Clock = () => Date;

/**
 * One attempt to apply to one job, from Prepare through a terminal status.
 *
 * Every mutator checks the current status; the class is the only place the
 * lifecycle rules live, so adapters, the resolver and the review step cannot
 * bypass them.
 */
export class ApplicationSession {
  readonly id: string;
  readonly platform: Platform;
  readonly externalJobId: string;
  readonly jobTitle: string;
  readonly company: string;
  readonly jobUrl: string;
  readonly startedAt: Date;

  private statusValue: SessionStatus = "pending";
  private approvedAtValue?: Date;
  private completedAtValue?: Date;
  private message = "";
  private questionList: Question[] = [];
  private actionLog: ApplicationAction[] = [];
  private pages = 0;
  private page = 0;
  private metadata: ApplicationMetadata = { matchingSkills: [], addressedRequirements: [], confidenceScore: 0 };
  private error?: string;
  private messageTarget?: MessageField;
  private clock: Clock;

  constructor(job: Job, clock: Clock = () => new Date()) {
    this.clock = clock;
    this.id = crypto.randomUUID();
    this.platform = job.platform;
    this.externalJobId = job.externalJobId;
    this.jobTitle = job.title;
    this.company = job.company;
    this.jobUrl = job.url;
    this.startedAt = clock();
  }

  get status(): SessionStatus {
    return this.statusValue;
  }

  get isTerminal(): boolean {
    return isTerminal(this.statusValue);
  }

  get approvedAt(): Date | undefined {
    return this.approvedAtValue;
  }

  get completedAt(): Date | undefined {
    return this.completedAtValue;
  }

  get applicationMessage(): string {
    return this.message;
  }

  get questions(): ReadonlyArray<Readonly<Question>> {
    return this.questionList;
  }

  get actions(): ReadonlyArray<ApplicationAction> {
    return this.actionLog;
  }

  get totalPages(): number {
    return this.pages;
  }

  get currentPage(): number {
    return this.page;
  }

  get matchingSkills(): readonly string[] {
    return this.metadata.matchingSkills;
  }

  get addressedRequirements(): readonly string[] {
    return this.metadata.addressedRequirements;
  }

  get confidenceScore(): number {
    return this.metadata.confidenceScore;
  }

  get errorMessage(): string | undefined {
    return this.error;
  }

  get messageField(): Readonly<MessageField> | undefined {
    return this.messageTarget;
  }

  findQuestion(questionId: string): Readonly<Question> | undefined {
    return this.questionList.find((question) => question.id === questionId);
  }

  questionsOnPage(pageIndex: number): ReadonlyArray<Readonly<Question>> {
    return this.questionList.filter((question) => question.pageIndex === pageIndex);
  }

  setForm(questions: Question[], totalPages: number, messageField?: MessageField): void {
    if (this.statusValue !== "pending") {
      throw new SessionLockedError("replace the detected form", this.statusValue);
    }
    this.questionList = questions.map((question) => ({ ...question, options: [...question.options] }));
    this.pages = totalPages;
    this.messageTarget = messageField ? { ...messageField } : undefined;
  }

  setMessage(message: string): void {
    this.assertEditable("edit the application message");
    this.message = message;
  }

  setAnswer(questionId: string, answer: string): void {
    this.assertEditable("edit answers");
    const question = this.questionList.find((item) => item.id === questionId);
    if (!question) {
      throw new Error(`Unknown question: ${questionId}`);
    }
    if (question.preFilled) {
      throw new Error(`Question is pre-filled by the site: ${question.text}`);
    }
    question.answer = answer;
  }

  setMetadata(metadata: ApplicationMetadata): void {
    this.assertEditable("edit AI metadata");
    this.metadata = {
      matchingSkills: [...metadata.matchingSkills],
      addressedRequirements: [...metadata.addressedRequirements],
      confidenceScore: clampScore(metadata.confidenceScore),
    };
  }

  setCurrentPage(pageIndex: number): void {
    this.assertOpen("move between pages");
    this.page = pageIndex;
  }

  logAction(type: ActionType, description: string, options: ActionOptions = {}): void {
    this.assertOpen("log actions");
    const action: ApplicationAction = {
      timestamp: this.clock().toISOString(),
      type,
      description,
      success: options.success ?? true,
      ...(options.details !== undefined ? { details: options.details } : {}),
      ...(options.durationMs !== undefined ? { durationMs: options.durationMs } : {}),
    };
    this.actionLog.push(Object.freeze(action));
  }

  transition(to: SessionStatus, reason?: string): void {
    if (!canTransition(this.statusValue, to)) {
      throw new IllegalTransitionError(this.statusValue, to);
    }
    this.statusValue = to;
    if (to === "approved") {
      this.approvedAtValue = this.clock();
    }
    if (reason !== undefined) {
      this.error = reason;
    }
    if (isTerminal(to)) {
      this.completedAtValue = this.clock();
    }
  }

  fail(reason: string): void {
    this.transition("failed", reason);
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.id,
      platform: this.platform,
      externalJobId: this.externalJobId,
      jobTitle: this.jobTitle,
      company: this.company,
      jobUrl: this.jobUrl,
      status: this.statusValue,
      startedAt: this.startedAt.toISOString(),
      approvedAt: this.approvedAtValue?.toISOString(),
      completedAt: this.completedAtValue?.toISOString(),
      applicationMessage: this.message,
      matchingSkills: [...this.metadata.matchingSkills],
      addressedRequirements: [...this.metadata.addressedRequirements],
      confidenceScore: this.metadata.confidenceScore,
      totalPages: this.pages,
      currentPage: this.page,
      questions: this.questionList.map(({ fieldRef: _fieldRef, ...rest }) => ({ ...rest, options: [...rest.options] })),
      actions: [...this.actionLog],
      errorMessage: this.error,
    };
  }

  private assertEditable(operation: string): void {
    if (!isEditable(this.statusValue)) {
      throw new SessionLockedError(operation, this.statusValue);
    }
  }

  private assertOpen(operation: string): void {
    if (isTerminal(this.statusValue)) {
      throw new SessionLockedError(operation, this.statusValue);
    }
  }
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.round(score)));
}
