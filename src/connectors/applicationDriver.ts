import path from "path";
import { AutomationConfig } from "../config";
import { PacingGovernor } from "../automation/pacing";
import { AutomationPage, FieldGroupSnapshot } from "../automation/session";
import { ApplicationSession } from "../core/applicationSession";
import { errorMessage, isAbortError } from "../core/errors";
import { reportProgress } from "../core/progress";
import { canTransition } from "../core/transitions";
import { createPageFormSurface, FormSelectors } from "../forms/engine";
import { fillQuestion, fitToLength, typeInto } from "../forms/filler";
import { classifyNavigation, traverseForm } from "../forms/inspector";
import { LoginProfile, readLoginStatus } from "./login";
import { Logger } from "../logging/logger";
import { Job, Platform } from "../types/jobs";
import { ProgressReporter } from "../types/platform";

/** Per-site selectors that parameterize the shared application flow. */
export interface SiteProfile extends FormSelectors {
  platform: Platform;
  entryPointSelectors: string[];
  entryPointText?: RegExp;
  /** Appears once the application form has rendered. */
  surfaceSelector: string;
  backSelectors: string[];
  dismissSelectors: string[];
  discardSelectors: string[];
  successSelectors: string[];
  errorSelectors: string[];
  confirmationDismissSelectors: string[];
  login: LoginProfile;
}

/** Resolves a reason to stop before the entry point is clicked, or null to go on. */
export type Preflight = (page: AutomationPage, job: Job) => Promise<string | null>;

export interface ApplicationDriverDeps {
  profile: SiteProfile;
  getPage: () => Promise<AutomationPage | null>;
  pacing: PacingGovernor;
  automation: AutomationConfig;
  logger: Logger;
  preflight?: Preflight;
  screenshotDir?: string;
  clock?: () => Date;
}

export interface ApplicationDriver {
  prepare(job: Job, progress?: ProgressReporter, signal?: AbortSignal): Promise<ApplicationSession | null>;
  submit(session: ApplicationSession, progress?: ProgressReporter, signal?: AbortSignal): Promise<boolean>;
  cancel(): Promise<void>;
}

export const BUSY_MESSAGE = "Adapter is busy with another application";

type SubmitOutcome = { submitted: true } | { submitted: false; reason: string };

export function createApplicationDriver(deps: ApplicationDriverDeps): ApplicationDriver {
  const { profile, pacing, automation, logger } = deps;
  let busy = false;

  const fail = (session: ApplicationSession, reason: string): void => {
    if (!canTransition(session.status, "failed")) {
      logger.warn(`Session ${session.id} cannot fail from ${session.status}: ${reason}`);
      return;
    }
    session.logAction("error", reason, { success: false });
    session.fail(reason);
  };

  const capture = async (page: AutomationPage, session: ApplicationSession, step: string): Promise<void> => {
    if (!automation.screenshots || !deps.screenshotDir) {
      return;
    }
    const filePath = path.join(deps.screenshotDir, `${session.id}-${step}.png`);
    try {
      await page.screenshot(filePath);
      logger.info(`Screenshot saved: ${filePath}`);
    } catch (error) {
      logger.warn(`Screenshot failed: ${errorMessage(error)}`);
    }
  };

  const cancel = async (): Promise<void> => {
    try {
      const page = await deps.getPage();
      if (!page) {
        return;
      }
      const dismiss = await page.findFirst(profile.dismissSelectors);
      if (!dismiss) {
        return;
      }
      await page.click(dismiss.selector);
      await pacing.pause(undefined, { minMs: 300, maxMs: 800 });
      const discard = await page.findFirst(profile.discardSelectors);
      if (discard) {
        await page.click(discard.selector);
      }
    } catch (error) {
      logger.warn(`Cancel application failed: ${errorMessage(error)}`);
    }
  };

  const rewind = async (page: AutomationPage, totalPages: number, signal?: AbortSignal): Promise<void> => {
    for (let step = 0; step < totalPages - 1; step += 1) {
      const back = await page.findFirst(profile.backSelectors);
      if (!back) {
        return;
      }
      await page.click(back.selector);
      await pacing.pause(signal);
    }
  };

  const awaitConfirmation = async (page: AutomationPage): Promise<SubmitOutcome> => {
    const markers = [...profile.successSelectors, ...profile.errorSelectors].join(", ");
    const appeared = await page.waitFor(markers, automation.confirmationWaitMs);
    if (!appeared) {
      return { submitted: false, reason: "Submission confirmation not detected" };
    }
    if (await page.findFirst(profile.successSelectors)) {
      return { submitted: true };
    }
    const error = await page.findFirst(profile.errorSelectors);
    const text = error ? error.text : "";
    return { submitted: false, reason: `Form validation error: ${text || "unknown error"}` };
  };

  const fillPage = async (
    page: AutomationPage,
    session: ApplicationSession,
    pageIndex: number,
    signal?: AbortSignal
  ): Promise<void> => {
    const groups = await page.readFieldGroups({
      groupSelector: profile.groupSelector,
      labelSelector: profile.labelSelector,
      attachedFileSelector: profile.attachedFileSelector,
    });
    const byKey = new Map<string, FieldGroupSnapshot>(groups.map((group) => [group.key, group]));

    const messageField = session.messageField;
    if (messageField && messageField.pageIndex === pageIndex) {
      const group = byKey.get(messageField.fieldRef);
      const control = group?.controls.find((item) => item.tag === "textarea" || item.tag === "input");
      const message = session.applicationMessage.trim();
      if (!message) {
        session.logAction("fill", "Application message", { success: false, details: "No answer provided" });
      } else if (!control) {
        session.logAction("fill", "Application message", { success: false, details: "Field not found on page" });
      } else {
        const started = Date.now();
        await typeInto(page, control, fitToLength(message, control.maxLength ?? undefined), pacing, signal);
        session.logAction("fill", "Application message", { durationMs: Date.now() - started });
      }
      await pacing.pause(signal);
    }

    for (const question of session.questionsOnPage(pageIndex)) {
      signal?.throwIfAborted();
      if (question.preFilled) {
        session.logAction("skip", question.text, { details: `Pre-filled: ${question.preFilledValue ?? ""}` });
        continue;
      }
      const group = byKey.get(question.fieldRef);
      if (!group) {
        session.logAction("fill", question.text, { success: false, details: "Field not found on page" });
        continue;
      }
      const started = Date.now();
      const result = await fillQuestion(page, question, group, pacing, signal);
      session.logAction(result.skipped ? "skip" : "fill", question.text, {
        success: result.success,
        details: result.details,
        durationMs: Date.now() - started,
      });
      if (!result.skipped && result.success) {
        await pacing.pause(signal);
      }
    }
  };

  return {
    async prepare(job, progress, signal) {
      const page = await deps.getPage();
      if (!page) {
        return null;
      }
      const session = new ApplicationSession(job, deps.clock);
      if (busy) {
        fail(session, BUSY_MESSAGE);
        return session;
      }

      busy = true;
      try {
        reportProgress(progress, `Opening ${job.title} at ${job.company}`, logger);
        await page.goto(job.url);
        if (!(await readLoginStatus(page, profile.login))) {
          logger.warn(`Not signed in to ${profile.platform}; run: applygate login --platform ${profile.platform}`);
          return null;
        }
        session.logAction("navigate", `Opened ${job.url}`);
        await pacing.pause(signal);

        const blocked = deps.preflight ? await deps.preflight(page, job) : null;
        if (blocked) {
          fail(session, blocked);
          return session;
        }

        const entry = await page.findFirst(profile.entryPointSelectors, profile.entryPointText);
        if (!entry) {
          session.logAction("findButton", "Application entry point not found", { success: false });
          await capture(page, session, "no-entry-point");
          fail(session, "Could not find the apply button");
          return session;
        }
        session.logAction("findButton", `Found "${entry.text}"`);
        await page.click(entry.selector);

        const opened = await page.waitFor(profile.surfaceSelector, automation.surfaceTimeoutMs);
        if (!opened) {
          await capture(page, session, "no-surface");
          fail(session, "Application form did not open");
          return session;
        }
        session.logAction("surfaceOpen", "Application form opened");
        reportProgress(progress, "Analyzing application form", logger);

        const traversal = await traverseForm(createPageFormSurface(page, profile, pacing), {
          maxPages: automation.maxFormPages,
          messageLabelPattern: profile.messageLabelPattern,
          navigationPatterns: profile.navigationPatterns,
          signal,
          onPage: (pageIndex, count, navigation) =>
            reportProgress(progress, `Page ${pageIndex + 1}: ${count} questions, next control ${navigation}`, logger),
        });

        session.setForm(traversal.questions, traversal.totalPages, traversal.messageField);
        session.logAction(
          "formAnalyzed",
          `Detected ${traversal.questions.length} questions across ${traversal.totalPages} pages`,
          traversal.reachedPageCap ? { details: `Stopped at the ${automation.maxFormPages}-page limit` } : {}
        );

        await rewind(page, traversal.totalPages, signal);
        session.setCurrentPage(0);
        session.transition("readyForReview");
        reportProgress(progress, `Form ready: ${traversal.questions.length} questions detected`, logger);
        return session;
      } catch (error) {
        if (signal?.aborted || isAbortError(error)) {
          fail(session, "Preparation cancelled");
          await cancel();
        } else {
          await capture(page, session, "prepare-error");
          fail(session, errorMessage(error));
        }
        return session;
      } finally {
        busy = false;
      }
    },

    async submit(session, progress, signal) {
      if (session.status !== "approved") {
        return false;
      }
      const page = await deps.getPage();
      session.transition("submitting");
      if (!page) {
        fail(session, "Platform adapter is not ready");
        return false;
      }
      if (busy) {
        fail(session, BUSY_MESSAGE);
        return false;
      }

      busy = true;
      let clicked = false;
      try {
        for (let pageIndex = 0; ; pageIndex += 1) {
          signal?.throwIfAborted();
          session.setCurrentPage(pageIndex);
          reportProgress(progress, `Filling page ${pageIndex + 1} of ${session.totalPages}`, logger);
          await fillPage(page, session, pageIndex, signal);

          const navigation = classifyNavigation(
            await page.readButtons(profile.formScopeSelector),
            profile.navigationPatterns
          );
          if (navigation.kind === "none") {
            await capture(page, session, "no-navigation");
            fail(session, "Could not find navigation button");
            return false;
          }

          if (navigation.kind === "submit") {
            await pacing.pause(signal);
            signal?.throwIfAborted();
            clicked = true;
            await page.click(navigation.ref);
            session.logAction("submit", `Clicked "${navigation.text}"`);
            reportProgress(progress, "Waiting for confirmation", logger);

            const outcome = await awaitConfirmation(page);
            if (!outcome.submitted) {
              await capture(page, session, "not-confirmed");
              fail(session, outcome.reason);
              return false;
            }
            session.logAction("success", "Application submitted");
            session.transition("submitted");
            reportProgress(progress, "Application submitted", logger);
            await dismissConfirmation(page);
            return true;
          }

          if (pageIndex + 1 >= automation.maxFormPages) {
            fail(session, `Form exceeded ${automation.maxFormPages} pages`);
            return false;
          }
          await page.click(navigation.ref);
          session.logAction("nextPage", `Clicked "${navigation.text}"`);
          await pacing.pause(signal);
        }
      } catch (error) {
        if (!clicked && (signal?.aborted || isAbortError(error))) {
          fail(session, "Cancelled before submission");
        } else {
          await capture(page, session, "submit-error");
          fail(session, errorMessage(error));
        }
        return false;
      } finally {
        busy = false;
      }
    },

    cancel,
  };

  async function dismissConfirmation(page: AutomationPage): Promise<void> {
    try {
      const close = await page.findFirst(profile.confirmationDismissSelectors);
      if (close) {
        await page.click(close.selector);
      }
    } catch (error) {
      logger.warn(`Could not dismiss the confirmation: ${errorMessage(error)}`);
    }
  }
}
