import { defaultSleep, SleepFn } from "../automation/pacing";
import { AutomationPage } from "../automation/session";
import { reportProgress } from "../core/progress";
import { Logger } from "../logging/logger";
import { LoginOptions } from "../types/platform";

/** Where a site sends signed-out visitors, and what its pages show on either side of a sign-in. */
export interface LoginProfile {
  url: string;
  /** Landing page only a signed-in member reaches. */
  homeUrl: string;
  loginPathMarkers: string[];
  authenticatedPathMarkers: string[];
  loggedInSelectors: string[];
  loggedOutSelectors: string[];
}

export const LOGIN_POLL_MS = 3000;

/**
 * Signed in means a member-only page or control is showing and no sign-in link is.
 * A page on the sign-in path is always signed out.
 */
export async function readLoginStatus(page: AutomationPage, login: LoginProfile): Promise<boolean> {
  const url = page.url();
  if (login.loginPathMarkers.some((marker) => url.includes(marker))) {
    return false;
  }
  if (await page.findFirst(login.loggedOutSelectors)) {
    return false;
  }
  if (login.authenticatedPathMarkers.some((marker) => url.includes(marker))) {
    return true;
  }
  return (await page.findFirst(login.loggedInSelectors)) !== null;
}

export interface LoginFlowDeps {
  login: LoginProfile;
  getPage: () => Promise<AutomationPage | null>;
  logger: Logger;
  sleep?: SleepFn;
  now?: () => number;
}

export interface LoginFlow {
  checkLoginStatus(): Promise<boolean>;
  login(options: LoginOptions): Promise<boolean>;
}

export function createLoginFlow(deps: LoginFlowDeps): LoginFlow {
  const { login, logger } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? Date.now;

  const checkLoginStatus = async (): Promise<boolean> => {
    const page = await deps.getPage();
    if (!page) {
      return false;
    }
    await page.goto(login.homeUrl);
    return readLoginStatus(page, login);
  };

  return {
    checkLoginStatus,

    async login({ timeoutMs, progress, signal }) {
      const page = await deps.getPage();
      if (!page) {
        return false;
      }
      await page.goto(login.homeUrl);
      if (await readLoginStatus(page, login)) {
        reportProgress(progress, "Already signed in", logger);
        return true;
      }

      await page.goto(login.url);
      reportProgress(progress, `Sign in using the browser window (waiting up to ${Math.round(timeoutMs / 1000)}s)`, logger);
      const started = now();
      while (now() - started < timeoutMs) {
        await sleep(LOGIN_POLL_MS, signal);
        if (await readLoginStatus(page, login)) {
          reportProgress(progress, "Signed in", logger);
          return true;
        }
      }
      logger.warn(`No sign-in detected within ${timeoutMs} ms`);
      return false;
    },
  };
}
