import { AutomationPage, LinkSnapshot } from "../../automation/session";
import { errorMessage } from "../../core/errors";
import { createLogger, Logger } from "../../logging/logger";
import { Job, JobDetails, SearchFilter } from "../../types/jobs";
import { PlatformAdapter } from "../../types/platform";
import { AdapterDeps } from "../types";
import { createApplicationDriver, SiteProfile } from "../applicationDriver";
import { createLoginFlow } from "../login";
import { createPageHolder } from "../pageHolder";
import { absoluteUrl, cardLines, extractEmail, parseMoney, parseMoneyRange, readDescription } from "../scrape";
import { scrapeResultPages } from "../search";

const ORIGIN = "https://www.upwork.com";

export const UPWORK_PROFILE: SiteProfile = {
  platform: "upwork",
  entryPointSelectors: ["button:has-text('Apply Now')", "a:has-text('Apply Now')", "button:has-text('Submit a Proposal')"],
  surfaceSelector: "[data-test='cover-letter'], textarea[name='coverLetter'], .proposal-form",
  formScopeSelector: ".proposal-form, main",
  groupSelector: "[data-test='cover-letter'], [data-test='bid-input'], [data-test='question'], .screening-question",
  labelSelector: "label, h4, .question-title",
  messageLabelPattern: /cover letter/i,
  navigationPatterns: {
    submit: /\bsubmit\b|\bsend (for|proposal)\b/i,
    review: /\breview\b/i,
    next: /\b(next|continue)\b/i,
  },
  backSelectors: [],
  dismissSelectors: ["[data-test='modal-close']", "button[aria-label='Close']", "button:has-text('Cancel')"],
  discardSelectors: ["button:has-text('Discard')", "button:has-text('Yes, cancel')"],
  successSelectors: ["[data-test='proposal-submitted']", ".success-message", "h1:has-text('submitted')"],
  errorSelectors: ["[data-test='error-message']", ".error-message", ".alert-danger"],
  confirmationDismissSelectors: ["[data-test='modal-close']", "button[aria-label='Close']"],
  login: {
    url: `${ORIGIN}/ab/account-security/login`,
    homeUrl: `${ORIGIN}/nx/find-work/`,
    loginPathMarkers: ["/login", "/ab/account-security"],
    authenticatedPathMarkers: ["/nx/find-work", "/freelancers/~", "/ab/proposals", "/nx/search/jobs", "/messages"],
    loggedInSelectors: [
      "[data-test='nav-user-avatar']",
      "[data-qa='user-avatar']",
      ".nav-avatar",
      ".up-avatar",
      "button[aria-label*='account']",
      ".nav-d-user-menu",
      "[data-cy='nav-user-menu']",
      "img[alt*='avatar' i]",
      ".air3-avatar",
    ],
    loggedOutSelectors: [
      "a[href*='/ab/account-security/login']",
      "a[data-qa='login']",
      "button:has-text('Log In')",
      "a:has-text('Log In')",
      "[data-test='login-link']",
    ],
  },
};

const CONNECTS_BALANCE_SELECTORS = [
  "[data-test='connects-balance']",
  ".connects-balance",
  "span:has-text('Available Connects')",
];

const DESCRIPTION_SELECTORS = ["[data-test='Description']", "[data-test='job-description']", ".job-description"];

type Budget = Pick<Job, "budgetType" | "hourlyRateMin" | "hourlyRateMax" | "fixedPrice">;

export function buildUpworkSearchUrl(filter: SearchFilter): string {
  const params = new URLSearchParams();
  if (filter.keywords) {
    params.set("q", filter.keywords);
  }
  params.set("sort", "recency");
  const tiers = new Set<string>();
  for (const level of filter.experienceLevels) {
    const lowered = level.toLowerCase();
    if (lowered.includes("entry")) tiers.add("1");
    if (lowered.includes("intermediate") || lowered.includes("mid")) tiers.add("2");
    if (lowered.includes("expert") || lowered.includes("senior")) tiers.add("3");
  }
  if (tiers.size > 0) {
    params.set("contractor_tier", Array.from(tiers).join(","));
  }
  return `${ORIGIN}/nx/search/jobs/?${params.toString()}`;
}

export function parseUpworkBudget(text: string): Budget {
  const lines = cardLines(text).filter((line) => line.includes("$"));
  const hourly = lines.find((line) => /hourly|\/hr/i.test(line));
  if (hourly) {
    const range = parseMoneyRange(hourly);
    return { budgetType: "hourly", hourlyRateMin: range.min, hourlyRateMax: range.max };
  }
  const fixed = lines.find((line) => /budget|fixed/i.test(line));
  const price = fixed ? parseMoney(fixed) : undefined;
  return price === undefined ? {} : { budgetType: "fixed", fixedPrice: price };
}

export function parseConnectsRequired(text: string): number | undefined {
  const match = /(\d+)\s*connects/i.exec(text);
  return match ? Number(match[1]) : undefined;
}

/** Connects left on the account, as the job page shows them; null when the page does not. */
export async function readConnectsBalance(page: AutomationPage): Promise<number | null> {
  const balance = await page.findFirst(CONNECTS_BALANCE_SELECTORS);
  const match = balance ? /(\d+)/.exec(balance.text) : null;
  return match ? Number(match[1]) : null;
}

export async function checkConnects(page: AutomationPage, job: Job, logger: Logger): Promise<string | null> {
  const required = job.connectsRequired;
  if (required === undefined) {
    return null;
  }
  const balance = await readConnectsBalance(page);
  if (balance === null) {
    logger.warn(`Connects balance not shown; ${required} Connects will be spent without a check`);
    return null;
  }
  if (balance < required) {
    return `Not enough Connects: ${required} required, ${balance} available`;
  }
  logger.info(`Connects: ${required} required, ${balance} available`);
  return null;
}

export function parseUpworkCard(link: LinkSnapshot): Job | null {
  const idMatch = /~([a-zA-Z0-9]+)/.exec(link.href);
  if (!idMatch) {
    return null;
  }
  const title = link.text.trim() || "Untitled Job";
  const lines = cardLines(link.cardText);
  const posted = lines.find((line) => /^posted\b|\bago\b/i.test(line));
  const location = lines.find((line) => /^location\b/i.test(line));

  return {
    platform: "upwork",
    externalJobId: idMatch[1],
    title,
    company: "Upwork client",
    location: location ? location.replace(/^location\s*/i, "") : "Remote",
    url: absoluteUrl(link.href.split("?")[0], ORIGIN),
    hasQuickApply: true,
    postedAt: posted,
    connectsRequired: parseConnectsRequired(link.cardText),
    ...parseUpworkBudget(link.cardText),
  };
}

function parseNumber(text: string | null): number | undefined {
  const match = text ? /(\d+(?:\.\d+)?)/.exec(text) : null;
  return match ? Number(match[1]) : undefined;
}

export function createUpworkAdapter(deps: AdapterDeps): PlatformAdapter {
  const logger = deps.logger ?? createLogger("upwork");
  const pages = createPageHolder(deps.session, logger);
  const driver = createApplicationDriver({
    profile: UPWORK_PROFILE,
    getPage: pages.get,
    pacing: deps.pacing,
    automation: deps.automation,
    logger,
    preflight: (page, job) => checkConnects(page, job, logger),
    screenshotDir: deps.screenshotDir,
  });
  const login = createLoginFlow({ login: UPWORK_PROFILE.login, getPage: pages.get, logger });

  return {
    platform: "upwork",

    async searchJobs(filter, progress, signal) {
      const page = await pages.get();
      if (!page) {
        return [];
      }
      return scrapeResultPages({
        page,
        startUrl: buildUpworkSearchUrl(filter),
        linkSelector: "a[href*='/jobs/~'], [data-test='job-tile-title'] a",
        cardSelector: "article, [data-ev-label='job_tile'], section.air3-card-section",
        listSelector: null,
        nextPageSelectors: ["button[data-test='pagination-next']:not([disabled])", "a:has-text('Next')"],
        parseCard: parseUpworkCard,
        maxResults: filter.maxResults,
        pacing: deps.pacing,
        logger,
        progress,
        signal,
      });
    },

    async fetchJobDetails(url: string): Promise<JobDetails | null> {
      const page = await pages.get();
      if (!page) {
        return null;
      }
      try {
        await page.goto(url);
        const description = await readDescription(page, DESCRIPTION_SELECTORS);
        const budget = parseUpworkBudget((await page.textOf("[data-test='budget'], [data-test='hourly-rate']")) ?? "");
        const skills = await page.textOf("[data-test='Skills'], .skills-list");
        const experience = await page.textOf("[data-test='experience-level']");
        const entry = await page.findFirst(UPWORK_PROFILE.entryPointSelectors);
        return {
          description,
          recruiterEmail: description ? extractEmail(description) : undefined,
          hasQuickApply: entry !== null,
          hourlyRateMin: budget.hourlyRateMin,
          hourlyRateMax: budget.hourlyRateMax,
          fixedPrice: budget.fixedPrice,
          clientRating: parseNumber(await page.textOf("[data-test='client-rating'], .client-rating")),
          proposalsCount: parseNumber(await page.textOf("[data-test='proposals']")),
          requiredSkills: skills ? cardLines(skills) : undefined,
          experienceLevel: experience ?? undefined,
        };
      } catch (error) {
        logger.warn(`Could not load job details from ${url}: ${errorMessage(error)}`);
        return null;
      }
    },

    checkLoginStatus: login.checkLoginStatus,
    login: login.login,
    prepareApplication: driver.prepare,
    submitApplication: driver.submit,
    cancelApplication: driver.cancel,

    async close(): Promise<void> {
      await pages.close();
    },
  };
}
