import { LinkSnapshot } from "../../automation/session";
import { errorMessage } from "../../core/errors";
import { createLogger } from "../../logging/logger";
import { Job, JobDetails, SearchFilter } from "../../types/jobs";
import { PlatformAdapter } from "../../types/platform";
import { AdapterDeps } from "../types";
import { createApplicationDriver, SiteProfile } from "../applicationDriver";
import { createLoginFlow } from "../login";
import { createPageHolder } from "../pageHolder";
import { absoluteUrl, cardLines, extractEmail, readDescription } from "../scrape";
import { scrapeResultPages } from "../search";

const ORIGIN = "https://www.linkedin.com";
const STATUS_LINES = new Set(["viewed", "applied", "promoted", "easy apply", "actively recruiting", "×"]);

export const LINKEDIN_PROFILE: SiteProfile = {
  platform: "linkedin",
  entryPointSelectors: [
    "button.jobs-apply-button--top-card",
    ".jobs-apply-button",
    "button:has-text('Easy Apply')",
    "[data-job-apply-button]",
    ".jobs-s-apply button",
  ],
  entryPointText: /easy apply/i,
  surfaceSelector: ".jobs-easy-apply-modal, .jobs-easy-apply-content, [data-test-modal-id='easy-apply-modal']",
  formScopeSelector: ".jobs-easy-apply-modal, .jobs-easy-apply-content",
  groupSelector: ".jobs-easy-apply-form-section__grouping, .fb-form-element, .fb-dash-form-element",
  labelSelector: "label, legend, .fb-form-element-label, .t-14",
  attachedFileSelector: ".jobs-document-upload__file-name",
  messageLabelPattern: /cover letter/i,
  backSelectors: ["button[aria-label='Back']", "button:has-text('Back')"],
  dismissSelectors: ["button[aria-label='Dismiss']", "button[data-test-modal-close-btn]", ".artdeco-modal__dismiss"],
  discardSelectors: ["button[data-test-dialog-primary-btn]", "button:has-text('Discard')"],
  successSelectors: [
    "[data-test-modal-id='post-apply-modal']",
    ".jobs-post-apply-modal",
    ".artdeco-modal:has-text('Application sent')",
  ],
  errorSelectors: [".artdeco-inline-feedback--error", ".fb-form-element--error"],
  confirmationDismissSelectors: ["button[aria-label='Dismiss']", ".artdeco-modal__dismiss"],
  login: {
    url: `${ORIGIN}/login`,
    homeUrl: `${ORIGIN}/feed/`,
    loginPathMarkers: ["/login", "/checkpoint", "/authwall", "session_redirect"],
    authenticatedPathMarkers: ["/feed"],
    loggedInSelectors: [
      "div.global-nav__me",
      ".nav-item__profile-member-photo",
      "img.global-nav__me-photo",
      "button[data-control-name='nav.settings']",
    ],
    loggedOutSelectors: ["a[href*='login']", "a:has-text('Sign in')", "input[name='session_key']"],
  },
};

const DESCRIPTION_SELECTORS = [
  ".jobs-description-content__text",
  ".jobs-description__content",
  ".jobs-box__html-content",
  ".show-more-less-html__markup",
  ".description__text",
];

export function buildLinkedInSearchUrl(filter: SearchFilter): string {
  const params = new URLSearchParams();
  params.set("keywords", filter.keywords);
  params.set("location", filter.locations[0] ?? "United States");
  params.set("f_AL", "true");
  if (filter.remoteOnly) {
    params.set("f_WT", "2");
  }
  const levels = new Set<string>();
  for (const level of filter.experienceLevels) {
    const lowered = level.toLowerCase();
    if (lowered.includes("entry")) levels.add("2");
    if (lowered.includes("associate")) levels.add("3");
    if (lowered.includes("mid") || lowered.includes("senior")) levels.add("4");
    if (lowered.includes("director")) levels.add("5");
  }
  if (levels.size > 0) {
    params.set("f_E", Array.from(levels).join(","));
  }
  return `${ORIGIN}/jobs/search/?${params.toString()}`;
}

export function parseLinkedInCard(link: LinkSnapshot): Job | null {
  const idMatch = /\/jobs\/view\/(?:[^/?]*-)?(\d+)/.exec(link.href);
  if (!idMatch) {
    return null;
  }
  const title = (link.ariaLabel || link.text).replace(/\s+with verification$/i, "").trim();
  if (!title) {
    return null;
  }

  let company = "";
  let location = "";
  let postedAt: string | undefined;
  for (const line of cardLines(link.cardText)) {
    const lowered = line.toLowerCase();
    if (line === title || title.startsWith(line) || STATUS_LINES.has(lowered)) {
      continue;
    }
    if (/\bago\b/i.test(line)) {
      postedAt = postedAt ?? line;
    } else if (!location && /remote|hybrid|on-site|\(|,/i.test(line)) {
      location = line;
    } else if (!company && line.length > 2 && line.length < 100) {
      company = line;
    }
  }

  return {
    platform: "linkedin",
    externalJobId: idMatch[1],
    title,
    company: company || "Unknown",
    location: location || "Unknown",
    url: `${ORIGIN}/jobs/view/${idMatch[1]}/`,
    hasQuickApply: /easy apply/i.test(link.cardText),
    postedAt,
  };
}

export function createLinkedInAdapter(deps: AdapterDeps): PlatformAdapter {
  const logger = deps.logger ?? createLogger("linkedin");
  const pages = createPageHolder(deps.session, logger);
  const driver = createApplicationDriver({
    profile: LINKEDIN_PROFILE,
    getPage: pages.get,
    pacing: deps.pacing,
    automation: deps.automation,
    logger,
    screenshotDir: deps.screenshotDir,
  });
  const login = createLoginFlow({ login: LINKEDIN_PROFILE.login, getPage: pages.get, logger });

  return {
    platform: "linkedin",

    async searchJobs(filter, progress, signal) {
      const page = await pages.get();
      if (!page) {
        return [];
      }
      return scrapeResultPages({
        page,
        startUrl: buildLinkedInSearchUrl(filter),
        linkSelector: "a[href*='/jobs/view/']",
        cardSelector: ".job-card-container, li.jobs-search-results__list-item, .base-card",
        listSelector: ".jobs-search-results-list, .scaffold-layout__list",
        nextPageSelectors: ["button[aria-label='View next page']", "button[aria-label='Page forward']"],
        parseCard: parseLinkedInCard,
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
        const more = await page.findFirst(["button:has-text('Show more')", "button[aria-label*='see more']"]);
        if (more) {
          await page.click(more.selector);
        }
        const description = await readDescription(page, DESCRIPTION_SELECTORS);
        const entry = await page.findFirst(LINKEDIN_PROFILE.entryPointSelectors);
        const hasQuickApply = entry ? /easy apply/i.test(entry.text) : false;
        const external = hasQuickApply ? null : await page.findFirst(["a.jobs-apply-button", "a[href*='externalApply']"]);
        const externalHref = external ? await page.attributeOf(external.selector, "href") : null;
        return {
          description,
          recruiterEmail: description ? extractEmail(description) : undefined,
          externalApplyUrl: externalHref ? absoluteUrl(externalHref, ORIGIN) : undefined,
          hasQuickApply,
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
