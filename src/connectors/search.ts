import { PacingGovernor } from "../automation/pacing";
import { AutomationPage, LinkSnapshot } from "../automation/session";
import { errorMessage, isAbortError } from "../core/errors";
import { reportProgress } from "../core/progress";
import { Logger } from "../logging/logger";
import { Job } from "../types/jobs";
import { ProgressReporter } from "../types/platform";

export interface ResultPageScrape {
  page: AutomationPage;
  startUrl: string;
  linkSelector: string;
  cardSelector: string;
  /** Scrollable results list; null scrolls the window. */
  listSelector: string | null;
  nextPageSelectors: string[];
  parseCard: (link: LinkSnapshot) => Job | null;
  maxResults: number;
  pacing: PacingGovernor;
  logger: Logger;
  progress?: ProgressReporter;
  signal?: AbortSignal;
}

/**
 * Scrapes result cards page by page until `maxResults` unique jobs are found or
 * pagination runs out. Failures end the scrape with whatever was collected.
 */
export async function scrapeResultPages(options: ResultPageScrape): Promise<Job[]> {
  const { page, pacing, logger, progress, signal } = options;
  const jobs: Job[] = [];
  const seen = new Set<string>();

  try {
    await page.goto(options.startUrl);
    await pacing.pause(signal);

    for (let pageNumber = 1; jobs.length < options.maxResults; pageNumber += 1) {
      signal?.throwIfAborted();
      reportProgress(progress, `Scraping results page ${pageNumber}...`, logger);
      await page.scroll(options.listSelector, 5);

      const links = await page.collectLinks(options.linkSelector, options.cardSelector);
      for (const link of links) {
        const job = options.parseCard(link);
        if (!job || seen.has(job.externalJobId)) {
          continue;
        }
        seen.add(job.externalJobId);
        jobs.push(job);
        reportProgress(progress, `Found: ${job.title} at ${job.company}`, logger);
        if (jobs.length >= options.maxResults) {
          break;
        }
      }

      if (jobs.length >= options.maxResults) {
        break;
      }
      const next = await page.findFirst(options.nextPageSelectors);
      if (!next) {
        reportProgress(progress, "No more result pages.", logger);
        break;
      }
      await page.click(next.selector);
      await pacing.pause(signal);
    }
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      reportProgress(progress, `Search cancelled with ${jobs.length} jobs.`, logger);
    } else {
      logger.error(`Search stopped: ${errorMessage(error)}`);
    }
  }

  reportProgress(progress, `Completed. Found ${jobs.length} jobs.`, logger);
  return jobs;
}
