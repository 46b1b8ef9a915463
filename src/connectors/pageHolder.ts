import { AutomationPage, AutomationSession } from "../automation/session";
import { errorMessage } from "../core/errors";
import { Logger } from "../logging/logger";

/** Lazily opens the adapter's single page on its automation session. */
export interface PageHolder {
  get(): Promise<AutomationPage | null>;
  close(): Promise<void>;
}

export function createPageHolder(session: AutomationSession | null, logger: Logger): PageHolder {
  let page: AutomationPage | null = null;
  return {
    async get(): Promise<AutomationPage | null> {
      if (page || !session) {
        return page;
      }
      try {
        page = await session.newPage();
      } catch (error) {
        logger.error(`Could not open a browser page: ${errorMessage(error)}`);
      }
      return page;
    },
    async close(): Promise<void> {
      const current = page;
      page = null;
      if (current) {
        await current.close();
      }
    },
  };
}
