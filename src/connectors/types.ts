import { PacingGovernor } from "../automation/pacing";
import { AutomationSession } from "../automation/session";
import { AutomationConfig } from "../config";
import { Logger } from "../logging/logger";

export interface AdapterDeps {
  /** Browser session the adapter opens its single page on; null leaves the adapter without a surface. */
  session: AutomationSession | null;
  pacing: PacingGovernor;
  automation: AutomationConfig;
  logger?: Logger;
  screenshotDir?: string;
}
