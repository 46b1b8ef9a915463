import { ProgressReporter } from "../types/platform";
import { errorMessage } from "./errors";
import { Logger } from "../logging/logger";

export function reportProgress(progress: ProgressReporter | undefined, message: string, logger: Logger): void {
  logger.info(message);
  if (!progress) {
    return;
  }
  try {
    progress(message);
  } catch (error) {
    logger.warn(`Progress reporter threw: ${errorMessage(error)}`);
  }
}
