import fs from "fs";
import path from "path";
import { ApplicationSession, SessionSnapshot } from "../core/applicationSession";
import { errorMessage } from "../core/errors";
import { createLogger, Logger } from "./logger";

export interface AuditLogger {
  /** Persists the terminal session once; returns the written path, or null when nothing was written. */
  record(session: ApplicationSession): string | null;
}

export function auditFileName(snapshot: SessionSnapshot): string {
  const stamp = snapshot.startedAt.replace(/[:.]/g, "-");
  return `application-${stamp}-${snapshot.sessionId}.json`;
}

export function createAuditLogger(auditDir: string, logger: Logger = createLogger("audit")): AuditLogger {
  return {
    record(session: ApplicationSession): string | null {
      if (!session.isTerminal) {
        logger.warn(`Refusing to audit session ${session.id} in status ${session.status}`);
        return null;
      }

      const snapshot = session.snapshot();
      const filePath = path.join(auditDir, auditFileName(snapshot));
      try {
        fs.mkdirSync(auditDir, { recursive: true });
        fs.writeFileSync(filePath, `${JSON.stringify(snapshot, null, 2)}\n`, { encoding: "utf8", flag: "wx" });
        logger.info(`Audit record written: ${filePath}`);
        return filePath;
      } catch (error) {
        logger.error(`Failed to write audit record for ${session.id}: ${errorMessage(error)}`);
        return null;
      }
    },
  };
}
