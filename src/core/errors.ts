import { SessionStatus } from "../types/application";

export class IllegalTransitionError extends Error {
  readonly from: SessionStatus;
  readonly to: SessionStatus;

  constructor(from: SessionStatus, to: SessionStatus) {
    super(`Illegal session transition: ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class SessionLockedError extends Error {
  readonly status: SessionStatus;

  constructor(operation: string, status: SessionStatus) {
    super(`Cannot ${operation} while session is ${status}`);
    this.name = "SessionLockedError";
    this.status = status;
  }
}

export class UnsupportedPlatformError extends Error {
  constructor(platform: string, available: string[]) {
    super(`Platform '${platform}' is not supported. Available platforms: ${available.join(", ") || "none"}`);
    this.name = "UnsupportedPlatformError";
  }
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === "AbortError" || error.name === "TimeoutError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
