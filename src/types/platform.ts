import { ApplicationSession } from "../core/applicationSession";
import { Job, JobDetails, Platform, SearchFilter } from "./jobs";

export type ProgressReporter = (message: string) => void;

export interface LoginOptions {
  timeoutMs: number;
  progress?: ProgressReporter;
  signal?: AbortSignal;
}

export interface PlatformAdapter {
  readonly platform: Platform;
  searchJobs(filter: SearchFilter, progress?: ProgressReporter, signal?: AbortSignal): Promise<Job[]>;
  fetchJobDetails(url: string): Promise<JobDetails | null>;
  /** Loads the site's member landing page and reports whether the browser profile is signed in. */
  checkLoginStatus(): Promise<boolean>;
  /** Opens the sign-in page and polls until the user has signed in by hand or `timeoutMs` passes. */
  login(options: LoginOptions): Promise<boolean>;
  /**
   * Opens the application surface for `job` and inspects every page without filling anything.
   * Resolves to `null` when the adapter has no automation surface to work with, or the
   * browser profile is not signed in to the site.
   */
  prepareApplication(job: Job, progress?: ProgressReporter, signal?: AbortSignal): Promise<ApplicationSession | null>;
  /**
   * Fills and submits an approved session. Returns false without side effects when the
   * session is not approved.
   */
  submitApplication(session: ApplicationSession, progress?: ProgressReporter, signal?: AbortSignal): Promise<boolean>;
  /** Best-effort dismissal of any open application surface. Never throws. */
  cancelApplication(): Promise<void>;
  close(): Promise<void>;
}
