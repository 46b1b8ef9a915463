export const PLATFORMS = ["linkedin", "upwork"] as const;

export type Platform = (typeof PLATFORMS)[number];

export function isPlatform(value: unknown): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}

export type BudgetType = "hourly" | "fixed";

export interface Job {
  platform: Platform;
  externalJobId: string;
  title: string;
  company: string;
  location: string;
  url: string;
  hasQuickApply?: boolean;
  postedAt?: string;
  budgetType?: BudgetType;
  hourlyRateMin?: number;
  hourlyRateMax?: number;
  fixedPrice?: number;
  /** Upwork Connects a proposal for this job costs. */
  connectsRequired?: number;
}

export interface JobDetails {
  description?: string;
  recruiterEmail?: string;
  externalApplyUrl?: string;
  hasQuickApply: boolean;
  hourlyRateMin?: number;
  hourlyRateMax?: number;
  fixedPrice?: number;
  clientRating?: number;
  proposalsCount?: number;
  requiredSkills?: string[];
  experienceLevel?: string;
}

export interface SearchFilter {
  keywords: string;
  locations: string[];
  remoteOnly: boolean;
  experienceLevels: string[];
  maxResults: number;
}
