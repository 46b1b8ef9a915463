import fs from "fs";
import path from "path";
import { z } from "zod";
import { Job, PLATFORMS } from "../types/jobs";

const JobSchema = z.object({
  platform: z.enum(PLATFORMS),
  externalJobId: z.string(),
  title: z.string(),
  company: z.string(),
  location: z.string(),
  url: z.string(),
  hasQuickApply: z.boolean().optional(),
  postedAt: z.string().optional(),
  budgetType: z.enum(["hourly", "fixed"]).optional(),
  hourlyRateMin: z.number().optional(),
  hourlyRateMax: z.number().optional(),
  fixedPrice: z.number().optional(),
  connectsRequired: z.number().optional(),
});

export interface JobStore {
  upsertMany(jobs: Job[]): Promise<void>;
  loadAll(): Promise<Job[]>;
  find(platform: string, externalJobId: string): Promise<Job | undefined>;
}

/** Search results cached as a JSON array, keyed by platform and external id. */
export class FileJobStore implements JobStore {
  private filePath: string;

  constructor(dataDir: string, filename = "jobs.json") {
    this.filePath = path.join(dataDir, filename);
    fs.mkdirSync(dataDir, { recursive: true });
  }

  async loadAll(): Promise<Job[]> {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    const parsed = z.array(JobSchema).safeParse(raw);
    return parsed.success ? parsed.data : [];
  }

  async upsertMany(jobs: Job[]): Promise<void> {
    const existing = await this.loadAll();
    const map = new Map(existing.map((job) => [this.key(job), job]));
    for (const job of jobs) {
      map.set(this.key(job), job);
    }
    fs.writeFileSync(this.filePath, JSON.stringify(Array.from(map.values()), null, 2));
  }

  async find(platform: string, externalJobId: string): Promise<Job | undefined> {
    const jobs = await this.loadAll();
    return jobs.find((job) => job.platform === platform && job.externalJobId === externalJobId);
  }

  private key(job: Job): string {
    return `${job.platform}:${job.externalJobId}`;
  }
}
