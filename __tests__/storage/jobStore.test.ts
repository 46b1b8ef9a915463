import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileJobStore } from "../../src/storage/jobStore";
import { testJob } from "../helpers/fixtures";

describe("FileJobStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "applygate-jobs-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty", async () => {
    expect(await new FileJobStore(dir).loadAll()).toEqual([]);
  });

  it("upserts by platform and external id", async () => {
    const store = new FileJobStore(dir);
    await store.upsertMany([testJob(), testJob({ platform: "upwork", title: "Scraper" })]);
    await store.upsertMany([testJob({ title: "Senior Backend Engineer" })]);

    const jobs = await store.loadAll();

    expect(jobs.map((job) => `${job.platform}:${job.title}`)).toEqual([
      "linkedin:Senior Backend Engineer",
      "upwork:Scraper",
    ]);
    expect((await store.find("upwork", "4000000001"))?.title).toBe("Scraper");
    expect(await store.find("linkedin", "missing")).toBeUndefined();
  });

  it("ignores a file that does not hold jobs", async () => {
    fs.writeFileSync(path.join(dir, "jobs.json"), JSON.stringify([{ platform: "indeed" }]));
    expect(await new FileJobStore(dir).loadAll()).toEqual([]);
  });
});
