import fs from "fs";
import path from "path";
import { configPath, defaultConfig, loadConfig, saveConfig, AppConfig } from "../config";
import { createAdapterRegistry, AdapterRegistry } from "../connectors";
import { parseLinkedInCard } from "../connectors/linkedin/linkedinConnector";
import { parseUpworkCard } from "../connectors/upwork/upworkConnector";
import { createPacingGovernor } from "../automation/pacing";
import { createPlaywrightSession } from "../automation/playwright";
import { AutomationSession } from "../automation/session";
import { errorMessage, isAbortError } from "../core/errors";
import { SessionController } from "../core/sessionController";
import { createAiCollaborator } from "../llm";
import { createOpenAiChatClient } from "../llm/openai";
import { createAuditLogger } from "../logging/auditLogger";
import { createLogger } from "../logging/logger";
import { FileJobStore } from "../storage/jobStore";
import { isPlatform, Job, Platform, SearchFilter } from "../types/jobs";
import { createTerminalReviewGate } from "./review";

const logger = createLogger("cli");

export async function runCli(argv: string[] = process.argv.slice(2)): Promise<void> {
  const args = argv;
  const command = args[0] ?? "";

  switch (command) {
    case "init":
      await handleInit(args.slice(1));
      return;
    case "config":
      await handleConfig(args.slice(1));
      return;
    case "profile":
      await handleProfile(args.slice(1));
      return;
    case "login":
      await handleLogin(args.slice(1));
      return;
    case "search":
      await handleSearch(args.slice(1));
      return;
    case "jobs":
      await handleJobs(args.slice(1));
      return;
    case "details":
      await handleDetails(args.slice(1));
      return;
    case "apply":
      await handleApply(args.slice(1));
      return;
    default:
      printHelp();
      return;
  }
}

async function handleInit(args: string[]): Promise<void> {
  const filePath = configPath();
  if (fs.existsSync(filePath) && !hasFlag(args, "--force")) {
    process.stdout.write(`Config already exists at ${filePath} (use --force to overwrite)\n`);
    return;
  }
  saveConfig(defaultConfig(), filePath);
  process.stdout.write(`Initialized config at ${filePath}\n`);
}

async function handleConfig(args: string[]): Promise<void> {
  const subcommand = args[0] ?? "";
  if (subcommand !== "show") {
    process.stderr.write("Unknown config command. Use: applygate config show\n");
    return;
  }

  const config = loadConfig();
  process.stdout.write(`${JSON.stringify(redactConfig(config), null, 2)}\n`);
}

async function handleProfile(args: string[]): Promise<void> {
  const subcommand = args[0] ?? "";
  if (subcommand !== "set") {
    process.stderr.write("Unknown profile command. Use: applygate profile set --text <profile> | --file <path>\n");
    return;
  }

  const text = readFlag(args, "--text");
  const file = readFlag(args, "--file");
  const profile = file ? fs.readFileSync(path.resolve(file), "utf8") : text;
  if (profile === undefined || profile.trim().length === 0) {
    process.stderr.write("Profile text required. Use --text <profile> or --file <path>\n");
    return;
  }

  const config = loadConfig();
  saveConfig({ ...config, profile: profile.trim() });
  process.stdout.write(`Saved profile (${profile.trim().length} characters).\n`);
}

async function handleLogin(args: string[]): Promise<void> {
  const config = loadConfig();
  const platform = readPlatform(args, config);
  const seconds = Number(readFlag(args, "--timeout") ?? 300);
  const timeoutMs = (Number.isFinite(seconds) && seconds > 0 ? seconds : 300) * 1000;

  await withRuntime(config, async (registry) => {
    const adapter = registry.get(platform);
    if (hasFlag(args, "--check")) {
      const signedIn = await adapter.checkLoginStatus();
      process.stdout.write(`${platform}: ${signedIn ? "signed in" : "not signed in"}\n`);
      return;
    }

    const controller = new AbortController();
    const stop = (): void => controller.abort();
    process.once("SIGINT", stop);
    try {
      const signedIn = await adapter.login({
        timeoutMs,
        progress: (message) => process.stdout.write(`${message}\n`),
        signal: controller.signal,
      });
      if (signedIn) {
        process.stdout.write(`Signed in to ${platform}. The browser profile in ${config.app.browserDataDir} keeps the session.\n`);
      } else {
        process.stdout.write(`Not signed in to ${platform}.\n`);
        process.exitCode = 1;
      }
    } catch (error) {
      if (!isAbortError(error)) {
        throw error;
      }
      process.stdout.write("Login cancelled.\n");
    } finally {
      process.removeListener("SIGINT", stop);
    }
  });
}

async function handleSearch(args: string[]): Promise<void> {
  const config = loadConfig();
  const platform = readPlatform(args, config);
  const filter = buildFilter(args, config.search);
  const store = new FileJobStore(config.app.dataDir);

  await withRuntime(config, async (registry) => {
    const controller = new AbortController();
    const stop = (): void => controller.abort();
    process.once("SIGINT", stop);
    try {
      const jobs = await registry
        .get(platform)
        .searchJobs(filter, (message) => process.stdout.write(`${message}\n`), controller.signal);
      await store.upsertMany(jobs);
      process.stdout.write(`Saved ${jobs.length} jobs. Run: applygate jobs\n`);
    } finally {
      process.removeListener("SIGINT", stop);
    }
  });
}

async function handleJobs(args: string[]): Promise<void> {
  const config = loadConfig();
  const limitValue = Number(readFlag(args, "--limit") ?? 20);
  const limit = Number.isFinite(limitValue) && limitValue > 0 ? limitValue : 20;
  const store = new FileJobStore(config.app.dataDir);
  const jobs = await store.loadAll();
  if (jobs.length === 0) {
    process.stdout.write("No saved jobs found. Run: applygate search --keywords <text>\n");
    return;
  }

  for (const job of jobs.slice(0, limit)) {
    const quick = job.hasQuickApply ? " | quick apply" : "";
    const connects = job.connectsRequired !== undefined ? ` | ${job.connectsRequired} Connects` : "";
    process.stdout.write(
      `${job.platform}:${job.externalJobId} | ${job.company} | ${job.title} | ${job.location}${quick}${connects}\n`
    );
    process.stdout.write(`  ${job.url}\n`);
  }
}

async function handleDetails(args: string[]): Promise<void> {
  const config = loadConfig();
  const platform = readPlatform(args, config);
  const url = readFlag(args, "--url");
  if (!url) {
    process.stderr.write("Job URL required. Use: applygate details --platform <name> --url <jobUrl>\n");
    return;
  }

  await withRuntime(config, async (registry) => {
    const details = await registry.get(platform).fetchJobDetails(url);
    if (!details) {
      process.stdout.write("Could not load job details.\n");
      return;
    }
    process.stdout.write(`${JSON.stringify(details, null, 2)}\n`);
  });
}

async function handleApply(args: string[]): Promise<void> {
  const config = loadConfig();
  const platform = readPlatform(args, config);
  const jobId = readFlag(args, "--job");
  const url = readFlag(args, "--url");
  const store = new FileJobStore(config.app.dataDir);

  const job = jobId ? await store.find(platform, jobId) : url ? jobFromUrl(platform, url) : null;
  if (!job) {
    process.stderr.write("Job not found. Use --job <id> from `applygate jobs` or --url <jobUrl>\n");
    return;
  }
  if (!config.profile) {
    logger.warn("No profile configured; AI drafting will have nothing to work from. Run: applygate profile set");
  }

  await withRuntime(config, async (registry) => {
    const adapter = registry.get(platform);
    const details = await adapter.fetchJobDetails(job.url);
    const controllerDeps = {
      registry,
      ai: createAiCollaborator(createOpenAiChatClient({ config: config.llm })),
      audit: createAuditLogger(config.app.auditDir),
    };
    const controller = new SessionController(controllerDeps);
    const abort = new AbortController();
    const stop = (): void => abort.abort();
    process.once("SIGINT", stop);

    try {
      const session = await controller.run(
        job,
        { profile: config.profile, jobDescription: details?.description },
        createTerminalReviewGate(),
        { progress: (message) => process.stdout.write(`${message}\n`), signal: abort.signal }
      );
      process.stdout.write(`Result: ${session.status}${session.errorMessage ? ` (${session.errorMessage})` : ""}\n`);
      process.stdout.write(`Audit records: ${config.app.auditDir}\n`);
    } finally {
      process.removeListener("SIGINT", stop);
    }
  });
}

async function withRuntime(config: AppConfig, work: (registry: AdapterRegistry) => Promise<void>): Promise<void> {
  let session: AutomationSession | null = null;
  try {
    session = await createPlaywrightSession({
      headless: config.app.headless,
      slowMoMs: config.app.slowMoMs,
      userDataDir: config.app.browserDataDir,
    });
  } catch (error) {
    logger.error(`Could not start the browser: ${errorMessage(error)}`);
  }

  const registry = createAdapterRegistry({
    session,
    pacing: createPacingGovernor(config.automation.pacing),
    automation: config.automation,
    screenshotDir: path.join(config.app.dataDir, "screenshots"),
  });

  try {
    await work(registry);
  } finally {
    await registry.closeAll();
    if (session) {
      await session.close();
    }
  }
}

export function jobFromUrl(platform: Platform, url: string): Job {
  const link = { href: url, text: "Job", ariaLabel: "", cardText: "" };
  const parsed = platform === "linkedin" ? parseLinkedInCard(link) : parseUpworkCard(link);
  return {
    platform,
    externalJobId: parsed?.externalJobId ?? url,
    title: "Unknown title",
    company: "Unknown company",
    location: "Unknown",
    url: parsed?.url ?? url,
  };
}

function readPlatform(args: string[], config: AppConfig): Platform {
  const value = readFlag(args, "--platform") ?? config.app.defaultPlatform;
  if (!isPlatform(value)) {
    throw new Error(`Unknown platform '${value}'. Use linkedin or upwork.`);
  }
  return value;
}

export function buildFilter(args: string[], defaults: SearchFilter): SearchFilter {
  const locations = readMultiFlag(args, "--location");
  const levels = readMultiFlag(args, "--experience");
  const maxValue = Number(readFlag(args, "--max") ?? defaults.maxResults);
  return {
    keywords: readFlag(args, "--keywords") ?? defaults.keywords,
    locations: locations.length > 0 ? locations : defaults.locations,
    remoteOnly: hasFlag(args, "--remote") || defaults.remoteOnly,
    experienceLevels: levels.length > 0 ? levels : defaults.experienceLevels,
    maxResults: Number.isFinite(maxValue) && maxValue > 0 ? Math.floor(maxValue) : defaults.maxResults,
  };
}

function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) {
    return undefined;
  }

  return args[index + 1];
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

function readMultiFlag(args: string[], name: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    if (args[i] === name && typeof args[i + 1] === "string") {
      values.push(...splitList(args[i + 1]));
    }
  }
  return values;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    profile: config.profile ? `${config.profile.slice(0, 40)}${config.profile.length > 40 ? "..." : ""}` : "",
  };
}

function printHelp(): void {
  process.stdout.write("applygate <command>\n\n");
  process.stdout.write("Commands:\n");
  process.stdout.write("  init [--force]\n");
  process.stdout.write("  config show\n");
  process.stdout.write("  profile set --text <profile> | --file <path>\n");
  process.stdout.write("  login [--platform linkedin|upwork] [--check] [--timeout <seconds>]\n");
  process.stdout.write(
    "  search [--platform linkedin|upwork] [--keywords <text>] [--location <loc>] [--experience <level>] [--remote] [--max N]\n"
  );
  process.stdout.write("  jobs [--limit N]\n");
  process.stdout.write("  details [--platform linkedin|upwork] --url <jobUrl>\n");
  process.stdout.write("  apply [--platform linkedin|upwork] --job <id> | --url <jobUrl>\n");
}
