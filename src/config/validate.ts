import os from "os";
import path from "path";
import { AppConfig, DelayRange, defaultConfig } from "./index";
import { CURRENT_SCHEMA_VERSION } from "./migrate";
import { isPlatform } from "../types/jobs";

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(value: unknown): RawRecord {
  return isRecord(value) ? value : {};
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function readString(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function readBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function readNumber(value: unknown, fallback: number, min = 0): number {
  if (typeof value !== "number" || Number.isNaN(value) || value < min) {
    return fallback;
  }
  return value;
}

function readRange(value: unknown, fallback: DelayRange): DelayRange {
  const raw = section(value);
  const minMs = readNumber(raw.minMs, fallback.minMs);
  const maxMs = readNumber(raw.maxMs, fallback.maxMs);
  return minMs <= maxMs ? { minMs, maxMs } : { minMs: maxMs, maxMs: minMs };
}

function clampProbability(value: unknown, fallback: number): number {
  if (typeof value !== "number" || Number.isNaN(value)) {
    return fallback;
  }
  return Math.min(1, Math.max(0, value));
}

function expandHome(value: string): string {
  if (!value.startsWith("~")) {
    return value;
  }

  return path.join(os.homedir(), value.slice(1));
}

export function validateConfig(raw: unknown): AppConfig {
  const base = defaultConfig();
  const config = section(raw);

  const schemaVersion = typeof config.schemaVersion === "number" ? config.schemaVersion : CURRENT_SCHEMA_VERSION;

  const rawApp = section(config.app);
  const dataDir = expandHome(readString(rawApp.dataDir, base.app.dataDir));
  const app: AppConfig["app"] = {
    dataDir,
    auditDir: expandHome(readString(rawApp.auditDir, path.join(dataDir, "audit"))),
    browserDataDir: expandHome(readString(rawApp.browserDataDir, path.join(dataDir, "browser"))),
    headless: readBoolean(rawApp.headless, base.app.headless),
    slowMoMs: readNumber(rawApp.slowMoMs, base.app.slowMoMs),
    defaultPlatform: isPlatform(rawApp.defaultPlatform) ? rawApp.defaultPlatform : base.app.defaultPlatform,
  };

  const rawAutomation = section(config.automation);
  const rawPacing = section(rawAutomation.pacing);
  const rawHesitation = section(rawPacing.hesitation);
  const basePacing = base.automation.pacing;
  const automation: AppConfig["automation"] = {
    maxFormPages: Math.floor(readNumber(rawAutomation.maxFormPages, base.automation.maxFormPages, 1)),
    surfaceTimeoutMs: readNumber(rawAutomation.surfaceTimeoutMs, base.automation.surfaceTimeoutMs, 1),
    confirmationWaitMs: readNumber(rawAutomation.confirmationWaitMs, base.automation.confirmationWaitMs, 1),
    screenshots: readBoolean(rawAutomation.screenshots, base.automation.screenshots),
    pacing: {
      action: readRange(rawPacing.action, basePacing.action),
      hesitation: {
        ...readRange(rawHesitation, basePacing.hesitation),
        probability: clampProbability(rawHesitation.probability, basePacing.hesitation.probability),
      },
      keystroke: readRange(rawPacing.keystroke, basePacing.keystroke),
    },
  };

  const rawLlm = section(config.llm);
  const llm: AppConfig["llm"] = {
    enabled: readBoolean(rawLlm.enabled, base.llm.enabled),
    baseUrl: readString(rawLlm.baseUrl, base.llm.baseUrl).replace(/\/+$/, ""),
    model: readString(rawLlm.model, base.llm.model),
    apiKeyEnv: readString(rawLlm.apiKeyEnv, base.llm.apiKeyEnv),
    maxOutputTokens: Math.floor(readNumber(rawLlm.maxOutputTokens, base.llm.maxOutputTokens, 1)),
    temperature: readNumber(rawLlm.temperature, base.llm.temperature),
    timeoutMs: readNumber(rawLlm.timeoutMs, base.llm.timeoutMs, 1),
  };

  const profile = typeof config.profile === "string" ? config.profile : base.profile;

  const rawSearch = section(config.search);
  const search: AppConfig["search"] = {
    keywords: typeof rawSearch.keywords === "string" ? rawSearch.keywords : base.search.keywords,
    locations: isStringArray(rawSearch.locations) ? rawSearch.locations : base.search.locations,
    remoteOnly: readBoolean(rawSearch.remoteOnly, base.search.remoteOnly),
    experienceLevels: isStringArray(rawSearch.experienceLevels)
      ? rawSearch.experienceLevels
      : base.search.experienceLevels,
    maxResults: Math.floor(readNumber(rawSearch.maxResults, base.search.maxResults, 1)),
  };

  return {
    schemaVersion,
    app,
    automation,
    llm,
    profile,
    search,
  };
}
