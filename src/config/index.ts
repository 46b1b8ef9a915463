import fs from "fs";
import os from "os";
import path from "path";
import { Platform, SearchFilter } from "../types/jobs";
import { validateConfig } from "./validate";
import { migrateConfig } from "./migrate";

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface PacingConfig {
  action: DelayRange;
  hesitation: DelayRange & { probability: number };
  keystroke: DelayRange;
}

export interface AutomationConfig {
  maxFormPages: number;
  surfaceTimeoutMs: number;
  confirmationWaitMs: number;
  screenshots: boolean;
  pacing: PacingConfig;
}

export interface LlmConfig {
  enabled: boolean;
  baseUrl: string;
  model: string;
  apiKeyEnv: string;
  maxOutputTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface AppConfig {
  schemaVersion: number;
  app: {
    dataDir: string;
    auditDir: string;
    browserDataDir: string;
    headless: boolean;
    slowMoMs: number;
    defaultPlatform: Platform;
  };
  automation: AutomationConfig;
  llm: LlmConfig;
  /** Free-text candidate profile handed to the AI collaborator. */
  profile: string;
  search: SearchFilter;
}

export function defaultConfig(): AppConfig {
  const dataDir = path.join(os.homedir(), ".applygate");
  return {
    schemaVersion: 2,
    app: {
      dataDir,
      auditDir: path.join(dataDir, "audit"),
      browserDataDir: path.join(dataDir, "browser"),
      headless: false,
      slowMoMs: 0,
      defaultPlatform: "linkedin",
    },
    automation: {
      maxFormPages: 10,
      surfaceTimeoutMs: 10000,
      confirmationWaitMs: 3000,
      screenshots: false,
      pacing: {
        action: { minMs: 1500, maxMs: 4000 },
        hesitation: { minMs: 500, maxMs: 1500, probability: 0.15 },
        keystroke: { minMs: 30, maxMs: 100 },
      },
    },
    llm: {
      enabled: true,
      baseUrl: "https://api.openai.com/v1",
      model: "gpt-4o-mini",
      apiKeyEnv: "OPENAI_API_KEY",
      maxOutputTokens: 1500,
      temperature: 0.7,
      timeoutMs: 60000,
    },
    profile: "",
    search: {
      keywords: "",
      locations: [],
      remoteOnly: false,
      experienceLevels: [],
      maxResults: 25,
    },
  };
}

export function configPath(): string {
  const override = process.env.APPLYGATE_CONFIG;
  if (override && override.length > 0) {
    return override;
  }
  return path.join(os.homedir(), ".applygate", "config.json");
}

export function loadConfig(filePath: string = configPath()): AppConfig {
  if (!fs.existsSync(filePath)) {
    return defaultConfig();
  }

  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  const migrated = migrateConfig(parsed);
  const validated = validateConfig(migrated.config);
  if (migrated.changed) {
    saveConfig(validated, filePath);
  }
  return validated;
}

export function saveConfig(config: AppConfig, filePath: string = configPath()): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2));
}
