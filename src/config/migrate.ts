export const CURRENT_SCHEMA_VERSION = 2;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function migrateConfig(raw: unknown): { config: Record<string, unknown>; changed: boolean } {
  if (!isRecord(raw)) {
    return { config: { schemaVersion: CURRENT_SCHEMA_VERSION }, changed: true };
  }

  const config: Record<string, unknown> = { ...raw };
  const schemaVersion = typeof config.schemaVersion === "number" ? config.schemaVersion : 0;
  let changed = false;

  if (schemaVersion < 2) {
    // v1 kept LLM settings under app.llm and the profile as a record of fields.
    const app = isRecord(config.app) ? { ...config.app } : {};
    if (isRecord(app.llm) && !isRecord(config.llm)) {
      config.llm = app.llm;
    }
    delete app.llm;
    config.app = app;

    if (isRecord(config.profile)) {
      const summary = config.profile.summary;
      config.profile = typeof summary === "string" ? summary : "";
    }
    changed = true;
  }

  if (config.schemaVersion !== CURRENT_SCHEMA_VERSION) {
    config.schemaVersion = CURRENT_SCHEMA_VERSION;
    changed = true;
  }

  return { config, changed };
}
