import { isRecord } from "./validate";

export const CURRENT_SCHEMA_VERSION = 1;

export function migrateConfig(raw: unknown): { config: Record<string, unknown>; changed: boolean } {
  if (!isRecord(raw)) {
    return { config: { schemaVersion: CURRENT_SCHEMA_VERSION }, changed: true };
  }

  const config: Record<string, unknown> = { ...raw };
  const schemaVersion = typeof config.schemaVersion === "number" ? config.schemaVersion : 0;
  let changed = false;

  if (schemaVersion < 1) {
    // Unversioned configs called the per-run cap maxApplicationsPerRun.
    const app = isRecord(config.app) ? { ...config.app } : {};
    if (typeof app.maxApplicationsPerRun === "number" && app.maxFillsPerRun === undefined) {
      app.maxFillsPerRun = app.maxApplicationsPerRun;
    }
    delete app.maxApplicationsPerRun;
    config.app = app;
    changed = true;
  }

  if (config.schemaVersion !== CURRENT_SCHEMA_VERSION) {
    config.schemaVersion = CURRENT_SCHEMA_VERSION;
    changed = true;
  }

  return { config, changed };
}
