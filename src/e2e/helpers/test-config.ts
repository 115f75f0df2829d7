import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { ConfigFile } from "../../config.js";

const DEFAULT_CONFIG: ConfigFile = {
  organization: "test-org",
  inactiveDays: 30,
};

export interface TestDir {
  /** Absolute path to the temp directory */
  dir: string;
  /** Absolute path to the config file */
  configPath: string;
  /** Build an absolute path inside the temp dir */
  path: (relative: string) => string;
  /** Cleanup the temp directory */
  cleanup: () => void;
}

/**
 * Creates a temp directory with a stale-repos-config.json and returns helpers.
 */
export function createTestDir(configOverrides: Partial<ConfigFile> = {}): TestDir {
  const dir = mkdtempSync(join(tmpdir(), "stale-repos-e2e-"));
  const config = { ...DEFAULT_CONFIG, ...configOverrides };
  const configPath = join(dir, "stale-repos-config.json");
  writeFileSync(configPath, JSON.stringify(config, null, 2), "utf-8");

  return {
    dir,
    configPath,
    path: (relative: string) => join(dir, relative),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/** Every variable the tool reads; blanked so the host environment cannot leak into a test. */
export const CONFIG_ENV_VARS = [
  "GH_TOKEN",
  "GH_ENTERPRISE_URL",
  "GH_APP_ID",
  "GH_APP_INSTALLATION_ID",
  "GH_APP_PRIVATE_KEY",
  "GITHUB_APP_ENTERPRISE_ONLY",
  "ORGANIZATION",
  "INACTIVE_DAYS",
  "EXEMPT_REPOS",
  "EXEMPT_TOPICS",
  "ACTIVITY_METHOD",
  "ADDITIONAL_METRICS",
  "SKIP_EMPTY_REPORTS",
  "WORKFLOW_SUMMARY_ENABLED",
  "GITHUB_OUTPUT",
  "GITHUB_STEP_SUMMARY",
] as const;
