import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigError } from "./errors.js";
import type { ActivityMethod, GitHubAuth, Policy, SupplementalMetric } from "./types.js";
import { ACTIVITY_METHODS, SUPPLEMENTAL_METRICS } from "./types.js";

export const DEFAULT_CONFIG_FILE = "stale-repos-config.json";

export interface RunConfig {
  auth: GitHubAuth;
  enterpriseUrl?: string;
  organization?: string;
  policy: Policy;
  skipEmptyReports: boolean;
  workflowSummary: boolean;
}

/** Shape of stale-repos-config.json. Every key is optional; env vars and flags override it. */
export interface ConfigFile {
  enterpriseUrl?: string;
  organization?: string;
  inactiveDays?: number;
  exemptRepos?: string[];
  exemptTopics?: string[];
  activityMethod?: string;
  additionalMetrics?: string[];
  skipEmptyReports?: boolean;
  workflowSummary?: boolean;
}

export interface ConfigOverrides {
  organization?: string;
  inactiveDays?: number;
}

export interface GetConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

// ── Value parsers ──────────────────────────────────────────────

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === "") return defaultValue;
  return value.trim().toLowerCase() === "true";
}

export function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigError(`${name} must be an integer, got '${value}'`);
  }
  return Number(trimmed);
}

function isActivityMethod(value: string): value is ActivityMethod {
  return ACTIVITY_METHODS.some((m) => m === value);
}

function isSupplementalMetric(value: string): value is SupplementalMetric {
  return SUPPLEMENTAL_METRICS.some((m) => m === value);
}

export function parseActivityMethod(value: string | undefined): ActivityMethod {
  if (value === undefined || value.trim() === "") return "pushed";
  const normalized = value.trim().toLowerCase();
  if (!isActivityMethod(normalized)) {
    throw new ConfigError(
      `ACTIVITY_METHOD '${value}' is not supported. Use one of: ${ACTIVITY_METHODS.join(", ")}`,
    );
  }
  return normalized;
}

export function parseMetrics(values: readonly string[]): SupplementalMetric[] {
  const metrics: SupplementalMetric[] = [];
  for (const raw of values) {
    const normalized = raw.trim().toLowerCase();
    if (!isSupplementalMetric(normalized)) {
      throw new ConfigError(
        `Unknown additional metric '${raw}'. Use any of: ${SUPPLEMENTAL_METRICS.join(", ")}`,
      );
    }
    if (!metrics.includes(normalized)) metrics.push(normalized);
  }
  return metrics;
}

// ── Policy ─────────────────────────────────────────────────────

export interface PolicyInput {
  inactiveDays: number;
  exemptRepos?: readonly string[];
  exemptTopics?: readonly string[];
  activityMethod?: ActivityMethod;
  additionalMetrics?: readonly SupplementalMetric[];
}

/** Validate and freeze the policy handed to the classifier. */
export function createPolicy(input: PolicyInput): Policy {
  if (!Number.isInteger(input.inactiveDays) || input.inactiveDays < 0) {
    throw new ConfigError(`INACTIVE_DAYS must be a non-negative integer, got ${input.inactiveDays}`);
  }
  return Object.freeze({
    inactiveDays: input.inactiveDays,
    exemptRepos: Object.freeze([...(input.exemptRepos ?? [])]),
    exemptTopics: Object.freeze([...(input.exemptTopics ?? [])]),
    activityMethod: input.activityMethod ?? "pushed",
    additionalMetrics: Object.freeze([...(input.additionalMetrics ?? [])]),
  });
}

// ── Config file ────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ConfigError(`Config '${key}' must be a string`);
  return value;
}

function readBoolean(obj: Record<string, unknown>, key: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new ConfigError(`Config '${key}' must be true or false`);
  return value;
}

function readInteger(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ConfigError(`Config '${key}' must be an integer`);
  }
  return value;
}

function readStringArray(obj: Record<string, unknown>, key: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new ConfigError(`Config '${key}' must be an array of strings`);
  }
  return value;
}

export function parseConfigFile(raw: unknown): ConfigFile {
  if (!isRecord(raw)) {
    throw new ConfigError("Config file must contain a JSON object");
  }
  return {
    enterpriseUrl: readString(raw, "enterpriseUrl"),
    organization: readString(raw, "organization"),
    inactiveDays: readInteger(raw, "inactiveDays"),
    exemptRepos: readStringArray(raw, "exemptRepos"),
    exemptTopics: readStringArray(raw, "exemptTopics"),
    activityMethod: readString(raw, "activityMethod"),
    additionalMetrics: readStringArray(raw, "additionalMetrics"),
    skipEmptyReports: readBoolean(raw, "skipEmptyReports"),
    workflowSummary: readBoolean(raw, "workflowSummary"),
  };
}

/**
 * Load the JSON config file. An explicit path must exist; the default
 * stale-repos-config.json in the working directory is optional.
 */
export function loadConfigFile(configFilePath?: string): ConfigFile {
  const configPath = resolve(configFilePath ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(configPath)) {
    if (configFilePath) throw new ConfigError(`Config file not found: ${configPath}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${configPath}: ${msg}`);
  }
  return parseConfigFile(parsed);
}

// ── Credentials ────────────────────────────────────────────────

// Keys pasted into a single-line variable usually carry literal "\n".
function normalizePrivateKey(key: string): string {
  return key.replace(/\\n/g, "\n");
}

/**
 * GitHub App credentials win over GH_TOKEN when GH_APP_ID is set.
 * Credentials come from the environment only, never from the config file.
 */
export function resolveAuth(env: NodeJS.ProcessEnv): GitHubAuth {
  const appId = parseInteger("GH_APP_ID", env.GH_APP_ID);
  const installationId = parseInteger("GH_APP_INSTALLATION_ID", env.GH_APP_INSTALLATION_ID);
  const privateKey = nonEmpty(env.GH_APP_PRIVATE_KEY);

  if (appId !== undefined) {
    if (installationId === undefined || !privateKey) {
      throw new ConfigError("GH_APP_ID set and GH_APP_INSTALLATION_ID or GH_APP_PRIVATE_KEY variable not set");
    }
    return {
      kind: "app",
      appId,
      installationId,
      privateKey: normalizePrivateKey(privateKey),
      enterpriseOnly: parseBoolean(env.GITHUB_APP_ENTERPRISE_ONLY, false),
    };
  }

  const token = nonEmpty(env.GH_TOKEN);
  if (!token) {
    throw new ConfigError("GH_TOKEN environment variable not set");
  }
  return { kind: "token", token };
}

// ── Assembly ───────────────────────────────────────────────────

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Precedence: CLI overrides > environment > config file > defaults. */
export function getConfig(options: GetConfigOptions = {}): RunConfig {
  const env = options.env ?? process.env;
  const file = loadConfigFile(options.configPath);
  const overrides = options.overrides ?? {};

  const auth = resolveAuth(env);

  const inactiveDays =
    overrides.inactiveDays ?? parseInteger("INACTIVE_DAYS", env.INACTIVE_DAYS) ?? file.inactiveDays;
  if (inactiveDays === undefined) {
    throw new ConfigError("INACTIVE_DAYS environment variable not set");
  }

  const envExemptRepos = parseList(env.EXEMPT_REPOS);
  const envExemptTopics = parseList(env.EXEMPT_TOPICS);
  const envMetrics = parseList(env.ADDITIONAL_METRICS);

  const policy = createPolicy({
    inactiveDays,
    exemptRepos: envExemptRepos.length > 0 ? envExemptRepos : file.exemptRepos,
    exemptTopics: envExemptTopics.length > 0 ? envExemptTopics : file.exemptTopics,
    activityMethod: parseActivityMethod(nonEmpty(env.ACTIVITY_METHOD) ?? file.activityMethod),
    additionalMetrics: parseMetrics(envMetrics.length > 0 ? envMetrics : file.additionalMetrics ?? []),
  });

  return {
    auth,
    enterpriseUrl: nonEmpty(env.GH_ENTERPRISE_URL) ?? nonEmpty(file.enterpriseUrl),
    organization: nonEmpty(overrides.organization) ?? nonEmpty(env.ORGANIZATION) ?? nonEmpty(file.organization),
    policy,
    skipEmptyReports: parseBoolean(env.SKIP_EMPTY_REPORTS, file.skipEmptyReports ?? true),
    workflowSummary: parseBoolean(env.WORKFLOW_SUMMARY_ENABLED, file.workflowSummary ?? false),
  };
}
