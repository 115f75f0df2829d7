import { existsSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { getConfig, DEFAULT_CONFIG_FILE } from "./config.js";
import type { ConfigOverrides, RunConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createGitHubClient, listRepositories, verifyAuthentication } from "./github-client.js";
import { classify } from "./analysis/classifier.js";
import { generateMarkdown, writeMarkdownReport } from "./reporting/generate-markdown.js";
import { buildJsonReport, writeJsonOutput } from "./reporting/api-output.js";
import type { ClassificationResult } from "./types.js";
import * as log from "./log.js";

const TEMPLATE_CONFIG = {
  organization: "my-org",
  inactiveDays: 365,
  exemptRepos: [],
  exemptTopics: [],
  activityMethod: "pushed",
  additionalMetrics: [],
  skipEmptyReports: true,
  workflowSummary: false,
};

export interface RunArgs {
  markdown: string;
  json: string;
  verbose: boolean;
  config?: string;
  org?: string;
  inactiveDays?: number;
}

export interface PipelineOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  /** Frozen clock for the whole scan. */
  now?: Date;
}

export interface PipelineResult {
  config: RunConfig;
  results: ClassificationResult[];
}

function unscopedDescription(config: RunConfig): string {
  return config.auth.kind === "app"
    ? "repos the GitHub App installation can access"
    : "repos owned by the token owner";
}

export function runSetup(): string {
  const configPath = resolve(DEFAULT_CONFIG_FILE);
  if (existsSync(configPath)) {
    throw new ConfigError(
      `Config file already exists: ${configPath}. Remove or rename it and try again.`,
    );
  }
  writeFileSync(configPath, JSON.stringify(TEMPLATE_CONFIG, null, 2) + "\n", "utf-8");
  log.success(`Created template config: ${configPath}`);
  log.info(
    "Set GH_TOKEN (or GH_APP_ID, GH_APP_INSTALLATION_ID and GH_APP_PRIVATE_KEY) in the environment " +
      "or .env, and edit the file to match your organization.",
  );
  return configPath;
}

export async function runPipeline(options: PipelineOptions = {}): Promise<PipelineResult> {
  log.info("Loading configuration…");
  const config = getConfig({ configPath: options.configPath, overrides: options.overrides });
  const { policy } = config;

  log.info("Authenticating to GitHub…");
  const startAuth = Date.now();
  const octokit = createGitHubClient({ auth: config.auth, enterpriseUrl: config.enterpriseUrl });
  const login = await verifyAuthentication(octokit, config.auth);
  log.success(`Authenticated as ${login} (${Date.now() - startAuth}ms)`);

  if (!config.organization) {
    log.info(`ORGANIZATION not set, searching all ${unscopedDescription(config)}`);
  }
  if (policy.exemptTopics.length > 0) log.info(`Exempt topics: ${policy.exemptTopics.join(", ")}`);
  if (policy.exemptRepos.length > 0) log.info(`Exempt repos: ${policy.exemptRepos.join(", ")}`);
  log.debug(
    `Threshold ${policy.inactiveDays} days, activity method '${policy.activityMethod}', ` +
      `metrics [${policy.additionalMetrics.join(", ")}]`,
  );

  const startScan = Date.now();
  const results = await classify(listRepositories(octokit, config.organization, config.auth), policy, {
    now: options.now,
    organization: config.organization,
  });
  log.debug(`Scan finished in ${Date.now() - startScan}ms`);

  return { config, results };
}

export async function runReport(args: RunArgs, now?: Date): Promise<PipelineResult> {
  log.setVerbose(args.verbose);
  log.setSilent(args.json === "-");
  log.heading("Stale Repos");

  const pipeline = await runPipeline({
    configPath: args.config,
    overrides: { organization: args.org, inactiveDays: args.inactiveDays },
    now,
  });
  const { config, results } = pipeline;

  if (results.length === 0 && config.skipEmptyReports) {
    log.info("No stale repos found");
    return pipeline;
  }

  const markdown = generateMarkdown({
    results,
    inactiveDays: config.policy.inactiveDays,
    activityMethod: config.policy.activityMethod,
    additionalMetrics: config.policy.additionalMetrics,
  });
  writeMarkdownReport(markdown, resolve(args.markdown), { workflowSummary: config.workflowSummary });

  const jsonDestination = args.json === "-" ? "-" : resolve(args.json);
  writeJsonOutput(buildJsonReport(results), jsonDestination);

  log.heading("Summary");
  log.summary("Scope", config.organization ?? unscopedDescription(config));
  log.summary("Threshold (days)", config.policy.inactiveDays);
  log.summary("Stale repositories", results.length);
  log.summary("Markdown report", resolve(args.markdown));

  return pipeline;
}
