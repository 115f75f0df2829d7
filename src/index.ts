#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { runReport, runSetup } from "./pipeline.js";
import type { RunArgs } from "./pipeline.js";
import { parseInteger } from "./config.js";
import * as log from "./log.js";

function getVersion(): string {
  const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

const program = new Command()
  .name("stale-repos")
  .description("Finds repositories in a GitHub organization or account that have been inactive for too long")
  .version(getVersion());

program
  .command("setup")
  .description("Generate a template stale-repos-config.json in the current directory")
  .action(() => {
    runSetup();
  });

program
  .command("run", { isDefault: true })
  .description("Scan repositories and write the markdown and JSON reports")
  .option("--config <path>", "Path to a custom config file")
  .option("--org <name>", "Organization to scan (overrides ORGANIZATION)")
  .option("--inactive-days <n>", "Inactivity threshold in days (overrides INACTIVE_DAYS)", (value: string) =>
    parseInteger("--inactive-days", value),
  )
  .option("--markdown <path>", "Markdown report path", "stale_repos.md")
  .option("--json <path>", "JSON report path, or '-' for stdout", "stale_repos.json")
  .option("--verbose", "Enable debug logging", false)
  .action(async (opts: RunArgs) => {
    await runReport(opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
