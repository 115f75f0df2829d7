import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { generateMarkdown, sortByInactivity, writeMarkdownReport } from "./generate-markdown.js";
import type { ClassificationResult } from "../types.js";

vi.mock("../log.js");

function makeResult(overrides: Partial<ClassificationResult> = {}): ClassificationResult {
  return {
    url: "https://github.com/test-org/repo",
    daysInactive: 40,
    lastActiveDate: "2026-01-13",
    visibility: "public",
    daysSinceLastRelease: null,
    daysSinceLastPr: null,
    ...overrides,
  };
}

describe("sortByInactivity", () => {
  it("sorts descending without touching the input", () => {
    const input = [
      makeResult({ url: "a", daysInactive: 30 }),
      makeResult({ url: "b", daysInactive: 40 }),
      makeResult({ url: "c", daysInactive: 30 }),
    ];
    expect(sortByInactivity(input).map((r) => r.url)).toEqual(["b", "a", "c"]);
    expect(input.map((r) => r.url)).toEqual(["a", "b", "c"]);
  });
});

describe("generateMarkdown", () => {
  it("renders the base table sorted by days inactive", () => {
    const md = generateMarkdown({
      results: [
        makeResult({ url: "https://github.com/test-org/young", daysInactive: 31, lastActiveDate: "2026-01-22" }),
        makeResult({ url: "https://github.com/test-org/old", daysInactive: 400, lastActiveDate: "2025-01-18", visibility: "private" }),
      ],
      inactiveDays: 30,
      activityMethod: "pushed",
      additionalMetrics: [],
    });
    expect(md).toBe(
      "# Inactive Repositories\n\n" +
        "The following repos have not had a push event for more than 30 days:\n\n" +
        "| Repository URL | Days Inactive | Last Push Date | Visibility |\n" +
        "|---|---|---|---|\n" +
        "| https://github.com/test-org/old | 400 | 2025-01-18 | private |\n" +
        "| https://github.com/test-org/young | 31 | 2026-01-22 | public |\n",
    );
  });

  it("adds metric columns only for requested metrics", () => {
    const md = generateMarkdown({
      results: [makeResult({ daysSinceLastRelease: 12, daysSinceLastPr: null })],
      inactiveDays: 30,
      activityMethod: "pushed",
      additionalMetrics: ["release", "pr"],
    });
    const lines = md.split("\n");
    expect(lines[4]).toBe("| Repository URL | Days Inactive | Last Push Date | Visibility | Days Since Last Release | Days Since Last PR |");
    expect(lines[5]).toBe("|---|---|---|---|---|---|");
    expect(lines[6]).toBe("| https://github.com/test-org/repo | 40 | 2026-01-13 | public | 12 | None |");
  });

  it("renders only the PR column when only PR is requested", () => {
    const md = generateMarkdown({
      results: [makeResult({ daysSinceLastPr: 0 })],
      inactiveDays: 30,
      activityMethod: "pushed",
      additionalMetrics: ["pr"],
    });
    expect(md.split("\n")[6]).toBe("| https://github.com/test-org/repo | 40 | 2026-01-13 | public | 0 |");
  });

  it("describes the default-branch activity method", () => {
    const md = generateMarkdown({
      results: [],
      inactiveDays: 7,
      activityMethod: "default-branch-updated",
      additionalMetrics: [],
    });
    expect(md.split("\n")[2]).toBe(
      "The following repos have not had a commit on their default branch for more than 7 days:",
    );
    expect(md.split("\n")[4]).toBe("| Repository URL | Days Inactive | Last Commit Date | Visibility |");
  });

  it("escapes pipes in cell text", () => {
    const md = generateMarkdown({
      results: [makeResult({ url: "https://example.com/a|b" })],
      inactiveDays: 1,
      activityMethod: "pushed",
      additionalMetrics: [],
    });
    expect(md.split("\n")[6]).toBe("| https://example.com/a\\|b | 40 | 2026-01-13 | public |");
  });
});

describe("writeMarkdownReport", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("writes the file and appends to the workflow summary when enabled", () => {
    dir = mkdtempSync(join(tmpdir(), "stale-repos-md-"));
    const out = join(dir, "stale_repos.md");
    const summary = join(dir, "summary.md");
    writeFileSync(summary, "previous\n", "utf-8");

    writeMarkdownReport("# Report\n", out, { workflowSummary: true, env: { GITHUB_STEP_SUMMARY: summary } });

    expect(readFileSync(out, "utf-8")).toBe("# Report\n");
    expect(readFileSync(summary, "utf-8")).toBe("previous\n# Report\n");
  });

  it("leaves the workflow summary alone when disabled", () => {
    dir = mkdtempSync(join(tmpdir(), "stale-repos-md-"));
    const summary = join(dir, "summary.md");
    writeFileSync(summary, "previous\n", "utf-8");

    writeMarkdownReport("# Report\n", join(dir, "out.md"), { workflowSummary: false, env: { GITHUB_STEP_SUMMARY: summary } });

    expect(readFileSync(summary, "utf-8")).toBe("previous\n");
  });
});
