import { describe, expect, it } from "vitest";
import type { HealthStatus, ProjectRecord, ScanResult } from "@repohealth/core";
import { createScanReport, escapeHtml, formatReport } from "./index.js";

const project = (
  name: string,
  score: number,
  status: HealthStatus,
  overrides: Partial<ProjectRecord> = {},
): ProjectRecord => ({
  name,
  path: `/work/${name}`,
  vcs: {
    branch: "main",
    lastCommitAt: "2026-10-15T12:00:00+00:00",
    uncommittedChanges: 2,
    status: "dirty",
    remoteSyncStatus: "clean",
  },
  languages: ["Go", "TypeScript"],
  dependencies: {
    hasDependencies: true,
    counts: { npm: 3 },
    ecosystems: ["npm"],
    details: ["npm: 2 deps, 1 dev deps"],
    summary: "npm: 2 deps, 1 dev deps",
  },
  quality: {
    hasReadme: true,
    readmeTier: 3,
    hasTests: false,
    testCoverageTier: 0,
    hasCi: true,
    ciSystem: "GitHub Actions",
    hasDocumentation: false,
    qualityToolCount: 1,
    structureScore: 2,
  },
  remote: null,
  health: {
    score,
    status,
    adjustments: [
      { rule: "vcs.uncommitted", delta: -0.2 },
      { rule: "quality.ci", delta: 0.6 },
    ],
  },
  ...overrides,
});

const alpha = project("alpha", 9.25, "healthy", {
  remote: {
    repository: "acme/alpha",
    stars: 12,
    openIssues: 4,
    openPullRequests: 1,
    lastActivityAt: null,
    workflowStatus: "unknown",
  },
});

const scan: ScanResult = {
  rootPath: "/work",
  projects: [
    project("beta", 6.5, "warning"),
    alpha,
    project("aardvark", 6.5, "warning"),
    project("gamma", 2, "unhealthy"),
  ],
  skipped: [{ name: "notes", path: "/work/notes", reason: "not_git_repository" }],
};

const generatedAt = "2026-10-18T12:00:00.000Z";

describe("createScanReport", () => {
  it("sorts projects by score then name and counts statuses", () => {
    const report = createScanReport(scan, { generatedAt });

    expect(report.schemaVersion).toBe("repohealth.report.v1");
    expect(report.generatedAt).toBe(generatedAt);
    expect(report.projects.map((entry) => entry.name)).toEqual([
      "alpha",
      "aardvark",
      "beta",
      "gamma",
    ]);
    expect(report.totals).toEqual({ total: 4, healthy: 1, warning: 2, unhealthy: 1 });
    expect(report.skipped).toEqual(scan.skipped);
  });

  it("does not reorder the scanned projects in place", () => {
    createScanReport(scan, { generatedAt });

    expect(scan.projects.map((entry) => entry.name)).toEqual(["beta", "alpha", "aardvark", "gamma"]);
  });
});

describe("formatReport", () => {
  const report = createScanReport(
    { rootPath: "/work", projects: [alpha], skipped: scan.skipped },
    { generatedAt },
  );

  it("renders text blocks with one-decimal scores", () => {
    expect(formatReport(report, "text").split("\n")).toEqual([
      "Repository Health Summary",
      "  root: /work",
      "  generatedAt: 2026-10-18T12:00:00.000Z",
      "  projects: 1 (healthy 1, warning 0, unhealthy 0)",
      "  skipped: 1",
      "",
      "alpha [healthy] 9.3/10",
      "  path: /work/alpha",
      "  branch: main (dirty, 2 uncommitted changes, remote sync clean)",
      "  lastCommit: 2026-10-15T12:00:00+00:00 (3 days ago)",
      "  languages: Go, TypeScript",
      "  dependencies: npm: 2 deps, 1 dev deps",
      "  quality: readme tier 3, tests tier 0, ci GitHub Actions, docs no, tools 1, structure 2",
      "  remote: acme/alpha (12 stars, 4 open issues, 1 open pull requests)",
      "  adjustments: vcs.uncommitted -0.2, quality.ci +0.6",
      "",
      "Skipped",
      "  - notes (not_git_repository)",
    ]);
  });

  it("renders markdown sections per project", () => {
    const lines = formatReport(report, "md").split("\n");

    expect(lines[0]).toBe("# Repository Health Report");
    expect(lines).toContain("## alpha");
    expect(lines).toContain("- score: **9.3/10** (`healthy`)");
    expect(lines).toContain("- `notes`: not_git_repository");
  });

  it("renders json that parses back into the report", () => {
    expect(JSON.parse(formatReport(report, "json"))).toEqual(report);
  });

  it("escapes every interpolated value in html", () => {
    const hostile = createScanReport(
      {
        rootPath: "/work/<root>",
        projects: [project("<script>alert('x')</script>", 5, "warning")],
        skipped: [{ name: "a&b", path: "/work/a&b", reason: "analysis_failed", message: "boom" }],
      },
      { generatedAt },
    );

    const html = formatReport(hostile, "html");

    expect(html).toContain("<p>Root: <code>/work/&lt;root&gt;</code></p>");
    expect(html).toContain(
      '<tr class="warning"><td>&lt;script&gt;alert(&#39;x&#39;)&lt;/script&gt;</td><td>5.0/10</td>',
    );
    expect(html).toContain("<li>a&amp;b (analysis_failed)</li>");
    expect(html).not.toContain("<script>");
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&#39;&lt;/a&gt;");
  });
});
