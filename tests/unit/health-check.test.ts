import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { ToolkitConfig } from "../../src/config.js";
import { formatHealthReport, runHealthCheck, type HealthReport } from "../../src/health-check.js";
import type { SecretStore } from "../../src/secret-store.js";
import { createFakeGitHub, testKeyPair, type FakeReply } from "../helpers/fake-github.js";

function keyFile(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gh-app-toolkit-health-"));
  const keyPath = path.join(dir, "app.pem");
  fs.writeFileSync(keyPath, testKeyPair().privateKey, "utf8");
  return keyPath;
}

function clock(...isoTimes: string[]): () => Date {
  let index = 0;
  return () => {
    const value = isoTimes[Math.min(index, isoTimes.length - 1)] ?? "2024-01-01T00:00:00Z";
    index += 1;
    return new Date(value);
  };
}

function repositoryRoutes(overrides: { contents?: FakeReply; rateRemaining?: number } = {}) {
  return createFakeGitHub([
    { method: "POST", path: "/app/installations/42/access_tokens", reply: { status: 201, body: { token: "tok-42" } } },
    {
      method: "GET",
      path: "/repos/octo-org/widgets",
      reply: { body: { full_name: "octo-org/widgets", default_branch: "main" } }
    },
    { method: "GET", path: "/repos/octo-org/widgets/contents", reply: overrides.contents ?? { body: [] } },
    { method: "GET", path: "/repos/octo-org/widgets/pulls", reply: { body: [] } },
    {
      method: "GET",
      path: "/rate_limit",
      reply: { body: { resources: {}, rate: { limit: 5000, remaining: overrides.rateRemaining ?? 4999 } } }
    }
  ]);
}

describe("runHealthCheck", () => {
  it("reports healthy when every check passes", async () => {
    const github = repositoryRoutes();
    const config: ToolkitConfig = {
      appId: "12345",
      privateKeyPath: keyFile(),
      installationId: 42,
      repository: "octo-org/widgets"
    };

    const report = await runHealthCheck(config, {
      fetch: github.fetch,
      now: clock("2024-01-01T00:00:00Z", "2024-01-01T00:00:03Z")
    });

    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual([]);
    expect(report.status).toBe("HEALTHY");
    expect(report.rateLimit).toEqual({ limit: 5000, remaining: 4999 });
    expect(report.metrics).toEqual({
      timestamp: "2024-01-01T00:00:03.000Z",
      repository: "octo-org/widgets",
      github_app_id: "12345",
      health_status: "HEALTHY",
      error_count: 0,
      warning_count: 0,
      check_duration_seconds: 3
    });
    const pulls = github.requests.find((request) => request.path === "/repos/octo-org/widgets/pulls");
    expect(pulls?.query.get("state")).toBe("open");
    expect(pulls?.query.get("per_page")).toBe("1");
  });

  it("classifies permission and rate limit problems", async () => {
    const github = repositoryRoutes({
      contents: { status: 403, body: { message: "Resource not accessible by integration" } },
      rateRemaining: 50
    });
    const report = await runHealthCheck(
      { appId: "12345", privateKeyPath: keyFile(), installationId: 42, repository: "octo-org/widgets" },
      { fetch: github.fetch }
    );

    expect(report.status).toBe("UNHEALTHY");
    expect(report.errors).toEqual(["Token lacks contents permission"]);
    expect(report.warnings).toEqual(["Rate limit is low: 50/5000 remaining"]);
  });

  it("treats a missing repository as a warning", async () => {
    const github = repositoryRoutes({ contents: { status: 404, body: { message: "Not Found" } } });
    const report = await runHealthCheck(
      { appId: "12345", privateKeyPath: keyFile(), installationId: 42, repository: "octo-org/widgets" },
      { fetch: github.fetch }
    );

    expect(report.status).toBe("HEALTHY");
    expect(report.warnings).toEqual(["Repository not found or not accessible"]);
  });

  it("reports missing configuration without touching the network", async () => {
    const github = repositoryRoutes();
    const report = await runHealthCheck({}, { fetch: github.fetch });

    expect(report.errors).toEqual([
      "GITHUB_APP_ID is not configured",
      "No private key source configured (GITHUB_APP_PRIVATE_KEY_SECRET or GITHUB_APP_PRIVATE_KEY_PATH)",
      "No installation ID source configured (INSTALLATION_ID_SECRET or GITHUB_APP_INSTALLATION_ID)",
      "GITHUB_REPOSITORY is not configured"
    ]);
    expect(report.metrics.error_count).toBe(4);
    expect(report.metrics.health_status).toBe("UNHEALTHY");
    expect(github.requests).toHaveLength(0);
  });

  it("deletes a consumed key file on an unhealthy run", async () => {
    const github = repositoryRoutes();
    const privateKeyPath = keyFile();

    const report = await runHealthCheck(
      { privateKeyPath, installationId: 42, repository: "octo-org/widgets" },
      { fetch: github.fetch, consumeKeyFile: true }
    );

    expect(report.status).toBe("UNHEALTHY");
    expect(report.errors).toEqual(["GITHUB_APP_ID is not configured"]);
    expect(fs.existsSync(privateKeyPath)).toBe(false);
    expect(github.requests).toHaveLength(0);
  });

  it("keeps the key file unless asked to consume it", async () => {
    const github = repositoryRoutes();
    const privateKeyPath = keyFile();

    await runHealthCheck({ privateKeyPath, installationId: 42, repository: "octo-org/widgets" }, { fetch: github.fetch });

    expect(fs.existsSync(privateKeyPath)).toBe(true);
  });

  it("validates secret contents", async () => {
    const store: SecretStore = {
      access: async (name) => (name === "app-key" ? "not a pem" : "abc"),
      addVersion: async () => {}
    };
    const report = await runHealthCheck(
      {
        appId: "12345",
        repository: "octo-org/widgets",
        secrets: { projectId: "demo-project", privateKeySecret: "app-key", installationIdSecret: "app-installation" }
      },
      { secretStore: store }
    );

    expect(report.errors).toEqual([
      "GitHub App private key secret does not contain valid private key",
      "Installation ID is not a valid number: abc"
    ]);
  });
});

describe("formatHealthReport", () => {
  it("renders counts and details", () => {
    const report: HealthReport = {
      status: "UNHEALTHY",
      errors: ["Token lacks contents permission"],
      warnings: [],
      rateLimit: { limit: 5000, remaining: 10 },
      metrics: {
        timestamp: "2024-01-01T00:00:00.000Z",
        repository: "octo-org/widgets",
        github_app_id: "12345",
        health_status: "UNHEALTHY",
        error_count: 1,
        warning_count: 0,
        check_duration_seconds: 1
      }
    };
    expect(formatHealthReport(report)).toBe(
      [
        "=== Health Check Summary ===",
        "Status: UNHEALTHY",
        "Errors: 1",
        "Warnings: 0",
        "Rate limit: 10/5000 remaining",
        "",
        "Error details:",
        "  - Token lacks contents permission"
      ].join("\n")
    );
  });
});
