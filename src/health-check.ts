import { verify, type AppAuthOptions } from "./auth.js";
import type { ToolkitConfig } from "./config.js";
import { describeError } from "./errors.js";
import { GitHubClient, parseRepositoryName, type RateLimitInfo, type RepoInfo } from "./github.js";
import { signAppJwt } from "./jwt.js";
import { hasPrivateKeyHeader, readPrivateKeyFile } from "./private-key.js";
import type { SecretStore } from "./secret-store.js";
import { exchangeInstallationToken } from "./token-exchange.js";

const LOW_RATE_LIMIT = 100;

export type HealthStatus = "HEALTHY" | "UNHEALTHY";

export type HealthMetrics = {
  timestamp: string;
  repository: string | null;
  github_app_id: string | null;
  health_status: HealthStatus;
  error_count: number;
  warning_count: number;
  check_duration_seconds: number;
};

export type HealthReport = {
  status: HealthStatus;
  errors: string[];
  warnings: string[];
  rateLimit: RateLimitInfo | null;
  metrics: HealthMetrics;
};

export type HealthCheckDeps = AppAuthOptions & {
  secretStore?: SecretStore;
  /** Delete `privateKeyPath` after the secret access check. */
  consumeKeyFile?: boolean;
};

type Recorder = {
  error: (message: string) => void;
  warning: (message: string) => void;
};

function checkConfiguration(config: ToolkitConfig, deps: HealthCheckDeps, record: Recorder): void {
  const secrets = config.secrets ?? {};
  if (!config.appId) {
    record.error("GITHUB_APP_ID is not configured");
  }
  if (!secrets.privateKeySecret && !config.privateKeyPath) {
    record.error("No private key source configured (GITHUB_APP_PRIVATE_KEY_SECRET or GITHUB_APP_PRIVATE_KEY_PATH)");
  }
  if (!secrets.installationIdSecret && config.installationId === undefined) {
    record.error("No installation ID source configured (INSTALLATION_ID_SECRET or GITHUB_APP_INSTALLATION_ID)");
  }
  if (!config.repository) {
    record.error("GITHUB_REPOSITORY is not configured");
  }
  const usesSecrets = Boolean(secrets.privateKeySecret || secrets.installationIdSecret);
  if (usesSecrets && !secrets.projectId) {
    record.error("PROJECT_ID is not configured");
  } else if (usesSecrets && !deps.secretStore) {
    record.error("Secrets are configured but no secret store is available");
  }
}

async function loadPrivateKey(config: ToolkitConfig, deps: HealthCheckDeps, record: Recorder): Promise<string | null> {
  const secretName = config.secrets?.privateKeySecret;
  let pem: string;
  if (secretName && deps.secretStore) {
    try {
      pem = await deps.secretStore.access(secretName);
    } catch {
      record.error("Failed to access GitHub App private key secret");
      return null;
    }
  } else if (config.privateKeyPath) {
    try {
      pem = readPrivateKeyFile(config.privateKeyPath, { consume: deps.consumeKeyFile });
    } catch (error) {
      record.error(`Failed to read GitHub App private key: ${describeError(error)}`);
      return null;
    }
  } else {
    return null;
  }

  if (!pem.trim()) {
    record.error("GitHub App private key secret is empty");
    return null;
  }
  if (!hasPrivateKeyHeader(pem)) {
    record.error("GitHub App private key secret does not contain valid private key");
    return null;
  }
  return pem;
}

async function loadInstallationId(
  config: ToolkitConfig,
  deps: HealthCheckDeps,
  record: Recorder
): Promise<number | null> {
  const secretName = config.secrets?.installationIdSecret;
  if (!secretName || !deps.secretStore) {
    return config.installationId ?? null;
  }
  let raw: string;
  try {
    raw = await deps.secretStore.access(secretName);
  } catch {
    record.error("Failed to access installation ID secret");
    return null;
  }
  if (!raw) {
    record.error("Installation ID secret is empty");
    return null;
  }
  if (!/^[0-9]+$/.test(raw) || Number.parseInt(raw, 10) <= 0) {
    record.error(`Installation ID is not a valid number: ${raw}`);
    return null;
  }
  return Number.parseInt(raw, 10);
}

async function checkPermissions(client: GitHubClient, repo: RepoInfo, record: Recorder): Promise<void> {
  const contents = await client.fetchStatus("GET /repos/{owner}/{repo}/contents", {
    owner: repo.owner,
    repo: repo.repo
  });
  if (contents === 403) {
    record.error("Token lacks contents permission");
  } else if (contents === 404) {
    record.warning("Repository not found or not accessible");
  } else if (contents !== 200) {
    record.warning(`Unexpected response testing contents permission: ${contents}`);
  }

  const pulls = await client.fetchStatus("GET /repos/{owner}/{repo}/pulls", {
    owner: repo.owner,
    repo: repo.repo,
    state: "open",
    per_page: 1
  });
  if (pulls === 403) {
    record.error("Token lacks pull requests permission");
  } else if (pulls !== 200) {
    record.warning(`Unexpected response testing pull requests permission: ${pulls}`);
  }
}

/**
 * Runs every check in order and reports; a failing check never aborts the
 * run, it only skips the checks that depend on its output.
 */
export async function runHealthCheck(config: ToolkitConfig, deps: HealthCheckDeps = {}): Promise<HealthReport> {
  const clock = deps.now ?? (() => new Date());
  const startedAt = clock();
  const errors: string[] = [];
  const warnings: string[] = [];
  const record: Recorder = {
    error: (message) => {
      errors.push(message);
      deps.onLog?.("error", message);
    },
    warning: (message) => {
      warnings.push(message);
      deps.onLog?.("warn", message);
    }
  };

  deps.onLog?.("info", "Checking configuration.");
  checkConfiguration(config, deps, record);

  deps.onLog?.("info", "Checking secret accessibility.");
  const privateKey = await loadPrivateKey(config, deps, record);
  const installationId = await loadInstallationId(config, deps, record);

  let jwt: string | null = null;
  if (config.appId && privateKey && installationId !== null) {
    deps.onLog?.("info", "Testing JWT generation.");
    try {
      jwt = signAppJwt(config.appId, privateKey, { now: startedAt });
      if (jwt.split(".").length !== 3) {
        record.error("Generated JWT has invalid format");
        jwt = null;
      }
    } catch (error) {
      record.error(`Failed to generate JWT: ${describeError(error)}`);
    }
  }

  let token: string | null = null;
  if (jwt && installationId !== null) {
    deps.onLog?.("info", "Testing installation token exchange.");
    try {
      token = (await exchangeInstallationToken(jwt, installationId, deps)).token;
    } catch (error) {
      record.error(`Failed to exchange JWT for installation token: ${describeError(error)}`);
    }
  }

  let rateLimit: RateLimitInfo | null = null;
  if (token && config.repository) {
    deps.onLog?.("info", "Testing repository access.");
    try {
      const result = await verify(token, config.repository, deps);
      if (!result.ok) {
        record.error(`Repository access test failed: ${result.reason}`);
      }
      const client = new GitHubClient(token, deps);
      deps.onLog?.("info", "Testing token permissions.");
      await checkPermissions(client, parseRepositoryName(config.repository), record);

      deps.onLog?.("info", "Checking API rate limits.");
      try {
        rateLimit = await client.getRateLimit();
        if (rateLimit.remaining < LOW_RATE_LIMIT) {
          record.warning(`Rate limit is low: ${rateLimit.remaining}/${rateLimit.limit} remaining`);
        }
      } catch (error) {
        record.warning(`Could not read rate limit: ${describeError(error)}`);
      }
    } catch (error) {
      record.error(`Repository checks failed: ${describeError(error)}`);
    }
  }

  const status: HealthStatus = errors.length > 0 ? "UNHEALTHY" : "HEALTHY";
  const finishedAt = clock();
  return {
    status,
    errors,
    warnings,
    rateLimit,
    metrics: {
      timestamp: finishedAt.toISOString(),
      repository: config.repository ?? null,
      github_app_id: config.appId ?? null,
      health_status: status,
      error_count: errors.length,
      warning_count: warnings.length,
      check_duration_seconds: Math.round((finishedAt.getTime() - startedAt.getTime()) / 1000)
    }
  };
}

export function formatHealthReport(report: HealthReport): string {
  const lines = [
    "=== Health Check Summary ===",
    `Status: ${report.status}`,
    `Errors: ${report.errors.length}`,
    `Warnings: ${report.warnings.length}`
  ];
  if (report.rateLimit) {
    lines.push(`Rate limit: ${report.rateLimit.remaining}/${report.rateLimit.limit} remaining`);
  }
  if (report.errors.length > 0) {
    lines.push("", "Error details:", ...report.errors.map((message) => `  - ${message}`));
  }
  if (report.warnings.length > 0) {
    lines.push("", "Warning details:", ...report.warnings.map((message) => `  - ${message}`));
  }
  return lines.join("\n");
}
