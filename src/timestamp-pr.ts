import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { authenticate, verify, type AppAuthOptions } from "./auth.js";
import { requireSetting, type ToolkitConfig } from "./config.js";
import { resolveCredential, resolveInstallationId, type InstallationSource } from "./credentials.js";
import { AppAuthError, describeError } from "./errors.js";
import { ensureCommandAvailable, git, runCommand, type CommandRunner } from "./git.js";
import { buildGitAuthEnv } from "./git-auth-env.js";
import { GitHubClient, parseRepositoryName, type PullRequestInfo } from "./github.js";
import type { SecretStore } from "./secret-store.js";

export const DEFAULT_BRANCH_PREFIX = "timestamp-update";
export const DEFAULT_TEMPLATE_CHANGED_AT = "2025-08-12T16:30:00Z";
export const DEFAULT_GIT_BASE_URL = "https://github.com";
export const DEFAULT_GIT_USER_NAME = "gh-app-toolkit";
export const DEFAULT_GIT_USER_EMAIL = "gh-app-toolkit@users.noreply.github.com";
export const TIMESTAMP_FILE = "timestamp.txt";

const STALE_TITLE = /timestamp update/i;

export type TimestampUpdateDeps = AppAuthOptions & {
  secretStore?: SecretStore;
  consumeKeyFile?: boolean;
  run?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  /** Parent of the temporary clone; defaults to the OS temp directory. */
  workRoot?: string;
  random?: () => number;
  dryRun?: boolean;
};

export type TimestampUpdateResult = {
  repository: string;
  installationId: number;
  installationSource: InstallationSource;
  defaultBranch: string;
  branch: string;
  dryRun: boolean;
  closedPullRequests: number[];
  pullRequest: PullRequestInfo | null;
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `2025-08-12T16:30:00Z`: UTC to the second. */
export function formatUtcTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function buildBranchName(prefix: string, date: Date, random: () => number): string {
  const stamp = [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds())
  ].join("-");
  const suffix = 1000 + Math.floor(random() * 9000);
  return `${prefix}-${stamp}-${suffix}`;
}

export function renderTimestampFile(templateChangedAt: string, createdAt: string): string {
  return `Template changed: ${templateChangedAt}\nPR created: ${createdAt}\n`;
}

/**
 * Opens a pull request that rewrites `timestamp.txt` on a fresh branch, after
 * closing earlier timestamp pull requests. The clone is removed on every exit.
 */
export async function runTimestampUpdate(
  config: ToolkitConfig,
  deps: TimestampUpdateDeps = {}
): Promise<TimestampUpdateResult> {
  const repository = requireSetting(config.repository, "repository");
  const repo = parseRepositoryName(repository);
  const run = deps.run ?? runCommand;
  const log = deps.onLog;
  const requestOptions: AppAuthOptions = {
    apiBaseUrl: config.apiBaseUrl ?? deps.apiBaseUrl,
    fetch: deps.fetch,
    onLog: deps.onLog,
    now: deps.now
  };

  const credential = await resolveCredential(config, deps);
  const installation = await resolveInstallationId(config, credential, {
    ...requestOptions,
    secretStore: deps.secretStore,
    persist: true
  });

  const { token } = await authenticate(credential, installation.installationId, requestOptions);
  log?.("info", `Successfully obtained installation token (length: ${token.length})`);

  const verified = await verify(token, repository, requestOptions);
  if (!verified.ok) {
    throw new AppAuthError("RemoteError", "verify repository access", verified.reason);
  }

  const client = new GitHubClient(token, requestOptions);
  const { defaultBranch } = await client.getRepository(repo);
  const now = deps.now?.() ?? new Date();
  const createdAt = formatUtcTimestamp(now);
  const pullRequestConfig = config.pullRequest ?? {};
  const branch = buildBranchName(
    pullRequestConfig.branchPrefix ?? DEFAULT_BRANCH_PREFIX,
    now,
    deps.random ?? Math.random
  );
  const templateChangedAt = pullRequestConfig.templateChangedAt ?? DEFAULT_TEMPLATE_CHANGED_AT;
  log?.("info", `Default branch: ${defaultBranch}; new branch: ${branch}`);

  const result: TimestampUpdateResult = {
    repository,
    installationId: installation.installationId,
    installationSource: installation.source,
    defaultBranch,
    branch,
    dryRun: Boolean(deps.dryRun),
    closedPullRequests: [],
    pullRequest: null
  };

  if (deps.dryRun) {
    log?.("info", "Dry run: would close open timestamp update pull requests.");
    log?.("info", `Dry run: would push ${TIMESTAMP_FILE} to ${branch} and open a pull request against ${defaultBranch}.`);
    return result;
  }

  await ensureCommandAvailable(run, "git");

  const workDir = fs.mkdtempSync(path.join(deps.workRoot ?? os.tmpdir(), "gh-app-toolkit-pr-"));
  const repoDir = path.join(workDir, "repo");
  fs.mkdirSync(repoDir);
  const gitEnv = buildGitAuthEnv(deps.env ?? process.env, token);
  try {
    const gitBaseUrl = (pullRequestConfig.gitBaseUrl ?? DEFAULT_GIT_BASE_URL).replace(/\/+$/, "");
    log?.("info", `Cloning ${repository}.`);
    await git(run, ["clone", `${gitBaseUrl}/${repository}.git`, repoDir], { env: gitEnv });
    await git(run, ["config", "user.name", pullRequestConfig.gitUserName ?? DEFAULT_GIT_USER_NAME], {
      cwd: repoDir
    });
    await git(run, ["config", "user.email", pullRequestConfig.gitUserEmail ?? DEFAULT_GIT_USER_EMAIL], {
      cwd: repoDir
    });

    log?.("info", "Checking for existing timestamp update pull requests.");
    const openPulls = await client.listOpenPullRequests(repo);
    for (const pull of openPulls.filter((candidate) => STALE_TITLE.test(candidate.title))) {
      log?.("info", `Closing pull request #${pull.number}.`);
      await client.closePullRequest(repo, pull.number);
      result.closedPullRequests.push(pull.number);
    }

    try {
      await git(run, ["push", "origin", `:${branch}`], { cwd: repoDir, env: gitEnv });
    } catch (error) {
      log?.("info", "No stale remote branch to delete.", { error: describeError(error) });
    }

    await git(run, ["checkout", "-b", branch], { cwd: repoDir });
    fs.writeFileSync(path.join(repoDir, TIMESTAMP_FILE), renderTimestampFile(templateChangedAt, createdAt), "utf8");
    await git(run, ["add", TIMESTAMP_FILE], { cwd: repoDir });
    await git(
      run,
      ["commit", "-m", `Update timestamp - Template changed: ${templateChangedAt}, PR created: ${createdAt}`],
      { cwd: repoDir }
    );
    log?.("info", `Pushing branch ${branch}.`);
    await git(run, ["push", "origin", branch], { cwd: repoDir, env: gitEnv });

    result.pullRequest = await client.createPullRequest(repo, {
      title: `Automated timestamp update for ${repo.repo}`,
      body: `Automated timestamp update for ${repo.repo} - ${createdAt}`,
      head: branch,
      base: defaultBranch
    });
    log?.("info", `Pull request created: ${result.pullRequest.url}`);
    return result;
  } finally {
    fs.rmSync(workDir, { recursive: true, force: true });
  }
}
