import { Octokit } from "@octokit/rest";
import { AppAuthError, describeError } from "./errors.js";
import type { LogSink } from "./logger.js";

export const DEFAULT_API_BASE_URL = "https://api.github.com";
const USER_AGENT = "gh-app-toolkit/0.1.0";
const PAGE_SIZE = 100;

export type RepoInfo = {
  owner: string;
  repo: string;
};

export type GitHubRequestOptions = {
  apiBaseUrl?: string;
  /** Replaces the global fetch; tests answer requests in process through it. */
  fetch?: typeof fetch;
  onLog?: LogSink;
};

export type InstallationDetails = {
  id: number;
  account: string | null;
  repositorySelection: string | null;
  permissions: Record<string, string>;
};

export type InstallationAccessToken = {
  token: string;
  expiresAt: string | null;
};

export type RepositoryInfo = {
  fullName: string;
  defaultBranch: string;
};

export type RateLimitInfo = {
  limit: number;
  remaining: number;
};

export type PullRequestInfo = {
  number: number;
  title: string;
  url: string;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The `message` of a GitHub error body, or null when the body carries none. */
export function readApiMessage(body: unknown): string | null {
  if (!isRecord(body) || !("message" in body)) {
    return null;
  }
  return typeof body.message === "string" ? body.message : String(body.message);
}

export function parseRepositoryName(fullName: string, step = "parse repository name"): RepoInfo {
  const match = /^([^/\s]+)\/([^/\s]+)$/.exec(fullName.trim());
  if (!match || !match[1] || !match[2]) {
    throw new AppAuthError("InvalidInput", step, `expected owner/repo, got "${fullName}"`);
  }
  return { owner: match[1], repo: match[2] };
}

function readErrorStatus(error: unknown): number | undefined {
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function readErrorBody(error: unknown): unknown {
  if (error instanceof Error && "response" in error && isRecord(error.response)) {
    return error.response.data;
  }
  return undefined;
}

export function toRemoteError(step: string, error: unknown): AppAuthError {
  if (error instanceof AppAuthError) {
    return error;
  }
  const status = readErrorStatus(error);
  const remoteMessage = readApiMessage(readErrorBody(error)) ?? describeError(error);
  return new AppAuthError("RemoteError", step, `GitHub API error: ${remoteMessage}`, {
    status,
    remoteMessage,
    cause: error
  });
}

function ensureNoApiMessage(step: string, body: unknown): void {
  const message = readApiMessage(body);
  if (message !== null) {
    throw new AppAuthError("RemoteError", step, `GitHub API error: ${message}`, { remoteMessage: message });
  }
}

function malformed(step: string, field: string): AppAuthError {
  return new AppAuthError("MalformedResponse", step, `response is missing "${field}"`);
}

export class GitHubClient {
  private octokit: Octokit;

  /** `credential` is either an App JWT or an installation access token. */
  constructor(credential: string, options: GitHubRequestOptions = {}) {
    const onLog = options.onLog;
    this.octokit = new Octokit({
      auth: credential,
      baseUrl: options.apiBaseUrl ?? DEFAULT_API_BASE_URL,
      userAgent: USER_AGENT,
      request: options.fetch ? { fetch: options.fetch } : undefined,
      log: {
        debug: () => {},
        info: (message: string) => onLog?.("info", message),
        warn: (message: string) => onLog?.("warn", message),
        error: (message: string) => onLog?.("warn", message)
      }
    });
  }

  async listInstallationIds(): Promise<number[]> {
    const step = "list installations";
    const ids: number[] = [];
    let page = 1;
    while (true) {
      let body: unknown;
      try {
        const response = await this.octokit.apps.listInstallations({ per_page: PAGE_SIZE, page });
        body = response.data;
      } catch (error) {
        throw toRemoteError(step, error);
      }
      ensureNoApiMessage(step, body);
      if (!Array.isArray(body)) {
        throw new AppAuthError("MalformedResponse", step, "expected an array of installations");
      }
      for (const entry of body) {
        if (!isRecord(entry) || typeof entry.id !== "number") {
          throw malformed(step, "id");
        }
        ids.push(entry.id);
      }
      if (body.length < PAGE_SIZE) {
        break;
      }
      page += 1;
    }
    return ids;
  }

  async getInstallation(installationId: number): Promise<InstallationDetails> {
    const step = `get installation ${installationId}`;
    let body: unknown;
    try {
      const response = await this.octokit.apps.getInstallation({ installation_id: installationId });
      body = response.data;
    } catch (error) {
      throw toRemoteError(step, error);
    }
    ensureNoApiMessage(step, body);
    if (!isRecord(body) || typeof body.id !== "number") {
      throw malformed(step, "id");
    }
    const account = isRecord(body.account) && typeof body.account.login === "string" ? body.account.login : null;
    const permissions: Record<string, string> = {};
    if (isRecord(body.permissions)) {
      for (const [name, level] of Object.entries(body.permissions)) {
        if (typeof level === "string") {
          permissions[name] = level;
        }
      }
    }
    return {
      id: body.id,
      account,
      repositorySelection: typeof body.repository_selection === "string" ? body.repository_selection : null,
      permissions
    };
  }

  async createInstallationAccessToken(installationId: number): Promise<InstallationAccessToken> {
    const step = `exchange installation token (installation ${installationId})`;
    let body: unknown;
    try {
      const response = await this.octokit.apps.createInstallationAccessToken({ installation_id: installationId });
      body = response.data;
    } catch (error) {
      throw toRemoteError(step, error);
    }
    ensureNoApiMessage(step, body);
    if (!isRecord(body) || typeof body.token !== "string" || !body.token) {
      throw malformed(step, "token");
    }
    return {
      token: body.token,
      expiresAt: typeof body.expires_at === "string" ? body.expires_at : null
    };
  }

  async listInstallationRepositories(): Promise<string[]> {
    const step = "list installation repositories";
    const names: string[] = [];
    let page = 1;
    while (true) {
      let body: unknown;
      try {
        const response = await this.octokit.apps.listReposAccessibleToInstallation({ per_page: PAGE_SIZE, page });
        body = response.data;
      } catch (error) {
        throw toRemoteError(step, error);
      }
      ensureNoApiMessage(step, body);
      if (!isRecord(body) || !Array.isArray(body.repositories)) {
        throw malformed(step, "repositories");
      }
      for (const repo of body.repositories) {
        if (!isRecord(repo) || typeof repo.full_name !== "string") {
          throw malformed(step, "full_name");
        }
        names.push(repo.full_name);
      }
      if (body.repositories.length < PAGE_SIZE) {
        break;
      }
      page += 1;
    }
    return names;
  }

  /** Raw repository body; callers decide how to treat an error message in it. */
  async fetchRepository(repo: RepoInfo): Promise<unknown> {
    const step = `get repository ${repo.owner}/${repo.repo}`;
    try {
      const response = await this.octokit.repos.get({ owner: repo.owner, repo: repo.repo });
      return response.data;
    } catch (error) {
      const body = readErrorBody(error);
      if (readApiMessage(body) !== null) {
        return body;
      }
      throw toRemoteError(step, error);
    }
  }

  async getRepository(repo: RepoInfo): Promise<RepositoryInfo> {
    const step = `get repository ${repo.owner}/${repo.repo}`;
    const body = await this.fetchRepository(repo);
    ensureNoApiMessage(step, body);
    if (!isRecord(body) || typeof body.full_name !== "string") {
      throw malformed(step, "full_name");
    }
    if (typeof body.default_branch !== "string") {
      throw malformed(step, "default_branch");
    }
    return { fullName: body.full_name, defaultBranch: body.default_branch };
  }

  /** HTTP status of a GET, without treating error statuses as failures. */
  async fetchStatus(route: string, params: Record<string, string | number>): Promise<number> {
    try {
      const response = await this.octokit.request(route, params);
      return response.status;
    } catch (error) {
      const status = readErrorStatus(error);
      if (status !== undefined) {
        return status;
      }
      throw toRemoteError(`request ${route}`, error);
    }
  }

  async getRateLimit(): Promise<RateLimitInfo> {
    const step = "get rate limit";
    let body: unknown;
    try {
      const response = await this.octokit.rateLimit.get();
      body = response.data;
    } catch (error) {
      throw toRemoteError(step, error);
    }
    ensureNoApiMessage(step, body);
    if (!isRecord(body) || !isRecord(body.rate)) {
      throw malformed(step, "rate");
    }
    const { limit, remaining } = body.rate;
    if (typeof limit !== "number" || typeof remaining !== "number") {
      throw malformed(step, "rate.remaining");
    }
    return { limit, remaining };
  }

  async listOpenPullRequests(repo: RepoInfo): Promise<PullRequestInfo[]> {
    const step = `list pull requests ${repo.owner}/${repo.repo}`;
    const pulls: PullRequestInfo[] = [];
    let page = 1;
    while (true) {
      const response = await this.octokit.pulls
        .list({
          owner: repo.owner,
          repo: repo.repo,
          state: "open",
          per_page: PAGE_SIZE,
          page
        })
        .catch((error: unknown) => {
          throw toRemoteError(step, error);
        });
      for (const pull of response.data) {
        pulls.push({ number: pull.number, title: pull.title, url: pull.html_url });
      }
      if (response.data.length < PAGE_SIZE) {
        break;
      }
      page += 1;
    }
    return pulls;
  }

  async closePullRequest(repo: RepoInfo, pullNumber: number): Promise<void> {
    try {
      await this.octokit.pulls.update({
        owner: repo.owner,
        repo: repo.repo,
        pull_number: pullNumber,
        state: "closed"
      });
    } catch (error) {
      throw toRemoteError(`close pull request #${pullNumber}`, error);
    }
  }

  async createPullRequest(
    repo: RepoInfo,
    input: { title: string; body: string; head: string; base: string }
  ): Promise<PullRequestInfo> {
    try {
      const response = await this.octokit.pulls.create({
        owner: repo.owner,
        repo: repo.repo,
        title: input.title,
        body: input.body,
        head: input.head,
        base: input.base
      });
      return { number: response.data.number, title: response.data.title, url: response.data.html_url };
    } catch (error) {
      throw toRemoteError(`create pull request ${input.head}`, error);
    }
  }
}
