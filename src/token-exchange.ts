import { AppAuthError } from "./errors.js";
import { GitHubClient, type GitHubRequestOptions, type InstallationAccessToken } from "./github.js";

export function assertInstallationId(installationId: number, step: string): void {
  if (!Number.isSafeInteger(installationId) || installationId <= 0) {
    throw new AppAuthError("InvalidInput", step, `installation id must be a positive integer, got ${installationId}`);
  }
}

/**
 * Trades an App JWT for an installation access token with a single
 * `POST /app/installations/{id}/access_tokens`. Nothing is retried.
 */
export async function exchangeInstallationToken(
  jwt: string,
  installationId: number,
  options: GitHubRequestOptions = {}
): Promise<InstallationAccessToken> {
  const step = "exchange installation token";
  if (!jwt.trim()) {
    throw new AppAuthError("InvalidInput", step, "JWT is required");
  }
  assertInstallationId(installationId, step);
  const client = new GitHubClient(jwt, options);
  return client.createInstallationAccessToken(installationId);
}
