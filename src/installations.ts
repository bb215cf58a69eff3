import { authenticate, signCredential, type AppAuthOptions, type AppCredential } from "./auth.js";
import { AppAuthError, describeError } from "./errors.js";
import { GitHubClient, type InstallationDetails } from "./github.js";
import { assertInstallationId } from "./token-exchange.js";

export type SkippedInstallation = {
  installationId: number;
  reason: string;
};

export type InstallationMatch = {
  installationId: number;
  checkedInstallations: number;
  skippedInstallations: SkippedInstallation[];
};

export async function listInstallations(credential: AppCredential, options: AppAuthOptions = {}): Promise<number[]> {
  const jwt = signCredential(credential, options);
  options.onLog?.("info", "Fetching GitHub App installations.");
  const ids = await new GitHubClient(jwt, options).listInstallationIds();
  if (ids.length === 0) {
    throw new AppAuthError("NoInstallations", "list installations", "no installations found for this GitHub App");
  }
  return ids;
}

export async function getInstallation(
  credential: AppCredential,
  installationId: number,
  options: AppAuthOptions = {}
): Promise<InstallationDetails> {
  assertInstallationId(installationId, "get installation");
  const jwt = signCredential(credential, options);
  return new GitHubClient(jwt, options).getInstallation(installationId);
}

export async function listInstallationRepositories(
  credential: AppCredential,
  installationId: number,
  options: AppAuthOptions = {}
): Promise<string[]> {
  const { token } = await authenticate(credential, installationId, options);
  options.onLog?.("info", `Fetching repositories for installation ID: ${installationId}`);
  return new GitHubClient(token, options).listInstallationRepositories();
}

/**
 * Linear scan over every installation's repositories. An installation whose
 * repository lookup fails is skipped and reported, not fatal.
 */
export async function findInstallationForRepository(
  credential: AppCredential,
  targetRepo: string,
  options: AppAuthOptions = {}
): Promise<InstallationMatch> {
  const step = "find installation";
  if (!targetRepo.trim()) {
    throw new AppAuthError("InvalidInput", step, "target repository is required");
  }
  options.onLog?.("info", `Searching for installation ID for repository: ${targetRepo}`);

  const installationIds = await listInstallations(credential, options);
  const skippedInstallations: SkippedInstallation[] = [];
  let checkedInstallations = 0;

  for (const installationId of installationIds) {
    checkedInstallations += 1;
    options.onLog?.("info", `Checking installation ID: ${installationId}`);
    let repositories: string[];
    try {
      repositories = await listInstallationRepositories(credential, installationId, options);
    } catch (error) {
      const reason = describeError(error);
      skippedInstallations.push({ installationId, reason });
      options.onLog?.("warn", `Skipping installation ${installationId}: repository lookup failed.`, { reason });
      continue;
    }
    if (repositories.includes(targetRepo)) {
      options.onLog?.("info", `Found installation ID ${installationId} for repository ${targetRepo}`);
      return { installationId, checkedInstallations, skippedInstallations };
    }
  }

  throw new AppAuthError(
    "NotFound",
    step,
    `repository ${targetRepo} not found in any installation ` +
      `(checked ${checkedInstallations}, skipped ${skippedInstallations.length})`,
    { details: { checkedInstallations, skippedInstallations } }
  );
}
