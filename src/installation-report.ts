import type { AppAuthOptions, AppCredential } from "./auth.js";
import { describeError } from "./errors.js";
import {
  findInstallationForRepository,
  listInstallationRepositories,
  listInstallations
} from "./installations.js";

export type InstallationSummaryEntry =
  | { installationId: number; repositories: string[] }
  | { installationId: number; error: string };

export async function summarizeInstallations(
  credential: AppCredential,
  options: AppAuthOptions = {}
): Promise<InstallationSummaryEntry[]> {
  const ids = await listInstallations(credential, options);
  const entries: InstallationSummaryEntry[] = [];
  for (const installationId of ids) {
    try {
      const repositories = await listInstallationRepositories(credential, installationId, options);
      entries.push({ installationId, repositories });
    } catch (error) {
      entries.push({ installationId, error: describeError(error) });
    }
  }
  return entries;
}

export function formatInstallationSummary(entries: InstallationSummaryEntry[]): string {
  const lines = ["GitHub App Installation Summary", "==============================="];
  for (const entry of entries) {
    lines.push("", `Installation ID: ${entry.installationId}`);
    if ("error" in entry) {
      lines.push(`  Error: ${entry.error}`);
      continue;
    }
    if (entry.repositories.length === 0) {
      lines.push("  (no repositories)");
      continue;
    }
    lines.push("  Repositories:", ...entry.repositories.map((name) => `    - ${name}`));
  }
  return lines.join("\n");
}

export type SecretCommandOptions = {
  projectId: string;
  /** Repository names; bare names take `owner` as their owner. */
  repositories: string[];
  owner?: string;
};

export type SecretCommandResult = {
  lines: string[];
  /** Full names whose installation could not be found. */
  unresolved: string[];
};

function qualify(name: string, owner: string | undefined): string | null {
  if (name.includes("/")) {
    return name;
  }
  return owner ? `${owner}/${name}` : null;
}

/** Shell lines that store each repository's installation id as a secret. */
export async function buildSecretCommands(
  credential: AppCredential,
  input: SecretCommandOptions,
  options: AppAuthOptions = {}
): Promise<SecretCommandResult> {
  const lines: string[] = [];
  const unresolved: string[] = [];

  for (const name of input.repositories) {
    const fullName = qualify(name, input.owner);
    if (!fullName) {
      options.onLog?.("warn", `Skipping ${name}: no owner given for a bare repository name.`);
      continue;
    }
    const repoName = fullName.slice(fullName.indexOf("/") + 1);
    try {
      const match = await findInstallationForRepository(credential, fullName, options);
      lines.push(
        `# ${fullName} (Installation ID: ${match.installationId})`,
        `echo -n "${match.installationId}" | gcloud secrets versions add ${repoName}-installation-id --data-file=- --project=${input.projectId}`,
        ""
      );
    } catch (error) {
      options.onLog?.("warn", `Could not resolve installation for ${fullName}.`, { error: describeError(error) });
      unresolved.push(fullName);
      lines.push(`# ERROR: Could not find installation ID for ${fullName}`, "");
    }
  }

  return { lines, unresolved };
}
