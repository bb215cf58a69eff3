import type { AppAuthOptions, AppCredential } from "./auth.js";
import { parseInstallationId, requireSetting, type ToolkitConfig } from "./config.js";
import { AppAuthError, describeError } from "./errors.js";
import { findInstallationForRepository } from "./installations.js";
import { readPrivateKeyFile } from "./private-key.js";
import type { SecretStore } from "./secret-store.js";

export type CredentialSources = AppAuthOptions & {
  secretStore?: SecretStore;
  /** Delete `privateKeyPath` after reading it. */
  consumeKeyFile?: boolean;
};

export type InstallationSource = "config" | "secret" | "discovered";

export type ResolvedInstallation = {
  installationId: number;
  source: InstallationSource;
};

export async function resolvePrivateKey(config: ToolkitConfig, sources: CredentialSources = {}): Promise<string> {
  const secretName = config.secrets?.privateKeySecret;
  if (secretName && sources.secretStore) {
    sources.onLog?.("info", "Retrieving GitHub App private key from the secret store.", { secret: secretName });
    const pem = await sources.secretStore.access(secretName);
    if (!pem) {
      throw new AppAuthError("KeyNotFound", "read private key", `secret ${secretName} is empty`);
    }
    return `${pem}\n`;
  }
  if (config.privateKeyPath) {
    return readPrivateKeyFile(config.privateKeyPath, { consume: sources.consumeKeyFile });
  }
  throw new AppAuthError(
    "InvalidInput",
    "read private key",
    "no private key configured; set privateKeyPath or secrets.privateKeySecret"
  );
}

export async function resolveCredential(config: ToolkitConfig, sources: CredentialSources = {}): Promise<AppCredential> {
  const appId = requireSetting(config.appId, "GitHub App ID");
  return { appId, privateKey: await resolvePrivateKey(config, sources) };
}

export type ResolveInstallationOptions = CredentialSources & {
  /** Write a discovered id back to `secrets.installationIdSecret`. */
  persist?: boolean;
};

/**
 * Installation id from configuration, then the secret store, then discovery
 * over every installation of the App.
 */
export async function resolveInstallationId(
  config: ToolkitConfig,
  credential: AppCredential,
  options: ResolveInstallationOptions = {}
): Promise<ResolvedInstallation> {
  if (config.installationId !== undefined) {
    return { installationId: config.installationId, source: "config" };
  }

  const secretName = config.secrets?.installationIdSecret;
  const store = options.secretStore;
  if (secretName && store) {
    let stored = "";
    try {
      stored = await store.access(secretName);
    } catch (error) {
      options.onLog?.("warn", "Installation ID could not be read from the secret store; discovering it.", {
        error: describeError(error)
      });
    }
    if (stored) {
      options.onLog?.("info", `Installation ID retrieved from the secret store: ${stored}`);
      return { installationId: parseInstallationId(stored, `secret ${secretName}`), source: "secret" };
    }
  }

  const repository = requireSetting(config.repository, "repository (needed to discover the installation ID)");
  options.onLog?.("info", "Installation ID not configured. Discovering automatically.");
  const match = await findInstallationForRepository(credential, repository, options);
  options.onLog?.("info", `Discovered installation ID: ${match.installationId}`, {
    checkedInstallations: match.checkedInstallations,
    skippedInstallations: match.skippedInstallations.length
  });

  if (options.persist && secretName && store) {
    try {
      await store.addVersion(secretName, String(match.installationId));
      options.onLog?.("info", "Stored installation ID in the secret store for future use.");
    } catch (error) {
      options.onLog?.("warn", "Failed to store installation ID in the secret store. Will rediscover next time.", {
        error: describeError(error)
      });
    }
  }

  return { installationId: match.installationId, source: "discovered" };
}
