import { AppAuthError } from "./errors.js";
import { runCommand, type CommandRunner } from "./git.js";

/** Opaque string secrets, addressed by name. */
export interface SecretStore {
  access(name: string): Promise<string>;
  addVersion(name: string, value: string): Promise<void>;
}

export type GcloudSecretStoreOptions = {
  run?: CommandRunner;
  command?: string;
};

/** Google Secret Manager through the `gcloud` CLI. */
export class GcloudSecretStore implements SecretStore {
  private readonly run: CommandRunner;
  private readonly command: string;

  constructor(
    private readonly projectId: string,
    options: GcloudSecretStoreOptions = {}
  ) {
    if (!projectId.trim()) {
      throw new AppAuthError("InvalidInput", "configure secret store", "project id is required");
    }
    this.run = options.run ?? runCommand;
    this.command = options.command ?? "gcloud";
  }

  async access(name: string): Promise<string> {
    const step = `access secret ${name}`;
    try {
      const result = await this.run(this.command, [
        "secrets",
        "versions",
        "access",
        "latest",
        `--secret=${name}`,
        `--project=${this.projectId}`
      ]);
      return result.stdout.trim();
    } catch (error) {
      // The command output may echo the secret; keep only the cause chain.
      throw new AppAuthError("RemoteError", step, `secret could not be read from project ${this.projectId}`, {
        cause: error
      });
    }
  }

  async addVersion(name: string, value: string): Promise<void> {
    const step = `store secret ${name}`;
    try {
      await this.run(
        this.command,
        ["secrets", "versions", "add", name, "--data-file=-", `--project=${this.projectId}`],
        { input: value }
      );
    } catch (error) {
      throw new AppAuthError("RemoteError", step, `secret could not be written to project ${this.projectId}`, {
        cause: error
      });
    }
  }
}
