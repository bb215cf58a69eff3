#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { Command } from "commander";
import { authenticate, signCredential, verify, type AppAuthOptions } from "./auth.js";
import {
  DEFAULT_CONFIG_FILE,
  parseInstallationId,
  requireSetting,
  resolveToolkitConfig,
  type ToolkitConfig
} from "./config.js";
import { resolveCredential, resolveInstallationId } from "./credentials.js";
import { describeError, isAppAuthError } from "./errors.js";
import { formatHealthReport, runHealthCheck } from "./health-check.js";
import { buildSecretCommands, formatInstallationSummary, summarizeInstallations } from "./installation-report.js";
import { findInstallationForRepository, getInstallation, listInstallations } from "./installations.js";
import { checkPrivateKey } from "./key-check.js";
import { createLogSink, log, type LogSink } from "./logger.js";
import { GcloudSecretStore, type SecretStore } from "./secret-store.js";
import { runTimestampUpdate } from "./timestamp-pr.js";

type SharedOptions = {
  config?: string;
  appId?: string;
  privateKey?: string;
  consumeKeyFile?: boolean;
  apiUrl?: string;
  repo?: string;
  json?: boolean;
  verbose?: boolean;
};

type CliContext = {
  config: ToolkitConfig;
  json: boolean;
  onLog: LogSink;
  request: AppAuthOptions;
  secretStore?: SecretStore;
  consumeKeyFile: boolean;
};

const program = new Command();

// Key file to delete when the command exits, set by `--consume-key-file`.
let consumedKeyPath: string | null = null;

function withSharedOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", `Path to config file (default: ${DEFAULT_CONFIG_FILE} when present)`)
    .option("--api-url <url>", "GitHub API base URL")
    .option("--repo <owner/repo>", "Target repository")
    .option("--json", "Output JSON", false)
    .option("--verbose", "Log progress of every step", false);
}

function withKeyOptions(command: Command): Command {
  return withSharedOptions(command)
    .option("--app-id <id>", "GitHub App ID")
    .option("--private-key <path>", "Path to the GitHub App private key (PEM)")
    .option("--consume-key-file", "Delete the private key file when the command exits", false);
}

function removeConsumedKey(): void {
  if (consumedKeyPath) {
    fs.rmSync(consumedKeyPath, { force: true });
    consumedKeyPath = null;
  }
}

function createContext(options: SharedOptions): CliContext {
  const json = Boolean(options.json);
  if (options.consumeKeyFile && options.privateKey) {
    consumedKeyPath = path.resolve(process.cwd(), options.privateKey);
  }
  const configPath = path.resolve(process.cwd(), options.config ?? DEFAULT_CONFIG_FILE);
  const config = resolveToolkitConfig({
    configPath,
    requireFile: options.config !== undefined,
    env: process.env,
    overrides: {
      appId: options.appId,
      privateKeyPath: options.privateKey,
      apiBaseUrl: options.apiUrl,
      repository: options.repo
    }
  });

  if (options.consumeKeyFile && config.privateKeyPath) {
    consumedKeyPath = path.resolve(process.cwd(), config.privateKeyPath);
  }

  const sink = createLogSink(json);
  const onLog: LogSink = (level, message, data) => {
    if (level === "info" && !options.verbose) {
      return;
    }
    sink(level, message, data);
  };

  const projectId = config.secrets?.projectId;
  return {
    config,
    json,
    onLog,
    request: { apiBaseUrl: config.apiBaseUrl, onLog },
    secretStore: projectId ? new GcloudSecretStore(projectId) : undefined,
    consumeKeyFile: Boolean(options.consumeKeyFile)
  };
}

function print(context: CliContext, value: unknown, text: string): void {
  console.log(context.json ? JSON.stringify(value, null, 2) : text);
}

program
  .name("gh-app-toolkit")
  .description("Authenticate as a GitHub App and run installation-scoped checks.")
  .version("0.1.0", "-V, --version", "output the version");

withKeyOptions(program.command("jwt").description("Print a freshly signed GitHub App JWT.")).action(
  async (options: SharedOptions) => {
    const context = createContext(options);
    const credential = await resolveCredential(context.config, {
      ...context.request,
      secretStore: context.secretStore,
      consumeKeyFile: context.consumeKeyFile
    });
    const jwt = signCredential(credential, context.request);
    print(context, { jwt }, jwt);
  }
);

withKeyOptions(program.command("token").description("Print an installation access token."))
  .option("--installation-id <id>", "Installation ID (discovered from --repo when omitted)")
  .action(async (options: SharedOptions & { installationId?: string }) => {
    const context = createContext(options);
    const config: ToolkitConfig = options.installationId
      ? { ...context.config, installationId: parseInstallationId(options.installationId, "--installation-id") }
      : context.config;
    const credential = await resolveCredential(config, {
      ...context.request,
      secretStore: context.secretStore,
      consumeKeyFile: context.consumeKeyFile
    });
    const { installationId } = await resolveInstallationId(config, credential, {
      ...context.request,
      secretStore: context.secretStore
    });
    const token = await authenticate(credential, installationId, context.request);
    print(context, { installationId, token: token.token, expiresAt: token.expiresAt }, token.token);
  });

withSharedOptions(
  program
    .command("verify")
    .description("Check that the token in GITHUB_TOKEN can read a repository.")
    .argument("<repository>", "Repository as owner/repo")
).action(async (repository: string, options: SharedOptions) => {
  const context = createContext(options);
  const token = process.env.GITHUB_TOKEN;
  if (!token) {
    throw new Error("Missing GitHub token. Set GITHUB_TOKEN.");
  }
  const result = await verify(token, repository, context.request);
  if (!result.ok) {
    print(context, result, `Repository access failed: ${result.reason}`);
    process.exitCode = 1;
    return;
  }
  print(context, result, `Successfully accessed repository: ${result.fullName}`);
});

const installations = program.command("installations").description("Inspect the App's installations.");

withKeyOptions(installations.command("list").description("List installation IDs.")).action(
  async (options: SharedOptions) => {
    const context = createContext(options);
    const credential = await resolveCredential(context.config, {
      ...context.request,
      secretStore: context.secretStore,
      consumeKeyFile: context.consumeKeyFile
    });
    const ids = await listInstallations(credential, context.request);
    print(context, ids, ids.join("\n"));
  }
);

withKeyOptions(
  installations.command("show").description("Show one installation.").argument("<id>", "Installation ID")
).action(async (id: string, options: SharedOptions) => {
  const context = createContext(options);
  const installationId = parseInstallationId(id, "installation id");
  const credential = await resolveCredential(context.config, {
    ...context.request,
    secretStore: context.secretStore,
    consumeKeyFile: context.consumeKeyFile
  });
  const details = await getInstallation(credential, installationId, context.request);
  const permissions = Object.entries(details.permissions).map(([name, level]) => `  ${name}: ${level}`);
  print(
    context,
    details,
    [
      `Installation ID: ${details.id}`,
      `Account: ${details.account ?? "(unknown)"}`,
      `Repository selection: ${details.repositorySelection ?? "(unknown)"}`,
      "Permissions:",
      ...permissions
    ].join("\n")
  );
});

withKeyOptions(
  installations.command("summary").description("List every installation with its repositories.")
).action(async (options: SharedOptions) => {
  const context = createContext(options);
  const credential = await resolveCredential(context.config, {
    ...context.request,
    secretStore: context.secretStore,
    consumeKeyFile: context.consumeKeyFile
  });
  const entries = await summarizeInstallations(credential, context.request);
  print(context, entries, formatInstallationSummary(entries));
});

withKeyOptions(
  installations
    .command("find")
    .description("Find the installation that can access a repository.")
    .argument("<repository>", "Repository as owner/repo")
).action(async (repository: string, options: SharedOptions) => {
  const context = createContext(options);
  const credential = await resolveCredential(context.config, {
    ...context.request,
    secretStore: context.secretStore,
    consumeKeyFile: context.consumeKeyFile
  });
  const match = await findInstallationForRepository(credential, repository, context.request);
  for (const skipped of match.skippedInstallations) {
    log("warn", `Installation ${skipped.installationId} was skipped: ${skipped.reason}`, context.json);
  }
  print(context, match, String(match.installationId));
});

withKeyOptions(
  installations
    .command("secret-commands")
    .description("Print gcloud commands that store each repository's installation ID.")
    .argument("<repositories...>", "Repositories as owner/repo, or bare names with --owner")
)
  .option("--project <id>", "Google Cloud project ID")
  .option("--owner <owner>", "Owner for bare repository names")
  .action(async (repositories: string[], options: SharedOptions & { project?: string; owner?: string }) => {
    const context = createContext(options);
    const projectId = requireSetting(options.project ?? context.config.secrets?.projectId, "project ID");
    const credential = await resolveCredential(context.config, {
      ...context.request,
      secretStore: context.secretStore,
      consumeKeyFile: context.consumeKeyFile
    });
    const result = await buildSecretCommands(
      credential,
      { projectId, repositories, owner: options.owner ?? context.config.owner },
      context.request
    );
    if (result.unresolved.length > 0) {
      log("warn", `No installation found for ${result.unresolved.length} repositories.`, context.json, {
        repositories: result.unresolved
      });
    }
    print(context, result, result.lines.join("\n"));
  });

withKeyOptions(
  program.command("test-key").description("Check that the private key authenticates as the App.")
).action(async (options: SharedOptions) => {
  const context = createContext(options);
  const appId = requireSetting(context.config.appId, "GitHub App ID");
  const privateKeyPath = requireSetting(context.config.privateKeyPath, "private key path");
  const result = await checkPrivateKey(
    { appId, privateKeyPath, consumeKeyFile: context.consumeKeyFile },
    context.request
  );
  if (!result.ok) {
    print(context, result, `Key check failed: ${result.reason}`);
    process.exitCode = 1;
    return;
  }
  print(context, result, `Authentication successful. Found ${result.installationCount} installation(s).`);
});

withKeyOptions(program.command("health").description("Run the GitHub App health check."))
  .option("--metrics-file <path>", "Write the metrics JSON to this file")
  .action(async (options: SharedOptions & { metricsFile?: string }) => {
    const context = createContext(options);
    const report = await runHealthCheck(context.config, {
      ...context.request,
      secretStore: context.secretStore,
      consumeKeyFile: context.consumeKeyFile
    });
    if (options.metricsFile) {
      fs.writeFileSync(options.metricsFile, `${JSON.stringify(report.metrics, null, 2)}\n`, "utf8");
    }
    print(context, report, formatHealthReport(report));
    if (report.status !== "HEALTHY") {
      process.exitCode = 1;
    }
  });

withKeyOptions(
  program.command("timestamp-pr").description("Open a pull request that updates timestamp.txt.")
)
  .option("--dry-run", "Authenticate and verify, then only list the planned actions", false)
  .option("--yes", "Bypass confirmation prompts", false)
  .action(async (options: SharedOptions & { dryRun?: boolean; yes?: boolean }) => {
    const dryRun = Boolean(options.dryRun);
    const context = createContext(options);
    if (!dryRun && !options.yes) {
      throw new Error("Refusing to mutate GitHub without --yes. Use --dry-run to preview.");
    }
    const result = await runTimestampUpdate(context.config, {
      ...context.request,
      secretStore: context.secretStore,
      consumeKeyFile: context.consumeKeyFile,
      dryRun
    });
    const summary = result.pullRequest
      ? `Pull request created: ${result.pullRequest.url}`
      : `Dry run complete for ${result.repository} (branch ${result.branch}).`;
    print(context, result, summary);
  });

program
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const json = process.argv.includes("--json");
    const data = isAppAuthError(error)
      ? { kind: error.kind, step: error.step, ...(error.status !== undefined ? { status: error.status } : {}) }
      : undefined;
    log("error", describeError(error), json, data);
    process.exitCode = 1;
  })
  .finally(removeConsumedKey);
