import fs from "node:fs";
import { fileURLToPath } from "node:url";
import AjvModule, { type SchemaObject } from "ajv";
import addFormatsModule from "ajv-formats";
import { AppAuthError } from "./errors.js";

// Both packages ship CommonJS; under NodeNext their classes sit on `.default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export const DEFAULT_CONFIG_FILE = "gh-app-toolkit.config.json";

export type ToolkitConfig = {
  appId?: string;
  privateKeyPath?: string;
  installationId?: number;
  /** Target repository as `owner/repo`. */
  repository?: string;
  /** Owner assumed for bare repository names. */
  owner?: string;
  apiBaseUrl?: string;
  secrets?: {
    projectId?: string;
    privateKeySecret?: string;
    installationIdSecret?: string;
  };
  pullRequest?: {
    gitUserName?: string;
    gitUserEmail?: string;
    gitBaseUrl?: string;
    branchPrefix?: string;
    templateChangedAt?: string;
  };
};

const schemaPath = fileURLToPath(new URL("../schema/gh-app-toolkit.schema.json", import.meta.url));

export function loadConfigFile(configPath: string): ToolkitConfig {
  const raw = fs.readFileSync(configPath, "utf8");
  const json: unknown = JSON.parse(raw);
  const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath, "utf8"));

  const ajv = new Ajv({ allErrors: true, strict: true });
  addFormats(ajv);
  const validate = ajv.compile<ToolkitConfig>(schema);

  if (!validate(json)) {
    const errors = validate.errors
      ?.map((error) => `${error.instancePath || "<root>"} ${error.message}`)
      .join("; ");
    throw new Error(`Invalid config: ${errors}`);
  }

  return json;
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseInstallationId(value: string, source: string): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new AppAuthError("InvalidInput", "read installation id", `${source} is not a valid number: ${value}`);
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new AppAuthError("InvalidInput", "read installation id", `${source} must be a positive integer`);
  }
  return parsed;
}

/** Settings from the environment. Only the CLI passes `process.env` here. */
export function configFromEnv(env: NodeJS.ProcessEnv): ToolkitConfig {
  const installationId = readEnv(env, "GITHUB_APP_INSTALLATION_ID");
  const projectId = readEnv(env, "PROJECT_ID");
  const privateKeySecret = readEnv(env, "GITHUB_APP_PRIVATE_KEY_SECRET");
  const installationIdSecret = readEnv(env, "INSTALLATION_ID_SECRET");

  return {
    appId: readEnv(env, "GITHUB_APP_ID"),
    privateKeyPath: readEnv(env, "GITHUB_APP_PRIVATE_KEY_PATH"),
    installationId: installationId
      ? parseInstallationId(installationId, "GITHUB_APP_INSTALLATION_ID")
      : undefined,
    repository: readEnv(env, "GITHUB_REPOSITORY"),
    owner: readEnv(env, "GITHUB_OWNER"),
    apiBaseUrl: readEnv(env, "GITHUB_API_URL"),
    secrets:
      projectId || privateKeySecret || installationIdSecret
        ? { projectId, privateKeySecret, installationIdSecret }
        : undefined
  };
}

/** Later layers win; nested sections merge key by key. */
export function mergeConfig(...layers: ToolkitConfig[]): ToolkitConfig {
  let merged: ToolkitConfig = {};
  for (const layer of layers) {
    merged = {
      appId: layer.appId ?? merged.appId,
      privateKeyPath: layer.privateKeyPath ?? merged.privateKeyPath,
      installationId: layer.installationId ?? merged.installationId,
      repository: layer.repository ?? merged.repository,
      owner: layer.owner ?? merged.owner,
      apiBaseUrl: layer.apiBaseUrl ?? merged.apiBaseUrl,
      secrets:
        layer.secrets || merged.secrets
          ? {
              projectId: layer.secrets?.projectId ?? merged.secrets?.projectId,
              privateKeySecret: layer.secrets?.privateKeySecret ?? merged.secrets?.privateKeySecret,
              installationIdSecret: layer.secrets?.installationIdSecret ?? merged.secrets?.installationIdSecret
            }
          : undefined,
      pullRequest:
        layer.pullRequest || merged.pullRequest
          ? {
              gitUserName: layer.pullRequest?.gitUserName ?? merged.pullRequest?.gitUserName,
              gitUserEmail: layer.pullRequest?.gitUserEmail ?? merged.pullRequest?.gitUserEmail,
              gitBaseUrl: layer.pullRequest?.gitBaseUrl ?? merged.pullRequest?.gitBaseUrl,
              branchPrefix: layer.pullRequest?.branchPrefix ?? merged.pullRequest?.branchPrefix,
              templateChangedAt: layer.pullRequest?.templateChangedAt ?? merged.pullRequest?.templateChangedAt
            }
          : undefined
    };
  }
  return merged;
}

export type ResolveConfigOptions = {
  configPath?: string;
  /** Fail when `configPath` does not exist instead of skipping it. */
  requireFile?: boolean;
  env?: NodeJS.ProcessEnv;
  overrides?: ToolkitConfig;
};

export function resolveToolkitConfig(options: ResolveConfigOptions): ToolkitConfig {
  const layers: ToolkitConfig[] = [];
  if (options.configPath) {
    if (fs.existsSync(options.configPath)) {
      layers.push(loadConfigFile(options.configPath));
    } else if (options.requireFile) {
      throw new AppAuthError("InvalidInput", "load config", `config file not found: ${options.configPath}`);
    }
  }
  if (options.env) {
    layers.push(configFromEnv(options.env));
  }
  if (options.overrides) {
    layers.push(options.overrides);
  }
  return mergeConfig(...layers);
}

export function requireSetting<T>(value: T | undefined, name: string): T {
  if (value === undefined || value === null || (typeof value === "string" && value.trim() === "")) {
    throw new AppAuthError("InvalidInput", "read configuration", `${name} is required`);
  }
  return value;
}
