import { AppAuthError, describeError } from "./errors.js";
import {
  GitHubClient,
  isRecord,
  parseRepositoryName,
  readApiMessage,
  type GitHubRequestOptions,
  type InstallationAccessToken
} from "./github.js";
import { signAppJwt } from "./jwt.js";
import { describeToken } from "./redact.js";
import { exchangeInstallationToken } from "./token-exchange.js";

export type AppCredential = {
  appId: string;
  /** PEM encoded RSA private key (PKCS#1 or PKCS#8). */
  privateKey: string;
};

export type AppAuthOptions = GitHubRequestOptions & {
  now?: () => Date;
};

export type VerifyResult =
  | { ok: true; fullName: string; defaultBranch: string | null }
  | { ok: false; reason: string };

export function signCredential(credential: AppCredential, options: AppAuthOptions = {}): string {
  return signAppJwt(credential.appId, credential.privateKey, { now: options.now?.() });
}

export async function authenticate(
  credential: AppCredential,
  installationId: number,
  options: AppAuthOptions = {}
): Promise<InstallationAccessToken> {
  options.onLog?.("info", `Generating JWT for GitHub App ID: ${credential.appId}`);
  const jwt = signCredential(credential, options);
  options.onLog?.("info", `Exchanging JWT for installation token (installation ID: ${installationId})`);
  const token = await exchangeInstallationToken(jwt, installationId, options);
  options.onLog?.("info", "Installation token issued.", {
    token: describeToken(token.token),
    expiresAt: token.expiresAt
  });
  return token;
}

/**
 * Smoke test: can `token` read `repoFullName`? Remote failures come back as
 * `{ ok: false }`; only malformed arguments throw.
 */
export async function verify(
  token: string,
  repoFullName: string,
  options: GitHubRequestOptions = {}
): Promise<VerifyResult> {
  const step = "verify repository access";
  if (!token.trim()) {
    throw new AppAuthError("InvalidInput", step, "token is required");
  }
  const repo = parseRepositoryName(repoFullName, step);

  let body: unknown;
  try {
    body = await new GitHubClient(token, options).fetchRepository(repo);
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }

  const message = readApiMessage(body);
  if (message !== null) {
    return { ok: false, reason: `API test failed: ${message}` };
  }
  if (!isRecord(body) || typeof body.full_name !== "string") {
    return { ok: false, reason: "Unexpected API response format" };
  }
  return {
    ok: true,
    fullName: body.full_name,
    defaultBranch: typeof body.default_branch === "string" ? body.default_branch : null
  };
}
