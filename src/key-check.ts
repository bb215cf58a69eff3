import type { AppAuthOptions } from "./auth.js";
import { describeError, isAppAuthError } from "./errors.js";
import { GitHubClient } from "./github.js";
import { signAppJwt } from "./jwt.js";
import { hasPrivateKeyHeader, readPrivateKeyFile } from "./private-key.js";

export type KeyCheckResult =
  | { ok: true; installationCount: number }
  | { ok: false; status: number | null; reason: string };

export type KeyCheckInput = {
  appId: string;
  privateKeyPath: string;
  /** Delete the key file once read, whatever the outcome. */
  consumeKeyFile?: boolean;
};

function describeStatus(status: number): string {
  switch (status) {
    case 401:
      return "Authentication failed (401): check the App ID and private key";
    case 403:
      return "Access forbidden (403): the App may lack permissions";
    default:
      return `Unexpected response (${status})`;
  }
}

/**
 * Signs a JWT from the key file and asks GitHub for the App's installations.
 * Every failure is reported in the result.
 */
export async function checkPrivateKey(input: KeyCheckInput, options: AppAuthOptions = {}): Promise<KeyCheckResult> {
  let pem: string;
  try {
    pem = readPrivateKeyFile(input.privateKeyPath, { consume: input.consumeKeyFile });
  } catch (error) {
    return { ok: false, status: null, reason: describeError(error) };
  }
  if (!hasPrivateKeyHeader(pem)) {
    return { ok: false, status: null, reason: "Invalid private key format" };
  }

  let jwt: string;
  try {
    jwt = signAppJwt(input.appId, pem, { now: options.now?.() });
  } catch (error) {
    return { ok: false, status: null, reason: `Failed to generate JWT: ${describeError(error)}` };
  }
  options.onLog?.("info", "JWT generated; testing authentication against GitHub.");

  try {
    const ids = await new GitHubClient(jwt, options).listInstallationIds();
    return { ok: true, installationCount: ids.length };
  } catch (error) {
    if (isAppAuthError(error) && error.status !== undefined) {
      return { ok: false, status: error.status, reason: describeStatus(error.status) };
    }
    return { ok: false, status: null, reason: describeError(error) };
  }
}
