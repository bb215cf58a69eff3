import crypto from "node:crypto";
import { base64UrlDecode, base64UrlEncode, base64UrlEncodeJson } from "./base64url.js";
import { AppAuthError, describeError } from "./errors.js";
import { hasPrivateKeyHeader } from "./private-key.js";

/** GitHub rejects App JWTs that live longer than ten minutes. */
export const JWT_LIFETIME_SECONDS = 600;
export const JWT_CLOCK_SKEW_SECONDS = 60;

const SIGN_STEP = "sign app jwt";

export type AppJwtClaims = {
  iat: number;
  exp: number;
  iss: string;
};

export type SignAppJwtOptions = {
  now?: Date;
};

export function buildAppJwtClaims(appId: string, now: Date): AppJwtClaims {
  const iat = Math.floor(now.getTime() / 1000) - JWT_CLOCK_SKEW_SECONDS;
  return {
    iat,
    exp: iat + JWT_LIFETIME_SECONDS,
    iss: appId
  };
}

function loadRsaKey(privateKey: string): crypto.KeyObject {
  let key: crypto.KeyObject;
  try {
    key = crypto.createPrivateKey(privateKey);
  } catch (error) {
    throw new AppAuthError("SigningError", SIGN_STEP, "private key could not be parsed", { cause: error });
  }
  if (key.asymmetricKeyType !== "rsa") {
    throw new AppAuthError(
      "SigningError",
      SIGN_STEP,
      `private key must be RSA, got ${key.asymmetricKeyType ?? "unknown"}`
    );
  }
  return key;
}

/**
 * RS256 (RSASSA-PKCS1-v1_5 over SHA-256) signature of `signingInput`,
 * base64url encoded. Deterministic for a given input and key.
 */
export function createJwtSignature(signingInput: string, privateKey: string): string {
  const key = loadRsaKey(privateKey);
  let signature: Buffer;
  try {
    signature = crypto.sign("sha256", Buffer.from(signingInput, "utf8"), key);
  } catch (error) {
    throw new AppAuthError("SigningError", SIGN_STEP, `signing failed: ${describeError(error)}`, {
      cause: error
    });
  }
  return base64UrlEncode(signature);
}

export function signAppJwt(appId: string, privateKey: string, options: SignAppJwtOptions = {}): string {
  const issuer = appId.trim();
  if (!issuer) {
    throw new AppAuthError("InvalidInput", SIGN_STEP, "GitHub App ID is required");
  }
  if (!privateKey.trim()) {
    throw new AppAuthError("KeyNotFound", SIGN_STEP, "private key material is empty");
  }
  if (!hasPrivateKeyHeader(privateKey)) {
    throw new AppAuthError("KeyInvalid", SIGN_STEP, "private key is not a PEM encoded RSA private key");
  }

  const header = { alg: "RS256", typ: "JWT" };
  const claims = buildAppJwtClaims(issuer, options.now ?? new Date());
  const signingInput = `${base64UrlEncodeJson(header)}.${base64UrlEncodeJson(claims)}`;
  return `${signingInput}.${createJwtSignature(signingInput, privateKey)}`;
}

export function decodeJwtPayload(token: string): AppJwtClaims {
  const segments = token.split(".");
  if (segments.length !== 3) {
    throw new AppAuthError("InvalidInput", "decode app jwt", `expected 3 segments, got ${segments.length}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(base64UrlDecode(segments[1] ?? "").toString("utf8"));
  } catch (error) {
    if (error instanceof AppAuthError) {
      throw error;
    }
    throw new AppAuthError("InvalidInput", "decode app jwt", "payload is not JSON", { cause: error });
  }
  if (
    !parsed ||
    typeof parsed !== "object" ||
    !("iat" in parsed) ||
    !("exp" in parsed) ||
    !("iss" in parsed) ||
    typeof parsed.iat !== "number" ||
    typeof parsed.exp !== "number" ||
    typeof parsed.iss !== "string"
  ) {
    throw new AppAuthError("InvalidInput", "decode app jwt", "payload is missing iat, exp or iss");
  }
  return { iat: parsed.iat, exp: parsed.exp, iss: parsed.iss };
}
