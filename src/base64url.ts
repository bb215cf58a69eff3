import { AppAuthError } from "./errors.js";

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

export function base64UrlEncode(value: Uint8Array | string): string {
  const buffer = typeof value === "string" ? Buffer.from(value, "utf8") : Buffer.from(value);
  return buffer
    .toString("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/g, "");
}

export function base64UrlDecode(text: string): Buffer {
  // A single trailing character can never encode a whole byte.
  if (!BASE64URL_PATTERN.test(text) || text.length % 4 === 1) {
    throw new AppAuthError("InvalidInput", "decode base64url", "value is not valid base64url");
  }
  const padded = text.replace(/-/g, "+").replace(/_/g, "/") + "=".repeat((4 - (text.length % 4)) % 4);
  return Buffer.from(padded, "base64");
}

export function base64UrlEncodeJson(value: unknown): string {
  return base64UrlEncode(JSON.stringify(value));
}
