const PEM_BLOCK = /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?(-----END [A-Z ]*PRIVATE KEY-----|$)/g;
const JWT_LIKE = /\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;
const GITHUB_TOKEN = /\b(gh[pousr]_[A-Za-z0-9]{20,}|github_pat_[A-Za-z0-9_]{20,})\b/g;
const CREDENTIAL_URL = /(https?:\/\/)[^\s/@]+@/g;

export const REDACTED = "[REDACTED]";

export function redactSecrets(text: string): string {
  return text
    .replace(PEM_BLOCK, REDACTED)
    .replace(JWT_LIKE, REDACTED)
    .replace(GITHUB_TOKEN, REDACTED)
    .replace(CREDENTIAL_URL, `$1${REDACTED}@`);
}

/** Safe stand-in for a bearer credential in diagnostics. */
export function describeToken(token: string): string {
  return `${REDACTED} (${token.length} characters)`;
}
