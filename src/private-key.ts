import fs from "node:fs";
import { AppAuthError } from "./errors.js";

const PEM_HEADER_PATTERN = /-----BEGIN (RSA )?PRIVATE KEY-----/;

export function hasPrivateKeyHeader(pem: string): boolean {
  return PEM_HEADER_PATTERN.test(pem);
}

export type ReadPrivateKeyOptions = {
  /** Delete the file once read, whether or not the read succeeded. */
  consume?: boolean;
};

export function readPrivateKeyFile(keyPath: string, options: ReadPrivateKeyOptions = {}): string {
  const step = "read private key";
  try {
    if (!keyPath.trim()) {
      throw new AppAuthError("KeyNotFound", step, "private key path is empty");
    }
    let raw: string;
    try {
      raw = fs.readFileSync(keyPath, "utf8");
    } catch (error) {
      throw new AppAuthError("KeyNotFound", step, `private key file not readable: ${keyPath}`, {
        cause: error
      });
    }
    const pem = raw.trim();
    if (!pem) {
      throw new AppAuthError("KeyNotFound", step, `private key file is empty: ${keyPath}`);
    }
    return `${pem}\n`;
  } finally {
    if (options.consume && keyPath.trim()) {
      fs.rmSync(keyPath, { force: true });
    }
  }
}
