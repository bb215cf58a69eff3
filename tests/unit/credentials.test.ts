import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { AppCredential } from "../../src/auth.js";
import { resolveCredential, resolveInstallationId, resolvePrivateKey } from "../../src/credentials.js";
import type { SecretStore } from "../../src/secret-store.js";
import { createFakeGitHub, testKeyPair } from "../helpers/fake-github.js";

class MemorySecretStore implements SecretStore {
  readonly writes: Array<{ name: string; value: string }> = [];

  constructor(
    private readonly values: Record<string, string>,
    private readonly failWrites = false
  ) {}

  async access(name: string): Promise<string> {
    const value = this.values[name];
    if (value === undefined) {
      throw new Error(`secret ${name} does not exist`);
    }
    return value;
  }

  async addVersion(name: string, value: string): Promise<void> {
    if (this.failWrites) {
      throw new Error("permission denied");
    }
    this.writes.push({ name, value });
    this.values[name] = value;
  }
}

const credential: AppCredential = { appId: "12345", privateKey: testKeyPair().privateKey };

function discoveryRoutes() {
  return createFakeGitHub([
    { method: "GET", path: "/app/installations", reply: { body: [{ id: 9 }] } },
    { method: "POST", path: "/app/installations/9/access_tokens", reply: { status: 201, body: { token: "tok-9" } } },
    {
      method: "GET",
      path: "/installation/repositories",
      reply: { body: { total_count: 1, repositories: [{ full_name: "octo-org/widgets" }] } }
    }
  ]);
}

describe("resolvePrivateKey", () => {
  it("prefers the secret store", async () => {
    const store = new MemorySecretStore({ "app-key": "PEM" });
    const pem = await resolvePrivateKey(
      { privateKeyPath: "/unused.pem", secrets: { privateKeySecret: "app-key" } },
      { secretStore: store }
    );
    expect(pem).toBe("PEM\n");
  });

  it("reads and optionally consumes the key file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gh-app-toolkit-cred-"));
    const keyPath = path.join(dir, "app.pem");
    fs.writeFileSync(keyPath, "KEY\n", "utf8");

    expect(await resolvePrivateKey({ privateKeyPath: keyPath }, { consumeKeyFile: true })).toBe("KEY\n");
    expect(fs.existsSync(keyPath)).toBe(false);
  });

  it("fails without any key source", async () => {
    await expect(resolvePrivateKey({})).rejects.toThrowError(
      "read private key: no private key configured; set privateKeyPath or secrets.privateKeySecret"
    );
  });

  it("fails on an empty secret", async () => {
    const store = new MemorySecretStore({ "app-key": "" });
    await expect(
      resolvePrivateKey({ secrets: { privateKeySecret: "app-key" } }, { secretStore: store })
    ).rejects.toThrowError("read private key: secret app-key is empty");
  });
});

describe("resolveCredential", () => {
  it("requires an App ID", async () => {
    await expect(resolveCredential({ privateKeyPath: "/unused.pem" })).rejects.toThrowError(
      "read configuration: GitHub App ID is required"
    );
  });
});

describe("resolveInstallationId", () => {
  it("uses a configured id without any request", async () => {
    const github = discoveryRoutes();
    expect(await resolveInstallationId({ installationId: 5 }, credential, { fetch: github.fetch })).toEqual({
      installationId: 5,
      source: "config"
    });
    expect(github.requests).toHaveLength(0);
  });

  it("reads a stored id from the secret store", async () => {
    const github = discoveryRoutes();
    const store = new MemorySecretStore({ "app-installation": "77" });
    const resolved = await resolveInstallationId(
      { secrets: { installationIdSecret: "app-installation" } },
      credential,
      { fetch: github.fetch, secretStore: store }
    );
    expect(resolved).toEqual({ installationId: 77, source: "secret" });
  });

  it("discovers and stores the id when the secret is missing", async () => {
    const github = discoveryRoutes();
    const store = new MemorySecretStore({});
    const resolved = await resolveInstallationId(
      { repository: "octo-org/widgets", secrets: { installationIdSecret: "app-installation" } },
      credential,
      { fetch: github.fetch, secretStore: store, persist: true }
    );
    expect(resolved).toEqual({ installationId: 9, source: "discovered" });
    expect(store.writes).toEqual([{ name: "app-installation", value: "9" }]);
  });

  it("keeps a discovered id when storing it fails", async () => {
    const github = discoveryRoutes();
    const store = new MemorySecretStore({}, true);
    const warnings: string[] = [];
    const resolved = await resolveInstallationId(
      { repository: "octo-org/widgets", secrets: { installationIdSecret: "app-installation" } },
      credential,
      {
        fetch: github.fetch,
        secretStore: store,
        persist: true,
        onLog: (level, message) => {
          if (level === "warn") warnings.push(message);
        }
      }
    );
    expect(resolved.installationId).toBe(9);
    expect(warnings).toContain("Failed to store installation ID in the secret store. Will rediscover next time.");
  });

  it("rejects a stored id that is not a number", async () => {
    const store = new MemorySecretStore({ "app-installation": "abc" });
    await expect(
      resolveInstallationId({ secrets: { installationIdSecret: "app-installation" } }, credential, {
        secretStore: store
      })
    ).rejects.toThrowError("read installation id: secret app-installation is not a valid number: abc");
  });
});
