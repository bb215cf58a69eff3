import { describe, expect, it } from "vitest";
import type { AppCredential } from "../../src/auth.js";
import { AppAuthError } from "../../src/errors.js";
import {
  findInstallationForRepository,
  getInstallation,
  listInstallationRepositories,
  listInstallations
} from "../../src/installations.js";
import { createFakeGitHub, testKeyPair, type FakeRoute, type RecordedRequest } from "../helpers/fake-github.js";

const credential: AppCredential = { appId: "12345", privateKey: testKeyPair().privateKey };

function repositoriesFor(request: RecordedRequest): { body: unknown } {
  if (request.authorization === "token tok-1") {
    return { body: { total_count: 1, repositories: [{ full_name: "a/b" }] } };
  }
  if (request.authorization === "token tok-2") {
    return { body: { total_count: 1, repositories: [{ full_name: "c/d" }] } };
  }
  return { body: { total_count: 0, repositories: [] } };
}

function twoInstallations(overrides: FakeRoute[] = []): FakeRoute[] {
  return [
    ...overrides,
    { method: "GET", path: "/app/installations", reply: { body: [{ id: 1 }, { id: 2 }] } },
    { method: "POST", path: "/app/installations/1/access_tokens", reply: { status: 201, body: { token: "tok-1" } } },
    { method: "POST", path: "/app/installations/2/access_tokens", reply: { status: 201, body: { token: "tok-2" } } },
    { method: "GET", path: "/installation/repositories", reply: repositoriesFor }
  ];
}

async function caught(run: () => Promise<unknown>): Promise<AppAuthError> {
  try {
    await run();
  } catch (error) {
    if (error instanceof AppAuthError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected an AppAuthError");
}

describe("listInstallations", () => {
  it("returns installation ids in order", async () => {
    const github = createFakeGitHub(twoInstallations());
    expect(await listInstallations(credential, { fetch: github.fetch })).toEqual([1, 2]);
    expect(github.requests[0]?.query.get("per_page")).toBe("100");
  });

  it("fails when the App has no installations", async () => {
    const github = createFakeGitHub([{ method: "GET", path: "/app/installations", reply: { body: [] } }]);
    const error = await caught(() => listInstallations(credential, { fetch: github.fetch }));
    expect(error.kind).toBe("NoInstallations");
  });

  it("follows pages until a short page", async () => {
    const fullPage = Array.from({ length: 100 }, (_, index) => ({ id: index + 1 }));
    const github = createFakeGitHub([
      {
        method: "GET",
        path: "/app/installations",
        reply: (request) => ({ body: request.query.get("page") === "2" ? [{ id: 101 }] : fullPage })
      }
    ]);
    const ids = await listInstallations(credential, { fetch: github.fetch });
    expect(ids).toHaveLength(101);
    expect(ids[100]).toBe(101);
    expect(github.requests).toHaveLength(2);
  });
});

describe("getInstallation", () => {
  it("reads account, selection and permissions", async () => {
    const github = createFakeGitHub([
      {
        method: "GET",
        path: "/app/installations/7",
        reply: {
          body: {
            id: 7,
            account: { login: "octo-org" },
            repository_selection: "selected",
            permissions: { contents: "write", pull_requests: "write" }
          }
        }
      }
    ]);
    expect(await getInstallation(credential, 7, { fetch: github.fetch })).toEqual({
      id: 7,
      account: "octo-org",
      repositorySelection: "selected",
      permissions: { contents: "write", pull_requests: "write" }
    });
  });
});

describe("listInstallationRepositories", () => {
  it("lists with the installation token", async () => {
    const github = createFakeGitHub(twoInstallations());
    expect(await listInstallationRepositories(credential, 2, { fetch: github.fetch })).toEqual(["c/d"]);
    expect(github.requests.map((request) => `${request.method} ${request.path}`)).toEqual([
      "POST /app/installations/2/access_tokens",
      "GET /installation/repositories"
    ]);
  });
});

describe("findInstallationForRepository", () => {
  it("returns the installation whose repositories include the target", async () => {
    const github = createFakeGitHub(twoInstallations());
    const match = await findInstallationForRepository(credential, "c/d", { fetch: github.fetch });
    expect(match).toEqual({ installationId: 2, checkedInstallations: 2, skippedInstallations: [] });
  });

  it("stops at the first match", async () => {
    const github = createFakeGitHub(twoInstallations());
    const match = await findInstallationForRepository(credential, "a/b", { fetch: github.fetch });
    expect(match.installationId).toBe(1);
    expect(github.requests.some((request) => request.path === "/app/installations/2/access_tokens")).toBe(false);
  });

  it("matches full names exactly", async () => {
    const github = createFakeGitHub(twoInstallations());
    const error = await caught(() => findInstallationForRepository(credential, "c/q", { fetch: github.fetch }));
    expect(error.kind).toBe("NotFound");
    expect(error.message).toBe("find installation: repository c/q not found in any installation (checked 2, skipped 0)");
  });

  it("skips an installation whose lookup fails and keeps scanning", async () => {
    const github = createFakeGitHub(
      twoInstallations([
        {
          method: "POST",
          path: "/app/installations/1/access_tokens",
          reply: { status: 403, body: { message: "Resource not accessible by integration" } }
        }
      ])
    );
    const warnings: string[] = [];
    const match = await findInstallationForRepository(credential, "c/d", {
      fetch: github.fetch,
      onLog: (level, message) => {
        if (level === "warn") warnings.push(message);
      }
    });
    expect(match.installationId).toBe(2);
    expect(match.skippedInstallations).toHaveLength(1);
    expect(match.skippedInstallations[0]?.installationId).toBe(1);
    expect(match.skippedInstallations[0]?.reason).toBe(
      "exchange installation token (installation 1): GitHub API error: Resource not accessible by integration"
    );
    expect(warnings).toContain("Skipping installation 1: repository lookup failed.");
  });

  it("reports skipped installations when nothing matches", async () => {
    const github = createFakeGitHub(
      twoInstallations([
        { method: "POST", path: "/app/installations/2/access_tokens", reply: { status: 500, body: { message: "boom" } } }
      ])
    );
    const error = await caught(() => findInstallationForRepository(credential, "x/y", { fetch: github.fetch }));
    expect(error.kind).toBe("NotFound");
    expect(error.message).toBe("find installation: repository x/y not found in any installation (checked 2, skipped 1)");
    expect(error.details?.checkedInstallations).toBe(2);
  });

  it("rejects an empty target before any request", async () => {
    const github = createFakeGitHub(twoInstallations());
    const error = await caught(() => findInstallationForRepository(credential, " ", { fetch: github.fetch }));
    expect(error.kind).toBe("InvalidInput");
    expect(github.requests).toHaveLength(0);
  });
});
