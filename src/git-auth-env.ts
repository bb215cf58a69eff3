import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export const GIT_TOKEN_ENV = "GH_APP_TOOLKIT_GIT_TOKEN";

let askpassPath: string | null = null;

/**
 * Writes (once per process) a GIT_ASKPASS helper that answers git's prompts
 * from the environment, so the token never lands in a remote URL or on disk.
 */
function ensureAskPassCommand(): string {
  if (askpassPath && fs.existsSync(askpassPath)) {
    return askpassPath;
  }

  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gh-app-toolkit-git-askpass-"));

  if (process.platform === "win32") {
    const jsPath = path.join(dir, "askpass.js");
    const cmdPath = path.join(dir, "askpass.cmd");
    fs.writeFileSync(
      jsPath,
      [
        "const prompt = process.argv.slice(2).join(' ');",
        "if (/username/i.test(prompt)) {",
        "  process.stdout.write('x-access-token');",
        "} else {",
        `  process.stdout.write(process.env.${GIT_TOKEN_ENV} ?? '');`,
        "}"
      ].join("\n"),
      "utf8"
    );
    fs.writeFileSync(cmdPath, `@echo off\r\nnode "${jsPath}" %*\r\n`, "utf8");
    askpassPath = cmdPath;
    return cmdPath;
  }

  const shPath = path.join(dir, "askpass.sh");
  fs.writeFileSync(
    shPath,
    [
      "#!/bin/sh",
      'case "$1" in',
      "  *[Uu]sername*) printf '%s' 'x-access-token' ;;",
      `  *) printf '%s' "$${GIT_TOKEN_ENV}" ;;`,
      "esac",
      ""
    ].join("\n"),
    { encoding: "utf8", mode: 0o700 }
  );
  askpassPath = shPath;
  return shPath;
}

export function buildGitAuthEnv(base: NodeJS.ProcessEnv, token: string): NodeJS.ProcessEnv {
  if (!token) {
    return { ...base };
  }

  const askpass = ensureAskPassCommand();
  return {
    ...base,
    [GIT_TOKEN_ENV]: token,
    GIT_TERMINAL_PROMPT: "0",
    GIT_ASKPASS: askpass
  };
}
