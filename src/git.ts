import { spawn } from "node:child_process";
import { AppAuthError } from "./errors.js";
import { redactSecrets } from "./redact.js";

export type RunCommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
};

export type RunCommandResult = {
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<RunCommandResult>;

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  return signal ? `signal ${signal}` : String(code);
}

/**
 * Runs a command without a shell. A non-zero exit, or a kill on timeout,
 * rejects with the redacted command line and its output.
 */
export async function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<RunCommandResult> {
  const commandLine = [command, ...args].join(" ");
  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  });
  child.stdout.setEncoding("utf8");
  child.stderr.setEncoding("utf8");

  let stdout = "";
  let stderr = "";
  child.stdout.on("data", (chunk: string) => {
    stdout += chunk;
  });
  child.stderr.on("data", (chunk: string) => {
    stderr += chunk;
  });

  return new Promise<RunCommandResult>((resolve, reject) => {
    child.once("error", reject);
    child.stdin.once("error", reject);
    child.stdin.end(options.input ?? "");
    child.once("close", (code, signal) => {
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      const output = (stderr || stdout).trim();
      const message = `Command failed (${describeExit(code, signal)}): ${commandLine}${output ? `\n${output}` : ""}`;
      reject(new Error(redactSecrets(message)));
    });
  });
}

export async function git(
  run: CommandRunner,
  args: string[],
  options: RunCommandOptions = {}
): Promise<RunCommandResult> {
  return run("git", args, options);
}

export async function ensureCommandAvailable(run: CommandRunner, command: string): Promise<void> {
  try {
    await run(command, ["--version"], { timeoutMs: 30_000 });
  } catch (error) {
    throw new AppAuthError("InvalidInput", `check ${command}`, `${command} is not installed or not on PATH`, {
      cause: error
    });
  }
}
