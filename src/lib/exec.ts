import { spawn } from "node:child_process";

const DEFAULT_TIMEOUT_MS = 60_000;

export interface RunOptions {
  cwd?: string;
  /** Merged over the current environment. */
  env?: Record<string, string>;
  timeoutMs?: number;
  allowNonZeroExit?: boolean;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (binary: string, args?: string[], options?: RunOptions) => Promise<RunResult>;

/** Why a subprocess produced no usable result. */
export type CommandFailure = "not-found" | "timeout" | "exit";

interface CommandErrorDetails {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  timeoutMs?: number;
}

export class CommandError extends Error {
  readonly failure: CommandFailure;
  readonly binary: string;
  readonly command: string;
  readonly exitCode?: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(failure: CommandFailure, binary: string, args: string[] = [], details: CommandErrorDetails = {}) {
    const command = formatCommand(binary, args);
    super(describeFailure(failure, binary, command, details));
    this.name = "CommandError";
    this.failure = failure;
    this.binary = binary;
    this.command = command;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout ?? "";
    this.stderr = details.stderr ?? "";
  }
}

function describeFailure(failure: CommandFailure, binary: string, command: string, details: CommandErrorDetails): string {
  switch (failure) {
    case "not-found":
      return `Command not found: ${binary}`;
    case "timeout":
      return `Command timed out after ${details.timeoutMs ?? DEFAULT_TIMEOUT_MS}ms: ${command}`;
    case "exit":
      return `Command failed (${details.exitCode ?? "unknown"}): ${command}`;
  }
}

export async function runCommand(binary: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return await new Promise<RunResult>((resolve, reject) => {
    const child = spawn(binary, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const settle = (outcome: RunResult | Error): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (outcome instanceof Error) {
        reject(outcome);
      } else {
        resolve(outcome);
      }
    };

    const timer = setTimeout(() => {
      child.kill("SIGTERM");
      settle(new CommandError("timeout", binary, args, { stdout: stdout.trim(), stderr: stderr.trim(), timeoutMs }));
    }, timeoutMs);

    child.stdout?.on("data", (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });
    child.stderr?.on("data", (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      settle(error.code === "ENOENT" ? new CommandError("not-found", binary, args) : error);
    });

    child.on("close", (code) => {
      const result = { stdout: stdout.trim(), stderr: stderr.trim(), exitCode: typeof code === "number" ? code : 1 };
      settle(
        result.exitCode !== 0 && !options.allowNonZeroExit ? new CommandError("exit", binary, args, result) : result
      );
    });
  });
}

export function formatCommand(binary: string, args: string[]): string {
  return [binary, ...args].join(" ");
}
