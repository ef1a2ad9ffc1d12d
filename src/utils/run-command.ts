import { spawn } from "node:child_process";

export interface CommandOptions {
  cwd?: string;
  timeout?: number;
}

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  duration: number;
}

/**
 * Run a command to completion and capture its output
 *
 * Never rejects: a command that cannot be started resolves with
 * exitCode -1 and the spawn error in stderr.
 */
export function runCommand(
  command: string,
  args: string[] = [],
  options: CommandOptions = {},
): Promise<CommandResult> {
  const startTime = Date.now();

  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timeoutId: NodeJS.Timeout | undefined;
    let settled = false;

    const finish = (exitCode: number, error?: Error): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      resolve({
        success: exitCode === 0,
        stdout,
        stderr: error ? `${stderr}${String(error)}` : stderr,
        exitCode,
        duration: Date.now() - startTime,
      });
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    if (options.timeout) {
      timeoutId = setTimeout(() => {
        child.kill("SIGTERM");
      }, options.timeout);
    }

    child.on("error", (error) => finish(-1, error));
    child.on("close", (code) => finish(code ?? -1));
  });
}
