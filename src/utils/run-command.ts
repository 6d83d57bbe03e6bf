/**
 * Subprocess runner
 * Invokes external tools without a shell and captures their output
 */

import { execFile } from "node:child_process";
import { CommandError } from "./errors";

export interface CommandOptions {
  cwd?: string;
  signal?: AbortSignal;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandOutput>;

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Run a command and resolve with its output.
 * Rejects with a CommandError when the command is missing, exits non-zero
 * or is aborted through `options.signal`.
 */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise<CommandOutput>((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        signal: options.signal,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }

        const code: unknown = "code" in error ? error.code : undefined;
        reject(
          new CommandError(command, args, {
            exitCode: typeof code === "number" ? code : null,
            stdout,
            stderr: stderr || error.message,
            notFound: code === "ENOENT",
            aborted: error.name === "AbortError",
          }),
        );
      },
    );
  });

/**
 * Render a command line for log output
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/\s/.test(part) ? `"${part}"` : part))
    .join(" ");
}
