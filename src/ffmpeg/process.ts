import { execFile } from "node:child_process";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs a short-lived helper command to completion. Rejects only when the command could
 * not be started at all (for example ENOENT); a non-zero exit resolves with its code.
 */
export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

const MAX_BUFFER = 32 * 1024 * 1024;

export const runCommand: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: "utf8", maxBuffer: MAX_BUFFER, timeout: 30_000 },
      (error, stdout, stderr) => {
        if (error && typeof error.code !== "number") {
          reject(error);
          return;
        }
        resolve({
          stdout,
          stderr,
          exitCode: typeof error?.code === "number" ? error.code : 0,
        });
      },
    );
  });
