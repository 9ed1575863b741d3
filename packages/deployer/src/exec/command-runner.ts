import { spawn } from "node:child_process";
import { createLogger } from "@agentport/shared";

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string | undefined>;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: Buffer;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * Runs external tools (uv, tar, gcloud) as child processes and collects
 * their output. A non-zero exit code is reported in the result rather than
 * thrown; failing to start the process at all rejects.
 */
export class ProcessRunner implements CommandRunner {
  private logger = createLogger("process-runner");

  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.logger.debug(`$ ${command} ${args.join(" ")}`, options.cwd ? { cwd: options.cwd } : undefined);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ["ignore", "pipe", "pipe"],
        timeout: options.timeoutMs,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on("data", (data: Buffer) => stdout.push(data));
      child.stderr.on("data", (data: Buffer) => stderr.push(data));

      child.on("error", (err) => {
        reject(err);
      });

      child.on("close", (code) => {
        const errOutput = Buffer.concat(stderr).toString("utf-8");
        if (code !== 0) {
          this.logger.debug(`${command} exited with code ${code}`, errOutput);
        }
        resolve({
          exitCode: code,
          stdout: Buffer.concat(stdout),
          stderr: errOutput,
        });
      });
    });
  }
}
