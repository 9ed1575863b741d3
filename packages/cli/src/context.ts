import { ProcessRunner, ReadlinePrompter, RemoteClient, resolveAccessToken } from '@agentport/deployer';
import type { CommandRunner, FetchLike, Prompter } from '@agentport/deployer';
import type { Config } from '@agentport/shared';

export interface CliContext {
  env: Record<string, string | undefined>;
  runner: CommandRunner;
  fetch?: FetchLike;
  createPrompter: () => Prompter;
  interactive: boolean;
  // Command results; logs go to stderr
  out: (line: string) => void;
  setExitCode: (code: number) => void;
}

export function defaultContext(): CliContext {
  return {
    env: process.env,
    runner: new ProcessRunner(),
    createPrompter: () => new ReadlinePrompter(),
    interactive: Boolean(process.stdin.isTTY),
    out: (line) => console.log(line),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

export function accessToken(config: Config, ctx: CliContext): Promise<string> {
  return resolveAccessToken({ explicit: [config.project.accessToken], runner: ctx.runner });
}

export function remoteClient(config: Config, baseUrl: string, token: string, ctx: CliContext): RemoteClient {
  return new RemoteClient({
    baseUrl,
    accessToken: token,
    timeoutMs: config.remote.timeoutMs,
    maxAttempts: config.remote.maxAttempts,
    baseDelayMs: config.remote.baseDelayMs,
    fetch: ctx.fetch,
  });
}
