import { ConfigurationError } from "@agentport/shared";
import type { DeploymentDescriptor } from "@agentport/shared";
import { dirname } from "node:path";
import type { CommandRunner } from "../exec/command-runner.js";

export interface SourceArchiver {
  archive(descriptor: DeploymentDescriptor): Promise<Buffer>;
}

/**
 * Builds a gzip tarball of the descriptor's files with the system `tar`,
 * rooted at the source root's parent so module paths survive unpacking.
 */
export class TarArchiver implements SourceArchiver {
  private runner: CommandRunner;
  private timeoutMs: number;

  constructor(runner: CommandRunner, timeoutMs = 120_000) {
    this.runner = runner;
    this.timeoutMs = timeoutMs;
  }

  async archive(descriptor: DeploymentDescriptor): Promise<Buffer> {
    const result = await this.runner.run(
      "tar",
      ["-czf", "-", "-C", dirname(descriptor.sourceRoot), "--", ...descriptor.files],
      { timeoutMs: this.timeoutMs },
    );
    if (result.exitCode !== 0) {
      throw new ConfigurationError(`Failed to archive ${descriptor.sourceRoot}: ${result.stderr.trim()}`);
    }
    return result.stdout;
  }
}
