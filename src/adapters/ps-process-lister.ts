import type { CommandRunner } from "../ports/command-runner.js";
import type { ProcessLister } from "../ports/process-lister.js";

export class PsProcessLister implements ProcessLister {
  constructor(private readonly runner: CommandRunner) {}

  /** `ps` exits non-zero when the user owns no processes. */
  async listCommands(user: string): Promise<readonly string[]> {
    const outcome = await this.runner.run({
      command: "ps",
      args: ["h", "-u", user, "-o", "command"],
    });
    if (outcome.exitCode !== 0) {
      return [];
    }
    return outcome.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}
