import { CommandFailedError } from "../domain/coded-error.js";
import type { ClusterServiceControl } from "../ports/cluster-service.js";
import type { PrivilegedExecutor } from "../services/privileged-executor.js";

export class SystemctlClusterService implements ClusterServiceControl {
  constructor(
    private readonly executor: PrivilegedExecutor,
    readonly serviceName: string = "patroni",
  ) {}

  async stop(): Promise<void> {
    const argv = ["systemctl", "stop", this.serviceName];
    const outcome = await this.executor.runAsRoot(argv);
    if (outcome.exitCode !== 0) {
      throw new CommandFailedError({ command: "systemctl", args: argv.slice(1) }, outcome);
    }
  }

  /** `systemctl is-active` exits 0 only for an active unit. */
  async isActive(): Promise<boolean> {
    const outcome = await this.executor.run([
      "systemctl",
      "is-active",
      "--quiet",
      this.serviceName,
    ]);
    return outcome.exitCode === 0;
  }
}
