import { userInfo } from "node:os";
import { CommandFailedError } from "../domain/coded-error.js";
import type { Logger } from "../observability/logger.js";
import { silentLogger } from "../observability/logger.js";
import type {
  CommandInvocation,
  CommandOutcome,
  CommandRunner,
  RunCommandOptions,
} from "../ports/command-runner.js";

/**
 * Identity of the process running the orchestrator. Resolved once at start-up
 * and passed to every component instead of being read from global state.
 */
export interface ExecutionContext {
  readonly currentUser: string;
  readonly isRoot: boolean;
  readonly nonInteractive: boolean;
}

export function resolveExecutionContext(input: {
  readonly nonInteractive: boolean;
}): ExecutionContext {
  const uid = typeof process.geteuid === "function" ? process.geteuid() : -1;
  let currentUser = process.env.USER ?? "";
  try {
    currentUser = userInfo().username;
  } catch (error) {
    // userInfo() throws when the uid has no passwd entry (common in containers)
    if (!currentUser) {
      throw error;
    }
  }
  return {
    currentUser,
    isRoot: uid === 0,
    nonInteractive: input.nonInteractive,
  };
}

/**
 * Chooses how to run argv as the database superuser:
 * directly when we already are that user, through `su` as root,
 * and through `sudo` otherwise.
 */
export function resolveInvocation(
  context: ExecutionContext,
  dbsu: string,
  argv: readonly string[],
): CommandInvocation {
  const [command, ...args] = argv;
  if (command === undefined) {
    throw new Error("no command specified");
  }

  if (context.currentUser === dbsu) {
    return { command, args };
  }

  if (context.isRoot) {
    return { command: "su", args: ["-", dbsu, "-c", shellQuoteArgs(argv)] };
  }

  const sudoArgs = context.nonInteractive
    ? ["-n", "-inu", dbsu, "--"]
    : ["-inu", dbsu, "--"];
  return { command: "sudo", args: [...sudoArgs, ...argv] };
}

/** Same selection for commands that need root rather than the DBSU. */
export function resolveRootInvocation(
  context: ExecutionContext,
  argv: readonly string[],
): CommandInvocation {
  const [command, ...args] = argv;
  if (command === undefined) {
    throw new Error("no command specified");
  }
  if (context.isRoot) {
    return { command, args };
  }
  return {
    command: "sudo",
    args: context.nonInteractive ? ["-n", ...argv] : [...argv],
  };
}

const SHELL_SPECIAL = /[\s'"\\$`!*?[\]{}()<>|&;#~]/;

export function shellQuoteArgs(argv: readonly string[]): string {
  return argv
    .map((arg) => {
      if (arg.length === 0) {
        return "''";
      }
      if (!SHELL_SPECIAL.test(arg)) {
        return arg;
      }
      return `'${arg.replace(/'/g, `'"'"'`)}'`;
    })
    .join(" ");
}

export class PrivilegedExecutor {
  constructor(
    private readonly runner: CommandRunner,
    readonly context: ExecutionContext,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** Runs argv as the current user. */
  async run(
    argv: readonly string[],
    options?: RunCommandOptions,
  ): Promise<CommandOutcome> {
    const [command, ...args] = argv;
    if (command === undefined) {
      throw new Error("no command specified");
    }
    return this.runner.run({ command, args }, options);
  }

  async runAs(
    dbsu: string,
    argv: readonly string[],
    options?: RunCommandOptions,
  ): Promise<CommandOutcome> {
    const invocation = resolveInvocation(this.context, dbsu, argv);
    this.logger.debug("executing as database superuser", {
      dbsu,
      command: invocation.command,
      args: invocation.args,
    });
    return this.runner.run(invocation, options);
  }

  /** Like runAs, but a non-zero exit rejects with CommandFailedError. */
  async runAsOrThrow(
    dbsu: string,
    argv: readonly string[],
    options?: RunCommandOptions,
  ): Promise<CommandOutcome> {
    const invocation = resolveInvocation(this.context, dbsu, argv);
    this.logger.debug("executing as database superuser", {
      dbsu,
      command: invocation.command,
      args: invocation.args,
    });
    const outcome = await this.runner.run(invocation, options);
    if (outcome.exitCode !== 0) {
      throw new CommandFailedError(invocation, outcome);
    }
    return outcome;
  }

  async runAsRoot(
    argv: readonly string[],
    options?: RunCommandOptions,
  ): Promise<CommandOutcome> {
    const invocation = resolveRootInvocation(this.context, argv);
    this.logger.debug("executing as root", {
      command: invocation.command,
      args: invocation.args,
    });
    return this.runner.run(invocation, options);
  }
}
