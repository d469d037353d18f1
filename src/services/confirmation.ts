import type { InterruptSignal, InterruptSource } from "../ports/interrupt-source.js";
import type { OutputSink } from "../ports/output-sink.js";
import { sleep as defaultSleep, type Sleep } from "./sleep.js";

export const COUNTDOWN_TICKS = 5;
export const COUNTDOWN_TICK_MS = 1_000;

export class ConfirmationCancelledError extends Error {
  constructor(
    readonly action: string,
    readonly signal: InterruptSignal,
  ) {
    super(`${action} cancelled by user (${signal})`);
    this.name = "ConfirmationCancelledError";
  }
}

export interface CountdownOptions {
  readonly warning: string;
  readonly action: string;
  readonly interrupts: InterruptSource;
  readonly output: OutputSink;
  readonly ticks?: number;
  readonly tickMs?: number;
  readonly sleep?: Sleep;
}

/**
 * Counts down one tick at a time and rejects with ConfirmationCancelledError
 * when an interrupt arrives first. The interrupt listener only lives for the
 * duration of the call.
 */
export async function confirmWithCountdown(
  options: CountdownOptions,
): Promise<void> {
  const ticks = options.ticks ?? COUNTDOWN_TICKS;
  const tickMs = options.tickMs ?? COUNTDOWN_TICK_MS;
  const wait = options.sleep ?? defaultSleep;

  const controller = new AbortController();
  let received: InterruptSignal | null = null;
  const unsubscribe = options.interrupts.subscribe((signal) => {
    received ??= signal;
    controller.abort();
  });

  const cancelIfInterrupted = async (): Promise<void> => {
    const signal = received;
    if (signal !== null) {
      await options.output.write(`\n${options.action} cancelled.\n`);
      throw new ConfirmationCancelledError(options.action, signal);
    }
  };

  try {
    await options.output.write(
      `\nWARNING: ${options.warning}\nPress Ctrl+C to cancel, or wait for countdown...\n`,
    );
    for (let remaining = ticks; remaining > 0; remaining -= 1) {
      await cancelIfInterrupted();
      await wait(tickMs, controller.signal);
      await cancelIfInterrupted();
      await options.output.write(
        `Starting ${options.action} in ${remaining} seconds...\n`,
      );
    }
  } finally {
    unsubscribe();
  }
}
