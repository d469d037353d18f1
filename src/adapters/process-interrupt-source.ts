import type {
  InterruptSignal,
  InterruptSource,
} from "../ports/interrupt-source.js";

const SIGNALS: readonly InterruptSignal[] = ["SIGINT", "SIGTERM"];

export class ProcessInterruptSource implements InterruptSource {
  constructor(private readonly target: NodeJS.Process = process) {}

  subscribe(listener: (signal: InterruptSignal) => void): () => void {
    const handlers = SIGNALS.map((signal) => {
      const handler = (): void => listener(signal);
      this.target.on(signal, handler);
      return { signal, handler };
    });
    return () => {
      for (const { signal, handler } of handlers) {
        this.target.off(signal, handler);
      }
    };
  }
}
