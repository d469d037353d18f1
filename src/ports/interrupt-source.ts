export type InterruptSignal = "SIGINT" | "SIGTERM";

export interface InterruptSource {
  /** Registers a listener and returns the function that removes it. */
  subscribe(listener: (signal: InterruptSignal) => void): () => void;
}
