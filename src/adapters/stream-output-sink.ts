import type { Writable } from "node:stream";
import type { OutputSink } from "../ports/output-sink.js";

export class StreamOutputSink implements OutputSink {
  constructor(private readonly stream: Writable = process.stderr) {}

  write(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(text, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
