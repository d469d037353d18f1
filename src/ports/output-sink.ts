export interface OutputSink {
  write(text: string): Promise<void>;
}
