export interface SystemState {
  readonly patroniActive: boolean;
  readonly pgRunning: boolean;
  readonly pgPid: number;
  readonly dataDir: string;
  readonly dbsu: string;
  readonly capturedAt: Date;
}

export function captureSystemState(input: SystemState): SystemState {
  return Object.freeze({ ...input });
}
