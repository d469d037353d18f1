export interface ProcessLister {
  listCommands(user: string): Promise<readonly string[]>;
}
