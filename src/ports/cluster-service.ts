export interface ClusterServiceControl {
  readonly serviceName: string;
  stop(): Promise<void>;
  isActive(): Promise<boolean>;
}
