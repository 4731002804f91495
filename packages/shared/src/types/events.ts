export interface ContainerEvent {
  containerName: string;
  exitCode: string;
  isAbnormal: boolean;
}
