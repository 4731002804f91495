/**
 * Point-in-time health readings. A temperature of 0 means no sensor could be read.
 */
export interface MetricSnapshot {
  temperatureCelsius: number;
  ramUsedPercent: number;
  loadAverage1m: number;
}

/**
 * Used percentage per mount point, as produced by one full disk scan.
 */
export type DiskUsage = Readonly<Record<string, number>>;

export interface HostDetails {
  memoryTotalBytes: number;
  uptimeSeconds: number;
}
