import { readFile } from 'node:fs/promises';
import { loadavg, totalmem, uptime } from 'node:os';
import {
  MEMINFO_PATH,
  TEMPERATURE_SENSOR_PATHS,
  getLogger,
  roundPercent,
} from '@hostwatch/shared';
import type { HostDetails, MetricSnapshot } from '@hostwatch/shared';
import type { MetricSource } from '../types.js';

const logger = getLogger();

export interface SystemSamplerOptions {
  sensorPaths?: readonly string[];
  meminfoPath?: string;
}

/**
 * Parse /proc/meminfo into a map of field name to value in kB.
 */
export function parseMeminfo(content: string): Map<string, number> {
  const fields = new Map<string, number>();

  for (const line of content.split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim();
    const value = parseInt(line.slice(separator + 1).trim(), 10);
    if (key && Number.isFinite(value)) {
      fields.set(key, value);
    }
  }

  return fields;
}

export class SystemSampler implements MetricSource {
  private sensorPaths: readonly string[];
  private meminfoPath: string;

  constructor(options: SystemSamplerOptions = {}) {
    this.sensorPaths = options.sensorPaths ?? TEMPERATURE_SENSOR_PATHS;
    this.meminfoPath = options.meminfoPath ?? MEMINFO_PATH;
  }

  async sample(): Promise<MetricSnapshot> {
    const [temperatureCelsius, ramUsedPercent] = await Promise.all([
      this.readTemperature(),
      this.readRamUsage(),
    ]);

    return {
      temperatureCelsius,
      ramUsedPercent,
      loadAverage1m: loadavg()[0],
    };
  }

  describeHost(): HostDetails {
    return {
      memoryTotalBytes: totalmem(),
      uptimeSeconds: uptime(),
    };
  }

  /**
   * First readable sensor wins. Returns 0 when none can be read.
   */
  async readTemperature(): Promise<number> {
    let lastError: unknown = null;

    for (const path of this.sensorPaths) {
      try {
        const milliDegrees = parseInt((await readFile(path, 'utf-8')).trim(), 10);
        if (Number.isFinite(milliDegrees)) {
          return milliDegrees / 1000;
        }
      } catch (err) {
        lastError = err;
      }
    }

    logger.debug({ err: lastError }, 'Could not read temperature');
    return 0;
  }

  async readRamUsage(): Promise<number> {
    try {
      const fields = parseMeminfo(await readFile(this.meminfoPath, 'utf-8'));
      const total = fields.get('MemTotal');
      const available = fields.get('MemAvailable');

      if (total === undefined || available === undefined || total <= 0) {
        logger.debug({ path: this.meminfoPath }, 'MemTotal/MemAvailable missing from meminfo');
        return 0;
      }

      return roundPercent((1 - available / total) * 100);
    } catch (err) {
      logger.debug({ err }, 'Could not read RAM info');
      return 0;
    }
  }
}
