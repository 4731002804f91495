import { readFile, statfs } from 'node:fs/promises';
import {
  DISK_DEVICE_PREFIXES,
  DiskScanError,
  EXCLUDED_MOUNT_MARKERS,
  MOUNTS_PATH,
  getErrorCode,
  getErrorMessage,
  getLogger,
  roundPercent,
} from '@hostwatch/shared';
import type { DiskUsage } from '@hostwatch/shared';
import type { DiskSource } from '../types.js';

const logger = getLogger();

// /proc/mounts escapes whitespace in paths as octal, e.g. "\040" for a space.
function unescapeMountPath(path: string): string {
  return path.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

/**
 * Mount points backed by physical or mapped block devices, minus container-managed ones.
 * The first entry for a mount point wins.
 */
export function selectMounts(mountsTable: string): string[] {
  const mounts: string[] = [];

  for (const line of mountsTable.split('\n')) {
    const [device, rawMount] = line.trim().split(/\s+/);
    if (!device || !rawMount) continue;
    if (!DISK_DEVICE_PREFIXES.some((prefix) => device.startsWith(prefix))) continue;

    const mount = unescapeMountPath(rawMount);
    if (EXCLUDED_MOUNT_MARKERS.some((marker) => mount.includes(marker))) continue;
    if (!mounts.includes(mount)) {
      mounts.push(mount);
    }
  }

  return mounts;
}

export class DiskScanner implements DiskSource {
  private mountsPath: string;

  constructor(mountsPath: string = MOUNTS_PATH) {
    this.mountsPath = mountsPath;
  }

  /**
   * Full scan of every eligible mount. Mounts that cannot be queried are skipped;
   * an unreadable mount table throws DiskScanError.
   */
  async scan(): Promise<DiskUsage> {
    let table: string;
    try {
      table = await readFile(this.mountsPath, 'utf-8');
    } catch (err) {
      if (getErrorCode(err) === 'ENOENT') {
        logger.debug({ path: this.mountsPath }, 'Mount table not found, no disks to scan');
        return Object.freeze({});
      }
      throw new DiskScanError(`Cannot read ${this.mountsPath}: ${getErrorMessage(err)}`);
    }

    const usage: Record<string, number> = {};

    for (const mount of selectMounts(table)) {
      try {
        const stats = await statfs(mount);
        if (stats.blocks > 0) {
          usage[mount] = roundPercent((1 - stats.bavail / stats.blocks) * 100);
        }
      } catch (err) {
        logger.debug({ err, mount }, 'Skipping mount that cannot be queried');
      }
    }

    logger.info({ disks: usage }, 'Disk check completed');
    return Object.freeze(usage);
  }
}
