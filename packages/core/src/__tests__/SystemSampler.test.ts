import { describe, it, expect, vi, beforeEach } from 'vitest';

// --- Mock node:fs/promises and node:os ---
const { mockReadFile } = vi.hoisted(() => ({ mockReadFile: vi.fn() }));

vi.mock('node:fs/promises', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node:fs/promises')>()),
  readFile: mockReadFile,
}));

vi.mock('node:os', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node:os')>()),
  loadavg: () => [0.42, 0.3, 0.2],
  totalmem: () => 8_589_934_592,
  uptime: () => 3_600,
}));

import { SystemSampler, parseMeminfo } from '../metrics/SystemSampler.js';

const MEMINFO = [
  'MemTotal:       16384000 kB',
  'MemFree:         1024000 kB',
  'MemAvailable:    4096000 kB',
  'Buffers:          512000 kB',
  'HugePages_Total:       0',
].join('\n');

function serveFiles(files: Record<string, string>): void {
  mockReadFile.mockImplementation(async (path: string) => {
    if (path in files) return files[path];
    throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), {
      code: 'ENOENT',
    });
  });
}

describe('parseMeminfo', () => {
  it('should map field names to their kB values', () => {
    const fields = parseMeminfo(MEMINFO);

    expect(fields.get('MemTotal')).toBe(16_384_000);
    expect(fields.get('MemAvailable')).toBe(4_096_000);
    expect(fields.get('HugePages_Total')).toBe(0);
  });

  it('should skip lines without a numeric value', () => {
    const fields = parseMeminfo('garbage\nMemTotal: lots\nMemFree: 12 kB\n');

    expect([...fields.entries()]).toEqual([['MemFree', 12]]);
  });
});

describe('SystemSampler', () => {
  const sampler = new SystemSampler({
    sensorPaths: ['/sensors/a', '/sensors/b', '/sensors/c'],
    meminfoPath: '/proc-test/meminfo',
  });

  beforeEach(() => {
    mockReadFile.mockReset();
  });

  it('should take the first readable sensor and derive RAM usage from MemAvailable', async () => {
    serveFiles({
      '/sensors/b': 'garbage\n',
      '/sensors/c': '45500\n',
      '/proc-test/meminfo': MEMINFO,
    });

    await expect(sampler.sample()).resolves.toEqual({
      temperatureCelsius: 45.5,
      ramUsedPercent: 75,
      loadAverage1m: 0.42,
    });
  });

  it('should stop at the first sensor that reads', async () => {
    serveFiles({ '/sensors/a': '61000', '/sensors/c': '99000' });

    await expect(sampler.readTemperature()).resolves.toBe(61);
    expect(mockReadFile).not.toHaveBeenCalledWith('/sensors/c', 'utf-8');
  });

  it('should report 0 for values that cannot be read', async () => {
    serveFiles({});

    await expect(sampler.sample()).resolves.toEqual({
      temperatureCelsius: 0,
      ramUsedPercent: 0,
      loadAverage1m: 0.42,
    });
  });

  it('should report 0 RAM usage when MemAvailable is missing', async () => {
    serveFiles({ '/proc-test/meminfo': 'MemTotal: 1000 kB\nMemFree: 10 kB\n' });

    await expect(sampler.readRamUsage()).resolves.toBe(0);
  });

  it('should round RAM usage to one decimal place', async () => {
    serveFiles({ '/proc-test/meminfo': 'MemTotal: 3000 kB\nMemAvailable: 1000 kB\n' });

    await expect(sampler.readRamUsage()).resolves.toBe(66.7);
  });

  it('should describe the host from the OS', () => {
    expect(sampler.describeHost()).toEqual({
      memoryTotalBytes: 8_589_934_592,
      uptimeSeconds: 3_600,
    });
  });
});
