export const HOSTWATCH_VERSION = '1.0.0';

export const DEFAULT_TEMP_LIMIT = 82;
export const DEFAULT_DISK_LIMIT = 90;
export const DEFAULT_RAM_LIMIT = 92;
export const DEFAULT_DAILY_TIME = '08:00';
export const DEFAULT_WEEKLY_DAY = 'monday' as const;
export const DEFAULT_CHECK_INTERVAL = 60;
export const DEFAULT_NOTIFY_TIMEOUT = '15s';
export const DEFAULT_RECONNECT_DELAY = '10s';
export const DEFAULT_ALERT_COOLDOWN = '0';

export const HOURLY_PERIOD_SECONDS = 3600;

// Largest delay setTimeout honours; anything above fires after 1 ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
export const MAX_CHECK_INTERVAL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

export const MAX_EVENT_FRAME_LENGTH = 1024 * 1024;

export const DOCKER_SOCKET_PATH = '/var/run/docker.sock';

// {"type":["container"],"event":["die"]}
export const DOCKER_DIE_EVENTS_FILTER =
  '%7B%22type%22%3A%5B%22container%22%5D%2C%22event%22%3A%5B%22die%22%5D%7D';

export const TEMPERATURE_SENSOR_PATHS: readonly string[] = [
  ...Array.from({ length: 10 }, (_, i) => `/sys/class/hwmon/hwmon${i}/temp1_input`),
  '/sys/class/thermal/thermal_zone0/temp',
];

export const MEMINFO_PATH = '/proc/meminfo';
export const MOUNTS_PATH = '/proc/mounts';

export const DISK_DEVICE_PREFIXES: readonly string[] = ['/dev/sd', '/dev/nvme', '/dev/mapper'];
export const EXCLUDED_MOUNT_MARKERS: readonly string[] = [
  'docker',
  'overlay',
  'kubelet',
  'containers',
];
