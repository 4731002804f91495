export class HostwatchError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'HostwatchError';
    this.code = code;
  }
}

export class ConfigValidationError extends HostwatchError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class StreamConnectionError extends HostwatchError {
  constructor(message: string) {
    super(message, 'STREAM_CONNECTION_ERROR');
    this.name = 'StreamConnectionError';
  }
}

export class StreamClosedError extends HostwatchError {
  constructor(socketPath: string) {
    super(`Event stream closed by peer: ${socketPath}`, 'STREAM_CLOSED');
    this.name = 'StreamClosedError';
  }
}

export class NotificationDeliveryError extends HostwatchError {
  public readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message, 'NOTIFICATION_DELIVERY_ERROR');
    this.name = 'NotificationDeliveryError';
    this.status = status;
  }
}

export class DiskScanError extends HostwatchError {
  constructor(message: string) {
    super(message, 'DISK_SCAN_ERROR');
    this.name = 'DiskScanError';
  }
}

/**
 * The `code` of a Node.js system error (ENOENT, ECONNREFUSED, ...), if any.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
