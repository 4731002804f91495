import { existsSync } from 'node:fs';
import { once } from 'node:events';
import { createConnection } from 'node:net';
import type { Duplex } from 'node:stream';
import {
  DEFAULT_RECONNECT_DELAY,
  DOCKER_DIE_EVENTS_FILTER,
  DOCKER_SOCKET_PATH,
  PRIORITY,
  StreamClosedError,
  StreamConnectionError,
  getLogger,
  parseDuration,
} from '@hostwatch/shared';
import type { BackgroundTask, NotificationSender } from '../types.js';
import { InterruptibleDelay } from '../utils/delay.js';
import { FrameDecoder } from './FrameDecoder.js';
import type { Frame } from './FrameDecoder.js';
import { formatCrashMessage, toContainerEvent } from './container-event.js';

const logger = getLogger();

export const CRASH_TITLE = 'CONTAINER CRASHED';
export const CRASH_TAGS: readonly string[] = ['skull', 'warning'];

export type SocketConnector = (socketPath: string) => Duplex;

export interface ContainerEventStreamOptions {
  socketPath?: string;
  /** Milliseconds between a failed attempt and the next connection. */
  reconnectDelay?: number;
  connect?: SocketConnector;
  sleep?: (ms: number) => Promise<void>;
}

export function buildEventsRequest(): string {
  return `GET /events?filters=${DOCKER_DIE_EVENTS_FILTER} HTTP/1.0\r\n\r\n`;
}

/**
 * Follows container "die" events on the runtime's Unix socket and reports abnormal exits.
 *
 * Every connection attempt ends with the socket destroyed. Any failure, including the peer
 * closing the stream, is followed by the reconnect delay; there is no retry limit.
 */
export class ContainerEventStream implements BackgroundTask {
  private notifier: NotificationSender;
  private socketPath: string;
  private reconnectDelay: number;
  private connect: SocketConnector;
  private sleep: (ms: number) => Promise<void>;
  private delay = new InterruptibleDelay();
  private socket: Duplex | null = null;
  private stopped: boolean = false;

  constructor(notifier: NotificationSender, options: ContainerEventStreamOptions = {}) {
    this.notifier = notifier;
    this.socketPath = options.socketPath ?? DOCKER_SOCKET_PATH;
    this.reconnectDelay = options.reconnectDelay ?? parseDuration(DEFAULT_RECONNECT_DELAY);
    this.connect = options.connect ?? ((path) => createConnection(path));
    this.sleep = options.sleep ?? ((ms) => this.delay.wait(ms));
  }

  async start(): Promise<void> {
    if (!existsSync(this.socketPath)) {
      logger.warn(
        { socketPath: this.socketPath },
        'Container runtime socket not found, container monitoring disabled',
      );
      return;
    }

    this.stopped = false;
    logger.info({ socketPath: this.socketPath }, 'Container event monitor active');

    while (!this.stopped) {
      try {
        await this.follow();
      } catch (err) {
        if (this.stopped) break;

        if (err instanceof StreamClosedError) {
          logger.warn({ socketPath: this.socketPath }, err.message);
        } else {
          logger.error({ err, socketPath: this.socketPath }, 'Container event stream error');
        }
      }

      if (this.stopped) break;
      await this.sleep(this.reconnectDelay);
    }

    logger.info('Container event monitor stopped');
  }

  stop(): void {
    this.stopped = true;
    // Destroy with an error so a pending connect or read settles instead of hanging.
    this.socket?.destroy(new StreamConnectionError('Container event monitor stopped'));
    this.delay.interrupt();
  }

  /**
   * One connection attempt: request the event feed and handle frames until the stream ends.
   */
  private async follow(): Promise<void> {
    const socket = this.connect(this.socketPath);
    this.socket = socket;

    try {
      await once(socket, 'connect');
      socket.write(buildEventsRequest());

      const decoder = new FrameDecoder();
      for await (const chunk of socket) {
        await this.handleFrames(decoder.push(chunk));
        if (this.stopped) return;
      }
      await this.handleFrames(decoder.end());
    } finally {
      socket.destroy();
      this.socket = null;
    }

    throw new StreamClosedError(this.socketPath);
  }

  private async handleFrames(frames: Frame[]): Promise<void> {
    for (const frame of frames) {
      if (this.stopped) return;
      await this.handleFrame(frame);
    }
  }

  private async handleFrame(frame: Frame): Promise<void> {
    const event = toContainerEvent(frame);
    if (!event.isAbnormal) {
      logger.debug({ container: event.containerName }, 'Container stopped cleanly');
      return;
    }

    const message = formatCrashMessage(event);
    logger.warn({ container: event.containerName, exitCode: event.exitCode }, message);
    await this.notifier.send(CRASH_TITLE, message, PRIORITY.urgent, CRASH_TAGS);
  }
}
