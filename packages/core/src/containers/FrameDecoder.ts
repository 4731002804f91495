import { StringDecoder } from 'node:string_decoder';
import { MAX_EVENT_FRAME_LENGTH, StreamConnectionError, getLogger } from '@hostwatch/shared';

const logger = getLogger();

const STATUS_LINE = /^HTTP\/\d(?:\.\d)?\s+(\d{3})\b/;

type DecoderState = 'start' | 'headers' | 'frames';

export type Frame = Record<string, unknown>;

function isFrame(value: unknown): value is Frame {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode one frame. Anything that is not a JSON object yields null.
 */
export function decodeFrame(line: string): Frame | null {
  try {
    const value: unknown = JSON.parse(line);
    return isFrame(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Incremental decoder for the runtime's event response: an optional HTTP status line and
 * headers, then one JSON object per line. Chunks may split lines and UTF-8 sequences anywhere.
 *
 * A non-2xx status line throws StreamConnectionError. Blank and malformed frames are skipped,
 * and so is a line that grows past `maxLineLength` before its newline arrives.
 */
export class FrameDecoder {
  private state: DecoderState = 'start';
  private buffer: string = '';
  private text = new StringDecoder('utf8');
  private statusCode: number | null = null;
  private maxLineLength: number;
  // Set while the rest of an oversized line is still arriving.
  private discarding: boolean = false;

  constructor(maxLineLength: number = MAX_EVENT_FRAME_LENGTH) {
    this.maxLineLength = maxLineLength;
  }

  push(chunk: Buffer | string): Frame[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.text.write(chunk);

    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    if (this.discarding && lines.length > 0) {
      lines.shift();
      this.discarding = false;
    }

    if (this.buffer.length > this.maxLineLength) {
      if (!this.discarding) {
        logger.debug({ limit: this.maxLineLength }, 'Skipping oversized event frame');
      }
      this.buffer = '';
      this.discarding = true;
    }

    return this.consumeLines(lines);
  }

  /**
   * Flush a trailing frame that was not newline-terminated.
   */
  end(): Frame[] {
    const rest = this.buffer + this.text.end();
    this.buffer = '';
    if (this.discarding) {
      this.discarding = false;
      return [];
    }
    return this.consumeLines([rest]);
  }

  getPendingLength(): number {
    return this.buffer.length;
  }

  getStatusCode(): number | null {
    return this.statusCode;
  }

  private consumeLines(lines: string[]): Frame[] {
    const frames: Frame[] = [];
    for (const line of lines) {
      const frame = this.consumeLine(line.replace(/\0/g, '').trim());
      if (frame) frames.push(frame);
    }
    return frames;
  }

  private consumeLine(line: string): Frame | null {
    switch (this.state) {
      case 'start': {
        if (!line) return null;

        const status = STATUS_LINE.exec(line);
        if (!status) {
          // No HTTP envelope: the body starts right away.
          this.state = 'frames';
          return this.decode(line);
        }

        this.statusCode = parseInt(status[1], 10);
        if (this.statusCode < 200 || this.statusCode >= 300) {
          throw new StreamConnectionError(`Event endpoint responded with "${line}"`);
        }
        this.state = 'headers';
        return null;
      }
      case 'headers':
        if (!line) this.state = 'frames';
        return null;
      case 'frames':
        return line ? this.decode(line) : null;
    }
  }

  private decode(line: string): Frame | null {
    const frame = decodeFrame(line);
    if (!frame) {
      logger.debug({ frame: line.slice(0, 200) }, 'Skipping malformed event frame');
    }
    return frame;
  }
}
