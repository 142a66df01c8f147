/**
 * Reads the bridge's merged stdout/stderr line by line.
 *
 * Every trimmed line goes into the shared output queue. QR blocks printed
 * during pairing are captured into a single slot, which a later capture
 * overwrites; the slot hands its payload out once via `takeQrCode()`.
 */

import { createInterface } from 'readline';
import type { Readable } from 'stream';

import { logger } from '../middleware/logger.js';
import { BoundedQueue } from './bounded-queue.js';

export const OUTPUT_QUEUE_CAPACITY = 500;
export const QR_START_MARKER = 'Scan this QR code with your WhatsApp app:';
export const QR_SUCCESS_MARKER = 'Successfully connected and authenticated!';

const QR_BLOCK_CHARS = ['█', '▄', '▀', '▐', '▌'];

const log = logger.child({ module: 'bridge-output' });

export function isQrRow(line: string): boolean {
  return QR_BLOCK_CHARS.some((ch) => line.includes(ch));
}

/** Last captured QR block. Writes replace; reads via `take()` consume. */
export class QrCodeSlot {
  private payload: string | null = null;
  private consumed = true;

  set(qr: string): void {
    this.payload = qr;
    this.consumed = false;
  }

  /** Payload if not yet handed out since the last capture. */
  take(): string | null {
    if (this.consumed || this.payload === null) return null;
    this.consumed = true;
    return this.payload;
  }

  peek(): string | null {
    return this.payload;
  }

  clear(): void {
    this.payload = null;
    this.consumed = true;
  }
}

export interface OutputMonitorOptions {
  queue?: BoundedQueue<string>;
  qrSlot?: QrCodeSlot;
}

export class OutputMonitor {
  readonly queue: BoundedQueue<string>;
  readonly qrSlot: QrCodeSlot;
  private capturing = false;
  private qrRows: string[] = [];
  private reading: Promise<void> = Promise.resolve();

  constructor(options: OutputMonitorOptions = {}) {
    this.queue = options.queue ?? new BoundedQueue<string>(OUTPUT_QUEUE_CAPACITY);
    this.qrSlot = options.qrSlot ?? new QrCodeSlot();
  }

  /**
   * Start reading `stream` in the background. Resolves `done` when the
   * stream closes. Capture state resets per stream.
   */
  attach(stream: Readable): Promise<void> {
    this.capturing = false;
    this.qrRows = [];

    const rl = createInterface({ input: stream, crlfDelay: Infinity });
    this.reading = (async () => {
      try {
        for await (const raw of rl) {
          this.handleLine(raw);
        }
      } catch (err) {
        log.warn({ err }, 'Bridge output stream errored');
      } finally {
        this.finishBlock();
        log.debug('Bridge output stream closed');
      }
    })();

    return this.reading;
  }

  /** Settles when the currently attached stream has closed. */
  get done(): Promise<void> {
    return this.reading;
  }

  handleLine(raw: string): void {
    const line = raw.trim();
    this.queue.push(line);

    if (line.includes(QR_START_MARKER)) {
      this.capturing = true;
      this.qrRows = [];
      return;
    }

    if (!this.capturing) return;

    if (line.includes(QR_SUCCESS_MARKER) || line === '') {
      this.finishBlock();
    } else if (isQrRow(line)) {
      this.qrRows.push(line);
    }
  }

  takeQrCode(): string | null {
    return this.qrSlot.take();
  }

  peekQrCode(): string | null {
    return this.qrSlot.peek();
  }

  private finishBlock(): void {
    if (!this.capturing) return;
    this.capturing = false;

    if (this.qrRows.length > 0) {
      this.qrSlot.set(this.qrRows.join('\n'));
      log.info({ rows: this.qrRows.length }, 'Captured QR code from bridge output');
    }
    this.qrRows = [];
  }
}
