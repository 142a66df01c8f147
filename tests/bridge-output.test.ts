import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';

import { BoundedQueue } from '../src/bridge/bounded-queue.js';
import {
  OutputMonitor,
  QrCodeSlot,
  QR_START_MARKER,
  QR_SUCCESS_MARKER,
  isQrRow,
} from '../src/bridge/output-monitor.js';

const QR_ROWS = [
  '█▀▀▀▀▀█ ▄▀ █▀▀▀▀▀█',
  '█ ███ █ ▀▄ █ ███ █',
  '█ ▀▀▀ █ █▀ █ ▀▀▀ █',
  '▀▀▀▀▀▀▀ ▀ ▀▀▀▀▀▀▀',
  '▀▄█ ▄▀▀▄▀█▄▀ ▄▀█▄',
];

describe('BoundedQueue', () => {
  it('keeps insertion order', () => {
    const queue = new BoundedQueue<string>(3);
    queue.push('a');
    queue.push('b');
    expect(queue.shift()).toBe('a');
    expect(queue.drain()).toEqual(['b']);
    expect(queue.shift()).toBeUndefined();
  });

  it('drops the oldest entry when full', () => {
    const queue = new BoundedQueue<number>(2);
    queue.push(1);
    queue.push(2);
    queue.push(3);
    expect(queue.size).toBe(2);
    expect(queue.dropped).toBe(1);
    expect(queue.drain()).toEqual([2, 3]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new BoundedQueue(0)).toThrow(RangeError);
    expect(() => new BoundedQueue(1.5)).toThrow('Queue capacity must be a positive integer, got 1.5');
  });
});

describe('QrCodeSlot', () => {
  it('hands a payload out once but keeps it visible', () => {
    const slot = new QrCodeSlot();
    expect(slot.take()).toBeNull();

    slot.set('qr-1');
    expect(slot.take()).toBe('qr-1');
    expect(slot.take()).toBeNull();
    expect(slot.peek()).toBe('qr-1');

    slot.set('qr-2');
    expect(slot.take()).toBe('qr-2');

    slot.clear();
    expect(slot.peek()).toBeNull();
  });
});

describe('OutputMonitor', () => {
  it('recognizes QR rows by their block characters', () => {
    expect(isQrRow(QR_ROWS[0] ?? '')).toBe(true);
    expect(isQrRow('Connecting to WhatsApp...')).toBe(false);
  });

  it('queues every line trimmed', () => {
    const monitor = new OutputMonitor();
    monitor.handleLine('  Starting bridge  ');
    monitor.handleLine('');
    expect(monitor.queue.drain()).toEqual(['Starting bridge', '']);
  });

  it('captures a QR block ended by a blank line', () => {
    const monitor = new OutputMonitor();
    monitor.handleLine(QR_START_MARKER);
    for (const row of QR_ROWS) monitor.handleLine(row);
    monitor.handleLine('');

    expect(monitor.takeQrCode()).toBe(QR_ROWS.join('\n'));
    expect(monitor.takeQrCode()).toBeNull();
  });

  it('ignores non-QR lines inside a block and stops at the success marker', () => {
    const monitor = new OutputMonitor();
    monitor.handleLine(QR_START_MARKER);
    monitor.handleLine(QR_ROWS[0] ?? '');
    monitor.handleLine('waiting for scan');
    monitor.handleLine(QR_ROWS[1] ?? '');
    monitor.handleLine(QR_SUCCESS_MARKER);
    monitor.handleLine(QR_ROWS[2] ?? '');

    expect(monitor.peekQrCode()).toBe(`${QR_ROWS[0]}\n${QR_ROWS[1]}`);
  });

  it('overwrites the slot on the next pairing cycle', () => {
    const monitor = new OutputMonitor();
    monitor.handleLine(QR_START_MARKER);
    monitor.handleLine(QR_ROWS[0] ?? '');
    monitor.handleLine('');
    monitor.handleLine(QR_START_MARKER);
    monitor.handleLine(QR_ROWS[4] ?? '');
    monitor.handleLine('');

    expect(monitor.takeQrCode()).toBe(QR_ROWS[4]);
  });

  it('does not capture rows outside a block', () => {
    const monitor = new OutputMonitor();
    monitor.handleLine(QR_ROWS[0] ?? '');
    expect(monitor.peekQrCode()).toBeNull();
  });

  it('reads an attached stream until it closes', async () => {
    const monitor = new OutputMonitor();
    const stream = new PassThrough();

    const done = monitor.attach(stream);
    stream.write('Starting bridge\r\n');
    stream.write(`${QR_START_MARKER}\n`);
    stream.write(`${QR_ROWS.join('\n')}\n`);
    stream.end();
    await done;

    expect(monitor.queue.drain()).toEqual(['Starting bridge', QR_START_MARKER, ...QR_ROWS]);
    expect(monitor.takeQrCode()).toBe(QR_ROWS.join('\n'));
  });

  it('keeps only the latest of two full pairing cycles', async () => {
    const monitor = new OutputMonitor();
    const stream = new PassThrough();
    const secondRows = [...QR_ROWS].reverse();

    const done = monitor.attach(stream);
    stream.write(`${QR_START_MARKER}\n${QR_ROWS.join('\n')}\n${QR_SUCCESS_MARKER}\n`);
    stream.write(`${QR_START_MARKER}\n${secondRows.join('\n')}\n${QR_SUCCESS_MARKER}\n`);
    stream.end();
    await done;

    expect(monitor.takeQrCode()).toBe(secondRows.join('\n'));
    expect(monitor.takeQrCode()).toBeNull();
    expect(monitor.queue.size).toBe(14);
  });

  it('shares an injected queue', async () => {
    const queue = new BoundedQueue<string>(2);
    const monitor = new OutputMonitor({ queue });
    const stream = new PassThrough();

    const done = monitor.attach(stream);
    stream.end('one\ntwo\nthree\n');
    await done;

    expect(queue.drain()).toEqual(['two', 'three']);
    expect(queue.dropped).toBe(1);
  });
});
