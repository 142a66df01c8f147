/**
 * Owns the bridge executable's process handle.
 *
 * The bridge runs detached as the head of its own process group so `stop()`
 * can signal it together with anything it forked. Its stdout and stderr are
 * merged into one stream for the OutputMonitor.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';
import { chmodSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { PassThrough } from 'stream';
import psList, { type ProcessDescriptor } from 'ps-list';

import { logger } from '../middleware/logger.js';
import { errorMessage, ProcessLifecycleError } from '../utils/errors.js';
import type { Result } from '../utils/formatting.js';
import { OutputMonitor } from './output-monitor.js';

export const START_WINDOW_MS = 5_000;
export const START_POLL_MS = 100;
export const STOP_GRACE_MS = 10_000;

/** Output lines that mean the bridge cannot come up. */
export const FATAL_OUTPUT_MARKERS = [
  "Required session table 'devices' does not exist",
  'Bridge initialization failed',
] as const;

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;
export type ProcessListFn = () => Promise<ProcessDescriptor[]>;

export interface BridgeSupervisorOptions {
  bridgeDir: string;
  executable: string;
  monitor: OutputMonitor;
  spawn?: SpawnFn;
  listProcesses?: ProcessListFn;
  startWindowMs?: number;
  stopGraceMs?: number;
}

const log = logger.child({ module: 'bridge-supervisor' });

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function isAlive(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

function failure(err: ProcessLifecycleError): Result<string> {
  log.warn({ code: err.code }, err.message);
  return { ok: false, error: err.message };
}

export class BridgeSupervisor {
  private child: ChildProcess | null = null;
  private starting: Promise<Result<string>> | null = null;
  private spawnError: Error | null = null;
  private readonly spawnFn: SpawnFn;
  private readonly listProcesses: ProcessListFn;
  private readonly startWindowMs: number;
  private readonly stopGraceMs: number;

  constructor(private readonly options: BridgeSupervisorOptions) {
    this.spawnFn = options.spawn ?? spawn;
    this.listProcesses = options.listProcesses ?? (() => psList());
    this.startWindowMs = options.startWindowMs ?? START_WINDOW_MS;
    this.stopGraceMs = options.stopGraceMs ?? STOP_GRACE_MS;
  }

  get bridgeDir(): string {
    return resolve(this.options.bridgeDir);
  }

  get executablePath(): string {
    return join(this.bridgeDir, this.options.executable);
  }

  /** PID of the owned process, if one is alive. */
  get pid(): number | null {
    return this.child && isAlive(this.child) ? this.child.pid ?? null : null;
  }

  /**
   * Owned handle alive, or some process on this host runs the bridge
   * executable. The scan covers a supervisor restarted next to a bridge it
   * no longer owns, at the cost of matching any process whose command line
   * happens to contain the executable name.
   */
  async isRunning(): Promise<boolean> {
    if (this.child && isAlive(this.child)) return true;

    let processes: ProcessDescriptor[];
    try {
      processes = await this.listProcesses();
    } catch (err) {
      log.warn({ err }, 'Process scan failed; assuming bridge is not running');
      return false;
    }

    const exe = this.executablePath;
    const name = this.options.executable;
    const match = processes.find((p) => (p.cmd ?? p.name).includes(exe) || p.name === name);
    if (match) {
      log.debug(
        { pid: match.pid, cmd: match.cmd ?? match.name },
        'Found unowned bridge process by name; may be a false positive on a name collision',
      );
      return true;
    }
    return false;
  }

  /** Concurrent callers share one in-flight start, so at most one bridge is launched. */
  start(): Promise<Result<string>> {
    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async launch(): Promise<Result<string>> {
    if (await this.isRunning()) {
      return { ok: true, value: 'Bridge is already running' };
    }

    const bridgeDir = this.bridgeDir;
    if (!existsSync(bridgeDir)) {
      return failure(new ProcessLifecycleError(`Bridge directory not found: ${bridgeDir}`));
    }
    const exe = this.executablePath;
    if (!existsSync(exe)) {
      return failure(new ProcessLifecycleError(`Bridge executable not found: ${exe}`));
    }

    let child: ChildProcess;
    try {
      chmodSync(exe, 0o755);
      child = this.spawnFn(exe, [], {
        cwd: bridgeDir,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (err) {
      return failure(new ProcessLifecycleError(`Failed to start bridge process: ${errorMessage(err)}`, { cause: err }));
    }

    this.child = child;
    this.spawnError = null;
    child.on('error', (err) => {
      this.spawnError = err;
      log.error({ err }, 'Bridge process error');
    });
    child.on('exit', (code, signal) => {
      log.info({ code, signal, pid: child.pid }, 'Bridge process exited');
    });

    this.attachOutput(child);
    log.info({ pid: child.pid, exe }, 'Bridge process spawned');

    return this.awaitStartup(child);
  }

  /** Merge stdout and stderr into one line stream for the monitor. */
  private attachOutput(child: ChildProcess): void {
    const merged = new PassThrough();
    child.stdout?.pipe(merged, { end: false });
    child.stderr?.pipe(merged, { end: false });
    child.on('close', () => merged.end());
    child.on('error', () => merged.end());
    void this.options.monitor.attach(merged);
  }

  private async awaitStartup(child: ChildProcess): Promise<Result<string>> {
    const queue = this.options.monitor.queue;
    const deadline = Date.now() + this.startWindowMs;
    let fatalLine: string | null = null;
    let lastLine: string | null = null;

    while (Date.now() < deadline) {
      for (const line of queue.drain()) {
        log.debug({ line }, 'Bridge startup output');
        if (line !== '') lastLine = line;
        if (fatalLine === null && FATAL_OUTPUT_MARKERS.some((marker) => line.includes(marker))) {
          fatalLine = line;
        }
      }
      if (fatalLine !== null) break;

      if (this.spawnError) {
        this.child = null;
        return failure(new ProcessLifecycleError(`Failed to start bridge process: ${this.spawnError.message}`, {
          cause: this.spawnError,
        }));
      }

      if (!isAlive(child)) {
        this.child = null;
        // Pick up output still buffered between exit and stream close
        await Promise.race([this.options.monitor.done, sleep(START_POLL_MS)]);
        for (const line of queue.drain()) {
          if (line !== '') lastLine = line;
        }
        return failure(new ProcessLifecycleError(
          `Bridge process failed to start. Exit code: ${child.exitCode ?? child.signalCode}. `
          + `Output: ${lastLine ?? 'No specific error message captured.'}`,
        ));
      }

      await sleep(START_POLL_MS);
    }

    if (fatalLine !== null) {
      await this.stop();
      return failure(new ProcessLifecycleError(`Bridge initialization failed: ${fatalLine}`));
    }

    return { ok: true, value: 'Bridge process started successfully' };
  }

  /**
   * SIGTERM the process group, wait for exit, then SIGKILL. Always drops the
   * handle. Does nothing when no process is owned.
   */
  async stop(): Promise<void> {
    const child = this.child;
    this.child = null;
    if (!child) return;

    try {
      if (!isAlive(child)) return;

      const exitedInTime = new Promise<boolean>((r) => {
        const timer = setTimeout(() => r(false), this.stopGraceMs);
        child.once('exit', () => {
          clearTimeout(timer);
          r(true);
        });
      });

      log.info({ pid: child.pid }, 'Sending SIGTERM to bridge process group');
      this.signal(child, 'SIGTERM');

      if (!(await exitedInTime) && isAlive(child)) {
        log.warn({ pid: child.pid }, 'Bridge did not exit in time; sending SIGKILL');
        this.signal(child, 'SIGKILL');
      } else {
        log.info({ pid: child.pid }, 'Bridge process terminated gracefully');
      }
    } catch (err) {
      log.error({ err }, 'Error stopping bridge process');
    }
  }

  /**
   * Synchronous SIGTERM to the owned process group, for `process.on('exit')`
   * where nothing can be awaited.
   */
  terminateNow(): void {
    const child = this.child;
    this.child = null;
    if (!child || !isAlive(child)) return;
    try {
      this.signal(child, 'SIGTERM');
    } catch (err) {
      log.error({ err }, 'Error signalling bridge process at exit');
    }
  }

  private signal(child: ChildProcess, signal: NodeJS.Signals): void {
    const pid = child.pid;
    if (pid !== undefined) {
      try {
        process.kill(-pid, signal);
        return;
      } catch (err) {
        log.debug({ err, pid }, 'Process group signal failed; signalling the child directly');
      }
    }
    child.kill(signal);
  }
}
