/**
 * Readiness orchestration: is the bridge process up, is its API answering,
 * and is the WhatsApp session paired?
 *
 * Nothing here caches. Each call looks at the live process, the live API and
 * the session store again, so `ensureReady()` can be called before every
 * operation and gives the same answer for the same state.
 */

import { logger } from '../middleware/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { AuthenticationRepository } from '../utils/db-backend.js';
import type { BridgeClient } from './client.js';
import type { BridgeSupervisor } from './supervisor.js';
import type { OutputMonitor } from './output-monitor.js';

export const API_POLL_ATTEMPTS = 30;
export const API_POLL_INTERVAL_MS = 1_000;

export interface BridgeStatus {
  isRunning: boolean;
  apiResponsive: boolean;
  isAuthenticated: boolean;
  errorMessage?: string;
}

export interface ReadinessResult {
  ready: boolean;
  message: string;
  qrUrl?: string;
}

export interface ReadinessDeps {
  supervisor: Pick<BridgeSupervisor, 'isRunning' | 'start'>;
  client: Pick<BridgeClient, 'checkHealth' | 'getAuthStatus' | 'qrUrl'>;
  monitor: Pick<OutputMonitor, 'queue' | 'takeQrCode'>;
  /** Session store used when the bridge API cannot answer. */
  authentication: () => Promise<Pick<AuthenticationRepository, 'checkAuthenticationStatus'>>;
  pollAttempts?: number;
  pollIntervalMs?: number;
}

const log = logger.child({ module: 'bridge-readiness' });

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export class ReadinessOrchestrator {
  private readonly pollAttempts: number;
  private readonly pollIntervalMs: number;

  constructor(private readonly deps: ReadinessDeps) {
    this.pollAttempts = deps.pollAttempts ?? API_POLL_ATTEMPTS;
    this.pollIntervalMs = deps.pollIntervalMs ?? API_POLL_INTERVAL_MS;
  }

  /** Bridge API first; the session store when the API is unreachable. */
  async checkAuthentication(): Promise<{ authenticated: boolean; message: string | null }> {
    try {
      const status = await this.deps.client.getAuthStatus();
      if (status.authenticated) return { authenticated: true, message: 'Authenticated via bridge' };
      if (status.hasQrCode) return { authenticated: false, message: 'QR code available for scanning' };
      return { authenticated: false, message: 'Not authenticated' };
    } catch (err) {
      log.debug({ err }, 'Bridge auth status unavailable; checking session store');
    }

    try {
      const repo = await this.deps.authentication();
      const status = await repo.checkAuthenticationStatus();
      return { authenticated: status.authenticated, message: status.reason };
    } catch (err) {
      return { authenticated: false, message: `Unable to check authentication: ${errorMessage(err)}` };
    }
  }

  async getBridgeStatus(): Promise<BridgeStatus> {
    const isRunning = await this.deps.supervisor.isRunning();
    const apiResponsive = isRunning ? await this.deps.client.checkHealth() : false;
    const auth = await this.checkAuthentication();

    const status: BridgeStatus = { isRunning, apiResponsive, isAuthenticated: auth.authenticated };
    if (auth.message !== null) status.errorMessage = auth.message;
    return status;
  }

  async ensureReady(): Promise<ReadinessResult> {
    try {
      return await this.evaluate();
    } catch (err) {
      log.error({ err }, 'Readiness check failed');
      return { ready: false, message: `Readiness check failed: ${errorMessage(err)}` };
    }
  }

  private async evaluate(): Promise<ReadinessResult> {
    const status = await this.getBridgeStatus();
    if (status.isRunning && status.apiResponsive && status.isAuthenticated) {
      return { ready: true, message: 'Bridge is ready' };
    }

    if (!status.isRunning) {
      const started = await this.deps.supervisor.start();
      if (!started.ok) {
        return { ready: false, message: `Failed to start bridge: ${started.error}` };
      }
      if (!(await this.waitForApi())) {
        return { ready: false, message: 'Bridge started but API is not responsive' };
      }
    }

    const after = await this.getBridgeStatus();
    if (after.isAuthenticated) {
      return { ready: true, message: 'Bridge is ready and authenticated' };
    }

    const qr = this.deps.monitor.takeQrCode();
    if (qr) log.info({ qr }, 'Bridge is waiting for QR pairing');

    return {
      ready: false,
      message: 'Bridge is running but not authenticated. Please scan the QR code via the web interface.',
      qrUrl: this.deps.client.qrUrl,
    };
  }

  /** Poll health until it answers or `pollAttempts * pollIntervalMs` has passed. */
  private async waitForApi(): Promise<boolean> {
    const deadline = Date.now() + this.pollAttempts * this.pollIntervalMs;
    for (;;) {
      this.logPendingOutput();
      if (await this.deps.client.checkHealth()) return true;
      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }
    this.logPendingOutput();
    return false;
  }

  private logPendingOutput(): void {
    for (const line of this.deps.monitor.queue.drain()) {
      log.debug({ line }, 'Bridge output');
    }
  }
}
