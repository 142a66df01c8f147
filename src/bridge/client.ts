/**
 * HTTP client for the bridge's local REST API.
 *
 * Health lives at the server root; everything else is under `/api`. Every
 * request carries a hard time budget and is retried on 429/5xx and on
 * network failures with exponential backoff.
 */

import { existsSync, statSync } from 'fs';
import { z } from 'zod';

import { logger } from '../middleware/logger.js';
import { errorMessage, TransientNetworkError } from '../utils/errors.js';
import type { Result } from '../utils/formatting.js';
import { convertToOpusOggTemp } from './audio.js';

export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);
export const BACKOFF_BASE_MS = 300;
export const HEALTH_TIMEOUT_MS = 2_000;

export interface BridgeClientOptions {
  baseUrl: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  retries: number;
  fetch?: typeof fetch;
  /** Delay before retry `attempt` (1-based). */
  backoff?: (attempt: number) => number;
}

export interface BridgeAuthStatus {
  authenticated: boolean;
  hasQrCode: boolean;
}

const authStatusBody = z.object({
  authenticated: z.boolean().default(false),
  has_qr_code: z.boolean().default(false),
});

const sendResponseBody = z.object({
  success: z.boolean().default(false),
  message: z.string().default('Unknown response'),
});

const downloadResponseBody = sendResponseBody.extend({
  path: z.string().optional(),
});

const log = logger.child({ module: 'bridge-client' });

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function defaultBackoff(attempt: number): number {
  return BACKOFF_BASE_MS * 2 ** (attempt - 1);
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export class BridgeClient {
  readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly backoff: (attempt: number) => number;

  constructor(private readonly options: BridgeClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
    this.backoff = options.backoff ?? defaultBackoff;
  }

  get apiUrl(): string {
    return `${this.baseUrl}/api`;
  }

  /** Page the bridge serves for QR pairing. */
  get qrUrl(): string {
    return `${this.baseUrl}/qr`;
  }

  /**
   * Request with retries. Resolves with the last response even when its
   * status is an error; rejects with `TransientNetworkError` only when no
   * response arrived at all.
   */
  async request(
    path: string,
    init: RequestInit = {},
    timeoutMs?: number,
    retries: number = this.options.retries,
  ): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const budget = timeoutMs ?? this.options.connectTimeoutMs + this.options.readTimeoutMs;
    const maxAttempts = retries + 1;

    for (let attempt = 1; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(budget) });
      } catch (err) {
        if (attempt >= maxAttempts) {
          const reason = isTimeout(err) ? `timed out after ${budget}ms` : errorMessage(err);
          throw new TransientNetworkError(`Bridge request to ${path} failed: ${reason}`, null, { cause: err });
        }
        log.debug({ err, path, attempt }, 'Bridge request failed; retrying');
        await sleep(this.backoff(attempt));
        continue;
      }

      if (!RETRY_STATUSES.has(response.status) || attempt >= maxAttempts) {
        return response;
      }

      log.debug({ path, status: response.status, attempt }, 'Bridge returned retryable status; retrying');
      await response.body?.cancel();
      await sleep(this.backoff(attempt));
    }
  }

  private async postJson(path: string, payload: Record<string, string>): Promise<Response> {
    return this.request(path, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
    });
  }

  /**
   * True when `GET /health` answers 200 within a short budget. A single
   * attempt with no retries; callers that poll own the retry cadence.
   * Never throws.
   */
  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.request('/health', {}, HEALTH_TIMEOUT_MS, 0);
      await response.body?.cancel();
      return response.status === 200;
    } catch (err) {
      log.debug({ err }, 'Bridge health check failed');
      return false;
    }
  }

  /** @throws TransientNetworkError when the API cannot be reached or answers non-200 */
  async getAuthStatus(): Promise<BridgeAuthStatus> {
    const response = await this.request('/api/auth-status');
    if (response.status !== 200) {
      await response.body?.cancel();
      throw new TransientNetworkError(`Auth status request failed: HTTP ${response.status}`, response.status);
    }

    const parsed = authStatusBody.safeParse(await response.json());
    if (!parsed.success) {
      throw new TransientNetworkError('Auth status response was not understood', response.status);
    }
    return { authenticated: parsed.data.authenticated, hasQrCode: parsed.data.has_qr_code };
  }

  async sendMessage(recipient: string, message: string): Promise<Result<string>> {
    if (!recipient) return { ok: false, error: 'Recipient must be provided' };
    return this.send({ recipient, message });
  }

  async sendFile(recipient: string, mediaPath: string): Promise<Result<string>> {
    const invalid = validateMedia(recipient, mediaPath);
    if (invalid) return invalid;
    return this.send({ recipient, media_path: mediaPath });
  }

  /** Sends as a voice note; anything that is not `.ogg` is converted first. */
  async sendAudioMessage(recipient: string, mediaPath: string): Promise<Result<string>> {
    const invalid = validateMedia(recipient, mediaPath);
    if (invalid) return invalid;

    let audioPath = mediaPath;
    if (!mediaPath.toLowerCase().endsWith('.ogg')) {
      try {
        audioPath = await convertToOpusOggTemp(mediaPath);
      } catch (err) {
        return {
          ok: false,
          error: `Error converting file to opus ogg. You likely need to install ffmpeg: ${errorMessage(err)}`,
        };
      }
    }

    return this.send({ recipient, media_path: audioPath });
  }

  /** Local path of the downloaded file, or `null` on any failure. */
  async downloadMedia(messageId: string, chatJid: string): Promise<string | null> {
    try {
      const response = await this.postJson('/api/download', { message_id: messageId, chat_jid: chatJid });
      if (response.status !== 200) {
        log.warn({ status: response.status, body: await response.text() }, 'Media download request failed');
        return null;
      }

      const body = downloadResponseBody.parse(await response.json());
      if (!body.success || !body.path) {
        log.warn({ messageId, message: body.message }, 'Media download failed');
        return null;
      }

      log.info({ messageId, path: body.path }, 'Media downloaded');
      return body.path;
    } catch (err) {
      log.warn({ err, messageId }, 'Media download error');
      return null;
    }
  }

  private async send(payload: Record<string, string>): Promise<Result<string>> {
    let response: Response;
    try {
      response = await this.postJson('/api/send', payload);
    } catch (err) {
      if (err instanceof TransientNetworkError && isTimeout(err.cause)) {
        return { ok: false, error: 'Request timed out. The bridge may be unresponsive.' };
      }
      return { ok: false, error: `Request error: ${errorMessage(err)}` };
    }

    const text = await response.text();
    if (response.status !== 200) {
      return { ok: false, error: `Error: HTTP ${response.status} - ${text}` };
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return { ok: false, error: `Error parsing response: ${text}` };
    }

    const parsed = sendResponseBody.safeParse(json);
    if (!parsed.success) return { ok: false, error: `Error parsing response: ${text}` };

    return parsed.data.success
      ? { ok: true, value: parsed.data.message }
      : { ok: false, error: parsed.data.message };
  }
}

function validateMedia(recipient: string, mediaPath: string): Result<string> | null {
  if (!recipient) return { ok: false, error: 'Recipient must be provided' };
  if (!mediaPath) return { ok: false, error: 'Media path must be provided' };
  if (!existsSync(mediaPath) || !statSync(mediaPath).isFile()) {
    return { ok: false, error: `Media file not found: ${mediaPath}` };
  }
  return null;
}
