/**
 * Plain-text rendering of messages for callers, plus shared utility types.
 *
 * One line per message:
 *   [2024-05-01 09:30:00] Chat: Family From: Alice: [image - Message ID: … - Chat JID: …] caption
 */

import type { MessageRepository } from './db-backend.js';
import type { Message } from './db-types.js';

// ── Shared utility types ────────────────────────────────────────────

/**
 * Discriminated union for operations that report failure as a value instead
 * of throwing.
 *
 * @example
 * ```ts
 * const sent = await client.sendMessage(jid, 'hi');
 * if (!sent.ok) logger.warn({ error: sent.error }, 'Send failed');
 * ```
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const NO_MESSAGES = 'No messages to display.';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM:SS` in UTC */
export function formatTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
    + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/**
 * Render one message as a single line ending in `\n`. Own messages show as
 * "Me"; other senders are resolved through the repository.
 */
export async function formatMessage(
  message: Message,
  names: Pick<MessageRepository, 'getSenderName'>,
  showChatInfo: boolean = true,
): Promise<string> {
  let line = `[${formatTimestamp(message.timestamp)}] `;
  if (showChatInfo && message.chatName) line += `Chat: ${message.chatName} `;

  const mediaPrefix = message.mediaType
    ? `[${message.mediaType} - Message ID: ${message.id} - Chat JID: ${message.chatJid}] `
    : '';
  const sender = message.isFromMe ? 'Me' : await names.getSenderName(message.sender);

  return `${line}From: ${sender}: ${mediaPrefix}${message.content}\n`;
}

export async function formatMessagesList(
  messages: readonly Message[],
  names: Pick<MessageRepository, 'getSenderName'>,
  showChatInfo: boolean = true,
): Promise<string> {
  if (messages.length === 0) return NO_MESSAGES;

  const lines: string[] = [];
  for (const message of messages) {
    lines.push(await formatMessage(message, names, showChatInfo));
  }
  return lines.join('');
}
