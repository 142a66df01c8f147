import type { MessageRepository } from './db-backend.js';
import type { Message } from './db-types.js';

/**
 * Expand each match into its same-chat window: `before…, match, after…`.
 *
 * Windows are concatenated in match order and never deduplicated, so two
 * nearby matches repeat the messages they share.
 */
export async function expandWithContext(
  repo: Pick<MessageRepository, 'getMessageContext'>,
  matches: readonly Message[],
  before: number,
  after: number,
): Promise<Message[]> {
  const expanded: Message[] = [];

  for (const match of matches) {
    const context = await repo.getMessageContext(match.id, before, after);
    expanded.push(...context.before, context.message, ...context.after);
  }

  return expanded;
}
