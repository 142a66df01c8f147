/**
 * Shared domain types used by all storage backends.
 *
 * Keep this file backend-agnostic so sqlite, postgres and the REST backend
 * share the exact same API contract.
 */

import { isGroupJid } from './jid.js';

export interface Message {
  id: string;
  timestamp: Date;
  sender: string;
  content: string;
  isFromMe: boolean;
  chatJid: string;
  chatName: string | null;
  mediaType: string | null;
}

export interface Chat {
  jid: string;
  name: string | null;
  lastMessageTime: Date | null;
  lastMessage: string | null;
  lastSender: string | null;
  lastIsFromMe: boolean | null;
}

export interface Contact {
  phoneNumber: string;
  name: string | null;
  jid: string;
}

export interface MessageContext {
  message: Message;
  /** Oldest first, ending right before `message` */
  before: Message[];
  /** Oldest first, starting right after `message` */
  after: Message[];
}

export interface AuthenticationStatus {
  authenticated: boolean;
  /** Why the session is not authenticated; null when it is. */
  reason: string | null;
}

export type ChatSortOrder = 'last_active' | 'name';

export interface ListMessagesOptions {
  /** ISO-8601; only messages strictly after this instant */
  after?: string;
  /** ISO-8601; only messages strictly before this instant */
  before?: string;
  senderPhoneNumber?: string;
  chatJid?: string;
  /** Case-insensitive substring match on content */
  query?: string;
  limit?: number;
  page?: number;
  includeContext?: boolean;
  contextBefore?: number;
  contextAfter?: number;
}

export interface ListChatsOptions {
  query?: string;
  limit?: number;
  page?: number;
  includeLastMessage?: boolean;
  sortBy?: ChatSortOrder;
}

export const DEFAULT_PAGE_SIZE = 20;
export const DEFAULT_CONTEXT_WINDOW = 5;
export const MAX_CONTACT_RESULTS = 50;

export type ResolvedListMessagesOptions =
  Required<Pick<ListMessagesOptions, 'limit' | 'page' | 'includeContext' | 'contextBefore' | 'contextAfter'>>
  & Omit<ListMessagesOptions, 'limit' | 'page' | 'includeContext' | 'contextBefore' | 'contextAfter'>;

export function resolveListMessagesOptions(options: ListMessagesOptions = {}): ResolvedListMessagesOptions {
  return {
    ...options,
    limit: options.limit ?? DEFAULT_PAGE_SIZE,
    page: options.page ?? 0,
    includeContext: options.includeContext ?? true,
    contextBefore: options.contextBefore ?? 1,
    contextAfter: options.contextAfter ?? 1,
  };
}

export function resolveListChatsOptions(options: ListChatsOptions = {}): Required<Omit<ListChatsOptions, 'query'>> & Pick<ListChatsOptions, 'query'> {
  return {
    ...options,
    limit: options.limit ?? DEFAULT_PAGE_SIZE,
    page: options.page ?? 0,
    includeLastMessage: options.includeLastMessage ?? true,
    sortBy: options.sortBy ?? 'last_active',
  };
}

/** Group chats are identified purely by their JID suffix. */
export function isGroupChat(chat: Pick<Chat, 'jid'>): boolean {
  return isGroupJid(chat.jid);
}
