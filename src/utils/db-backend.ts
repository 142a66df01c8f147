import type {
  AuthenticationStatus,
  Chat,
  Contact,
  ListChatsOptions,
  ListMessagesOptions,
  Message,
  MessageContext,
} from './db-types.js';

/**
 * Repository contracts every storage backend implements.
 *
 * Backends must behave identically for the same data: same filters, same
 * ordering, same error types. Only the transaction guarantee differs, and
 * that difference is visible through `UnitOfWork.transactional`.
 */

export interface MessageRepository {
  /** Display name for a sender JID or phone number; falls back to the input. */
  getSenderName(senderJid: string): Promise<string>;

  /**
   * Messages matching every given filter, newest first, paginated by
   * `page * limit`. With `includeContext` the result is each match wrapped in
   * its chronological before/after window instead.
   *
   * @throws FormatError when `after` or `before` is not ISO-8601
   */
  listMessages(options?: ListMessagesOptions): Promise<Message[]>;

  /** @throws NotFoundError when no message has this id */
  getMessageContext(messageId: string, before?: number, after?: number): Promise<MessageContext>;
}

export interface ChatRepository {
  listChats(options?: ListChatsOptions): Promise<Chat[]>;
  getChat(chatJid: string, includeLastMessage?: boolean): Promise<Chat | null>;
  /** First non-group chat whose JID contains the given phone number or JID. */
  getDirectChatByContact(senderPhoneNumber: string): Promise<Chat | null>;
}

export interface ContactRepository {
  /** Non-group contacts matching name or JID, at most 50, by name then JID. */
  searchContacts(query: string): Promise<Contact[]>;
  /** Chats the contact sent messages in, plus the direct chat with them. */
  getContactChats(jid: string, limit?: number, page?: number): Promise<Chat[]>;
  getLastInteraction(jid: string): Promise<Message | null>;
}

export interface AuthenticationRepository {
  /** Never throws; failures come back as `authenticated: false` with a reason. */
  checkAuthenticationStatus(): Promise<AuthenticationStatus>;
}

/**
 * Transaction boundary over repository writes.
 *
 * Commit is never implicit. Use `withUnitOfWork` rather than calling these
 * directly so a thrown error always rolls back.
 */
export interface UnitOfWork {
  /** False when the backend cannot roll back (REST). */
  readonly transactional: boolean;
  readonly active: boolean;
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /** End the scope without committing; uncommitted writes are dropped. */
  release(): Promise<void>;
}

export type DatabaseKind = 'sqlite' | 'supabase' | 'postgres';

export interface DatabaseAdapter {
  readonly kind: DatabaseKind;
  readonly messages: MessageRepository;
  readonly chats: ChatRepository;
  readonly contacts: ContactRepository;
  readonly authentication: AuthenticationRepository;
  unitOfWork(): UnitOfWork;
  close(): Promise<void>;
}
