/**
 * Local sqlite backend over the bridge's own store files.
 *
 * One better-sqlite3 connection opens the messages database and ATTACHes the
 * session database as schema `auth`, so a single BEGIN/COMMIT spans both
 * files and a unit of work commits or rolls back them together.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { logger } from '../middleware/logger.js';
import { errorMessage, NotFoundError } from './errors.js';
import { expandWithContext } from './message-context.js';
import { MESSAGE_STORE_SCHEMA, DEVICE_TABLE } from './db-schema.js';
import { mapChatRow, mapContactRow, mapMessageRow, type ChatRow, type ContactRow, type MessageRow } from './db-rows.js';
import {
  buildChatNameByJidQuery,
  buildChatNameByPhoneQuery,
  buildContactChatsQuery,
  buildDirectChatByContactQuery,
  buildGetChatQuery,
  buildLastInteractionQuery,
  buildListChatsQuery,
  buildListMessagesQuery,
  buildMessageByIdQuery,
  buildMessagesAfterQuery,
  buildMessagesBeforeQuery,
  buildSearchContactsQuery,
  type SqlQuery,
} from './db-queries.js';
import { phoneFromJid } from './jid.js';
import type {
  AuthenticationRepository,
  ChatRepository,
  ContactRepository,
  DatabaseAdapter,
  MessageRepository,
  UnitOfWork,
} from './db-backend.js';
import {
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_PAGE_SIZE,
  resolveListChatsOptions,
  resolveListMessagesOptions,
  type AuthenticationStatus,
  type Chat,
  type Contact,
  type ListChatsOptions,
  type ListMessagesOptions,
  type Message,
  type MessageContext,
} from './db-types.js';

const IN_MEMORY = ':memory:';
const AUTH_SCHEMA = 'auth';

const log = logger.child({ module: 'db-sqlite' });

// ── Connection ──────────────────────────────────────────────────────

export class SqliteConnection {
  readonly db: InstanceType<typeof Database>;
  /** Schema the device table lives in: `auth` when attached, else `main`. */
  readonly authSchema: string;

  constructor(messagesDbPath: string, authDbPath: string) {
    for (const path of [messagesDbPath, authDbPath]) {
      if (path !== IN_MEMORY) mkdirSync(dirname(path), { recursive: true });
    }

    this.db = new Database(messagesDbPath, { timeout: 5000 });
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(MESSAGE_STORE_SCHEMA);

    const sameFile = authDbPath !== IN_MEMORY && authDbPath === messagesDbPath;
    if (sameFile) {
      this.authSchema = 'main';
    } else {
      this.db.prepare(`ATTACH DATABASE ? AS ${AUTH_SCHEMA}`).run(authDbPath);
      this.authSchema = AUTH_SCHEMA;
    }

    log.info({ messagesDbPath, authDbPath }, 'SQLite store opened');
  }

  all<T>(query: SqlQuery): T[] {
    return this.db.prepare(query.text).all(...query.values) as T[];
  }

  get<T>(query: SqlQuery): T | undefined {
    return this.db.prepare(query.text).get(...query.values) as T | undefined;
  }

  run(text: string, values: unknown[] = []): Database.RunResult {
    return this.db.prepare(text).run(...values);
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

// ── Unit of work ────────────────────────────────────────────────────

export class SqliteUnitOfWork implements UnitOfWork {
  readonly transactional = true;
  private inTransaction = false;

  constructor(private readonly conn: SqliteConnection) {}

  get active(): boolean {
    return this.inTransaction;
  }

  async begin(): Promise<void> {
    if (this.inTransaction) return;
    this.conn.db.exec('BEGIN');
    this.inTransaction = true;
  }

  async commit(): Promise<void> {
    if (!this.inTransaction) return;
    this.conn.db.exec('COMMIT');
    this.inTransaction = false;
  }

  async rollback(): Promise<void> {
    if (!this.inTransaction) return;
    // A failed statement may already have ended the transaction
    if (this.conn.inTransaction) this.conn.db.exec('ROLLBACK');
    this.inTransaction = false;
  }

  async release(): Promise<void> {
    if (!this.inTransaction) return;
    log.debug('Unit of work released without commit, dropping uncommitted writes');
    await this.rollback();
  }
}

// ── Repositories ────────────────────────────────────────────────────

export class SqliteMessageRepository implements MessageRepository {
  constructor(private readonly conn: SqliteConnection) {}

  async getSenderName(senderJid: string): Promise<string> {
    try {
      const exact = this.conn.get<{ name: string | null }>(buildChatNameByJidQuery(senderJid));
      if (exact?.name) return exact.name;

      const fuzzy = this.conn.get<{ name: string | null }>(buildChatNameByPhoneQuery(phoneFromJid(senderJid)));
      return fuzzy?.name || senderJid;
    } catch (err) {
      log.warn({ err, senderJid }, 'Sender name lookup failed');
      return senderJid;
    }
  }

  async listMessages(options?: ListMessagesOptions): Promise<Message[]> {
    const resolved = resolveListMessagesOptions(options);
    const rows = this.conn.all<MessageRow>(buildListMessagesQuery(resolved, 'sqlite'));
    const matches = rows.map(mapMessageRow);

    if (!resolved.includeContext || matches.length === 0) return matches;
    return expandWithContext(this, matches, resolved.contextBefore, resolved.contextAfter);
  }

  async getMessageContext(
    messageId: string,
    before: number = DEFAULT_CONTEXT_WINDOW,
    after: number = DEFAULT_CONTEXT_WINDOW,
  ): Promise<MessageContext> {
    const target = this.conn.get<MessageRow>(buildMessageByIdQuery(messageId));
    if (!target) throw new NotFoundError(`Message with ID ${messageId} not found`);

    const beforeRows = before > 0
      ? this.conn.all<MessageRow>(buildMessagesBeforeQuery(target.chat_jid, target.id, before, 'sqlite'))
      : [];
    const afterRows = after > 0
      ? this.conn.all<MessageRow>(buildMessagesAfterQuery(target.chat_jid, target.id, after, 'sqlite'))
      : [];

    return {
      message: mapMessageRow(target),
      before: beforeRows.reverse().map(mapMessageRow),
      after: afterRows.map(mapMessageRow),
    };
  }
}

export class SqliteChatRepository implements ChatRepository {
  constructor(private readonly conn: SqliteConnection) {}

  async listChats(options?: ListChatsOptions): Promise<Chat[]> {
    return this.conn.all<ChatRow>(buildListChatsQuery(resolveListChatsOptions(options))).map(mapChatRow);
  }

  async getChat(chatJid: string, includeLastMessage: boolean = true): Promise<Chat | null> {
    const row = this.conn.get<ChatRow>(buildGetChatQuery(chatJid, includeLastMessage));
    return row ? mapChatRow(row) : null;
  }

  async getDirectChatByContact(senderPhoneNumber: string): Promise<Chat | null> {
    const row = this.conn.get<ChatRow>(buildDirectChatByContactQuery(senderPhoneNumber));
    return row ? mapChatRow(row) : null;
  }
}

export class SqliteContactRepository implements ContactRepository {
  constructor(private readonly conn: SqliteConnection) {}

  async searchContacts(query: string): Promise<Contact[]> {
    return this.conn.all<ContactRow>(buildSearchContactsQuery(query)).map(mapContactRow);
  }

  async getContactChats(jid: string, limit: number = DEFAULT_PAGE_SIZE, page: number = 0): Promise<Chat[]> {
    return this.conn.all<ChatRow>(buildContactChatsQuery(jid, limit, page)).map(mapChatRow);
  }

  async getLastInteraction(jid: string): Promise<Message | null> {
    const row = this.conn.get<MessageRow>(buildLastInteractionQuery(jid, 'sqlite'));
    return row ? mapMessageRow(row) : null;
  }
}

export class SqliteAuthenticationRepository implements AuthenticationRepository {
  constructor(private readonly conn: SqliteConnection) {}

  async checkAuthenticationStatus(): Promise<AuthenticationStatus> {
    const schema = this.conn.authSchema;
    try {
      const table = this.conn.get<{ name: string }>({
        text: `SELECT name FROM ${schema}.sqlite_master WHERE type = 'table' AND name = ?`,
        values: [DEVICE_TABLE],
      });
      if (!table) return { authenticated: false, reason: 'No device table found' };

      const row = this.conn.get<{ count: number }>({
        text: `SELECT COUNT(*) AS count FROM ${schema}.${DEVICE_TABLE}`,
        values: [],
      });
      if (!row || row.count === 0) return { authenticated: false, reason: 'No device registered' };

      return { authenticated: true, reason: null };
    } catch (err) {
      return { authenticated: false, reason: `Database error: ${errorMessage(err)}` };
    }
  }
}

// ── Adapter ─────────────────────────────────────────────────────────

export class SqliteDatabaseAdapter implements DatabaseAdapter {
  readonly kind = 'sqlite' as const;
  readonly connection: SqliteConnection;
  readonly messages: SqliteMessageRepository;
  readonly chats: SqliteChatRepository;
  readonly contacts: SqliteContactRepository;
  readonly authentication: SqliteAuthenticationRepository;

  constructor(messagesDbPath: string, authDbPath: string) {
    this.connection = new SqliteConnection(messagesDbPath, authDbPath);
    this.messages = new SqliteMessageRepository(this.connection);
    this.chats = new SqliteChatRepository(this.connection);
    this.contacts = new SqliteContactRepository(this.connection);
    this.authentication = new SqliteAuthenticationRepository(this.connection);
  }

  unitOfWork(): SqliteUnitOfWork {
    return new SqliteUnitOfWork(this.connection);
  }

  async close(): Promise<void> {
    this.connection.close();
    log.info('SQLite store closed');
  }
}
