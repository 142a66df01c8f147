import { Pool, type PoolConfig, type QueryResultRow } from 'pg';

import { logger } from '../middleware/logger.js';
import { errorMessage, NotFoundError } from './errors.js';
import { expandWithContext } from './message-context.js';
import { DEVICE_TABLE } from './db-schema.js';
import { phoneFromJid } from './jid.js';
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

const log = logger.child({ module: 'db-postgres' });

type BigintLike = string | number;

interface DbCountRow {
  count: BigintLike;
}

/** What the repositories need from a `Pool` or a checked-out client. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ClientSource {
  connect(): Promise<TransactionClient>;
}

/** `?` placeholders → `$1, $2, …` */
export function toPositional(text: string): string {
  let index = 0;
  return text.replace(/\?/g, () => `$${++index}`);
}

async function queryRows<T extends QueryResultRow>(db: Queryable, query: SqlQuery): Promise<T[]> {
  const res = await db.query(toPositional(query.text), query.values);
  return res.rows as T[];
}

async function queryOne<T extends QueryResultRow>(db: Queryable, query: SqlQuery): Promise<T | undefined> {
  const rows = await queryRows<T>(db, query);
  return rows[0];
}

// ── Unit of work ────────────────────────────────────────────────────

/**
 * Transaction on a dedicated pool client. The client is checked out on
 * `begin()` and returned to the pool on commit, rollback or release.
 */
export class PostgresUnitOfWork implements UnitOfWork {
  readonly transactional = true;
  private client: TransactionClient | null = null;

  constructor(private readonly pool: ClientSource) {}

  get active(): boolean {
    return this.client !== null;
  }

  async begin(): Promise<void> {
    if (this.client) return;
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
    } catch (err) {
      client.release();
      throw err;
    }
    this.client = client;
  }

  /** Client bound to this transaction; writes must go through it to be covered. */
  get connection(): TransactionClient | null {
    return this.client;
  }

  async commit(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    try {
      await client.query('COMMIT');
    } finally {
      client.release();
    }
  }

  async rollback(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    try {
      await client.query('ROLLBACK');
    } catch (err) {
      // The connection is unusable; let the pool discard it
      log.warn({ err }, 'Postgres rollback failed');
      client.release(err instanceof Error ? err : true);
      return;
    }
    client.release();
  }

  async release(): Promise<void> {
    if (!this.client) return;
    log.debug('Unit of work released without commit, dropping uncommitted writes');
    await this.rollback();
  }
}

// ── Repositories ────────────────────────────────────────────────────

export class PostgresMessageRepository implements MessageRepository {
  constructor(private readonly db: Queryable) {}

  async getSenderName(senderJid: string): Promise<string> {
    try {
      const exact = await queryOne<{ name: string | null }>(this.db, buildChatNameByJidQuery(senderJid));
      if (exact?.name) return exact.name;

      const fuzzy = await queryOne<{ name: string | null }>(this.db, buildChatNameByPhoneQuery(phoneFromJid(senderJid)));
      return fuzzy?.name || senderJid;
    } catch (err) {
      log.warn({ err, senderJid }, 'Sender name lookup failed');
      return senderJid;
    }
  }

  async listMessages(options?: ListMessagesOptions): Promise<Message[]> {
    const resolved = resolveListMessagesOptions(options);
    const rows = await queryRows<MessageRow>(this.db, buildListMessagesQuery(resolved, 'postgres'));
    const matches = rows.map(mapMessageRow);

    if (!resolved.includeContext || matches.length === 0) return matches;
    return expandWithContext(this, matches, resolved.contextBefore, resolved.contextAfter);
  }

  async getMessageContext(
    messageId: string,
    before: number = DEFAULT_CONTEXT_WINDOW,
    after: number = DEFAULT_CONTEXT_WINDOW,
  ): Promise<MessageContext> {
    const target = await queryOne<MessageRow>(this.db, buildMessageByIdQuery(messageId));
    if (!target) throw new NotFoundError(`Message with ID ${messageId} not found`);

    const [beforeRows, afterRows] = await Promise.all([
      before > 0
        ? queryRows<MessageRow>(this.db, buildMessagesBeforeQuery(target.chat_jid, target.id, before, 'postgres'))
        : Promise.resolve<MessageRow[]>([]),
      after > 0
        ? queryRows<MessageRow>(this.db, buildMessagesAfterQuery(target.chat_jid, target.id, after, 'postgres'))
        : Promise.resolve<MessageRow[]>([]),
    ]);

    return {
      message: mapMessageRow(target),
      before: beforeRows.reverse().map(mapMessageRow),
      after: afterRows.map(mapMessageRow),
    };
  }
}

export class PostgresChatRepository implements ChatRepository {
  constructor(private readonly db: Queryable) {}

  async listChats(options?: ListChatsOptions): Promise<Chat[]> {
    const rows = await queryRows<ChatRow>(this.db, buildListChatsQuery(resolveListChatsOptions(options)));
    return rows.map(mapChatRow);
  }

  async getChat(chatJid: string, includeLastMessage: boolean = true): Promise<Chat | null> {
    const row = await queryOne<ChatRow>(this.db, buildGetChatQuery(chatJid, includeLastMessage));
    return row ? mapChatRow(row) : null;
  }

  async getDirectChatByContact(senderPhoneNumber: string): Promise<Chat | null> {
    const row = await queryOne<ChatRow>(this.db, buildDirectChatByContactQuery(senderPhoneNumber));
    return row ? mapChatRow(row) : null;
  }
}

export class PostgresContactRepository implements ContactRepository {
  constructor(private readonly db: Queryable) {}

  async searchContacts(query: string): Promise<Contact[]> {
    const rows = await queryRows<ContactRow>(this.db, buildSearchContactsQuery(query));
    return rows.map(mapContactRow);
  }

  async getContactChats(jid: string, limit: number = DEFAULT_PAGE_SIZE, page: number = 0): Promise<Chat[]> {
    const rows = await queryRows<ChatRow>(this.db, buildContactChatsQuery(jid, limit, page));
    return rows.map(mapChatRow);
  }

  async getLastInteraction(jid: string): Promise<Message | null> {
    const row = await queryOne<MessageRow>(this.db, buildLastInteractionQuery(jid, 'postgres'));
    return row ? mapMessageRow(row) : null;
  }
}

export class PostgresAuthenticationRepository implements AuthenticationRepository {
  constructor(private readonly db: Queryable) {}

  async checkAuthenticationStatus(): Promise<AuthenticationStatus> {
    try {
      const table = await queryOne<{ present: boolean }>(this.db, {
        text: 'SELECT to_regclass(?) IS NOT NULL AS present',
        values: [DEVICE_TABLE],
      });
      if (!table?.present) return { authenticated: false, reason: 'No device table found' };

      const row = await queryOne<DbCountRow>(this.db, {
        text: `SELECT COUNT(*) AS count FROM ${DEVICE_TABLE}`,
        values: [],
      });
      if (!row || Number(row.count) === 0) return { authenticated: false, reason: 'No device registered' };

      return { authenticated: true, reason: null };
    } catch (err) {
      return { authenticated: false, reason: `Database error: ${errorMessage(err)}` };
    }
  }
}

// ── Adapter ─────────────────────────────────────────────────────────

export class PostgresDatabaseAdapter implements DatabaseAdapter {
  readonly kind = 'postgres' as const;
  readonly messages: PostgresMessageRepository;
  readonly chats: PostgresChatRepository;
  readonly contacts: PostgresContactRepository;
  readonly authentication: PostgresAuthenticationRepository;

  constructor(private readonly pool: Pool) {
    this.messages = new PostgresMessageRepository(pool);
    this.chats = new PostgresChatRepository(pool);
    this.contacts = new PostgresContactRepository(pool);
    this.authentication = new PostgresAuthenticationRepository(pool);

    pool.on('error', (err) => {
      log.error({ err }, 'Idle Postgres client error');
    });
  }

  unitOfWork(): PostgresUnitOfWork {
    return new PostgresUnitOfWork(this.pool);
  }

  async close(): Promise<void> {
    await this.pool.end();
    log.info('Postgres database pool closed');
  }
}

export function createPostgresAdapter(connectionString: string): PostgresDatabaseAdapter {
  const poolConfig: PoolConfig = { connectionString, max: 5 };
  log.info('Connecting to Postgres message store');
  return new PostgresDatabaseAdapter(new Pool(poolConfig));
}
