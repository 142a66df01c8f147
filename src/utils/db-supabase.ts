/**
 * Remote backend over Supabase's PostgREST endpoint.
 *
 * Reads the bridge tables (`messages`, `chats`), the `chat_list` view (chat
 * plus last-message columns) and `whatsmeow_contacts` for display names.
 * Filters and ordering mirror the SQL backends so the same data gives the
 * same answers. PostgREST has no multi-request transactions, so the unit of
 * work here is explicitly non-transactional.
 */

import { PostgrestClient } from '@supabase/postgrest-js';
import { z } from 'zod';

import { logger } from '../middleware/logger.js';
import { BackendDegradedError, errorMessage, NotFoundError } from './errors.js';
import { expandWithContext } from './message-context.js';
import { DEVICE_TABLE } from './db-schema.js';
import { parseIsoDateTime, toStoredTimestamp } from './date-filter.js';
import { escapeLikePattern, GROUP_JID_SUFFIX, phoneFromJid } from './jid.js';
import { mapChatRow, mapContactRow, mapMessageRow, type ChatRow, type MessageRow } from './db-rows.js';
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
  MAX_CONTACT_RESULTS,
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

const log = logger.child({ module: 'db-supabase' });

const MESSAGE_COLUMNS = 'id, chat_jid, sender, content, timestamp, is_from_me, media_type';
const NOT_GROUP_PATTERN = `%${GROUP_JID_SUFFIX}`;
/** Postgres error code for a missing relation. */
const UNDEFINED_TABLE = '42P01';

// ── Row validation ──────────────────────────────────────────────────

const timestampValue = z.union([z.string(), z.number()]);

const messageRecord = z.object({
  id: z.string(),
  chat_jid: z.string(),
  sender: z.string().nullable(),
  content: z.string().nullable(),
  timestamp: timestampValue,
  is_from_me: z.boolean().nullable(),
  media_type: z.string().nullable().optional(),
});

const chatRecord = z.object({
  jid: z.string(),
  name: z.string().nullable(),
  last_message_time: timestampValue.nullable(),
  last_message: z.string().nullable().optional(),
  last_sender: z.string().nullable().optional(),
  last_is_from_me: z.boolean().nullable().optional(),
});

const chatNameRecord = z.object({ jid: z.string(), name: z.string().nullable() });
const contactNameRecord = z.object({
  full_name: z.string().nullable().optional(),
  push_name: z.string().nullable().optional(),
});
const chatJidRecord = z.object({ chat_jid: z.string() });

const CONTACT_CHAT_SCAN_PAGE = 500;

type MessageRecord = z.infer<typeof messageRecord>;
type ChatRecord = z.infer<typeof chatRecord>;

interface PostgrestResponse {
  data: unknown;
  error: { message: string; code?: string } | null;
}

/** Validate a response body against `schema`, or throw the PostgREST error. */
function rowsOf<T>(schema: z.ZodType<T>, response: PostgrestResponse, what: string): T[] {
  if (response.error) {
    throw new Error(`Supabase ${what} failed: ${response.error.message}`, { cause: response.error });
  }
  return z.array(schema).parse(response.data ?? []);
}

function toMessageRow(record: MessageRecord, chatNames: ReadonlyMap<string, string | null>): MessageRow {
  return {
    ...record,
    chat_name: chatNames.get(record.chat_jid) ?? null,
    media_type: record.media_type ?? null,
  };
}

function toChatRow(record: ChatRecord, includeLastMessage: boolean): ChatRow {
  return {
    jid: record.jid,
    name: record.name,
    last_message_time: record.last_message_time,
    last_message: includeLastMessage ? record.last_message ?? null : null,
    last_sender: includeLastMessage ? record.last_sender ?? null : null,
    last_is_from_me: includeLastMessage ? record.last_is_from_me ?? null : null,
  };
}

function contains(value: string): string {
  return `%${escapeLikePattern(value)}%`;
}

/** Double-quote a value inside an `or=(…)` filter so commas and parens stay literal. */
function quoteFilterValue(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export type SupabaseRestClient = PostgrestClient;

export interface SupabaseClientOptions {
  url: string;
  key: string;
  fetch?: typeof fetch;
}

export function createSupabaseRestClient(options: SupabaseClientOptions): SupabaseRestClient {
  const base = options.url.replace(/\/+$/, '');
  return new PostgrestClient(`${base}/rest/v1`, {
    headers: {
      apikey: options.key,
      Authorization: `Bearer ${options.key}`,
    },
    fetch: options.fetch,
  });
}

// ── Repositories ────────────────────────────────────────────────────

export class SupabaseMessageRepository implements MessageRepository {
  constructor(private readonly client: SupabaseRestClient) {}

  async getSenderName(senderJid: string): Promise<string> {
    try {
      const exact = rowsOf(
        chatNameRecord,
        await this.client.from('chats').select('jid, name').eq('jid', senderJid).limit(1),
        'chat name lookup',
      );
      if (exact[0]?.name) return exact[0].name;

      const fuzzy = rowsOf(
        chatNameRecord,
        await this.client
          .from('chats')
          .select('jid, name')
          .like('jid', contains(phoneFromJid(senderJid)))
          .not('name', 'is', null)
          .limit(1),
        'chat name lookup',
      );
      if (fuzzy[0]?.name) return fuzzy[0].name;

      const contact = rowsOf(
        contactNameRecord,
        await this.client.from('whatsmeow_contacts').select('full_name, push_name').eq('their_jid', senderJid).limit(1),
        'contact name lookup',
      );
      return contact[0]?.full_name || contact[0]?.push_name || senderJid;
    } catch (err) {
      log.warn({ err, senderJid }, 'Sender name lookup failed');
      return senderJid;
    }
  }

  async listMessages(options?: ListMessagesOptions): Promise<Message[]> {
    const resolved = resolveListMessagesOptions(options);

    let query = this.client.from('messages').select(MESSAGE_COLUMNS);
    if (resolved.after) {
      query = query.gt('timestamp', toStoredTimestamp(parseIsoDateTime(resolved.after, 'after')));
    }
    if (resolved.before) {
      query = query.lt('timestamp', toStoredTimestamp(parseIsoDateTime(resolved.before, 'before')));
    }
    if (resolved.senderPhoneNumber) query = query.eq('sender', resolved.senderPhoneNumber);
    if (resolved.chatJid) query = query.eq('chat_jid', resolved.chatJid);
    if (resolved.query) query = query.ilike('content', contains(resolved.query));

    const offset = resolved.page * resolved.limit;
    const records = rowsOf(
      messageRecord,
      await query.order('timestamp', { ascending: false }).range(offset, offset + resolved.limit - 1),
      'message listing',
    );
    const matches = await this.withChatNames(records);

    if (!resolved.includeContext || matches.length === 0) return matches;
    return expandWithContext(this, matches, resolved.contextBefore, resolved.contextAfter);
  }

  async getMessageContext(
    messageId: string,
    before: number = DEFAULT_CONTEXT_WINDOW,
    after: number = DEFAULT_CONTEXT_WINDOW,
  ): Promise<MessageContext> {
    const [target] = rowsOf(
      messageRecord,
      await this.client.from('messages').select(MESSAGE_COLUMNS).eq('id', messageId).limit(1),
      'message lookup',
    );
    if (!target) throw new NotFoundError(`Message with ID ${messageId} not found`);

    const beforeRecords = before > 0
      ? rowsOf(
        messageRecord,
        await this.client
          .from('messages')
          .select(MESSAGE_COLUMNS)
          .eq('chat_jid', target.chat_jid)
          .lt('timestamp', target.timestamp)
          .order('timestamp', { ascending: false })
          .limit(before),
        'context lookup',
      )
      : [];
    const afterRecords = after > 0
      ? rowsOf(
        messageRecord,
        await this.client
          .from('messages')
          .select(MESSAGE_COLUMNS)
          .eq('chat_jid', target.chat_jid)
          .gt('timestamp', target.timestamp)
          .order('timestamp', { ascending: true })
          .limit(after),
        'context lookup',
      )
      : [];

    const [message, ...rest] = await this.withChatNames([target, ...beforeRecords.reverse(), ...afterRecords]);
    if (!message) throw new NotFoundError(`Message with ID ${messageId} not found`);

    return {
      message,
      before: rest.slice(0, beforeRecords.length),
      after: rest.slice(beforeRecords.length),
    };
  }

  /** PostgREST has no join here, so chat names come from a second request. */
  async withChatNames(records: readonly MessageRecord[]): Promise<Message[]> {
    if (records.length === 0) return [];

    const jids = [...new Set(records.map((record) => record.chat_jid))];
    const chats = rowsOf(
      chatNameRecord,
      await this.client.from('chats').select('jid, name').in('jid', jids),
      'chat name lookup',
    );
    const names = new Map(chats.map((chat) => [chat.jid, chat.name]));

    return records.map((record) => mapMessageRow(toMessageRow(record, names)));
  }
}

export class SupabaseChatRepository implements ChatRepository {
  constructor(private readonly client: SupabaseRestClient) {}

  async listChats(options?: ListChatsOptions): Promise<Chat[]> {
    const resolved = resolveListChatsOptions(options);

    let query = this.client.from('chat_list').select('*');
    if (resolved.query) {
      const pattern = quoteFilterValue(contains(resolved.query));
      query = query.or(`name.ilike.${pattern},jid.ilike.${pattern}`);
    }

    query = resolved.sortBy === 'name'
      ? query.order('name', { ascending: true, nullsFirst: false })
      : query.order('last_message_time', { ascending: false, nullsFirst: false });

    const offset = resolved.page * resolved.limit;
    const records = rowsOf(
      chatRecord,
      await query.order('jid', { ascending: true }).range(offset, offset + resolved.limit - 1),
      'chat listing',
    );
    return records.map((record) => mapChatRow(toChatRow(record, resolved.includeLastMessage)));
  }

  async getChat(chatJid: string, includeLastMessage: boolean = true): Promise<Chat | null> {
    const [record] = rowsOf(
      chatRecord,
      await this.client.from('chat_list').select('*').eq('jid', chatJid).limit(1),
      'chat lookup',
    );
    return record ? mapChatRow(toChatRow(record, includeLastMessage)) : null;
  }

  async getDirectChatByContact(senderPhoneNumber: string): Promise<Chat | null> {
    const [record] = rowsOf(
      chatRecord,
      await this.client
        .from('chat_list')
        .select('*')
        .like('jid', contains(senderPhoneNumber))
        .not('jid', 'like', NOT_GROUP_PATTERN)
        .order('last_message_time', { ascending: false, nullsFirst: false })
        .order('jid', { ascending: true })
        .limit(1),
      'direct chat lookup',
    );
    return record ? mapChatRow(toChatRow(record, true)) : null;
  }
}

export class SupabaseContactRepository implements ContactRepository {
  constructor(
    private readonly client: SupabaseRestClient,
    private readonly messages: SupabaseMessageRepository,
  ) {}

  async searchContacts(query: string): Promise<Contact[]> {
    const pattern = quoteFilterValue(contains(query));
    const records = rowsOf(
      chatNameRecord,
      await this.client
        .from('chats')
        .select('jid, name')
        .or(`name.ilike.${pattern},jid.ilike.${pattern}`)
        .not('jid', 'like', NOT_GROUP_PATTERN)
        .order('name', { ascending: true, nullsFirst: false })
        .order('jid', { ascending: true })
        .limit(MAX_CONTACT_RESULTS),
      'contact search',
    );
    return records.map(mapContactRow);
  }

  async getContactChats(jid: string, limit: number = DEFAULT_PAGE_SIZE, page: number = 0): Promise<Chat[]> {
    const chatJids = [jid, ...(await this.chatsWithSender(jid))];

    const offset = page * limit;
    const records = rowsOf(
      chatRecord,
      await this.client
        .from('chat_list')
        .select('*')
        .in('jid', [...new Set(chatJids)])
        .order('last_message_time', { ascending: false, nullsFirst: false })
        .order('jid', { ascending: true })
        .range(offset, offset + limit - 1),
      'contact chat listing',
    );
    return records.map((record) => mapChatRow(toChatRow(record, true)));
  }

  /**
   * Distinct chats the contact has sent to. Each request excludes the chats
   * already found, so every non-empty page adds at least one chat and no
   * page can be cut short by the server's row cap.
   */
  private async chatsWithSender(jid: string): Promise<string[]> {
    const senders = [jid, phoneFromJid(jid)];
    const found: string[] = [];

    for (;;) {
      let query = this.client.from('messages').select('chat_jid').in('sender', senders);
      if (found.length > 0) {
        query = query.not('chat_jid', 'in', `(${found.map(quoteFilterValue).join(',')})`);
      }
      const page = rowsOf(
        chatJidRecord,
        await query.order('chat_jid', { ascending: true }).limit(CONTACT_CHAT_SCAN_PAGE),
        'contact chat lookup',
      );
      if (page.length === 0) return found;
      for (const row of page) {
        if (!found.includes(row.chat_jid)) found.push(row.chat_jid);
      }
    }
  }

  async getLastInteraction(jid: string): Promise<Message | null> {
    const senders = [jid, phoneFromJid(jid)].map(quoteFilterValue).join(',');
    const records = rowsOf(
      messageRecord,
      await this.client
        .from('messages')
        .select(MESSAGE_COLUMNS)
        .or(`sender.in.(${senders}),chat_jid.eq.${quoteFilterValue(jid)}`)
        .order('timestamp', { ascending: false })
        .limit(1),
      'last interaction lookup',
    );
    const [message] = await this.messages.withChatNames(records);
    return message ?? null;
  }
}

export class SupabaseAuthenticationRepository implements AuthenticationRepository {
  constructor(private readonly client: SupabaseRestClient) {}

  async checkAuthenticationStatus(): Promise<AuthenticationStatus> {
    try {
      const { count, error } = await this.client
        .from(DEVICE_TABLE)
        .select('*', { count: 'exact', head: true });

      if (error) {
        if (error.code === UNDEFINED_TABLE || /does not exist/i.test(error.message)) {
          return { authenticated: false, reason: 'No device table found' };
        }
        return { authenticated: false, reason: `Database error: ${error.message}` };
      }
      if (!count) return { authenticated: false, reason: 'No device registered' };

      return { authenticated: true, reason: null };
    } catch (err) {
      return { authenticated: false, reason: `Database error: ${errorMessage(err)}` };
    }
  }
}

// ── Unit of work ────────────────────────────────────────────────────

/**
 * Each PostgREST request commits on its own. `begin` and `commit` do nothing
 * and `rollback` cannot undo anything, which it says in a warning.
 */
export class SupabaseUnitOfWork implements UnitOfWork {
  readonly transactional = false;
  private open = false;

  get active(): boolean {
    return this.open;
  }

  async begin(): Promise<void> {
    this.open = true;
  }

  async commit(): Promise<void> {
    this.open = false;
  }

  async rollback(): Promise<void> {
    const degraded = new BackendDegradedError(
      'Rollback requested but the REST backend cannot undo writes; each request was committed on its own',
    );
    log.warn({ code: degraded.code }, degraded.message);
    this.open = false;
  }

  async release(): Promise<void> {
    this.open = false;
  }
}

// ── Adapter ─────────────────────────────────────────────────────────

export class SupabaseDatabaseAdapter implements DatabaseAdapter {
  readonly kind = 'supabase' as const;
  readonly messages: SupabaseMessageRepository;
  readonly chats: SupabaseChatRepository;
  readonly contacts: SupabaseContactRepository;
  readonly authentication: SupabaseAuthenticationRepository;

  constructor(client: SupabaseRestClient) {
    this.messages = new SupabaseMessageRepository(client);
    this.chats = new SupabaseChatRepository(client);
    this.contacts = new SupabaseContactRepository(client, this.messages);
    this.authentication = new SupabaseAuthenticationRepository(client);
  }

  unitOfWork(): SupabaseUnitOfWork {
    return new SupabaseUnitOfWork();
  }

  async close(): Promise<void> {
    log.info('Supabase adapter closed');
  }
}

export function createSupabaseAdapter(options: SupabaseClientOptions): SupabaseDatabaseAdapter {
  log.info({ url: options.url }, 'Using Supabase REST message store');
  return new SupabaseDatabaseAdapter(createSupabaseRestClient(options));
}
