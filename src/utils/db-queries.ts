/**
 * SQL shared by the sqlite and postgres backends.
 *
 * Statements use `?` placeholders; the postgres backend renumbers them to
 * `$n` before sending. Both engines accept `NULLS LAST` and `LIKE … ESCAPE`,
 * which keeps ordering and matching identical across backends.
 */

import { parseIsoDateTime, toStoredTimestamp } from './date-filter.js';
import { escapeLikePattern, GROUP_JID_SUFFIX, phoneFromJid } from './jid.js';
import { MAX_CONTACT_RESULTS, type ResolvedListMessagesOptions, type ChatSortOrder } from './db-types.js';

export interface SqlQuery {
  text: string;
  values: unknown[];
}

export type SqlDialect = 'sqlite' | 'postgres';

/**
 * Timestamp comparison expression. sqlite keeps timestamps as text in
 * whatever layout the bridge wrote, so compare through `julianday()`.
 */
function ts(expr: string, dialect: SqlDialect): string {
  return dialect === 'sqlite' ? `julianday(${expr})` : expr;
}

const LIKE_ESCAPE = `ESCAPE '\\'`;
const NOT_GROUP = `NOT LIKE '%${GROUP_JID_SUFFIX}'`;

export const MESSAGE_SELECT = `
  SELECT m.id AS id, m.timestamp AS timestamp, m.sender AS sender, m.content AS content,
         m.is_from_me AS is_from_me, m.chat_jid AS chat_jid, c.name AS chat_name,
         m.media_type AS media_type
  FROM messages m
  LEFT JOIN chats c ON m.chat_jid = c.jid`;

function chatSelect(includeLastMessage: boolean): string {
  if (!includeLastMessage) {
    return `
  SELECT c.jid AS jid, c.name AS name, c.last_message_time AS last_message_time,
         NULL AS last_message, NULL AS last_sender, NULL AS last_is_from_me
  FROM chats c`;
  }
  return `
  SELECT c.jid AS jid, c.name AS name, c.last_message_time AS last_message_time,
         lm.content AS last_message, lm.sender AS last_sender, lm.is_from_me AS last_is_from_me
  FROM chats c
  LEFT JOIN messages lm ON c.jid = lm.chat_jid AND c.last_message_time = lm.timestamp`;
}

function contains(value: string): string {
  return `%${escapeLikePattern(value)}%`;
}

/** Sender columns hold either a full JID or the bare phone number. */
function senderCandidates(jid: string): [string, string] {
  return [jid, phoneFromJid(jid)];
}

// ── Messages ────────────────────────────────────────────────────────

/** @throws FormatError for malformed `after` / `before` */
export function buildListMessagesQuery(options: ResolvedListMessagesOptions, dialect: SqlDialect): SqlQuery {
  const where: string[] = [];
  const values: unknown[] = [];

  if (options.after) {
    where.push(`${ts('m.timestamp', dialect)} > ${ts('?', dialect)}`);
    values.push(toStoredTimestamp(parseIsoDateTime(options.after, 'after')));
  }
  if (options.before) {
    where.push(`${ts('m.timestamp', dialect)} < ${ts('?', dialect)}`);
    values.push(toStoredTimestamp(parseIsoDateTime(options.before, 'before')));
  }
  if (options.senderPhoneNumber) {
    where.push('m.sender = ?');
    values.push(options.senderPhoneNumber);
  }
  if (options.chatJid) {
    where.push('m.chat_jid = ?');
    values.push(options.chatJid);
  }
  if (options.query) {
    where.push(`LOWER(m.content) LIKE LOWER(?) ${LIKE_ESCAPE}`);
    values.push(contains(options.query));
  }

  const whereSql = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
  values.push(options.limit, options.page * options.limit);

  return {
    text: `${MESSAGE_SELECT} ${whereSql} ORDER BY ${ts('m.timestamp', dialect)} DESC LIMIT ? OFFSET ?`,
    values,
  };
}

export function buildMessageByIdQuery(messageId: string): SqlQuery {
  return { text: `${MESSAGE_SELECT} WHERE m.id = ? LIMIT 1`, values: [messageId] };
}

/** The target's timestamp, read in SQL at the column's own precision. */
function targetTimestamp(dialect: SqlDialect): string {
  return ts('(SELECT t.timestamp FROM messages t WHERE t.id = ? AND t.chat_jid = ?)', dialect);
}

/** Newest-first; callers reverse to get the ascending window. */
export function buildMessagesBeforeQuery(chatJid: string, messageId: string, limit: number, dialect: SqlDialect): SqlQuery {
  const col = ts('m.timestamp', dialect);
  return {
    text: `${MESSAGE_SELECT} WHERE m.chat_jid = ? AND ${col} < ${targetTimestamp(dialect)} ORDER BY ${col} DESC LIMIT ?`,
    values: [chatJid, messageId, chatJid, limit],
  };
}

export function buildMessagesAfterQuery(chatJid: string, messageId: string, limit: number, dialect: SqlDialect): SqlQuery {
  const col = ts('m.timestamp', dialect);
  return {
    text: `${MESSAGE_SELECT} WHERE m.chat_jid = ? AND ${col} > ${targetTimestamp(dialect)} ORDER BY ${col} ASC LIMIT ?`,
    values: [chatJid, messageId, chatJid, limit],
  };
}

export function buildChatNameByJidQuery(jid: string): SqlQuery {
  return { text: 'SELECT name FROM chats WHERE jid = ? LIMIT 1', values: [jid] };
}

export function buildChatNameByPhoneQuery(phone: string): SqlQuery {
  return {
    text: `SELECT name FROM chats WHERE jid LIKE ? ${LIKE_ESCAPE} AND name IS NOT NULL LIMIT 1`,
    values: [contains(phone)],
  };
}

// ── Chats ───────────────────────────────────────────────────────────

export function buildListChatsQuery(options: {
  query?: string;
  limit: number;
  page: number;
  includeLastMessage: boolean;
  sortBy: ChatSortOrder;
}): SqlQuery {
  const values: unknown[] = [];
  let whereSql = '';

  if (options.query) {
    whereSql = `WHERE (LOWER(c.name) LIKE LOWER(?) ${LIKE_ESCAPE} OR c.jid LIKE ? ${LIKE_ESCAPE})`;
    values.push(contains(options.query), contains(options.query));
  }

  const orderBy = options.sortBy === 'name'
    ? 'c.name ASC NULLS LAST, c.jid ASC'
    : 'c.last_message_time DESC NULLS LAST, c.jid ASC';

  values.push(options.limit, options.page * options.limit);

  return {
    text: `${chatSelect(options.includeLastMessage)} ${whereSql} ORDER BY ${orderBy} LIMIT ? OFFSET ?`,
    values,
  };
}

export function buildGetChatQuery(chatJid: string, includeLastMessage: boolean): SqlQuery {
  return {
    text: `${chatSelect(includeLastMessage)} WHERE c.jid = ? LIMIT 1`,
    values: [chatJid],
  };
}

export function buildDirectChatByContactQuery(phoneOrJid: string): SqlQuery {
  return {
    text: `${chatSelect(true)}
  WHERE c.jid LIKE ? ${LIKE_ESCAPE} AND c.jid ${NOT_GROUP}
  ORDER BY c.last_message_time DESC NULLS LAST, c.jid ASC
  LIMIT 1`,
    values: [contains(phoneOrJid)],
  };
}

// ── Contacts ────────────────────────────────────────────────────────

export function buildSearchContactsQuery(query: string): SqlQuery {
  const pattern = contains(query);
  return {
    text: `
  SELECT DISTINCT jid, name
  FROM chats
  WHERE (LOWER(name) LIKE LOWER(?) ${LIKE_ESCAPE} OR LOWER(jid) LIKE LOWER(?) ${LIKE_ESCAPE})
    AND jid ${NOT_GROUP}
  ORDER BY name ASC NULLS LAST, jid ASC
  LIMIT ${MAX_CONTACT_RESULTS}`,
    values: [pattern, pattern],
  };
}

export function buildContactChatsQuery(jid: string, limit: number, page: number): SqlQuery {
  const [full, bare] = senderCandidates(jid);
  return {
    text: `${chatSelect(true)}
  WHERE c.jid = ?
     OR EXISTS (SELECT 1 FROM messages sm WHERE sm.chat_jid = c.jid AND sm.sender IN (?, ?))
  ORDER BY c.last_message_time DESC NULLS LAST, c.jid ASC
  LIMIT ? OFFSET ?`,
    values: [jid, full, bare, limit, page * limit],
  };
}

export function buildLastInteractionQuery(jid: string, dialect: SqlDialect): SqlQuery {
  const [full, bare] = senderCandidates(jid);
  return {
    text: `${MESSAGE_SELECT}
  WHERE m.sender IN (?, ?) OR m.chat_jid = ?
  ORDER BY ${ts('m.timestamp', dialect)} DESC
  LIMIT 1`,
    values: [full, bare, jid],
  };
}
