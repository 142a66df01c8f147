import { fromStoredTimestamp } from './date-filter.js';
import { phoneFromJid } from './jid.js';
import type { Chat, Contact, Message } from './db-types.js';

type TimestampLike = string | number | Date;
/** sqlite returns 0/1, postgres returns booleans */
type BooleanLike = boolean | number | null;

export interface MessageRow {
  id: string;
  timestamp: TimestampLike;
  sender: string | null;
  content: string | null;
  is_from_me: BooleanLike;
  chat_jid: string;
  chat_name: string | null;
  media_type: string | null;
}

export interface ChatRow {
  jid: string;
  name: string | null;
  last_message_time: TimestampLike | null;
  last_message: string | null;
  last_sender: string | null;
  last_is_from_me: BooleanLike;
}

export interface ContactRow {
  jid: string;
  name: string | null;
}

function toBoolean(value: BooleanLike): boolean {
  return value === true || value === 1;
}

export function mapMessageRow(row: MessageRow): Message {
  return {
    id: row.id,
    timestamp: fromStoredTimestamp(row.timestamp),
    sender: row.sender ?? '',
    content: row.content ?? '',
    isFromMe: toBoolean(row.is_from_me),
    chatJid: row.chat_jid,
    chatName: row.chat_name,
    mediaType: row.media_type || null,
  };
}

export function mapChatRow(row: ChatRow): Chat {
  return {
    jid: row.jid,
    name: row.name,
    lastMessageTime: row.last_message_time === null ? null : fromStoredTimestamp(row.last_message_time),
    lastMessage: row.last_message,
    lastSender: row.last_sender,
    lastIsFromMe: row.last_is_from_me === null ? null : toBoolean(row.last_is_from_me),
  };
}

export function mapContactRow(row: ContactRow): Contact {
  return {
    phoneNumber: phoneFromJid(row.jid),
    name: row.name,
    jid: row.jid,
  };
}
