/**
 * Message-store schema as the bridge writes it.
 *
 * The bridge owns these tables. We only create them when missing so a fresh
 * or in-memory store can be queried before the bridge has run once.
 */

export const MESSAGE_STORE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS chats (
    jid TEXT PRIMARY KEY,
    name TEXT,
    last_message_time TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS messages (
    id TEXT NOT NULL,
    chat_jid TEXT NOT NULL,
    sender TEXT,
    content TEXT,
    timestamp TIMESTAMP,
    is_from_me BOOLEAN,
    media_type TEXT,
    filename TEXT,
    url TEXT,
    media_key BLOB,
    file_sha256 BLOB,
    file_enc_sha256 BLOB,
    file_length INTEGER,
    PRIMARY KEY (id, chat_jid),
    FOREIGN KEY (chat_jid) REFERENCES chats(jid)
  );

  CREATE INDEX IF NOT EXISTS idx_messages_chat_timestamp
    ON messages (chat_jid, timestamp DESC);

  CREATE INDEX IF NOT EXISTS idx_chats_last_message_time
    ON chats (last_message_time DESC);
`;

/** Session table whose row count is the only authentication signal. */
export const DEVICE_TABLE = 'whatsmeow_device';
