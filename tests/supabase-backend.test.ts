import { describe, expect, it, vi } from 'vitest';

import { createSupabaseAdapter } from '../src/utils/db-supabase.js';
import { withUnitOfWork } from '../src/utils/unit-of-work.js';
import { FormatError, NotFoundError } from '../src/utils/errors.js';

interface RecordedRequest {
  url: URL;
  method: string;
  headers: Headers;
}

type Handler = (url: URL, method: string) => Response;

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

/**
 * Fake PostgREST: each table answers from a queue of handlers, one per
 * request, so a test can script a sequence of lookups.
 */
function fakeRest(routes: Record<string, Handler[]>) {
  const requests: RecordedRequest[] = [];
  const fetch = vi.fn<typeof globalThis.fetch>(async (input, init) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const method = init?.method ?? 'GET';
    requests.push({ url, method, headers: new Headers(init?.headers) });

    const table = url.pathname.replace('/rest/v1/', '');
    const next = routes[table]?.shift();
    if (!next) return json({ message: `unexpected request to ${table}` }, 500);
    return next(url, method);
  });

  const adapter = createSupabaseAdapter({ url: 'https://project.example.test/', key: 'test-secret', fetch });
  return { adapter, fetch, requests };
}

const rows = (body: unknown): Handler => () => json(body);

const ALICE = '15550001111@s.whatsapp.net';

function messageRecord(id: string, time: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    chat_jid: ALICE,
    sender: '15550001111',
    content: `message ${id}`,
    timestamp: `2024-01-01T${time}+00:00`,
    is_from_me: false,
    media_type: null,
    ...overrides,
  };
}

describe('Supabase REST client', () => {
  it('sends the key as apikey and bearer token under /rest/v1', async () => {
    const { adapter, requests } = fakeRest({ chats: [rows([{ jid: ALICE, name: 'Alice' }])] });

    expect(await adapter.messages.getSenderName(ALICE)).toBe('Alice');

    const [req] = requests;
    expect(req?.url.origin).toBe('https://project.example.test');
    expect(req?.url.pathname).toBe('/rest/v1/chats');
    expect(req?.url.searchParams.get('jid')).toBe(`eq.${ALICE}`);
    expect(req?.headers.get('apikey')).toBe('test-secret');
    expect(req?.headers.get('authorization')).toBe('Bearer test-secret');
  });
});

describe('Supabase message repository', () => {
  it('falls back from chat names to contact names', async () => {
    const { adapter, requests } = fakeRest({
      chats: [rows([]), rows([])],
      whatsmeow_contacts: [rows([{ full_name: null, push_name: 'Ally' }])],
    });

    expect(await adapter.messages.getSenderName(ALICE)).toBe('Ally');
    expect(requests[1]?.url.searchParams.get('jid')).toBe('like.%15550001111%');
    expect(requests[1]?.url.searchParams.get('name')).toBe('not.is.null');
    expect(requests[2]?.url.searchParams.get('their_jid')).toBe(`eq.${ALICE}`);
  });

  it('returns the input when every lookup fails', async () => {
    const { adapter } = fakeRest({ chats: [() => json({ message: 'upstream down' }, 503)] });
    expect(await adapter.messages.getSenderName('15559999999')).toBe('15559999999');
  });

  it('maps filters onto PostgREST operators', async () => {
    const { adapter, requests } = fakeRest({
      messages: [rows([messageRecord('a4', '10:03:00', { sender: 'me', is_from_me: true })])],
      chats: [rows([{ jid: ALICE, name: 'Alice' }])],
    });

    const messages = await adapter.messages.listMessages({
      after: '2024-01-01T12:00:00+02:00',
      before: '2024-01-01T10:04:00Z',
      chatJid: ALICE,
      query: '50%',
      limit: 2,
      page: 1,
      includeContext: false,
    });

    const params = requests[0]?.url.searchParams;
    expect(params?.getAll('timestamp')).toEqual(['gt.2024-01-01T10:00:00.000Z', 'lt.2024-01-01T10:04:00.000Z']);
    expect(params?.get('chat_jid')).toBe(`eq.${ALICE}`);
    expect(params?.get('content')).toBe('ilike.%50\\%%');
    expect(params?.get('order')).toBe('timestamp.desc');
    expect(params?.get('offset')).toBe('2');
    expect(params?.get('limit')).toBe('2');

    expect(messages).toEqual([{
      id: 'a4',
      timestamp: new Date('2024-01-01T10:03:00Z'),
      sender: 'me',
      content: 'message a4',
      isFromMe: true,
      chatJid: ALICE,
      chatName: 'Alice',
      mediaType: null,
    }]);
  });

  it('rejects malformed dates before making a request', async () => {
    const { adapter, fetch } = fakeRest({});
    await expect(adapter.messages.listMessages({ after: 'soon' })).rejects.toThrow(FormatError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('surfaces PostgREST errors from list queries', async () => {
    const { adapter } = fakeRest({ messages: [() => json({ message: 'permission denied for table messages' }, 401)] });
    await expect(adapter.messages.listMessages()).rejects.toThrow(
      'Supabase message listing failed: permission denied for table messages',
    );
  });

  it('builds a chronological context window', async () => {
    const { adapter, requests } = fakeRest({
      messages: [
        rows([messageRecord('a3', '10:02:00')]),
        rows([messageRecord('a2', '10:01:00'), messageRecord('a1', '10:00:00')]),
        rows([messageRecord('a4', '10:03:00')]),
      ],
      chats: [rows([{ jid: ALICE, name: 'Alice' }])],
    });

    const context = await adapter.messages.getMessageContext('a3', 2, 1);

    expect(context.message.id).toBe('a3');
    expect(context.message.chatName).toBe('Alice');
    expect(context.before.map((m) => m.id)).toEqual(['a1', 'a2']);
    expect(context.after.map((m) => m.id)).toEqual(['a4']);
    expect(requests[1]?.url.searchParams.get('timestamp')).toBe('lt.2024-01-01T10:02:00+00:00');
    expect(requests[2]?.url.searchParams.get('order')).toBe('timestamp.asc');
  });

  it('throws NotFoundError for an unknown id', async () => {
    const { adapter } = fakeRest({ messages: [rows([])] });
    await expect(adapter.messages.getMessageContext('missing')).rejects.toThrow(NotFoundError);
  });
});

describe('Supabase chat and contact repositories', () => {
  const chatListRow = {
    jid: ALICE,
    name: 'Alice',
    last_message_time: '2024-01-01T10:04:00+00:00',
    last_message: 'great',
    last_sender: '15550001111',
    last_is_from_me: false,
  };

  it('quotes search text inside or-filters and orders like the SQL stores', async () => {
    const { adapter, requests } = fakeRest({ chat_list: [rows([chatListRow])] });

    const chats = await adapter.chats.listChats({ query: 'a,b', includeLastMessage: false });

    const params = requests[0]?.url.searchParams;
    expect(params?.get('or')).toBe('(name.ilike."%a,b%",jid.ilike."%a,b%")');
    expect(params?.get('order')).toBe('last_message_time.desc.nullslast,jid.asc');
    expect(chats).toEqual([{
      jid: ALICE,
      name: 'Alice',
      lastMessageTime: new Date('2024-01-01T10:04:00Z'),
      lastMessage: null,
      lastSender: null,
      lastIsFromMe: null,
    }]);
  });

  it('sorts by name when asked', async () => {
    const { adapter, requests } = fakeRest({ chat_list: [rows([])] });
    await adapter.chats.listChats({ sortBy: 'name' });
    expect(requests[0]?.url.searchParams.get('order')).toBe('name.asc.nullslast,jid.asc');
  });

  it('excludes groups from contact search and caps the result', async () => {
    const { adapter, requests } = fakeRest({ chats: [rows([{ jid: ALICE, name: 'Alice' }])] });

    expect(await adapter.contacts.searchContacts('ali')).toEqual([
      { phoneNumber: '15550001111', name: 'Alice', jid: ALICE },
    ]);
    const params = requests[0]?.url.searchParams;
    expect(params?.get('jid')).toBe('not.like.%@g.us');
    expect(params?.get('limit')).toBe('50');
  });

  it('collects every chat a contact sent to, past a single page of sender rows', async () => {
    const GROUP = '120363000000000001@g.us';
    const OTHER_GROUP = '120363000000000002@g.us';
    const chatJids = (jid: string, n: number) => Array.from({ length: n }, () => ({ chat_jid: jid }));
    const { adapter, requests } = fakeRest({
      messages: [
        rows([...chatJids(GROUP, 499), { chat_jid: ALICE }]),
        rows(chatJids(OTHER_GROUP, 3)),
        rows([]),
      ],
      chat_list: [rows([{ ...chatListRow, jid: GROUP, name: 'Hiking Club' }])],
    });

    const chats = await adapter.contacts.getContactChats(ALICE);

    expect(chats.map((c) => c.jid)).toEqual([GROUP]);
    const scans = requests.filter((r) => r.url.pathname === '/rest/v1/messages');
    expect(scans).toHaveLength(3);
    expect(scans[0]?.url.searchParams.get('chat_jid')).toBeNull();
    expect(scans[0]?.url.searchParams.get('limit')).toBe('500');
    expect(scans[0]?.url.searchParams.get('order')).toBe('chat_jid.asc');
    expect(scans[1]?.url.searchParams.get('chat_jid')).toBe(`not.in.("${GROUP}","${ALICE}")`);
    expect(scans[2]?.url.searchParams.get('chat_jid')).toBe(`not.in.("${GROUP}","${ALICE}","${OTHER_GROUP}")`);

    const listing = requests.find((r) => r.url.pathname === '/rest/v1/chat_list');
    expect(listing?.url.searchParams.get('jid')).toBe(`in.(${ALICE},${GROUP},${OTHER_GROUP})`);
  });

  it('matches the last interaction by sender or direct chat', async () => {
    const { adapter, requests } = fakeRest({
      messages: [rows([messageRecord('g2', '11:00:00', { chat_jid: '120363000000000001@g.us' })])],
      chats: [rows([{ jid: '120363000000000001@g.us', name: 'Hiking Club' }])],
    });

    const last = await adapter.contacts.getLastInteraction(ALICE);

    expect(last?.chatName).toBe('Hiking Club');
    expect(requests[0]?.url.searchParams.get('or')).toBe(
      `(sender.in.("${ALICE}","15550001111"),chat_jid.eq."${ALICE}")`,
    );
  });

  it('returns null when there was no interaction', async () => {
    const { adapter } = fakeRest({ messages: [rows([])] });
    expect(await adapter.contacts.getLastInteraction(ALICE)).toBeNull();
  });
});

describe('Supabase authentication repository', () => {
  const head = (contentRange: string): Handler => () => new Response(null, {
    status: 200,
    headers: { 'content-range': contentRange },
  });

  it('counts device rows with a HEAD request', async () => {
    const { adapter, requests } = fakeRest({ whatsmeow_device: [head('0-0/1')] });
    expect(await adapter.authentication.checkAuthenticationStatus()).toEqual({ authenticated: true, reason: null });
    expect(requests[0]?.method).toBe('HEAD');
  });

  it('reports an empty device table', async () => {
    const { adapter } = fakeRest({ whatsmeow_device: [head('*/0')] });
    expect(await adapter.authentication.checkAuthenticationStatus()).toEqual({
      authenticated: false,
      reason: 'No device registered',
    });
  });

  it('reports a missing device table', async () => {
    const { adapter } = fakeRest({
      whatsmeow_device: [() => json({ code: '42P01', message: 'relation "public.whatsmeow_device" does not exist' }, 404)],
    });
    expect(await adapter.authentication.checkAuthenticationStatus()).toEqual({
      authenticated: false,
      reason: 'No device table found',
    });
  });

  it('reports other failures as database errors', async () => {
    const { adapter } = fakeRest({ whatsmeow_device: [() => json({ code: 'XX000', message: 'boom' }, 500)] });
    expect(await adapter.authentication.checkAuthenticationStatus()).toEqual({
      authenticated: false,
      reason: 'Database error: boom',
    });
  });
});

describe('Supabase unit of work', () => {
  it('is not transactional and still rethrows', async () => {
    const { adapter, fetch } = fakeRest({});
    expect(adapter.unitOfWork().transactional).toBe(false);

    await expect(withUnitOfWork(adapter, async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(fetch).not.toHaveBeenCalled();
  });
});
