import { describe, it, expect } from 'vitest';
import { join } from 'path';

import { parseEnv, resolveDatabaseConfig, type EnvConfig } from '../src/utils/config.js';

function env(overrides: NodeJS.ProcessEnv = {}): EnvConfig {
  const parsed = parseEnv({ BRIDGE_DIR: '/srv/bridge', ...overrides });
  if (!parsed.success) throw new Error(parsed.error.message);
  return parsed.data;
}

describe('parseEnv', () => {
  it('applies defaults for the bridge API and timeouts', () => {
    const cfg = env();
    expect(cfg.BRIDGE_API_URL).toBe('http://localhost:8080');
    expect(cfg.BRIDGE_EXECUTABLE).toBe('whatsapp-bridge');
    expect(cfg.BRIDGE_CONNECT_TIMEOUT_MS).toBe(3000);
    expect(cfg.BRIDGE_READ_TIMEOUT_MS).toBe(15000);
    expect(cfg.BRIDGE_HTTP_RETRIES).toBe(3);
    expect(cfg.LOG_LEVEL).toBe('info');
  });

  it('coerces numeric settings from strings', () => {
    expect(env({ BRIDGE_READ_TIMEOUT_MS: '2500' }).BRIDGE_READ_TIMEOUT_MS).toBe(2500);
  });

  it('rejects invalid values', () => {
    expect(parseEnv({ BRIDGE_API_URL: 'not a url' }).success).toBe(false);
    expect(parseEnv({ BRIDGE_HTTP_RETRIES: '-1' }).success).toBe(false);
    expect(parseEnv({ LOG_LEVEL: 'loud' }).success).toBe(false);
  });
});

describe('resolveDatabaseConfig', () => {
  it('defaults to the bridge store files', () => {
    expect(resolveDatabaseConfig(env())).toEqual({
      kind: 'sqlite',
      messagesDbPath: join('/srv/bridge', 'store', 'messages.db'),
      authDbPath: join('/srv/bridge', 'store', 'whatsapp.db'),
    });
  });

  it('honours explicit store paths', () => {
    const cfg = env({ MESSAGES_DB_PATH: '/data/m.db', AUTH_DB_PATH: '/data/a.db' });
    expect(resolveDatabaseConfig(cfg)).toEqual({ kind: 'sqlite', messagesDbPath: '/data/m.db', authDbPath: '/data/a.db' });
  });

  it('maps a sqlite URL to both store files in its directory', () => {
    expect(resolveDatabaseConfig(env({ DATABASE_URL: 'sqlite:///var/lib/wa/anything.db' }))).toEqual({
      kind: 'sqlite',
      messagesDbPath: '/var/lib/wa/messages.db',
      authDbPath: '/var/lib/wa/whatsapp.db',
    });
  });

  it('supports in-memory sqlite', () => {
    expect(resolveDatabaseConfig(env({ DATABASE_URL: 'sqlite://:memory:' }))).toEqual({
      kind: 'sqlite',
      messagesDbPath: ':memory:',
      authDbPath: ':memory:',
    });
  });

  it('picks the REST backend when Supabase credentials are present', () => {
    const cfg = env({
      DATABASE_URL: 'postgresql://user:pw@db.example.test:5432/postgres',
      SUPABASE_URL: 'https://project.example.test',
      SUPABASE_ANON_KEY: 'test-secret',
    });
    expect(resolveDatabaseConfig(cfg)).toEqual({ kind: 'supabase', url: 'https://project.example.test', key: 'test-secret' });
  });

  it('picks direct Postgres otherwise', () => {
    const url = 'postgres://user:pw@localhost:5432/wa';
    expect(resolveDatabaseConfig(env({ DATABASE_URL: url }))).toEqual({ kind: 'postgres', connectionString: url });
  });

  it('rejects unknown schemes and malformed URLs', () => {
    expect(() => resolveDatabaseConfig(env({ DATABASE_URL: 'mysql://localhost/wa' }))).toThrow(
      'Unsupported database URL scheme: mysql',
    );
    expect(() => resolveDatabaseConfig(env({ DATABASE_URL: 'nonsense' }))).toThrow('Invalid DATABASE_URL format: nonsense');
  });
});
