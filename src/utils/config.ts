import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { resolve, dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  // Bridge process
  BRIDGE_DIR: z.string().min(1).default(resolve(PROJECT_ROOT, 'whatsapp-bridge')),
  BRIDGE_EXECUTABLE: z.string().min(1).default('whatsapp-bridge'),

  // Bridge HTTP API (health lives at the root, everything else under /api)
  BRIDGE_API_URL: z.string().url().default('http://localhost:8080'),
  BRIDGE_CONNECT_TIMEOUT_MS: positiveInt.default(3_000),
  BRIDGE_READ_TIMEOUT_MS: positiveInt.default(15_000),
  BRIDGE_HTTP_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  // Storage: DATABASE_URL wins over the individual paths
  DATABASE_URL: z.string().optional(),
  MESSAGES_DB_PATH: z.string().optional(),
  AUTH_DB_PATH: z.string().optional(),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),
  SUPABASE_ANON_KEY: z.string().optional(),

  // Infrastructure
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/** Parse an environment map without side effects. */
export function parseEnv(env: NodeJS.ProcessEnv) {
  return envSchema.safeParse(env);
}

// ── Storage selection ───────────────────────────────────────────────

export type DatabaseConfig =
  | { kind: 'sqlite'; messagesDbPath: string; authDbPath: string }
  | { kind: 'supabase'; url: string; key: string }
  | { kind: 'postgres'; connectionString: string };

const IN_MEMORY = ':memory:';

/**
 * Resolve which storage backend to use.
 *
 * - `sqlite:///dir/any.db` → `dir/messages.db` + `dir/whatsapp.db`
 * - `sqlite://:memory:` → both stores in memory
 * - `postgres://…` with SUPABASE_URL + key → the REST backend
 * - `postgres://…` without Supabase credentials → direct Postgres
 * - nothing set → the bridge's own store files under `BRIDGE_DIR/store`
 */
export function resolveDatabaseConfig(env: EnvConfig): DatabaseConfig {
  const url = env.DATABASE_URL?.trim();

  if (!url) {
    const storeDir = join(env.BRIDGE_DIR, 'store');
    return {
      kind: 'sqlite',
      messagesDbPath: env.MESSAGES_DB_PATH ?? join(storeDir, 'messages.db'),
      authDbPath: env.AUTH_DB_PATH ?? join(storeDir, 'whatsapp.db'),
    };
  }

  const schemeEnd = url.indexOf('://');
  if (schemeEnd <= 0) {
    throw new Error(`Invalid DATABASE_URL format: ${url}`);
  }
  const scheme = url.slice(0, schemeEnd).toLowerCase();
  const rest = url.slice(schemeEnd + 3);

  if (scheme === 'sqlite') {
    const dbPath = rest === '' || rest === IN_MEMORY || rest === `/${IN_MEMORY}` ? IN_MEMORY : rest;
    if (dbPath === IN_MEMORY) {
      return { kind: 'sqlite', messagesDbPath: IN_MEMORY, authDbPath: IN_MEMORY };
    }
    const baseDir = dirname(dbPath);
    return {
      kind: 'sqlite',
      messagesDbPath: join(baseDir, 'messages.db'),
      authDbPath: join(baseDir, 'whatsapp.db'),
    };
  }

  if (scheme === 'postgres' || scheme === 'postgresql') {
    const supabaseKey = env.SUPABASE_KEY ?? env.SUPABASE_ANON_KEY;
    if (env.SUPABASE_URL && supabaseKey) {
      return { kind: 'supabase', url: env.SUPABASE_URL, key: supabaseKey };
    }
    return { kind: 'postgres', connectionString: url };
  }

  throw new Error(`Unsupported database URL scheme: ${scheme}`);
}

// ── Process-wide config ─────────────────────────────────────────────

const parsed = parseEnv(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`   ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

export const config: EnvConfig = parsed.data;
export { PROJECT_ROOT };
