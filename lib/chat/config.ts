import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const ConfigSchema = z
  .object({
    CHAT_HISTORY_LIMIT: z.coerce.number().int().min(1).max(1000).default(50),
    CHAT_RECONNECT_BASE_MS: z.coerce.number().int().min(1).default(500),
    CHAT_RECONNECT_MAX_MS: z.coerce.number().int().min(1).default(10_000),
    CHAT_RECONNECT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(8),
    CHAT_RECONNECT_JITTER: z.coerce.number().min(0).max(1).default(0.3),
    CHAT_RESYNC_ON_RECONNECT: booleanFlag.default('true'),
    CHAT_MESSAGES_TABLE: z.string().min(1).default('messages'),
  })
  .refine((env) => env.CHAT_RECONNECT_MAX_MS >= env.CHAT_RECONNECT_BASE_MS, {
    message: 'CHAT_RECONNECT_MAX_MS must be >= CHAT_RECONNECT_BASE_MS',
    path: ['CHAT_RECONNECT_MAX_MS'],
  });

const SupabaseEnvSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_ANON_KEY: z.string().min(1),
});

export type ReconnectPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
  jitter: number;
};

export type ChatConfig = {
  historyLimit: number;
  reconnect: ReconnectPolicy;
  resyncOnReconnect: boolean;
  messagesTable: string;
};

export type SupabaseConfig = {
  url: string;
  anonKey: string;
};

export const DEFAULT_CHAT_CONFIG: ChatConfig = {
  historyLimit: 50,
  reconnect: {
    baseDelayMs: 500,
    maxDelayMs: 10_000,
    maxAttempts: 8,
    jitter: 0.3,
  },
  resyncOnReconnect: true,
  messagesTable: 'messages',
};

type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || 'env'}: ${e.message}`).join('; ');
}

/**
 * Read sync settings from the environment. Unset variables take the defaults;
 * empty strings count as unset.
 */
export function loadChatConfig(env: Env = process.env): ChatConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('CHAT_') && value !== undefined && value !== '')
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    throw new Error(`Invalid chat configuration: ${formatIssues(parsed.error)}`);
  }

  const values = parsed.data;
  return {
    historyLimit: values.CHAT_HISTORY_LIMIT,
    reconnect: {
      baseDelayMs: values.CHAT_RECONNECT_BASE_MS,
      maxDelayMs: values.CHAT_RECONNECT_MAX_MS,
      maxAttempts: values.CHAT_RECONNECT_MAX_ATTEMPTS,
      jitter: values.CHAT_RECONNECT_JITTER,
    },
    resyncOnReconnect: values.CHAT_RESYNC_ON_RECONNECT,
    messagesTable: values.CHAT_MESSAGES_TABLE,
  };
}

export function loadSupabaseConfig(env: Env = process.env): SupabaseConfig {
  const parsed = SupabaseEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid Supabase configuration: ${formatIssues(parsed.error)}`);
  }
  return { url: parsed.data.SUPABASE_URL, anonKey: parsed.data.SUPABASE_ANON_KEY };
}
