import type {
  REALTIME_SUBSCRIBE_STATES,
  RealtimeChannel,
  Session,
  SupabaseClient,
} from '@supabase/supabase-js';
import type {
  AppendRequest,
  ChatRemote,
  RemoteChannelHandle,
  RemoteEvent,
  SessionProvider,
  TransportStatus,
} from './remote';
import { DEFAULT_CHAT_CONFIG, type ChatConfig } from './config';
import type { SyncEngineDeps } from './syncEngine';
import type { ConversationId } from './types';

const MESSAGE_COLUMNS = 'id, group_id, sender_id, content, created_at, client_msg_id';

function toTransportStatus(status: `${REALTIME_SUBSCRIBE_STATES}`): TransportStatus {
  switch (status) {
    case 'SUBSCRIBED':
      return 'SUBSCRIBED';
    case 'TIMED_OUT':
      return 'TIMED_OUT';
    case 'CLOSED':
      return 'CLOSED';
    default:
      return 'CHANNEL_ERROR';
  }
}

/**
 * Messages table access over PostgREST and Realtime `postgres_changes`.
 * Row-level security decides what the signed-in user can read and write.
 */
export class SupabaseChatRemote implements ChatRemote {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = 'messages'
  ) {}

  async fetchRecent(conversationId: ConversationId, limit: number, signal?: AbortSignal): Promise<unknown[]> {
    let query = this.client
      .from(this.table)
      .select(MESSAGE_COLUMNS)
      .eq('group_id', conversationId)
      .order('created_at', { ascending: false })
      .limit(limit);

    if (signal) {
      query = query.abortSignal(signal);
    }

    const { data, error } = await query;
    if (error) {
      throw error;
    }
    return data ?? [];
  }

  async insert(request: AppendRequest): Promise<unknown> {
    const { data, error } = await this.client
      .from(this.table)
      .insert({
        group_id: request.conversationId,
        sender_id: request.senderId,
        content: request.content,
        client_msg_id: request.clientMsgId,
      })
      .select(MESSAGE_COLUMNS)
      .single();

    if (error) {
      throw error;
    }
    return data;
  }

  open(conversationId: ConversationId, listener: (event: RemoteEvent) => void): RemoteChannelHandle {
    const channel: RealtimeChannel = this.client
      .channel(`chat_group_${conversationId}`)
      .on(
        'postgres_changes',
        {
          event: 'INSERT',
          schema: 'public',
          table: this.table,
          filter: `group_id=eq.${conversationId}`,
        },
        (payload) => {
          listener({ type: 'insert', row: payload.new });
        }
      )
      .subscribe((status, err) => {
        listener({ type: 'status', status: toTransportStatus(status), error: err });
      });

    return {
      close: async () => {
        const result = await this.client.removeChannel(channel);
        if (result === 'error') {
          throw new Error(`Failed to remove realtime channel for conversation ${conversationId}`);
        }
      },
    };
  }
}

/**
 * Keeps the signed-in user's id in memory so sends can be stamped synchronously.
 */
export class SupabaseSessionProvider implements SessionProvider {
  private userId: string | null = null;
  private readonly listeners = new Set<() => void>();
  private readonly unsubscribe: () => void;

  private constructor(client: SupabaseClient) {
    const { data } = client.auth.onAuthStateChange((_event, session) => {
      this.update(session);
    });
    this.unsubscribe = () => data.subscription.unsubscribe();
  }

  static async create(client: SupabaseClient): Promise<SupabaseSessionProvider> {
    const provider = new SupabaseSessionProvider(client);
    const { data, error } = await client.auth.getSession();
    if (error) {
      console.error('[session] Failed to read current session', error);
    } else {
      provider.update(data.session);
    }
    return provider;
  }

  currentUserId(): string | null {
    return this.userId;
  }

  onChange(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.unsubscribe();
    this.listeners.clear();
  }

  private update(session: Session | null): void {
    const userId = session?.user.id ?? null;
    if (userId === this.userId) return;
    this.userId = userId;
    for (const listener of this.listeners) {
      listener();
    }
  }
}

export type SupabaseSyncDeps = SyncEngineDeps & { dispose: () => void };

/** Engine dependencies backed by one Supabase client, reading `config.messagesTable`. */
export async function createSupabaseSyncDeps(
  client: SupabaseClient,
  config: Pick<ChatConfig, 'messagesTable'> = DEFAULT_CHAT_CONFIG
): Promise<SupabaseSyncDeps> {
  const remote = new SupabaseChatRemote(client, config.messagesTable);
  const session = await SupabaseSessionProvider.create(client);
  return {
    history: remote,
    append: remote,
    subscription: remote,
    session,
    dispose: () => session.dispose(),
  };
}
