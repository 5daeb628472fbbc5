/**
 * Collaborator interfaces the sync engine consumes. Rows are handed over
 * undecoded; the engine validates them itself.
 */

import type { ConversationId } from './types';

export interface RemoteHistoryQuery {
  /** Most recent `limit` rows for the conversation, newest first. */
  fetchRecent(conversationId: ConversationId, limit: number, signal?: AbortSignal): Promise<unknown[]>;
}

export type AppendRequest = {
  conversationId: ConversationId;
  senderId: string;
  content: string;
  clientMsgId: string;
};

export interface RemoteAppend {
  /** Inserts a row and resolves with the stored row, server id and timestamp included. */
  insert(request: AppendRequest): Promise<unknown>;
}

export type TransportStatus = 'SUBSCRIBED' | 'CHANNEL_ERROR' | 'TIMED_OUT' | 'CLOSED';

export type RemoteEvent =
  | { type: 'status'; status: TransportStatus; error?: Error }
  | { type: 'insert'; row: unknown };

export interface RemoteChannelHandle {
  close(): Promise<void>;
}

export interface RemoteSubscription {
  open(conversationId: ConversationId, listener: (event: RemoteEvent) => void): RemoteChannelHandle;
}

export interface SessionProvider {
  currentUserId(): string | null;
  /** Called whenever the signed-in user changes. Returns an unsubscribe function. */
  onChange?(listener: () => void): () => void;
}

export type ChatRemote = RemoteHistoryQuery & RemoteAppend & RemoteSubscription;
