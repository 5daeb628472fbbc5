/**
 * Types for the realtime group conversation sync engine
 */

export type ConversationId = string;

/** A message the server has accepted and assigned an id and timestamp to. */
export type Message = {
  id: string;
  conversationId: ConversationId;
  senderId: string;
  content: string;
  createdAt: string;
  clientMsgId?: string | null; // correlation token attached by the sender
};

export type PendingStatus = 'in_flight' | 'failed';

export type PendingSend = {
  token: string;
  content: string;
  submittedAt: string;
  status: PendingStatus;
  error?: string;
};

export type ConfirmedEntry = {
  kind: 'confirmed';
  key: string;
  message: Message;
  effectiveAt: number;
};

export type PendingEntry = {
  kind: 'pending';
  key: string;
  pending: PendingSend;
  effectiveAt: number;
};

export type ConversationEntry = ConfirmedEntry | PendingEntry;

export type ConversationView = readonly ConversationEntry[];

/** Entry as handed to presentation code, tagged with ownership. */
export type ProjectedEntry = ConversationEntry & { isOwn: boolean };

export type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting' }
  | { status: 'subscribed' }
  | { status: 'degraded'; reason: string; attempt: number; offline: boolean }
  | { status: 'reconnecting'; attempt: number };

export type ConnectionStatus = ConnectionState['status'];

export type Result<T, E> = { ok: true; data: T } | { ok: false; error: E };
