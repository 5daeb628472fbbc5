import { createStore, type StoreApi } from 'zustand/vanilla';
import { compareOrderKeys, toEffectiveTime, toSubMillis, type OrderKey } from '@/lib/chat/cursors';
import type {
  ConversationEntry,
  ConversationId,
  ConversationView,
  Message,
  PendingSend,
} from '@/lib/chat/types';

type ConfirmedRecord = { message: Message; seq: number };
type PendingRecord = { pending: PendingSend; seq: number };

export type MessageStoreState = {
  conversationId: ConversationId;
  confirmed: ReadonlyMap<string, ConfirmedRecord>;
  pending: ReadonlyMap<string, PendingRecord>;
  seq: number;
  seeded: boolean;
  released: boolean;
  view: ConversationView;

  /** Id-keyed, additive insert. Returns whether state changed. */
  merge: (incoming: Message) => boolean;
  /**
   * Merge a confirmed message and drop the pending send it answers, matched by
   * `token` or, when absent, by the message's own clientMsgId.
   */
  reconcile: (message: Message, token?: string | null) => boolean;
  /** Bulk insert that only applies to a store that was never seeded and holds no confirmed messages. */
  seed: (initial: readonly Message[]) => boolean;
  snapshot: () => ConversationView;
  addPending: (pending: PendingSend) => boolean;
  markFailed: (token: string, error: string) => boolean;
  markInFlight: (token: string) => boolean;
  removePending: (token: string) => boolean;
  getPending: (token: string) => PendingSend | undefined;
  release: () => void;
};

export type MessageStore = StoreApi<MessageStoreState>;

const EMPTY_VIEW: ConversationView = Object.freeze([]);

function buildView(
  confirmed: ReadonlyMap<string, ConfirmedRecord>,
  pending: ReadonlyMap<string, PendingRecord>
): ConversationView {
  const keyed: Array<{ entry: ConversationEntry; order: OrderKey }> = [];

  for (const [id, record] of confirmed) {
    const { createdAt } = record.message;
    const effectiveAt = toEffectiveTime(createdAt);
    keyed.push({
      order: { effectiveAt, subMillis: toSubMillis(createdAt), id, seq: record.seq },
      entry: { kind: 'confirmed', key: id, message: record.message, effectiveAt },
    });
  }
  for (const [token, record] of pending) {
    const { submittedAt } = record.pending;
    const effectiveAt = toEffectiveTime(submittedAt);
    keyed.push({
      order: { effectiveAt, subMillis: toSubMillis(submittedAt), id: null, seq: record.seq },
      entry: { kind: 'pending', key: token, pending: record.pending, effectiveAt },
    });
  }

  keyed.sort((a, b) => compareOrderKeys(a.order, b.order));
  return Object.freeze(keyed.map(({ entry }) => entry));
}

function withoutKey<V>(map: ReadonlyMap<string, V>, key: string): Map<string, V> {
  const next = new Map(map);
  next.delete(key);
  return next;
}

export function createMessageStore(conversationId: ConversationId): MessageStore {
  return createStore<MessageStoreState>()((set, get) => {
    const isWritable = (action: string): boolean => {
      if (get().released) {
        console.debug(`[messageStore] ${action} ignored: store released`, { conversationId });
        return false;
      }
      return true;
    };

    const belongsHere = (message: Message): boolean => {
      if (message.conversationId !== conversationId) {
        console.warn('[messageStore] Rejected message from another conversation', {
          conversationId,
          messageId: message.id,
          messageConversationId: message.conversationId,
        });
        return false;
      }
      return true;
    };

    const updatePending = (token: string, patch: Partial<PendingSend>, action: string): boolean => {
      if (!isWritable(action)) return false;
      let changed = false;
      set((state) => {
        const record = state.pending.get(token);
        if (!record) return state;
        const pending = new Map(state.pending);
        pending.set(token, { ...record, pending: { ...record.pending, ...patch } });
        changed = true;
        return { pending, view: buildView(state.confirmed, pending) };
      });
      return changed;
    };

    const reconcile = (message: Message, token?: string | null): boolean => {
      if (!isWritable('reconcile') || !belongsHere(message)) return false;
      let changed = false;
      set((state) => {
        const correlation = token ?? message.clientMsgId ?? null;
        const known = state.confirmed.has(message.id);
        const answersPending = correlation !== null && state.pending.has(correlation);
        if (known && !answersPending) return state;

        let confirmed = state.confirmed;
        let seq = state.seq;
        if (!known) {
          const next = new Map(state.confirmed);
          next.set(message.id, { message, seq });
          confirmed = next;
          seq += 1;
        }
        const pending = answersPending && correlation !== null ? withoutKey(state.pending, correlation) : state.pending;

        changed = true;
        return { confirmed, pending, seq, view: buildView(confirmed, pending) };
      });
      return changed;
    };

    return {
      conversationId,
      confirmed: new Map(),
      pending: new Map(),
      seq: 0,
      seeded: false,
      released: false,
      view: EMPTY_VIEW,

      merge: (incoming) => reconcile(incoming),

      reconcile,

      seed: (initial) => {
        if (!isWritable('seed')) return false;
        let applied = false;
        set((state) => {
          if (state.seeded || state.confirmed.size > 0) {
            console.debug('[messageStore] seed ignored: store already populated', { conversationId });
            return state;
          }

          const confirmed = new Map<string, ConfirmedRecord>();
          let pending: ReadonlyMap<string, PendingRecord> = state.pending;
          let seq = state.seq;
          for (const message of initial) {
            if (!belongsHere(message) || confirmed.has(message.id)) continue;
            confirmed.set(message.id, { message, seq });
            seq += 1;
            if (message.clientMsgId && pending.has(message.clientMsgId)) {
              pending = withoutKey(pending, message.clientMsgId);
            }
          }

          applied = true;
          return { confirmed, pending, seq, seeded: true, view: buildView(confirmed, pending) };
        });
        return applied;
      },

      snapshot: () => get().view,

      addPending: (pendingSend) => {
        if (!isWritable('addPending')) return false;
        let added = false;
        set((state) => {
          if (state.pending.has(pendingSend.token)) return state;
          const pending = new Map(state.pending);
          pending.set(pendingSend.token, { pending: pendingSend, seq: state.seq });
          added = true;
          return { pending, seq: state.seq + 1, view: buildView(state.confirmed, pending) };
        });
        return added;
      },

      markFailed: (token, error) => updatePending(token, { status: 'failed', error }, 'markFailed'),

      markInFlight: (token) => updatePending(token, { status: 'in_flight', error: undefined }, 'markInFlight'),

      removePending: (token) => {
        if (!isWritable('removePending')) return false;
        let removed = false;
        set((state) => {
          if (!state.pending.has(token)) return state;
          const pending = withoutKey(state.pending, token);
          removed = true;
          return { pending, view: buildView(state.confirmed, pending) };
        });
        return removed;
      },

      getPending: (token) => get().pending.get(token)?.pending,

      release: () => {
        if (get().released) return;
        set({ confirmed: new Map(), pending: new Map(), view: EMPTY_VIEW, released: true });
      },
    };
  });
}
