import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createMessageStore, type MessageStore } from '@/store/messageStore';
import type { Message, PendingSend } from '@/lib/chat/types';
import { iso } from './fakes/chatBackend';

const conversationId = 'group-1';

function message(id: string, createdAt: string, partial?: Partial<Message>): Message {
  return {
    id,
    conversationId,
    senderId: 'user-b',
    content: `message ${id}`,
    createdAt,
    clientMsgId: null,
    ...partial,
  };
}

function pending(token: string, submittedAt: string, partial?: Partial<PendingSend>): PendingSend {
  return { token, content: `pending ${token}`, submittedAt, status: 'in_flight', ...partial };
}

function keys(store: MessageStore): string[] {
  return store.getState().snapshot().map((entry) => entry.key);
}

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest])
  );
}

let store: MessageStore;

beforeEach(() => {
  store = createMessageStore(conversationId);
});

describe('messageStore: merge', () => {
  it('is idempotent', () => {
    const m = message('m1', iso(1));

    expect(store.getState().merge(m)).toBe(true);
    const first = store.getState().snapshot();
    expect(store.getState().merge(m)).toBe(false);

    expect(store.getState().snapshot()).toBe(first);
    expect(keys(store)).toEqual(['m1']);
  });

  it('keeps the first copy of an id', () => {
    store.getState().merge(message('m1', iso(1)));
    store.getState().merge(message('m1', iso(1), { content: 'edited elsewhere' }));

    const [entry] = store.getState().snapshot();
    expect(entry?.kind === 'confirmed' && entry.message.content).toBe('message m1');
  });

  it('rejects messages from another conversation', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(store.getState().merge(message('m1', iso(1), { conversationId: 'group-2' }))).toBe(false);
    expect(keys(store)).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('produces the same view for every arrival order', () => {
    const set = [message('a', iso(4)), message('b', iso(1)), message('c', iso(3)), message('d', iso(2))];

    const views = permutations(set).map((order) => {
      const s = createMessageStore(conversationId);
      for (const m of order) s.getState().merge(m);
      return keys(s);
    });

    expect(views).toHaveLength(24);
    for (const view of views) {
      expect(view).toEqual(['b', 'd', 'c', 'a']);
    }
  });

  it('orders by the full timestamp fraction', () => {
    const late = message('late', '2024-05-01T10:00:04.123900+00:00');
    const early = message('early', '2024-05-01T10:00:04.123100+00:00');

    for (const order of [[late, early], [early, late]]) {
      const s = createMessageStore(conversationId);
      for (const m of order) s.getState().merge(m);
      expect(keys(s)).toEqual(['early', 'late']);
    }
  });

  it('breaks timestamp ties by id', () => {
    store.getState().merge(message('m2', iso(5)));
    store.getState().merge(message('m1', iso(5)));

    expect(keys(store)).toEqual(['m1', 'm2']);
  });

  it('notifies subscribers only when state changes', () => {
    const listener = vi.fn();
    store.subscribe(listener);

    store.getState().merge(message('m1', iso(1)));
    store.getState().merge(message('m1', iso(1)));

    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe('messageStore: seed', () => {
  it('applies only the first time', () => {
    expect(store.getState().seed([message('m1', iso(1)), message('m2', iso(2))])).toBe(true);
    const before = store.getState().snapshot();

    expect(store.getState().seed([message('m3', iso(3))])).toBe(false);

    expect(store.getState().snapshot()).toBe(before);
    expect(keys(store)).toEqual(['m1', 'm2']);
  });

  it('does not clobber messages that arrived before it', () => {
    store.getState().merge(message('live', iso(9)));

    expect(store.getState().seed([message('m1', iso(1))])).toBe(false);
    expect(keys(store)).toEqual(['live']);
  });

  it('drops duplicate ids within the seed', () => {
    store.getState().seed([message('m1', iso(1)), message('m1', iso(1))]);

    expect(keys(store)).toEqual(['m1']);
  });
});

describe('messageStore: pending sends', () => {
  it('orders pending entries by submission time', () => {
    store.getState().seed([message('m1', iso(1)), message('m3', iso(3))]);
    store.getState().addPending(pending('tok-1', iso(2)));

    expect(keys(store)).toEqual(['m1', 'tok-1', 'm3']);
    expect(store.getState().snapshot()[1]?.kind).toBe('pending');
  });

  it('places pending sends after confirmed messages at the same instant', () => {
    store.getState().addPending(pending('tok-2', iso(5)));
    store.getState().addPending(pending('tok-1', iso(5)));
    store.getState().merge(message('m1', iso(5)));

    expect(keys(store)).toEqual(['m1', 'tok-2', 'tok-1']);
  });

  it('replaces the pending entry with the confirmed message', () => {
    store.getState().addPending(pending('tok-1', iso(5)));

    expect(store.getState().reconcile(message('X', iso(4)), 'tok-1')).toBe(true);
    expect(keys(store)).toEqual(['X']);
    expect(store.getState().reconcile(message('X', iso(4)), 'tok-1')).toBe(false);
  });

  it('reconciles a live echo through its clientMsgId', () => {
    store.getState().addPending(pending('tok-1', iso(5)));

    store.getState().merge(message('X', iso(4), { clientMsgId: 'tok-1' }));

    expect(keys(store)).toEqual(['X']);
    expect(store.getState().getPending('tok-1')).toBeUndefined();
  });

  it('drops the pending entry even when the confirmed id is already known', () => {
    store.getState().merge(message('X', iso(4)));
    store.getState().addPending(pending('tok-1', iso(5)));

    expect(store.getState().reconcile(message('X', iso(4)), 'tok-1')).toBe(true);
    expect(keys(store)).toEqual(['X']);
  });

  it('marks failed and back in flight', () => {
    store.getState().addPending(pending('tok-1', iso(5)));

    expect(store.getState().markFailed('tok-1', 'Message not sent. Tap to retry.')).toBe(true);
    expect(store.getState().getPending('tok-1')).toEqual({
      token: 'tok-1',
      content: 'pending tok-1',
      submittedAt: iso(5),
      status: 'failed',
      error: 'Message not sent. Tap to retry.',
    });

    expect(store.getState().markInFlight('tok-1')).toBe(true);
    expect(store.getState().getPending('tok-1')?.status).toBe('in_flight');
    expect(store.getState().getPending('tok-1')?.error).toBeUndefined();
  });

  it('reports unknown tokens', () => {
    expect(store.getState().markFailed('missing', 'x')).toBe(false);
    expect(store.getState().removePending('missing')).toBe(false);
  });
});

describe('messageStore: release', () => {
  it('ignores every mutation afterwards', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    store.getState().merge(message('m1', iso(1)));

    store.getState().release();

    expect(store.getState().merge(message('m2', iso(2)))).toBe(false);
    expect(store.getState().seed([message('m3', iso(3))])).toBe(false);
    expect(store.getState().addPending(pending('tok-1', iso(4)))).toBe(false);
    expect(store.getState().snapshot()).toEqual([]);
    expect(debug).toHaveBeenCalled();
  });
});
