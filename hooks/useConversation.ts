'use client';

import { useCallback, useEffect, useState } from 'react';
import { useStore } from 'zustand';
import { createStore } from 'zustand/vanilla';
import type { ChatError } from '@/lib/chat/errors';
import {
  SyncEngine,
  type SyncEngineDeps,
  type SyncEngineOptions,
  type SyncPhase,
  type SyncSnapshot,
} from '@/lib/chat/syncEngine';
import type { ConnectionState, ProjectedEntry } from '@/lib/chat/types';

type UseConversationReturn = {
  entries: readonly ProjectedEntry[];
  connection: ConnectionState;
  phase: SyncPhase;
  historyError: string | null;
  lastError: ChatError | null;
  send: (content: string) => string | null;
  retryFailed: (token: string) => boolean;
  dismissFailed: (token: string) => boolean;
  refresh: () => Promise<boolean>;
  clearError: () => void;
};

const idleStore = createStore<SyncSnapshot>()(() => ({
  conversationId: null,
  phase: 'idle',
  entries: [],
  connection: { status: 'disconnected' },
  historyError: null,
  lastError: null,
}));

/**
 * Runs a SyncEngine for `conversationId` while the calling component is mounted.
 * `deps` and `options` should be referentially stable; a new object restarts the engine.
 */
export function useConversation(
  conversationId: string | null,
  deps: SyncEngineDeps,
  options?: SyncEngineOptions
): UseConversationReturn {
  const [engine, setEngine] = useState<SyncEngine | null>(null);

  useEffect(() => {
    if (!conversationId) {
      setEngine(null);
      return () => {};
    }

    const next = new SyncEngine(deps, options);
    setEngine(next);
    next.start(conversationId).catch((error) => {
      console.error('[useConversation] Failed to start conversation sync', error);
    });

    return () => {
      next.stop().catch((error) => {
        console.error('[useConversation] Failed to stop conversation sync', error);
      });
    };
  }, [conversationId, deps, options]);

  const store = engine?.store ?? idleStore;
  const entries = useStore(store, (state) => state.entries);
  const connection = useStore(store, (state) => state.connection);
  const phase = useStore(store, (state) => state.phase);
  const historyError = useStore(store, (state) => state.historyError);
  const lastError = useStore(store, (state) => state.lastError);

  const send = useCallback((content: string) => engine?.send(content) ?? null, [engine]);
  const retryFailed = useCallback((token: string) => engine?.retryFailed(token) ?? false, [engine]);
  const dismissFailed = useCallback((token: string) => engine?.dismissFailed(token) ?? false, [engine]);
  const refresh = useCallback(async () => (engine ? engine.refresh() : false), [engine]);
  const clearError = useCallback(() => engine?.clearError(), [engine]);

  return {
    entries,
    connection,
    phase,
    historyError,
    lastError,
    send,
    retryFailed,
    dismissFailed,
    refresh,
    clearError,
  };
}
