/**
 * Composition root for one conversation screen.
 *
 * start() seeds the transcript from history and then brings up the live feed;
 * stop() tears everything down. The read model is a zustand store so a UI can
 * subscribe to it directly (see hooks/useConversation).
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { createMessageStore, type MessageStore } from '@/store/messageStore';
import { DEFAULT_CHAT_CONFIG, type ChatConfig } from './config';
import { ConnectionSupervisor } from './connectionSupervisor';
import { ChatErrorHandler, type ChatErrorListener } from './errorHandler';
import type { ChatError, FetchError } from './errors';
import { HistoryLoader } from './historyLoader';
import { LiveFeed } from './liveFeed';
import type { RemoteAppend, RemoteHistoryQuery, RemoteSubscription, SessionProvider } from './remote';
import { SendCoordinator } from './sendCoordinator';
import type {
  ConnectionState,
  ConversationId,
  ConversationView,
  Message,
  ProjectedEntry,
} from './types';

export type SyncPhase = 'idle' | 'loading' | 'ready' | 'stopped';

export type SyncSnapshot = {
  conversationId: ConversationId | null;
  phase: SyncPhase;
  entries: readonly ProjectedEntry[];
  connection: ConnectionState;
  historyError: string | null;
  lastError: ChatError | null;
};

export type SyncEngineDeps = {
  history: RemoteHistoryQuery;
  append: RemoteAppend;
  subscription: RemoteSubscription;
  session: SessionProvider;
};

export type SyncEngineOptions = {
  config?: ChatConfig;
  random?: () => number;
  now?: () => Date;
};

type Session = {
  conversationId: ConversationId;
  messages: MessageStore;
  supervisor: ConnectionSupervisor;
  sender: SendCoordinator;
  controller: AbortController;
  unsubscribers: Array<() => void>;
};

const DISCONNECTED: ConnectionState = { status: 'disconnected' };
const NO_ENTRIES: readonly ProjectedEntry[] = Object.freeze([]);

export class SyncEngine {
  readonly store: StoreApi<SyncSnapshot>;
  private readonly errors = new ChatErrorHandler();
  private readonly loader: HistoryLoader;
  private readonly config: ChatConfig;
  private session: Session | null = null;
  private stopped = false;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly deps: SyncEngineDeps,
    private readonly options: SyncEngineOptions = {}
  ) {
    this.config = options.config ?? DEFAULT_CHAT_CONFIG;
    this.loader = new HistoryLoader(deps.history);
    this.store = createStore<SyncSnapshot>()(() => ({
      conversationId: null,
      phase: 'idle',
      entries: NO_ENTRIES,
      connection: DISCONNECTED,
      historyError: null,
      lastError: null,
    }));
    this.errors.onError((error) => {
      if (!this.stopped) {
        this.store.setState({ lastError: error });
      }
    });
  }

  async start(conversationId: ConversationId): Promise<void> {
    if (this.session || this.stopped) {
      throw new Error('SyncEngine.start() may only be called once per instance');
    }

    const messages = createMessageStore(conversationId);
    const feed = new LiveFeed(this.deps.subscription, conversationId, this.errors);
    const supervisor = new ConnectionSupervisor(feed, {
      policy: this.config.reconnect,
      errors: this.errors,
      random: this.options.random,
      onMessage: (message) => this.applyLive(messages, message),
      onResubscribed: () => {
        if (!this.config.resyncOnReconnect) return;
        this.refresh().catch((error) => {
          console.error('[syncEngine] Resync after reconnect failed', error);
        });
      },
    });
    const sender = new SendCoordinator(conversationId, messages, this.deps.append, this.deps.session, {
      errors: this.errors,
      now: this.options.now,
    });

    const session: Session = {
      conversationId,
      messages,
      supervisor,
      sender,
      controller: new AbortController(),
      unsubscribers: [],
    };
    this.session = session;

    session.unsubscribers.push(
      messages.subscribe((state, previous) => {
        if (state.view !== previous.view) {
          this.store.setState({ entries: this.project(state.view) });
        }
      }),
      supervisor.subscribe((connection) => {
        this.store.setState({ connection });
      })
    );
    const unsubscribeSession = this.deps.session.onChange?.(() => {
      this.store.setState({ entries: this.project(messages.getState().view) });
    });
    if (unsubscribeSession) {
      session.unsubscribers.push(unsubscribeSession);
    }

    this.store.setState({ conversationId, phase: 'loading', historyError: null });

    const result = await this.loader.load(conversationId, this.config.historyLimit, session.controller.signal);
    if (!this.isCurrent(session)) {
      return;
    }

    if (result.ok) {
      this.applyHistory(session, result.data);
    } else {
      this.reportHistoryFailure(result.error, 'start');
    }
    this.store.setState({ phase: 'ready' });

    await supervisor.connect();
  }

  /** Every call resolves once teardown has finished. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.teardown();
    }
    return this.stopping;
  }

  private async teardown(): Promise<void> {
    this.stopped = true;

    const session = this.session;
    if (session) {
      session.controller.abort();
      session.sender.dispose();
      for (const unsubscribe of session.unsubscribers) {
        unsubscribe();
      }
      session.messages.getState().release();
      await session.supervisor.disconnect();
    }

    this.errors.clearListeners();
    this.store.setState({ phase: 'stopped', entries: NO_ENTRIES, connection: DISCONNECTED });
    console.debug('[syncEngine] Stopped', { conversationId: session?.conversationId });
  }

  /**
   * Fetch the latest page again and merge it message by message. Also the
   * retry action after a failed initial load. Resolves to whether it succeeded.
   */
  async refresh(): Promise<boolean> {
    const session = this.session;
    if (!session || !this.isCurrent(session)) {
      return false;
    }

    const result = await this.loader.load(
      session.conversationId,
      this.config.historyLimit,
      session.controller.signal
    );
    if (!this.isCurrent(session)) {
      return false;
    }

    if (!result.ok) {
      this.reportHistoryFailure(result.error, 'refresh');
      return false;
    }
    this.applyHistory(session, result.data);
    return true;
  }

  currentView(): ConversationView {
    return this.session?.messages.getState().snapshot() ?? [];
  }

  connectionState(): ConnectionState {
    return this.session?.supervisor.getState() ?? DISCONNECTED;
  }

  send(content: string): string | null {
    return this.session?.sender.send(content) ?? null;
  }

  retryFailed(token: string): boolean {
    return this.session?.sender.retry(token) ?? false;
  }

  dismissFailed(token: string): boolean {
    return this.session?.sender.dismiss(token) ?? false;
  }

  clearError(): void {
    this.store.setState({ lastError: null });
  }

  onError(listener: ChatErrorListener): () => void {
    return this.errors.onError(listener);
  }

  getSnapshot(): SyncSnapshot {
    return this.store.getState();
  }

  subscribe(listener: (snapshot: SyncSnapshot, previous: SyncSnapshot) => void): () => void {
    return this.store.subscribe(listener);
  }

  private isCurrent(session: Session): boolean {
    return !this.stopped && this.session === session;
  }

  private applyLive(messages: MessageStore, message: Message): void {
    if (this.stopped) return;
    messages.getState().merge(message);
  }

  /** First successful load seeds; anything after that merges per message. */
  private applyHistory(session: Session, history: readonly Message[]): void {
    const state = session.messages.getState();
    if (!state.seed(history)) {
      for (const message of history) {
        state.merge(message);
      }
    }
    this.store.setState({ historyError: null });
  }

  private reportHistoryFailure(error: FetchError, action: string): void {
    const handled = this.errors.handle(error, {
      component: 'syncEngine',
      action,
      conversationId: this.session?.conversationId,
    });
    if (this.session && this.session.messages.getState().view.length === 0) {
      this.store.setState({ historyError: handled.userMessage });
    }
  }

  /** Recomputed on view changes and when the session provider reports a new user. */
  private project(view: ConversationView): readonly ProjectedEntry[] {
    const userId = this.deps.session.currentUserId();
    return view.map((entry) => ({
      ...entry,
      isOwn: entry.kind === 'pending' || entry.message.senderId === userId,
    }));
  }
}
