import { createStore, type StoreApi } from 'zustand/vanilla';
import { calculateReconnectDelay } from './backoff';
import type { ReconnectPolicy } from './config';
import { ChatErrorHandler } from './errorHandler';
import { SubscriptionError } from './errors';
import type { FeedEvent, LiveFeed } from './liveFeed';
import type { ConnectionState, Message } from './types';

export type ConnectionListener = (state: ConnectionState, previous: ConnectionState) => void;

export type ConnectionSupervisorOptions = {
  policy: ReconnectPolicy;
  onMessage: (message: Message) => void;
  /** Called when the feed is subscribed again after a degraded period. */
  onResubscribed?: () => void;
  errors?: ChatErrorHandler;
  random?: () => number;
};

type ConnectionSlice = { connection: ConnectionState };

/**
 * Owns the live feed lifecycle.
 *
 * disconnected -> connecting -> subscribed
 * connecting | subscribed -> degraded -> reconnecting -> connecting ...
 * any -> disconnected on disconnect(), after which nothing transitions again.
 */
export class ConnectionSupervisor {
  private readonly store: StoreApi<ConnectionSlice>;
  private readonly errors: ChatErrorHandler;
  private readonly random: () => number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private attempt = 0;
  private started = false;
  private tornDown = false;
  private recovering = false;
  private offlineReported = false;

  constructor(
    private readonly feed: LiveFeed,
    private readonly options: ConnectionSupervisorOptions
  ) {
    this.store = createStore<ConnectionSlice>()(() => ({ connection: { status: 'disconnected' } }));
    this.errors = options.errors ?? new ChatErrorHandler();
    this.random = options.random ?? Math.random;
  }

  getState(): ConnectionState {
    return this.store.getState().connection;
  }

  subscribe(listener: ConnectionListener): () => void {
    return this.store.subscribe((state, previous) => listener(state.connection, previous.connection));
  }

  /** True while a reconnect timer is pending. */
  get reconnectScheduled(): boolean {
    return this.timer !== null;
  }

  async connect(): Promise<void> {
    if (this.tornDown || this.started) {
      return;
    }
    this.started = true;
    this.transition({ status: 'connecting' });
    await this.openFeed();
  }

  async disconnect(): Promise<void> {
    if (this.tornDown) {
      return;
    }
    this.tornDown = true;
    this.clearTimer();
    this.transition({ status: 'disconnected' });
    await this.feed.close();
  }

  private async openFeed(): Promise<void> {
    await this.feed.open((event) => this.handleFeedEvent(event));
  }

  private handleFeedEvent(event: FeedEvent): void {
    if (this.tornDown) {
      return;
    }
    if (event.type === 'message') {
      this.options.onMessage(event.message);
      return;
    }
    if (event.status === 'subscribed') {
      this.handleSubscribed();
    } else {
      this.handleFailure(event.error?.message ?? event.status);
    }
  }

  private handleSubscribed(): void {
    const { status } = this.getState();
    if (status !== 'connecting' && status !== 'reconnecting') {
      return;
    }

    const resumed = this.recovering;
    this.attempt = 0;
    this.recovering = false;
    this.offlineReported = false;
    this.transition({ status: 'subscribed' });

    if (resumed) {
      this.options.onResubscribed?.();
    }
  }

  private handleFailure(reason: string): void {
    const { status } = this.getState();
    // A channel usually reports CLOSED right after CHANNEL_ERROR; one failure per attempt.
    if (status !== 'connecting' && status !== 'subscribed') {
      return;
    }

    this.attempt += 1;
    this.recovering = true;
    const offline = this.attempt > this.options.policy.maxAttempts;
    this.transition({ status: 'degraded', reason, attempt: this.attempt, offline });

    if (offline && !this.offlineReported) {
      this.offlineReported = true;
      this.errors.handle(
        new SubscriptionError(`Realtime subscription failed ${this.attempt} times in a row: ${reason}`),
        { component: 'connection', action: 'reconnect', conversationId: this.feed.conversationId }
      );
    }

    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    this.clearTimer();
    const delay = calculateReconnectDelay(this.attempt, this.options.policy, this.random);
    console.debug('[connection] Reconnect scheduled', {
      conversationId: this.feed.conversationId,
      attempt: this.attempt,
      delay,
    });
    this.timer = setTimeout(() => {
      this.timer = null;
      this.reconnect().catch((error) => {
        console.error('[connection] Reconnect attempt failed', error);
      });
    }, delay);
  }

  private async reconnect(): Promise<void> {
    if (this.tornDown || this.getState().status !== 'degraded') {
      return;
    }
    this.transition({ status: 'reconnecting', attempt: this.attempt });
    await this.feed.close();
    if (this.tornDown) {
      return;
    }
    this.transition({ status: 'connecting' });
    await this.openFeed();
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private transition(next: ConnectionState): void {
    console.debug(`[connection] ${this.getState().status} -> ${next.status}`, {
      conversationId: this.feed.conversationId,
    });
    this.store.setState({ connection: next });
  }
}
