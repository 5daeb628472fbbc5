import { decodeMessage } from './decode';
import { ChatErrorHandler } from './errorHandler';
import { describeError } from './errors';
import type { RemoteChannelHandle, RemoteEvent, RemoteSubscription, TransportStatus } from './remote';
import type { ConversationId, Message } from './types';

export type FeedStatus = 'subscribed' | 'error' | 'timed_out' | 'closed';

export type FeedEvent =
  | { type: 'message'; message: Message }
  | { type: 'status'; status: FeedStatus; error?: Error };

export type FeedListener = (event: FeedEvent) => void;

const STATUS_MAP: Record<TransportStatus, FeedStatus> = {
  SUBSCRIBED: 'subscribed',
  CHANNEL_ERROR: 'error',
  TIMED_OUT: 'timed_out',
  CLOSED: 'closed',
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}

/**
 * One realtime subscription to inserts in a single conversation.
 *
 * Reopening closes the previous channel first. Every open bumps a generation
 * counter and callbacks from an older channel are ignored, so a late event
 * from a torn-down channel never reaches the listener.
 */
export class LiveFeed {
  private handle: RemoteChannelHandle | null = null;
  private generation = 0;

  constructor(
    private readonly remote: RemoteSubscription,
    readonly conversationId: ConversationId,
    private readonly errors: ChatErrorHandler = new ChatErrorHandler()
  ) {}

  get isOpen(): boolean {
    return this.handle !== null;
  }

  /**
   * Returns false when a close() or another open() superseded this call while
   * the previous channel was shutting down.
   */
  async open(listener: FeedListener): Promise<boolean> {
    const generation = ++this.generation;
    await this.release();
    if (generation !== this.generation) {
      return false;
    }

    const deliver = (event: RemoteEvent) => {
      if (generation !== this.generation) {
        return;
      }
      this.handleRemoteEvent(event, listener);
    };

    try {
      this.handle = this.remote.open(this.conversationId, deliver);
      console.debug('[liveFeed] Opened subscription', { conversationId: this.conversationId, generation });
    } catch (error) {
      this.handle = null;
      this.emit(listener, { type: 'status', status: 'error', error: toError(error) });
    }
    return true;
  }

  async close(): Promise<void> {
    this.generation += 1;
    await this.release();
  }

  private async release(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (!handle) {
      return;
    }
    try {
      await handle.close();
    } catch (error) {
      console.error('[liveFeed] Failed to close subscription', error);
    }
  }

  private handleRemoteEvent(event: RemoteEvent, listener: FeedListener): void {
    if (event.type === 'status') {
      this.emit(listener, { type: 'status', status: STATUS_MAP[event.status], error: event.error });
      return;
    }

    let message: Message;
    try {
      message = decodeMessage(event.row);
    } catch (error) {
      this.errors.handle(error, {
        component: 'liveFeed',
        action: 'decode',
        conversationId: this.conversationId,
      });
      return;
    }

    if (message.conversationId !== this.conversationId) {
      console.warn('[liveFeed] Dropped insert for another conversation', {
        conversationId: this.conversationId,
        messageId: message.id,
        messageConversationId: message.conversationId,
      });
      return;
    }

    this.emit(listener, { type: 'message', message });
  }

  private emit(listener: FeedListener, event: FeedEvent): void {
    try {
      listener(event);
    } catch (error) {
      console.error('[liveFeed] Listener threw while handling event', error);
    }
  }
}
