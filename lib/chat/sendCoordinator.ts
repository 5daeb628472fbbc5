import { newClientMsgId } from '@/lib/id';
import type { MessageStore } from '@/store/messageStore';
import { decodeMessage } from './decode';
import { ChatErrorHandler } from './errorHandler';
import { SendError, describeError } from './errors';
import type { RemoteAppend, SessionProvider } from './remote';
import type { ConversationId, PendingSend } from './types';

export type SendCoordinatorOptions = {
  errors?: ChatErrorHandler;
  now?: () => Date;
};

/**
 * Optimistic sends for one conversation.
 *
 * Each send gets its own correlation token and runs independently; only the
 * store updates are serialized. Failed sends are never retried automatically.
 */
export class SendCoordinator {
  private disposed = false;
  private readonly inFlight = new Set<string>();
  private readonly errors: ChatErrorHandler;
  private readonly now: () => Date;

  constructor(
    private readonly conversationId: ConversationId,
    private readonly store: MessageStore,
    private readonly remote: RemoteAppend,
    private readonly session: SessionProvider,
    options: SendCoordinatorOptions = {}
  ) {
    this.errors = options.errors ?? new ChatErrorHandler();
    this.now = options.now ?? (() => new Date());
  }

  /** Tokens whose append request has not settled yet. */
  get pendingRequests(): number {
    return this.inFlight.size;
  }

  /**
   * Queue `content` for sending. Returns the correlation token, or null when
   * nothing was queued.
   */
  send(content: string): string | null {
    if (this.disposed) {
      return null;
    }

    const text = content.trim();
    if (!text) {
      console.debug('[send] Ignored blank message', { conversationId: this.conversationId });
      return null;
    }

    if (!this.session.currentUserId()) {
      this.errors.handle(new SendError('Cannot send without a signed-in user', null), {
        component: 'send',
        action: 'send',
        conversationId: this.conversationId,
      });
      return null;
    }

    const pending: PendingSend = {
      token: newClientMsgId(),
      content: text,
      submittedAt: this.now().toISOString(),
      status: 'in_flight',
    };
    this.store.getState().addPending(pending);
    this.dispatch(pending.token, text);
    return pending.token;
  }

  retry(token: string): boolean {
    if (this.disposed) {
      return false;
    }
    const pending = this.store.getState().getPending(token);
    if (!pending || pending.status !== 'failed') {
      return false;
    }
    this.store.getState().markInFlight(token);
    this.dispatch(token, pending.content);
    return true;
  }

  dismiss(token: string): boolean {
    if (this.disposed) {
      return false;
    }
    const pending = this.store.getState().getPending(token);
    if (!pending || pending.status !== 'failed') {
      return false;
    }
    return this.store.getState().removePending(token);
  }

  /** Results of requests still in flight are dropped from here on. */
  dispose(): void {
    this.disposed = true;
  }

  private dispatch(token: string, content: string): void {
    this.inFlight.add(token);
    this.append(token, content)
      .catch((error) => {
        console.error('[send] Unexpected failure while settling send', error);
      })
      .finally(() => {
        this.inFlight.delete(token);
      });
  }

  private async append(token: string, content: string): Promise<void> {
    const senderId = this.session.currentUserId();
    if (!senderId) {
      this.fail(token, new SendError('Signed out before the message was sent', token));
      return;
    }

    let row: unknown;
    try {
      row = await this.remote.insert({
        conversationId: this.conversationId,
        senderId,
        content,
        clientMsgId: token,
      });
    } catch (error) {
      this.fail(token, new SendError(`Append failed: ${describeError(error)}`, token, { cause: error }));
      return;
    }

    if (this.disposed) {
      console.debug('[send] Discarded confirmation after dispose', { token });
      return;
    }

    try {
      const confirmed = decodeMessage(row);
      this.store.getState().reconcile(confirmed, token);
    } catch (error) {
      this.fail(token, new SendError(`Confirmation was unreadable: ${describeError(error)}`, token, { cause: error }));
    }
  }

  private fail(token: string, error: SendError): void {
    if (this.disposed) {
      console.debug('[send] Discarded failure after dispose', { token });
      return;
    }
    if (!this.store.getState().markFailed(token, error.userMessage)) {
      // The live feed already confirmed this token.
      console.debug('[send] Ignored failure for a send that was already confirmed', { token });
      return;
    }
    this.errors.handle(error, { component: 'send', action: 'append', conversationId: this.conversationId });
  }
}
