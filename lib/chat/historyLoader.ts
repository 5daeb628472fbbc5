import { decodeMessage } from './decode';
import { DecodeError, FetchError, describeError, isAbortError } from './errors';
import type { RemoteHistoryQuery } from './remote';
import type { ConversationId, Message, Result } from './types';

/**
 * Loads the latest page of a conversation. No retries: the engine decides.
 */
export class HistoryLoader {
  constructor(private readonly remote: RemoteHistoryQuery) {}

  async load(
    conversationId: ConversationId,
    limit: number,
    signal?: AbortSignal
  ): Promise<Result<Message[], FetchError>> {
    const context = { conversationId, limit };

    if (signal?.aborted) {
      return { ok: false, error: new FetchError('History fetch aborted', { aborted: true, context }) };
    }

    let rows: unknown[];
    try {
      rows = await this.remote.fetchRecent(conversationId, limit, signal);
    } catch (error) {
      const aborted = signal?.aborted === true || isAbortError(error);
      return {
        ok: false,
        error: new FetchError(
          aborted ? 'History fetch aborted' : `History fetch failed: ${describeError(error)}`,
          { aborted, cause: error, context }
        ),
      };
    }

    if (signal?.aborted) {
      return { ok: false, error: new FetchError('History fetch aborted', { aborted: true, context }) };
    }

    const messages: Message[] = [];
    try {
      for (const row of rows) {
        messages.push(decodeMessage(row));
      }
    } catch (error) {
      const detail = error instanceof DecodeError ? error.message : describeError(error);
      return {
        ok: false,
        error: new FetchError(`History contained an unreadable message: ${detail}`, { cause: error, context }),
      };
    }

    // Rows arrive newest first; the transcript reads oldest first.
    return { ok: true, data: messages.reverse() };
  }
}
