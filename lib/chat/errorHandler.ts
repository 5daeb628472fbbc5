/**
 * Centralized error handling for conversation sync
 * Provides consistent error logging and fans user-visible errors out to listeners
 */

import {
  ChatError,
  describeError,
  isAbortError,
  type ErrorContext,
  type ErrorSeverity,
} from './errors';

export type ChatErrorListener = (error: ChatError) => void;

export class ChatErrorHandler {
  private listeners = new Set<ChatErrorListener>();

  /**
   * Handle error with context
   */
  handle(error: unknown, context: ErrorContext): ChatError {
    const chatError = this.normalizeError(error, context);

    if (isAbortError(chatError)) {
      console.debug(`[chat] ${context.component}: aborted`, chatError.context);
      return chatError;
    }

    this.logError(chatError);

    if (this.isUserVisible(chatError)) {
      this.notify(chatError);
    }

    return chatError;
  }

  /**
   * Subscribe to user-visible errors. Returns an unsubscribe function.
   */
  onError(listener: ChatErrorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clearListeners(): void {
    this.listeners.clear();
  }

  /**
   * Normalize error to ChatError format
   */
  private normalizeError(error: unknown, context: ErrorContext): ChatError {
    const chatError =
      error instanceof ChatError
        ? error
        : new ChatError('UNKNOWN', describeError(error), 'Something went wrong.', 'medium', true, {
            cause: error,
          });

    chatError.context = {
      ...chatError.context,
      ...context,
    };

    return chatError;
  }

  /**
   * Fetch and send failures always reach the UI. A subscription failure only
   * does once the supervisor gives up on quick recovery; the normal reconnect
   * cycle is shown through the connectivity indicator instead.
   */
  private isUserVisible(error: ChatError): boolean {
    switch (error.code) {
      case 'FETCH_FAILED':
      case 'SEND_FAILED':
      case 'SUBSCRIPTION_FAILED':
        return true;
      case 'DECODE_FAILED':
        return false;
      default:
        return error.severity === 'high' || error.severity === 'critical';
    }
  }

  private notify(error: ChatError): void {
    for (const listener of this.listeners) {
      try {
        listener(error);
      } catch (listenerError) {
        console.error('[chat] Error listener threw:', listenerError);
      }
    }
  }

  /**
   * Log error to console
   */
  private logError(error: ChatError): void {
    const context = error.context;
    const logMessage = `[chat] ${context.component ?? 'unknown'}: ${error.message}`;
    const logData = {
      code: error.code,
      severity: error.severity,
      retryable: error.retryable,
      context,
    };

    switch (this.getLogLevel(error.severity)) {
      case 'error':
        console.error(logMessage, logData);
        break;
      case 'warn':
        console.warn(logMessage, logData);
        break;
      default:
        console.log(logMessage, logData);
    }
  }

  /**
   * Get console log level from severity
   */
  private getLogLevel(severity: ErrorSeverity): 'error' | 'warn' | 'log' {
    switch (severity) {
      case 'critical':
      case 'high':
        return 'error';
      case 'medium':
        return 'warn';
      default:
        return 'log';
    }
  }
}
