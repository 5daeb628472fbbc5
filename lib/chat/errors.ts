/**
 * Error taxonomy for conversation sync.
 *
 * Every failure the engine can hit is one of these four. Decode errors stay
 * inside the live feed; subscription errors feed the reconnect loop; fetch and
 * send errors reach the UI through the engine's error channel.
 */

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export type ChatErrorCode =
  | 'FETCH_FAILED'
  | 'SUBSCRIPTION_FAILED'
  | 'DECODE_FAILED'
  | 'SEND_FAILED'
  | 'UNKNOWN';

export type ErrorContext = {
  component: string;
  action?: string;
  conversationId?: string;
  [key: string]: unknown;
};

type ChatErrorOptions = {
  cause?: unknown;
  context?: Partial<ErrorContext>;
};

export class ChatError extends Error {
  readonly code: ChatErrorCode;
  readonly severity: ErrorSeverity;
  readonly retryable: boolean;
  readonly userMessage: string;
  context: Partial<ErrorContext>;

  constructor(
    code: ChatErrorCode,
    message: string,
    userMessage: string,
    severity: ErrorSeverity,
    retryable: boolean,
    options: ChatErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.severity = severity;
    this.retryable = retryable;
    this.userMessage = userMessage;
    this.context = options.context ?? {};
  }
}

export class FetchError extends ChatError {
  readonly aborted: boolean;

  constructor(message: string, options: ChatErrorOptions & { aborted?: boolean } = {}) {
    super('FETCH_FAILED', message, 'Could not load messages. Tap to retry.', 'high', true, options);
    this.aborted = options.aborted ?? false;
  }
}

export class SubscriptionError extends ChatError {
  constructor(message: string, options: ChatErrorOptions = {}) {
    super(
      'SUBSCRIPTION_FAILED',
      message,
      'You are offline. New messages will appear when the connection returns.',
      'medium',
      true,
      options
    );
  }
}

export class DecodeError extends ChatError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: ChatErrorOptions = {}) {
    super('DECODE_FAILED', message, 'A message could not be displayed.', 'low', false, options);
    this.issues = issues;
  }
}

export class SendError extends ChatError {
  readonly token: string | null;

  constructor(message: string, token: string | null, options: ChatErrorOptions = {}) {
    super('SEND_FAILED', message, 'Message not sent. Tap to retry.', 'high', true, options);
    this.token = token;
  }
}

/** Pull a readable message out of whatever a backend client threw. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Unknown error';
}

export function isAbortError(error: unknown): boolean {
  if (error instanceof FetchError) return error.aborted;
  if (error && typeof error === 'object' && 'name' in error) {
    return error.name === 'AbortError';
  }
  return false;
}
