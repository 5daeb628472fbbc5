import { v4 as uuidv4 } from 'uuid';

/** Correlation token attached to an outgoing message and echoed back in its row. */
export function newClientMsgId(): string {
  return uuidv4();
}
