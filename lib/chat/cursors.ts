/**
 * Ordering keys for the conversation view.
 *
 * Time first, at full timestamp precision. At an equal instant, confirmed
 * messages come first, ordered by server id; pending sends follow in
 * submission order (seq is the store's insertion counter).
 */

export type OrderKey = {
  effectiveAt: number;
  /** Fraction of a millisecond that Date.parse drops (Postgres keeps microseconds). */
  subMillis: number;
  /** Server id for confirmed messages, null for pending sends. */
  id: string | null;
  seq: number;
};

/**
 * Compare two keys: negative if a sorts first, positive if b does
 */
export function compareOrderKeys(a: OrderKey, b: OrderKey): number {
  if (a.effectiveAt !== b.effectiveAt) {
    return a.effectiveAt - b.effectiveAt;
  }
  if (a.subMillis !== b.subMillis) {
    return a.subMillis - b.subMillis;
  }

  if (a.id !== null && b.id !== null) {
    if (a.id < b.id) return -1;
    if (a.id > b.id) return 1;
  } else if (a.id !== null) {
    return -1;
  } else if (b.id !== null) {
    return 1;
  }
  return a.seq - b.seq;
}

/**
 * Epoch milliseconds for an ISO timestamp; unparseable values sort last.
 */
export function toEffectiveTime(timestamp: string): number {
  const time = Date.parse(timestamp);
  return Number.isNaN(time) ? Number.MAX_SAFE_INTEGER : time;
}

const FRACTION_PAST_MILLIS = /T\d{2}:\d{2}:\d{2}\.\d{3}(\d+)/;

/**
 * Digits after the third fractional digit, as a fraction of a millisecond.
 * `...04.123900Z` -> 0.9
 */
export function toSubMillis(timestamp: string): number {
  const digits = FRACTION_PAST_MILLIS.exec(timestamp)?.[1];
  return digits ? Number(`0.${digits}`) : 0;
}
