/**
 * Single-slot mailbox between background tasks and the UI event loop.
 *
 * Holds at most one message. Offering while a message is pending replaces
 * it, so only the most recent result is ever delivered. Neither operation
 * waits on anything.
 */

/**
 * What happened to an offered message.
 * - `stored`: the slot was empty
 * - `replaced`: a pending message was discarded in favour of this one
 * - `rejected`: the accept policy kept the pending message instead
 */
export type OfferResult = 'stored' | 'replaced' | 'rejected';

/**
 * Decides whether an incoming message may replace the pending one.
 */
export type AcceptPolicy<T> = (pending: T, incoming: T) => boolean;

export class LatestMailbox<T> {
  private slot: { message: T } | null = null;

  /**
   * @param accept - Optional policy consulted when the slot is full;
   *   replace-with-latest when omitted
   */
  constructor(private readonly accept?: AcceptPolicy<T>) {}

  /**
   * Deposit a message. Never blocks and never throws.
   */
  offer(message: T): OfferResult {
    if (this.slot === null) {
      this.slot = { message };
      return 'stored';
    }
    if (this.accept && !this.accept(this.slot.message, message)) {
      return 'rejected';
    }
    this.slot = { message };
    return 'replaced';
  }

  /**
   * Take the pending message, leaving the slot empty.
   *
   * @returns The message, or null when nothing is pending
   */
  tryTake(): T | null {
    if (this.slot === null) {
      return null;
    }
    const { message } = this.slot;
    this.slot = null;
    return message;
  }

  get hasPending(): boolean {
    return this.slot !== null;
  }
}
