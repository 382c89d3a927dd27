/**
 * Subscriber store contract.
 *
 * Implementations must make insertPending and markConfirmed individually
 * atomic. Cross-operation consistency (insert now, confirm later) is the
 * subscription service's job, never a multi-row transaction.
 */

export type SubscriberStatus = "pending_confirmation" | "confirmed";

export interface Subscriber {
  id: string;
  email: string;
  name: string;
  status: SubscriberStatus;
  subscribedAt: Date;
  confirmedAt: Date | null;
}

export interface ListConfirmedOptions {
  /** Rows fetched per query (default: 500) */
  pageSize?: number;
}

export interface SubscriberStore {
  /**
   * Insert a pending subscriber.
   * @throws DuplicateEmailError if the email exists in any status
   */
  insertPending(email: string, name: string): Promise<Subscriber>;

  /**
   * Transition a subscriber to confirmed.
   * @returns true if this call performed the transition, false if it was
   *   already confirmed
   * @throws SubscriberNotFoundError if the id does not exist
   */
  markConfirmed(subscriberId: string): Promise<boolean>;

  /**
   * Lazily stream confirmed subscribers in id order. Each call starts a
   * fresh iteration.
   */
  listConfirmed(options?: ListConfirmedOptions): AsyncIterable<Subscriber>;

  findById(subscriberId: string): Promise<Subscriber | null>;
}

export const DEFAULT_PAGE_SIZE = 500;
