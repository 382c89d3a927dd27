/**
 * In-memory subscriber store (for testing).
 */

import { randomUUID } from "node:crypto";
import { DuplicateEmailError, SubscriberNotFoundError } from "../../errors.js";
import { SystemTimeProvider, type TimeProvider } from "../utils/time.js";
import {
  DEFAULT_PAGE_SIZE,
  type ListConfirmedOptions,
  type Subscriber,
  type SubscriberStore,
} from "./types.js";

export class InMemorySubscriberStore implements SubscriberStore {
  private rows = new Map<string, Subscriber>();
  private emails = new Set<string>();

  /** Pages served by listConfirmed (for asserting lazy iteration) */
  public pagesFetched = 0;

  constructor(
    private readonly time: TimeProvider = new SystemTimeProvider(),
    private readonly generateId: () => string = randomUUID
  ) {}

  async insertPending(email: string, name: string): Promise<Subscriber> {
    if (this.emails.has(email)) {
      throw new DuplicateEmailError(email);
    }

    const subscriber: Subscriber = {
      id: this.generateId(),
      email,
      name,
      status: "pending_confirmation",
      subscribedAt: new Date(this.time.now()),
      confirmedAt: null,
    };

    this.emails.add(email);
    this.rows.set(subscriber.id, subscriber);
    return { ...subscriber };
  }

  async markConfirmed(subscriberId: string): Promise<boolean> {
    const row = this.rows.get(subscriberId);
    if (!row) {
      throw new SubscriberNotFoundError(subscriberId);
    }
    if (row.status === "confirmed") {
      return false;
    }

    this.rows.set(subscriberId, {
      ...row,
      status: "confirmed",
      confirmedAt: new Date(this.time.now()),
    });
    return true;
  }

  async *listConfirmed(options: ListConfirmedOptions = {}): AsyncGenerator<Subscriber, void, unknown> {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    let cursor: string | null = null;

    while (true) {
      const after = cursor;
      const page: Subscriber[] = [...this.rows.values()]
        .filter((row) => row.status === "confirmed" && (after === null || row.id > after))
        .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
        .slice(0, pageSize);

      if (page.length === 0) return;
      this.pagesFetched++;

      for (const row of page) {
        yield { ...row };
      }

      if (page.length < pageSize) return;
      cursor = page[page.length - 1].id;
    }
  }

  async findById(subscriberId: string): Promise<Subscriber | null> {
    const row = this.rows.get(subscriberId);
    return row ? { ...row } : null;
  }

  /** Number of stored rows (for testing) */
  get size(): number {
    return this.rows.size;
  }

  all(): Subscriber[] {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }
}
