/**
 * Postgres-backed subscriber store.
 *
 * Duplicate detection relies on the unique email constraint, never on a
 * read-before-write, so two concurrent subscribes for one address cannot
 * both succeed.
 */

import { and, asc, eq, gt } from "drizzle-orm";
import type { PgQueryResultHKT } from "drizzle-orm/pg-core";
import { subscribers, type SchemaDatabase, type SubscriberRow } from "@letterbox/db";
import { DuplicateEmailError, SubscriberNotFoundError } from "../errors.js";
import { log } from "../logger.js";
import {
  DEFAULT_PAGE_SIZE,
  type ListConfirmedOptions,
  type Subscriber,
  type SubscriberStore,
} from "../domain/subscribers/types.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";

const UNIQUE_VIOLATION = "23505";
const INVALID_TEXT_REPRESENTATION = "22P02";

/**
 * Postgres SQLSTATE of an error, looking through wrapped causes.
 */
export function pgErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && typeof current === "object" && current !== null; depth++) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return undefined;
}

function toSubscriber(row: SubscriberRow): Subscriber {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    status: row.status,
    subscribedAt: row.subscribedAt,
    confirmedAt: row.confirmedAt,
  };
}

export class DrizzleSubscriberStore<TQueryResult extends PgQueryResultHKT = PgQueryResultHKT>
  implements SubscriberStore
{
  constructor(
    private readonly db: SchemaDatabase<TQueryResult>,
    private readonly time: TimeProvider = new SystemTimeProvider()
  ) {}

  async insertPending(email: string, name: string): Promise<Subscriber> {
    let rows: SubscriberRow[];
    try {
      rows = await this.db
        .insert(subscribers)
        .values({ email, name, status: "pending_confirmation" })
        .onConflictDoNothing({ target: subscribers.email })
        .returning();
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        throw new DuplicateEmailError(email, { cause: error });
      }
      throw error;
    }

    const [row] = rows;
    if (!row) {
      throw new DuplicateEmailError(email);
    }

    log.store.debug({ subscriberId: row.id }, "inserted pending subscriber");
    return toSubscriber(row);
  }

  async markConfirmed(subscriberId: string): Promise<boolean> {
    try {
      // Conditional update: only the caller that flips the status sees a row
      const updated = await this.db
        .update(subscribers)
        .set({ status: "confirmed", confirmedAt: new Date(this.time.now()) })
        .where(and(eq(subscribers.id, subscriberId), eq(subscribers.status, "pending_confirmation")))
        .returning({ id: subscribers.id });

      if (updated.length > 0) {
        return true;
      }

      const existing = await this.db
        .select({ id: subscribers.id })
        .from(subscribers)
        .where(eq(subscribers.id, subscriberId))
        .limit(1);

      if (existing.length === 0) {
        throw new SubscriberNotFoundError(subscriberId);
      }
      return false;
    } catch (error) {
      // Not a uuid: it cannot name a stored subscriber
      if (pgErrorCode(error) === INVALID_TEXT_REPRESENTATION) {
        throw new SubscriberNotFoundError(subscriberId);
      }
      throw error;
    }
  }

  /**
   * Keyset pagination (id > cursor ORDER BY id) over confirmed rows.
   * Fetches pageSize + 1 rows to learn whether another page exists.
   */
  async *listConfirmed(options: ListConfirmedOptions = {}): AsyncGenerator<Subscriber, void, unknown> {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    let cursor: string | null = null;
    let pages = 0;
    let total = 0;

    while (true) {
      const where = cursor
        ? and(eq(subscribers.status, "confirmed"), gt(subscribers.id, cursor))
        : eq(subscribers.status, "confirmed");

      const rows: SubscriberRow[] = await this.db
        .select()
        .from(subscribers)
        .where(where)
        .orderBy(asc(subscribers.id))
        .limit(pageSize + 1);

      const hasMore = rows.length > pageSize;
      const page = hasMore ? rows.slice(0, pageSize) : rows;
      if (page.length === 0) break;

      pages++;
      total += page.length;
      for (const row of page) {
        yield toSubscriber(row);
      }

      if (!hasMore) break;
      cursor = page[page.length - 1].id;
    }

    log.store.debug({ pages, total }, "confirmed subscribers streamed");
  }

  async findById(subscriberId: string): Promise<Subscriber | null> {
    try {
      const rows: SubscriberRow[] = await this.db
        .select()
        .from(subscribers)
        .where(eq(subscribers.id, subscriberId))
        .limit(1);
      const [row] = rows;
      return row ? toSubscriber(row) : null;
    } catch (error) {
      if (pgErrorCode(error) === INVALID_TEXT_REPRESENTATION) {
        return null;
      }
      throw error;
    }
  }
}
