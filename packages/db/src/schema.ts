import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  index,
  pgEnum,
} from "drizzle-orm/pg-core";

// Enums
export const subscriberStatusEnum = pgEnum("subscriber_status", [
  "pending_confirmation",
  "confirmed",
]);

// Subscribers table
// Email is unique across every status: this is the only place the
// constraint lives, so inserts rely on it for duplicate detection.
export const subscribers = pgTable(
  "subscribers",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    email: varchar("email", { length: 320 }).notNull().unique(),
    name: varchar("name", { length: 256 }).notNull(),
    status: subscriberStatusEnum("status").default("pending_confirmation").notNull(),
    subscribedAt: timestamp("subscribed_at", { withTimezone: true }).defaultNow().notNull(),
    confirmedAt: timestamp("confirmed_at", { withTimezone: true }),
  },
  (table) => ({
    // Keyset pagination over confirmed subscribers for broadcasts
    statusIdIdx: index("subscribers_status_id_idx").on(table.status, table.id),
  })
);

// Types
export type SubscriberStatus = (typeof subscriberStatusEnum.enumValues)[number];
export type SubscriberRow = typeof subscribers.$inferSelect;
export type NewSubscriberRow = typeof subscribers.$inferInsert;
