/**
 * Shared test fixtures: settings, a scriptable email provider, and
 * helpers for seeding the in-memory store.
 */

import type { CoreSettings } from "../../config.js";
import type { EmailProvider, SendEmailRequest, SendEmailResult } from "../../providers/types.js";
import type { InMemorySubscriberStore } from "../../domain/subscribers/memory-store.js";
import type { Subscriber } from "../../domain/subscribers/types.js";

export const NOW = 1_700_000_000_000;

export function testSettings(overrides: Partial<CoreSettings> = {}): CoreSettings {
  return {
    signingSecret: "test-secret",
    tokenTtlMs: 60 * 60 * 1000,
    maxSendRetries: 3,
    backoffBaseMs: 100,
    backoffCapMs: 1000,
    backoffJitter: 0,
    broadcastConcurrency: 4,
    broadcastPageSize: 3,
    sendTimeoutMs: 5000,
    leaseTtlMs: 10_000,
    outcomeTtlMs: 24 * 60 * 60 * 1000,
    inFlightPollMs: 250,
    baseUrl: "https://news.example.com",
    fromEmail: "news@example.com",
    fromName: "Newsletter",
    ...overrides,
  };
}

export const SENT: SendEmailResult = { success: true, providerMessageId: "msg-1" };
export const TRANSIENT: SendEmailResult = { success: false, error: "Service unavailable", retryable: true };
export const REJECTED: SendEmailResult = { success: false, error: "Mailbox does not exist", retryable: false };

type Responder = (request: SendEmailRequest, call: number) => SendEmailResult | Promise<SendEmailResult>;

/**
 * Provider driven by a responder function. `call` is 1-indexed. A
 * responder that throws makes send reject, like a network failure.
 */
export class ScriptedEmailProvider implements EmailProvider {
  readonly name = "scripted";
  readonly requests: SendEmailRequest[] = [];

  constructor(private readonly responder: Responder = () => SENT) {}

  /** Answer calls in order; the last response repeats */
  static sequence(...responses: Array<SendEmailResult | Error>): ScriptedEmailProvider {
    return new ScriptedEmailProvider((_request, call) => {
      const response = responses[Math.min(call, responses.length) - 1];
      if (response instanceof Error) {
        throw response;
      }
      return response;
    });
  }

  async send(request: SendEmailRequest): Promise<SendEmailResult> {
    const call = this.requests.push(request);
    return this.responder(request, call);
  }

  get calls(): number {
    return this.requests.length;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

export async function seedConfirmed(store: InMemorySubscriberStore, count: number): Promise<Subscriber[]> {
  const seeded: Subscriber[] = [];
  for (let i = 1; i <= count; i++) {
    const subscriber = await store.insertPending(`reader${i}@example.com`, `Reader ${i}`);
    await store.markConfirmed(subscriber.id);
    seeded.push({ ...subscriber, status: "confirmed" });
  }
  return seeded;
}
