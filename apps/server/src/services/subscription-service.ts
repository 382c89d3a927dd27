/**
 * Subscription lifecycle: pending_confirmation -> confirmed.
 *
 * The store mutation and the email send are never one atomic unit. A
 * subscriber whose confirmation email permanently failed stays pending;
 * the caller learns about it through DeliveryFailedError.
 */

import type { CoreSettings } from "../config.js";
import { InvalidTokenError, SubscriberNotFoundError, ValidationError } from "../errors.js";
import { log } from "../logger.js";
import type { BroadcastOptions, BroadcastReport } from "../domain/delivery/index.js";
import type { NewsletterIssue } from "../domain/payload-builders/types.js";
import type { Subscriber, SubscriberStore } from "../domain/subscribers/types.js";
import type { TokenCodec } from "../domain/token/codec.js";
import { newsletterIssueSchema, subscribeInputSchema } from "../domain/validation.js";
import type { DeliveryPipeline } from "./delivery-pipeline.js";

export interface SubscribeResult {
  subscriberId: string;
  status: "pending_confirmation";
}

export interface ConfirmResult {
  subscriberId: string;
  status: "confirmed";
  /** True when an earlier visit already confirmed the subscriber */
  alreadyConfirmed: boolean;
}

export interface SubscriptionServiceDeps {
  store: SubscriberStore;
  tokens: TokenCodec;
  delivery: Pick<DeliveryPipeline, "sendConfirmation" | "broadcastIssue">;
  settings: Pick<CoreSettings, "tokenTtlMs">;
}

export class SubscriptionService {
  private readonly store: SubscriberStore;
  private readonly tokens: TokenCodec;
  private readonly delivery: Pick<DeliveryPipeline, "sendConfirmation" | "broadcastIssue">;
  private readonly tokenTtlMs: number;

  constructor(deps: SubscriptionServiceDeps) {
    this.store = deps.store;
    this.tokens = deps.tokens;
    this.delivery = deps.delivery;
    this.tokenTtlMs = deps.settings.tokenTtlMs;
  }

  /**
   * Register a pending subscriber and send the confirmation email.
   *
   * @throws ValidationError for a malformed email or empty name
   * @throws DuplicateEmailError when the email already exists in any status
   * @throws DeliveryFailedError when the confirmation email permanently failed
   */
  async subscribe(input: unknown): Promise<SubscribeResult> {
    const parsed = subscribeInputSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZodIssues(parsed.error.issues);
    }

    const { email, name } = parsed.data;
    const subscriber = await this.store.insertPending(email, name);
    log.subscription.info({ subscriberId: subscriber.id }, "pending");

    const token = this.tokens.issue(subscriber.id, this.tokenTtlMs);
    log.token.debug({ subscriberId: subscriber.id, expiresAt: token.expiresAt }, "issued");

    await this.delivery.sendConfirmation(subscriber, token);

    return { subscriberId: subscriber.id, status: "pending_confirmation" };
  }

  /**
   * Confirm the subscriber a token names. Revisiting a valid link succeeds
   * with alreadyConfirmed set.
   *
   * @throws InvalidTokenError with the verification failure reason
   * @throws SubscriberNotFoundError when the token names no stored subscriber
   */
  async confirm(token: string): Promise<ConfirmResult> {
    const verification = this.tokens.verify(token);
    if (!verification.valid) {
      log.token.info({ reason: verification.reason }, "rejected");
      throw new InvalidTokenError(verification.reason);
    }

    const { subscriberId } = verification;
    const transitioned = await this.store.markConfirmed(subscriberId);

    if (transitioned) {
      log.subscription.info({ subscriberId }, "confirmed");
    } else {
      log.subscription.debug({ subscriberId }, "already confirmed");
    }

    return { subscriberId, status: "confirmed", alreadyConfirmed: !transitioned };
  }

  /**
   * @throws SubscriberNotFoundError when no subscriber has this id
   */
  async getSubscriber(subscriberId: string): Promise<Subscriber> {
    const subscriber = await this.store.findById(subscriberId);
    if (!subscriber) {
      throw new SubscriberNotFoundError(subscriberId);
    }
    return subscriber;
  }

  /**
   * Broadcast a newsletter issue to every confirmed subscriber.
   *
   * @throws ValidationError for an incomplete issue
   */
  async publishIssue(input: unknown, options: BroadcastOptions = {}): Promise<BroadcastReport> {
    const parsed = newsletterIssueSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZodIssues(parsed.error.issues);
    }

    const issue: NewsletterIssue = parsed.data;
    return this.delivery.broadcastIssue(issue, options);
  }
}
