/**
 * Delivery Pipeline
 *
 * Turns "send this content to this subscriber" into at most one transport
 * call per fingerprint:
 *
 *   acquire lease ──► transmit ──► success ─────────────► settle "sent"
 *        ▲                │
 *        │                ├─► permanent / retries spent ─► settle "permanently_failed"
 *        │                │
 *        └── backoff ◄── release ◄── transient failure
 *
 * Callers that find the lease held wait for it to settle (bounded by the
 * lease TTL) and then report the same outcome as the holder.
 */

import { LEASE_MARGIN_MS, type CoreSettings } from "../config.js";
import { ConfigurationError, DeliveryFailedError, DeliveryInFlightError } from "../errors.js";
import { createTimer, log, logFailure } from "../logger.js";
import type { EmailProvider, SendEmailRequest } from "../providers/types.js";
import type { BroadcastOptions, BroadcastReport, DeliveryResult } from "../domain/delivery/index.js";
import { computeFingerprint } from "../domain/idempotency/fingerprint.js";
import type {
  DeliveryIntent,
  DeliveryOutcome,
  IdempotencyCache,
  Lease,
  LeaseResult,
} from "../domain/idempotency/types.js";
import {
  buildConfirmationEmail,
  buildConfirmationLink,
  buildIssueEmail,
} from "../domain/payload-builders/email.js";
import type { EmailContent, NewsletterIssue } from "../domain/payload-builders/types.js";
import type { Subscriber, SubscriberStore } from "../domain/subscribers/types.js";
import type { ConfirmationToken } from "../domain/token/types.js";
import { calculateBackoff } from "../domain/utils/backoff.js";
import { forEachBounded } from "../domain/utils/concurrency.js";
import { executeWithRetry, TimeoutDelayProvider, type DelayProvider } from "../domain/utils/retry.js";
import { systemRandom, SystemTimeProvider, type RandomSource, type TimeProvider } from "../domain/utils/time.js";
import { withTimeout } from "../domain/utils/timeout.js";

export interface DeliveryPipelineDeps {
  provider: EmailProvider;
  cache: IdempotencyCache;
  store: Pick<SubscriberStore, "listConfirmed">;
  settings: CoreSettings;
  delay?: DelayProvider;
  time?: TimeProvider;
  random?: RandomSource;
}

type TransmitResult =
  | { ok: true; providerMessageId?: string }
  | { ok: false; retryable: boolean; error: string };

type AcquireResult = Exclude<LeaseResult, { status: "in_flight" }> | { status: "cancelled" };

// Settling is a single cache write; a short retry covers connection blips
const SETTLE_RETRIES = 2;

export class DeliveryPipeline {
  private readonly provider: EmailProvider;
  private readonly cache: IdempotencyCache;
  private readonly store: Pick<SubscriberStore, "listConfirmed">;
  private readonly settings: CoreSettings;
  private readonly delay: DelayProvider;
  private readonly time: TimeProvider;
  private readonly random: RandomSource;

  constructor(deps: DeliveryPipelineDeps) {
    const { leaseTtlMs, sendTimeoutMs } = deps.settings;
    if (leaseTtlMs < sendTimeoutMs + LEASE_MARGIN_MS) {
      throw new ConfigurationError(
        `Lease TTL (${leaseTtlMs}ms) must be at least the send timeout (${sendTimeoutMs}ms) + ${LEASE_MARGIN_MS}ms`
      );
    }

    this.provider = deps.provider;
    this.cache = deps.cache;
    this.store = deps.store;
    this.settings = deps.settings;
    this.delay = deps.delay ?? new TimeoutDelayProvider();
    this.time = deps.time ?? new SystemTimeProvider();
    this.random = deps.random ?? systemRandom;
  }

  /**
   * Send the confirmation email for a freshly issued token.
   *
   * @throws DeliveryFailedError when the send is (or was already) settled
   *   as permanently failed
   * @throws DeliveryInFlightError when another holder keeps the lease past
   *   its TTL
   */
  async sendConfirmation(subscriber: Subscriber, token: ConfirmationToken): Promise<DeliveryOutcome> {
    const link = buildConfirmationLink(this.settings.baseUrl, token.value);
    const content = buildConfirmationEmail({
      recipient: subscriber,
      link,
      expiresAt: token.expiresAt,
    });

    const result = await this.deliver(
      { kind: "confirmation", subscriberId: subscriber.id, contentVersion: token.expiresAt },
      this.toRequest(subscriber.email, content)
    );

    // Confirmations are never sent with an abort signal
    if (result.status === "cancelled") {
      throw new DeliveryFailedError(subscriber.id, "confirmation", "cancelled", 0);
    }

    const { outcome } = result;
    if (outcome.status === "permanently_failed") {
      throw new DeliveryFailedError(
        subscriber.id,
        "confirmation",
        outcome.reason ?? "unknown",
        outcome.attempts ?? 0
      );
    }

    return outcome;
  }

  /**
   * Fan an issue out to every confirmed subscriber. A recipient failure is
   * recorded in the report and never stops the broadcast. A failing
   * subscriber source ends it early with `sourceError` set.
   */
  async broadcastIssue(issue: NewsletterIssue, options: BroadcastOptions = {}): Promise<BroadcastReport> {
    const elapsed = createTimer();
    const report: BroadcastReport = {
      issueVersion: issue.version,
      sent: 0,
      deduplicated: 0,
      failed: [],
      cancelled: 0,
      aborted: false,
      durationMs: 0,
    };

    log.broadcast.info(
      { issueVersion: issue.version, concurrency: this.settings.broadcastConcurrency },
      "started"
    );

    try {
      const summary = await forEachBounded(
        this.store.listConfirmed({ pageSize: this.settings.broadcastPageSize }),
        async (subscriber) => {
          try {
            const result = await this.deliver(
              { kind: "issue", subscriberId: subscriber.id, contentVersion: issue.version },
              this.toRequest(subscriber.email, buildIssueEmail(issue, subscriber)),
              options.signal
            );

            if (result.status === "cancelled") {
              report.cancelled++;
              return;
            }
            if (result.deduplicated) {
              report.deduplicated++;
            }
            if (result.outcome.status === "sent") {
              report.sent++;
            } else {
              report.failed.push({
                subscriberId: subscriber.id,
                reason: result.outcome.reason ?? "unknown",
              });
            }
          } catch (error) {
            // Cache outages and lease timeouts fail this recipient only
            report.failed.push({
              subscriberId: subscriber.id,
              reason: error instanceof Error ? error.message : String(error),
            });
          }
        },
        { concurrency: this.settings.broadcastConcurrency, signal: options.signal }
      );
      report.aborted = summary.aborted;
    } catch (error) {
      // Recipients already dispatched have finished; the report covers them
      report.sourceError = error instanceof Error ? error.message : String(error);
      logFailure("broadcast", "subscriber source failed", error, { issueVersion: issue.version });
    }

    report.durationMs = Math.round(elapsed());

    const context = {
      issueVersion: issue.version,
      sent: report.sent,
      failed: report.failed.length,
      deduplicated: report.deduplicated,
      cancelled: report.cancelled,
      durationMs: report.durationMs,
    };
    if (report.aborted) {
      log.broadcast.warn(context, "aborted");
    } else if (report.sourceError) {
      log.broadcast.warn(context, "stopped early");
    } else if (report.failed.length > 0) {
      log.broadcast.warn(context, "completed with failures");
    } else {
      log.broadcast.info(context, "completed");
    }

    return report;
  }

  /**
   * Single-recipient send primitive shared by confirmations and issues.
   */
  async deliver(
    intent: DeliveryIntent,
    message: SendEmailRequest,
    signal?: AbortSignal
  ): Promise<DeliveryResult> {
    const fingerprint = computeFingerprint(intent);
    const context = { kind: intent.kind, subscriberId: intent.subscriberId };
    const maxAttempts = this.settings.maxSendRetries + 1;
    let attempts = 0;

    while (true) {
      const acquired = await this.acquire(fingerprint, intent, signal);
      if (acquired.status === "cancelled") {
        log.delivery.info({ ...context, attempts }, "cancelled while waiting for lease");
        return { status: "cancelled" };
      }
      if (acquired.status === "settled") {
        log.delivery.debug({ ...context, status: acquired.outcome.status }, "already settled");
        return { status: "settled", outcome: acquired.outcome, deduplicated: true };
      }

      const { lease } = acquired;
      attempts++;
      const result = await this.transmit(message);

      if (result.ok) {
        const outcome: DeliveryOutcome = { status: "sent", at: this.time.now(), attempts };
        await this.settle(lease, outcome, context);
        log.delivery.info(
          { ...context, attempts, providerMessageId: result.providerMessageId },
          "sent"
        );
        return { status: "settled", outcome, deduplicated: false };
      }

      if (!result.retryable || attempts >= maxAttempts) {
        const outcome: DeliveryOutcome = {
          status: "permanently_failed",
          at: this.time.now(),
          reason: result.error,
          attempts,
        };
        await this.settle(lease, outcome, context);
        log.delivery.error(
          { ...context, attempts, reason: result.error, retryable: result.retryable },
          "permanently failed"
        );
        return { status: "settled", outcome, deduplicated: false };
      }

      // Transient: give the lease back so any caller can pick the retry up
      await this.release(lease, context);

      if (signal?.aborted) {
        log.delivery.info({ ...context, attempts }, "cancelled");
        return { status: "cancelled" };
      }

      const delayMs = calculateBackoff(attempts, {
        baseDelayMs: this.settings.backoffBaseMs,
        maxDelayMs: this.settings.backoffCapMs,
        jitterFactor: this.settings.backoffJitter,
        random: this.random,
      });
      log.delivery.warn({ ...context, attempts, delayMs, error: result.error }, "transient failure, retrying");
      await this.delay.delay(delayMs);

      if (signal?.aborted) {
        log.delivery.info({ ...context, attempts }, "cancelled");
        return { status: "cancelled" };
      }
    }
  }

  /**
   * Take the lease, or the settled outcome. While another caller holds the
   * lease, poll until it settles, the lease TTL has passed or the signal
   * aborts.
   */
  private async acquire(
    fingerprint: string,
    intent: DeliveryIntent,
    signal?: AbortSignal
  ): Promise<AcquireResult> {
    const { leaseTtlMs, inFlightPollMs } = this.settings;
    const maxPolls = Math.max(1, Math.ceil(leaseTtlMs / inFlightPollMs));

    for (let poll = 0; ; poll++) {
      const result = await this.cache.tryBegin(fingerprint, leaseTtlMs);
      if (result.status !== "in_flight") {
        return result;
      }

      if (poll >= maxPolls) {
        log.delivery.warn(
          { kind: intent.kind, subscriberId: intent.subscriberId, polls: poll },
          "lease still held, giving up"
        );
        throw new DeliveryInFlightError(intent.subscriberId, intent.kind);
      }
      await this.delay.delay(inFlightPollMs);

      if (signal?.aborted) {
        return { status: "cancelled" };
      }
    }
  }

  private async transmit(message: SendEmailRequest): Promise<TransmitResult> {
    try {
      const result = await withTimeout(
        this.provider.send(message),
        this.settings.sendTimeoutMs,
        `${this.provider.name} send`
      );

      if (result.success) {
        return { ok: true, providerMessageId: result.providerMessageId };
      }
      return {
        ok: false,
        retryable: result.retryable !== false,
        error: result.error ?? "Unknown provider error",
      };
    } catch (error) {
      // Timeouts and thrown network errors may succeed on retry
      return {
        ok: false,
        retryable: true,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async settle(
    lease: Lease,
    outcome: DeliveryOutcome,
    context: Record<string, unknown>
  ): Promise<void> {
    const result = await executeWithRetry(
      () => this.cache.settle(lease, outcome, this.settings.outcomeTtlMs),
      { maxRetries: SETTLE_RETRIES, baseDelayMs: 100, maxDelayMs: 1000 },
      this.delay
    );

    if (!result.success) {
      // The lease TTL is now the only guard against a resend
      logFailure("cache", "settle failed", result.error, { ...context, status: outcome.status });
    } else if (!result.value) {
      log.cache.warn({ ...context, status: outcome.status }, "lease lost before settle");
    }
  }

  private async release(lease: Lease, context: Record<string, unknown>): Promise<void> {
    try {
      await this.cache.release(lease);
    } catch (error) {
      // The marker expires with the lease TTL; the retry waits for it
      logFailure("cache", "release failed", error, context);
    }
  }

  private toRequest(to: string, content: EmailContent): SendEmailRequest {
    return {
      to,
      from: this.settings.fromEmail,
      fromName: this.settings.fromName,
      subject: content.subject,
      html: content.html,
      text: content.text,
    };
  }
}
