import { log } from "../logger.js";
import { systemRandom, type RandomSource } from "../domain/utils/time.js";
import type { EmailProvider, SendEmailRequest, SendEmailResult } from "./types.js";

/**
 * success: every send succeeds
 * fail: every send fails permanently
 * transient: every send fails with a retryable error
 * random: fails (transiently) with probability failureRate
 */
export type MockMode = "success" | "fail" | "transient" | "random";

export interface MockProviderConfig {
  mode: MockMode;
  failureRate?: number;  // 0-1, only used in "random" mode
  latencyMs?: number;    // Simulate network delay
  historyLimit?: number; // Requests kept for inspection (default 100)
  random?: RandomSource;
}

export class MockEmailProvider implements EmailProvider {
  name = "mock";
  private config: Required<MockProviderConfig>;
  private messageCounter = 0;

  private readonly history: SendEmailRequest[] = [];

  constructor(config: MockProviderConfig) {
    this.config = {
      mode: config.mode,
      failureRate: config.failureRate ?? 0.1,
      latencyMs: config.latencyMs ?? 50,
      historyLimit: config.historyLimit ?? 100,
      random: config.random ?? systemRandom,
    };
  }

  async send(request: SendEmailRequest): Promise<SendEmailResult> {
    if (this.config.latencyMs > 0) {
      await this.sleep(this.config.latencyMs);
    }

    this.history.push(request);
    if (this.history.length > this.config.historyLimit) {
      this.history.shift();
    }

    switch (this.config.mode) {
      case "fail":
        log.provider.debug({ to: request.to, subject: request.subject }, "mock rejected");
        return { success: false, error: "Simulated rejection", retryable: false };

      case "transient":
        log.provider.debug({ to: request.to, subject: request.subject }, "mock unavailable");
        return { success: false, error: "Simulated outage", retryable: true };

      case "random":
        if (this.config.random() < this.config.failureRate) {
          return { success: false, error: "Simulated failure", retryable: true };
        }
        break;

      case "success":
        break;
    }

    const messageId = this.generateMessageId();
    log.provider.debug({ to: request.to, subject: request.subject, messageId }, "mock sent");

    return {
      success: true,
      providerMessageId: messageId,
    };
  }

  /** Most recent requests received, oldest first */
  get sent(): readonly SendEmailRequest[] {
    return this.history;
  }

  private generateMessageId(): string {
    this.messageCounter++;
    return `mock-${this.messageCounter.toString().padStart(6, "0")}`;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
