import type { Config } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { log } from "../logger.js";
import type { EmailProvider } from "./types.js";
import { ResendProvider } from "./resend-provider.js";
import { MockEmailProvider } from "./mock-provider.js";

export * from "./types.js";
export { ResendProvider, isRetryableResendError } from "./resend-provider.js";
export { MockEmailProvider, type MockMode } from "./mock-provider.js";

type ProviderConfig = Pick<
  Config,
  "EMAIL_PROVIDER" | "RESEND_API_KEY" | "MOCK_MODE" | "MOCK_FAILURE_RATE" | "MOCK_LATENCY_MS"
>;

/**
 * Create the configured email provider
 */
export function createEmailProvider(config: ProviderConfig): EmailProvider {
  switch (config.EMAIL_PROVIDER) {
    case "mock": {
      const provider = new MockEmailProvider({
        mode: config.MOCK_MODE,
        failureRate: config.MOCK_FAILURE_RATE,
        latencyMs: config.MOCK_LATENCY_MS,
      });
      log.provider.info({ provider: "mock", mode: config.MOCK_MODE }, "initialized");
      return provider;
    }

    case "resend": {
      if (!config.RESEND_API_KEY) {
        throw new ConfigurationError("RESEND_API_KEY is required when EMAIL_PROVIDER=resend");
      }
      log.provider.info({ provider: "resend" }, "initialized");
      return new ResendProvider(config.RESEND_API_KEY);
    }
  }
}
