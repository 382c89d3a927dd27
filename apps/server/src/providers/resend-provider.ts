import { Resend } from "resend";
import type { EmailProvider, SendEmailRequest, SendEmailResult } from "./types.js";

/**
 * Resend error names that no retry will fix. Everything else (rate limits,
 * application and internal server errors, thrown network errors) is
 * reported as retryable.
 */
const PERMANENT_ERRORS = new Set<string>([
  "validation_error",
  "missing_required_field",
  "invalid_parameter",
  "invalid_from_address",
  "invalid_access",
  "invalid_api_Key",
  "missing_api_key",
  "restricted_api_key",
  "invalid_region",
  "not_found",
  "method_not_allowed",
]);

export function isRetryableResendError(name: string): boolean {
  return !PERMANENT_ERRORS.has(name);
}

export class ResendProvider implements EmailProvider {
  name = "resend";
  private client: Resend;

  constructor(apiKey: string) {
    this.client = new Resend(apiKey);
  }

  async send(request: SendEmailRequest): Promise<SendEmailResult> {
    try {
      const from = request.fromName
        ? `${request.fromName} <${request.from}>`
        : request.from;

      const result = await this.client.emails.send({
        from,
        to: request.to,
        subject: request.subject,
        html: request.html,
        text: request.text,
      });

      if (result.error) {
        return {
          success: false,
          error: result.error.message,
          retryable: isRetryableResendError(result.error.name),
        };
      }

      return {
        success: true,
        providerMessageId: result.data?.id,
      };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : "Unknown error",
        retryable: true,
      };
    }
  }
}
