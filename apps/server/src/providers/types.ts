/**
 * Email provider abstraction layer
 * Allows swapping between Resend and the mock provider
 */

export interface SendEmailRequest {
  to: string;
  from: string;
  fromName?: string;
  subject: string;
  html: string;
  text: string;
}

export interface SendEmailResult {
  success: boolean;
  providerMessageId?: string;
  error?: string;
  /**
   * Whether retrying may succeed. Providers set false for rejections that
   * will never succeed (invalid recipient, bad credentials); omitted means
   * the failure is treated as transient.
   */
  retryable?: boolean;
}

export interface EmailProvider {
  /** Provider name for logging */
  name: string;

  /** Send a single email */
  send(request: SendEmailRequest): Promise<SendEmailResult>;
}
