/**
 * Types for payload building.
 */

/** Rendered email content, ready for a provider */
export interface EmailContent {
  subject: string;
  html: string;
  text: string;
}

export interface RecipientInfo {
  email: string;
  name: string;
}

/**
 * A newsletter issue. `version` identifies the content for delivery
 * deduplication; html and text may use {{name}} and {{email}}.
 */
export interface NewsletterIssue {
  version: string;
  subject: string;
  html: string;
  text: string;
}

export interface ConfirmationEmailContext {
  recipient: RecipientInfo;
  /** Absolute confirmation URL including the token */
  link: string;
  /** Token expiry, epoch milliseconds */
  expiresAt: number;
}
