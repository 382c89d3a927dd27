/**
 * Email payload builders - pure functions.
 */

import { escapeHtml, interpolateVariables } from "../utils/template.js";
import type {
  ConfirmationEmailContext,
  EmailContent,
  NewsletterIssue,
  RecipientInfo,
} from "./types.js";

export const CONFIRMATION_SUBJECT = "Confirm your subscription";

/**
 * Build the confirmation URL for a token.
 *
 * @example
 * buildConfirmationLink("https://news.example.com", "abc.1.2.ff")
 * // "https://news.example.com/subscriptions/confirm?token=abc.1.2.ff"
 */
export function buildConfirmationLink(baseUrl: string, tokenValue: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  return `${base}/subscriptions/confirm?token=${encodeURIComponent(tokenValue)}`;
}

export function buildConfirmationEmail(context: ConfirmationEmailContext): EmailContent {
  const { recipient, link, expiresAt } = context;
  const expiry = new Date(expiresAt).toUTCString();

  return {
    subject: CONFIRMATION_SUBJECT,
    html:
      `<p>Hi ${escapeHtml(recipient.name)},</p>` +
      `<p>Welcome to our newsletter! Please <a href="${escapeHtml(link)}">confirm your subscription</a>.</p>` +
      `<p>This link expires on ${expiry}.</p>`,
    text:
      `Hi ${recipient.name},\n\n` +
      `Welcome to our newsletter! Visit ${link} to confirm your subscription.\n\n` +
      `This link expires on ${expiry}.`,
  };
}

/**
 * Render a newsletter issue for one recipient.
 * Variables are HTML-escaped in the html body only.
 */
export function buildIssueEmail(issue: NewsletterIssue, recipient: RecipientInfo): EmailContent {
  const variables = { name: recipient.name, email: recipient.email };

  return {
    subject: interpolateVariables(issue.subject, variables),
    html: interpolateVariables(issue.html, variables, escapeHtml),
    text: interpolateVariables(issue.text, variables),
  };
}
