/**
 * Input schemas for the subscription lifecycle.
 */

import { z } from "zod";

// Control characters never belong in a display name or email header
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

export const subscribeInputSchema = z.object({
  email: z.string().trim().toLowerCase().email().max(320),
  name: z
    .string()
    .trim()
    .min(1, "name must not be empty")
    .max(256)
    .refine((name) => !CONTROL_CHARS.test(name), "name must not contain control characters"),
});

export type SubscribeInput = z.infer<typeof subscribeInputSchema>;

export const newsletterIssueSchema = z.object({
  version: z.string().trim().min(1).max(128),
  subject: z
    .string()
    .trim()
    .min(1)
    .max(998)
    .refine((subject) => !CONTROL_CHARS.test(subject), "subject must not contain control characters"),
  html: z.string().min(1),
  text: z.string().min(1),
});

export const confirmQuerySchema = z.object({
  token: z.string().min(1).max(1024),
});
