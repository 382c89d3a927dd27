/**
 * Error taxonomy for the subscription service.
 *
 * Every error the request layer can see extends SubscriptionError and
 * carries a machine-readable code plus the HTTP status it maps to.
 * Transient transport failures never appear here: the delivery pipeline
 * absorbs them and only surfaces DeliveryFailedError once retries run out.
 */

import type { TokenErrorReason } from "./domain/token/types.js";
import type { DeliveryKind } from "./domain/idempotency/types.js";

export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  DUPLICATE_EMAIL: "DUPLICATE_EMAIL",
  INVALID_TOKEN: "INVALID_TOKEN",
  SUBSCRIBER_NOT_FOUND: "SUBSCRIBER_NOT_FOUND",
  DELIVERY_FAILED: "DELIVERY_FAILED",
  DELIVERY_IN_FLIGHT: "DELIVERY_IN_FLIGHT",
  CACHE_UNAVAILABLE: "CACHE_UNAVAILABLE",
  UNAUTHORIZED: "UNAUTHORIZED",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorResponse {
  /** Human-readable error message */
  error: string;
  /** Machine-readable error code */
  code: ErrorCode;
  /** Additional details (validation issues, token failure reason) */
  details?: unknown;
  requestId?: string;
}

export class SubscriptionError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  toJSON(requestId?: string): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
      ...(requestId !== undefined && { requestId }),
    };
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends SubscriptionError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], message = "Validation failed") {
    super(message, ErrorCodes.VALIDATION_ERROR, 400, issues);
    this.issues = issues;
  }

  static fromZodIssues(
    issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>
  ): ValidationError {
    return new ValidationError(
      issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    );
  }
}

/** Conflict: the email already belongs to a subscriber in some status. */
export class DuplicateEmailError extends SubscriptionError {
  constructor(readonly email: string, options?: { cause?: unknown }) {
    super("Email is already subscribed", ErrorCodes.DUPLICATE_EMAIL, 409, undefined, options);
  }
}

const TOKEN_MESSAGES: Record<TokenErrorReason, string> = {
  malformed: "Confirmation link is invalid",
  signature_mismatch: "Confirmation link is invalid, contact support if this persists",
  expired: "Confirmation link has expired, subscribe again to receive a new one",
};

export class InvalidTokenError extends SubscriptionError {
  constructor(readonly reason: TokenErrorReason) {
    super(TOKEN_MESSAGES[reason], ErrorCodes.INVALID_TOKEN, 401, { reason });
  }
}

export class SubscriberNotFoundError extends SubscriptionError {
  constructor(readonly subscriberId: string) {
    super("Subscriber not found", ErrorCodes.SUBSCRIBER_NOT_FOUND, 404);
  }
}

/**
 * Permanent delivery failure: retries were exhausted or the transport
 * rejected the message outright. The subscriber keeps its status.
 */
export class DeliveryFailedError extends SubscriptionError {
  constructor(
    readonly subscriberId: string,
    readonly kind: DeliveryKind,
    readonly reason: string,
    readonly attempts: number
  ) {
    super("Email could not be delivered", ErrorCodes.DELIVERY_FAILED, 502, {
      subscriberId,
      kind,
    });
  }
}

/** Another worker still holds the delivery lease and did not settle in time. */
export class DeliveryInFlightError extends SubscriptionError {
  constructor(readonly subscriberId: string, readonly kind: DeliveryKind) {
    super("Delivery already in progress, retry later", ErrorCodes.DELIVERY_IN_FLIGHT, 503, {
      subscriberId,
      kind,
    });
  }
}

/**
 * The idempotency cache cannot be reached. Sending without it could
 * duplicate emails, so the request is refused instead.
 */
export class CacheUnavailableError extends SubscriptionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.CACHE_UNAVAILABLE, 503, undefined, options);
  }
}

export class UnauthorizedError extends SubscriptionError {
  constructor() {
    super("Unauthorized", ErrorCodes.UNAUTHORIZED, 401);
  }
}

/** Fatal misconfiguration: the process must not serve traffic. */
export class ConfigurationError extends SubscriptionError {
  constructor(message: string, readonly issues: string[] = []) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, 500, issues.length > 0 ? issues : undefined);
  }
}
