import { Data } from "effect"

/**
 * Customer or payment data is structurally invalid.
 * Raised before any external effect and always surfaced to the caller.
 */
export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly field: "name" | "contactInfo" | "amount" | "source"
  readonly reason: string
}> {}

/**
 * The payment gateway rejected a call (card declined, network rejection, ...).
 * Contained by the executors and turned into a failed PaymentResponse.
 */
export class GatewayError extends Data.TaggedError("GatewayError")<{
  readonly operation: string
  readonly message: string
  readonly code?: string
}> {}

// Refund or recurrence requested from a service composed without that executor
export class CapabilityUnavailableError extends Data.TaggedError("CapabilityUnavailableError")<{
  readonly capability: "refund" | "recurrence"
}> {}

// Email or SMS transport failed to hand the message over
export class NotificationError extends Data.TaggedError("NotificationError")<{
  readonly channel: "email" | "sms"
  readonly reason: string
  readonly cause?: unknown
}> {}
