import { Schema } from "effect"

// Charge intent in the smallest currency unit (cents)
export class PaymentData extends Schema.Class<PaymentData>("PaymentData")({
  amount: Schema.Int,
  // Opaque payment-method token, e.g. "tok_mastercard"
  source: Schema.String
}) {}

export const PaymentStatus = Schema.Literal(
  "success",
  "failed",
  "pending",
  "refunded",
  "recurrence-active",
  "recurrence-incomplete",
  "recurrence-failed",
  "offline-processed"
)
export type PaymentStatus = typeof PaymentStatus.Type

export class PaymentResponse extends Schema.Class<PaymentResponse>("PaymentResponse")({
  status: PaymentStatus,
  amount: Schema.Int, // 0 when the payment failed
  id: Schema.optional(Schema.String),
  message: Schema.optional(Schema.String)
}) {}

// Pipeline stages of PaymentService.processPayment, in order
export type PaymentStage =
  | "received"
  | "validated"
  | "charged"
  | "notified"
  | "logged"
  | "returned"
