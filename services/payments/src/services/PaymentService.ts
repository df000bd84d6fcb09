import { Context, Effect } from "effect"
import type { PlatformError } from "@effect/platform/Error"
import type { CustomerData } from "../domain/Customer.js"
import type { PaymentData, PaymentResponse } from "../domain/Payment.js"
import type {
  CapabilityUnavailableError,
  NotificationError,
  ValidationError
} from "../domain/errors.js"

export class PaymentService extends Context.Tag("PaymentService")<
  PaymentService,
  {
    /**
     * One-time payment: validate, charge, notify, log.
     * Gateway rejections are not failures here; they come back as a
     * response with status "failed". Everything else is logged and re-raised.
     */
    readonly processPayment: (
      payment: PaymentData,
      customer: CustomerData
    ) => Effect.Effect<
      PaymentResponse,
      ValidationError | NotificationError | PlatformError
    >

    /**
     * Refunds a previous transaction.
     * Fails with CapabilityUnavailableError when the service was built
     * without a RefundExecutor.
     */
    readonly refundPayment: (
      transactionId: string
    ) => Effect.Effect<PaymentResponse, CapabilityUnavailableError | PlatformError>

    /**
     * Sets up recurring billing for the customer.
     * Fails with CapabilityUnavailableError when the service was built
     * without a RecurrenceExecutor.
     */
    readonly setupRecurrencePayment: (
      payment: PaymentData,
      customer: CustomerData
    ) => Effect.Effect<PaymentResponse, CapabilityUnavailableError | PlatformError>
  }
>() {}
