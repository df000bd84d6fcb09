import { Context, Effect } from "effect"
import type { CustomerData } from "../domain/Customer.js"
import type { PaymentData, PaymentResponse } from "../domain/Payment.js"

export class RecurrenceExecutor extends Context.Tag("RecurrenceExecutor")<
  RecurrenceExecutor,
  {
    /**
     * Creates a gateway customer, attaches the payment source as its default
     * method and subscribes it to the configured recurring price.
     * The response amount is the subscription's unit price, not payment.amount.
     * Gateway rejections come back with status "recurrence-failed".
     */
    readonly setupRecurrence: (
      customer: CustomerData,
      payment: PaymentData
    ) => Effect.Effect<PaymentResponse>
  }
>() {}
