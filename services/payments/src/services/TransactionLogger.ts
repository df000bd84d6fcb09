import { Context, Effect } from "effect"
import type { PlatformError } from "@effect/platform/Error"
import type { CustomerData } from "../domain/Customer.js"
import type { PaymentData, PaymentResponse } from "../domain/Payment.js"

// Refunds only know the transaction id, so customer and payment are optional
export interface TransactionRecord {
  readonly customer?: CustomerData
  readonly payment?: PaymentData
  readonly response: PaymentResponse
}

export class TransactionLogger extends Context.Tag("TransactionLogger")<
  TransactionLogger,
  {
    /**
     * Appends one record to the transaction log. Never truncates.
     * Write failures propagate.
     */
    readonly log: (record: TransactionRecord) => Effect.Effect<void, PlatformError>
  }
>() {}
