import { Context, Effect } from "effect"
import type { CustomerData } from "../domain/Customer.js"
import type { PaymentData, PaymentResponse } from "../domain/Payment.js"

export class ChargeExecutor extends Context.Tag("ChargeExecutor")<
  ChargeExecutor,
  {
    /**
     * Performs the monetary transaction.
     * Never fails on gateway rejections: those come back as a
     * PaymentResponse with status "failed" and amount 0.
     */
    readonly charge: (
      customer: CustomerData,
      payment: PaymentData
    ) => Effect.Effect<PaymentResponse>
  }
>() {}
