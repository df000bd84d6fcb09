import { Context, Effect } from "effect"
import type { PaymentResponse } from "../domain/Payment.js"

export class RefundExecutor extends Context.Tag("RefundExecutor")<
  RefundExecutor,
  {
    readonly refund: (transactionId: string) => Effect.Effect<PaymentResponse>
  }
>() {}
