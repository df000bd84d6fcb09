import { Effect, Layer } from "effect"
import { randomUUID } from "node:crypto"
import { ChargeExecutor } from "./ChargeExecutor.js"
import { PaymentResponse, type PaymentData } from "../domain/Payment.js"
import type { CustomerData } from "../domain/Customer.js"

// Degraded-mode fallback: records the charge locally and always succeeds
export const OfflineChargeExecutorLive = Layer.succeed(ChargeExecutor, {
  charge: (customer: CustomerData, payment: PaymentData) =>
    Effect.gen(function* () {
      const id = randomUUID()

      yield* Effect.logInfo("Offline payment processed", {
        transactionId: id,
        customer: customer.name,
        amount: payment.amount
      })

      return new PaymentResponse({
        status: "offline-processed",
        amount: payment.amount,
        id,
        message: "Offline payment processed successfully"
      })
    })
})
