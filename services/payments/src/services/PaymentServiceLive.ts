import { Effect, Layer, Option } from "effect"
import { PaymentService } from "./PaymentService.js"
import { PaymentValidator } from "./PaymentValidator.js"
import { ChargeExecutor } from "./ChargeExecutor.js"
import { Notifier } from "./Notifier.js"
import { TransactionLogger } from "./TransactionLogger.js"
import { RefundExecutor } from "./RefundExecutor.js"
import { RecurrenceExecutor } from "./RecurrenceExecutor.js"
import { CapabilityUnavailableError } from "../domain/errors.js"
import type { CustomerData } from "../domain/Customer.js"
import type { PaymentData, PaymentStage } from "../domain/Payment.js"

const enterStage = (stage: PaymentStage) => Effect.logDebug("Payment stage", { stage })

/**
 * Refund and recurrence executors are optional: a service built without
 * them rejects those use-cases with CapabilityUnavailableError.
 */
export const PaymentServiceLive = Layer.effect(
  PaymentService,
  Effect.gen(function* () {
    const validator = yield* PaymentValidator
    const chargeExecutor = yield* ChargeExecutor
    const notifier = yield* Notifier
    const transactionLogger = yield* TransactionLogger
    const refundExecutor = yield* Effect.serviceOption(RefundExecutor)
    const recurrenceExecutor = yield* Effect.serviceOption(RecurrenceExecutor)

    return {
      processPayment: (payment: PaymentData, customer: CustomerData) =>
        Effect.gen(function* () {
          yield* enterStage("received")

          // Nothing with an external effect runs before both checks pass
          yield* validator.validateCustomer(customer)
          yield* validator.validatePayment(payment)
          yield* enterStage("validated")

          const response = yield* chargeExecutor.charge(customer, payment)
          yield* enterStage("charged")

          yield* notifier.notify(customer)
          yield* enterStage("notified")

          yield* transactionLogger.log({ customer, payment, response })
          yield* enterStage("logged")

          yield* enterStage("returned")
          return response
        }).pipe(
          Effect.tapErrorCause((cause) => Effect.logError("Error processing payment", { cause })),
          Effect.withSpan("PaymentService.processPayment")
        ),

      refundPayment: (transactionId: string) =>
        Effect.gen(function* () {
          if (Option.isNone(refundExecutor)) {
            return yield* Effect.fail(new CapabilityUnavailableError({ capability: "refund" }))
          }

          const response = yield* refundExecutor.value.refund(transactionId)
          yield* transactionLogger.log({ response })
          return response
        }).pipe(
          Effect.tapErrorCause((cause) => Effect.logError("Error refunding payment", { cause })),
          Effect.withSpan("PaymentService.refundPayment")
        ),

      setupRecurrencePayment: (payment: PaymentData, customer: CustomerData) =>
        Effect.gen(function* () {
          if (Option.isNone(recurrenceExecutor)) {
            return yield* Effect.fail(new CapabilityUnavailableError({ capability: "recurrence" }))
          }

          const response = yield* recurrenceExecutor.value.setupRecurrence(customer, payment)
          yield* transactionLogger.log({ customer, payment, response })
          return response
        }).pipe(
          Effect.tapErrorCause((cause) => Effect.logError("Error setting up recurrence payment", { cause })),
          Effect.withSpan("PaymentService.setupRecurrencePayment")
        )
    }
  })
)
