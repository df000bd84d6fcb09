import { Effect, Layer, Option } from "effect"
import { ChargeExecutor } from "./ChargeExecutor.js"
import { RefundExecutor } from "./RefundExecutor.js"
import { RecurrenceExecutor } from "./RecurrenceExecutor.js"
import { PaymentGateway, type ChargeRecord, type SubscriptionRecord } from "../clients/PaymentGateway.js"
import { PaymentsConfig } from "../config.js"
import { PaymentResponse, type PaymentData } from "../domain/Payment.js"
import { GatewayError } from "../domain/errors.js"
import type { CustomerData } from "../domain/Customer.js"

const fromCharge = (charge: ChargeRecord): PaymentResponse => {
  switch (charge.status) {
    case "succeeded":
      return new PaymentResponse({
        status: "success",
        amount: charge.amount,
        id: charge.id,
        message: "Payment successful"
      })
    case "pending":
      return new PaymentResponse({
        status: "pending",
        amount: charge.amount,
        id: charge.id,
        message: "Payment pending"
      })
    case "failed":
      return new PaymentResponse({
        status: "failed",
        amount: 0,
        id: charge.id,
        message: charge.failureMessage ?? "Payment failed"
      })
  }
}

const fromSubscription = (subscription: SubscriptionRecord): PaymentResponse => {
  const active = subscription.status === "active" || subscription.status === "trialing"
  return new PaymentResponse({
    status: active ? "recurrence-active" : "recurrence-incomplete",
    amount: subscription.unitAmount ?? 0,
    id: subscription.id,
    message: active ? "Recurrence payment successful" : "Recurrence payment incomplete"
  })
}

export const GatewayChargeExecutorLive = Layer.effect(
  ChargeExecutor,
  Effect.gen(function* () {
    const gateway = yield* PaymentGateway
    const config = yield* PaymentsConfig

    return {
      charge: (customer: CustomerData, payment: PaymentData) =>
        gateway.createCharge({
          amount: payment.amount,
          currency: config.currency,
          source: payment.source,
          description: `Charge for ${customer.name}`
        }).pipe(
          Effect.map(fromCharge),
          Effect.tap((response) =>
            Effect.logInfo("Charge completed", { status: response.status, transactionId: response.id })
          ),
          Effect.catchTag("GatewayError", (error) =>
            Effect.logWarning("Payment failed", {
              operation: error.operation,
              code: error.code,
              reason: error.message
            }).pipe(
              Effect.as(new PaymentResponse({ status: "failed", amount: 0, message: error.message }))
            )
          ),
          Effect.withSpan("ChargeExecutor.charge")
        )
    }
  })
)

// No reversal is performed at the gateway; the refund is acknowledged as-is.
export const GatewayRefundExecutorLive = Layer.succeed(RefundExecutor, {
  refund: (transactionId: string) =>
    Effect.logInfo("Refunding payment", { transactionId }).pipe(
      Effect.as(new PaymentResponse({
        status: "refunded",
        amount: 0,
        id: transactionId,
        message: "Payment refunded successfully"
      }))
    )
})

export const GatewayRecurrenceExecutorLive = Layer.effect(
  RecurrenceExecutor,
  Effect.gen(function* () {
    const gateway = yield* PaymentGateway
    const config = yield* PaymentsConfig

    return {
      setupRecurrence: (customer: CustomerData, payment: PaymentData) =>
        Effect.gen(function* () {
          const priceId = yield* Option.match(config.recurringPriceId, {
            onNone: () => Effect.fail(new GatewayError({
              operation: "createSubscription",
              message: "Recurring price id is not configured"
            })),
            onSome: Effect.succeed
          })

          const customerId = yield* gateway.createCustomer({
            name: customer.name,
            ...(customer.contactInfo?.email ? { email: customer.contactInfo.email } : {})
          })
          const paymentMethodId = yield* gateway.attachPaymentMethod(payment.source, customerId)
          yield* gateway.setDefaultPaymentMethod(customerId, paymentMethodId)
          const subscription = yield* gateway.createSubscription(customerId, priceId)

          yield* Effect.logInfo("Recurrence payment set up", {
            subscriptionId: subscription.id,
            status: subscription.status
          })

          return fromSubscription(subscription)
        }).pipe(
          Effect.catchTag("GatewayError", (error) =>
            Effect.logWarning("Recurrence payment failed", {
              operation: error.operation,
              reason: error.message
            }).pipe(
              Effect.as(new PaymentResponse({ status: "recurrence-failed", amount: 0, message: error.message }))
            )
          ),
          Effect.withSpan("RecurrenceExecutor.setupRecurrence")
        )
    }
  })
)

// One gateway client behind all three executor capabilities
export const GatewayPaymentProcessorLive = Layer.mergeAll(
  GatewayChargeExecutorLive,
  GatewayRefundExecutorLive,
  GatewayRecurrenceExecutorLive
)
