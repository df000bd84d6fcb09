import { Effect, Layer, Redacted } from "effect"
import Stripe from "stripe"
import { PaymentGateway, type CreateChargeParams, type CreateCustomerParams } from "./PaymentGateway.js"
import { StripeConfig } from "../config.js"
import { GatewayError } from "../domain/errors.js"

// Stripe rejections become GatewayError; anything else is a defect
export const callStripe = <A>(operation: string, run: () => Promise<A>) =>
  Effect.tryPromise({
    try: run,
    catch: (error) => error
  }).pipe(
    Effect.catchAll((error): Effect.Effect<never, GatewayError> =>
      error instanceof Stripe.errors.StripeError
        ? Effect.fail(new GatewayError({
            operation,
            message: error.message,
            code: error.code
          }))
        : Effect.die(error)
    ),
    Effect.withSpan(`stripe.${operation}`)
  )

export const StripeGatewayLive = Layer.effect(
  PaymentGateway,
  Effect.gen(function* () {
    const config = yield* StripeConfig
    const stripe = new Stripe(Redacted.value(config.secretKey), { typescript: true })

    return {
      createCharge: (params: CreateChargeParams) =>
        callStripe("createCharge", () =>
          stripe.charges.create({
            amount: params.amount,
            currency: params.currency,
            source: params.source,
            description: params.description
          })
        ).pipe(
          Effect.map((charge) => ({
            id: charge.id,
            amount: charge.amount,
            status: charge.status,
            ...(charge.failure_message ? { failureMessage: charge.failure_message } : {})
          }))
        ),

      createCustomer: (params: CreateCustomerParams) =>
        callStripe("createCustomer", () =>
          stripe.customers.create({
            name: params.name,
            ...(params.email ? { email: params.email } : {})
          })
        ).pipe(Effect.map((customer) => customer.id)),

      attachPaymentMethod: (paymentMethodId: string, customerId: string) =>
        callStripe("attachPaymentMethod", () =>
          stripe.paymentMethods.attach(paymentMethodId, { customer: customerId })
        ).pipe(Effect.map((paymentMethod) => paymentMethod.id)),

      setDefaultPaymentMethod: (customerId: string, paymentMethodId: string) =>
        callStripe("setDefaultPaymentMethod", () =>
          stripe.customers.update(customerId, {
            invoice_settings: { default_payment_method: paymentMethodId }
          })
        ).pipe(Effect.asVoid),

      createSubscription: (customerId: string, priceId: string) =>
        callStripe("createSubscription", () =>
          stripe.subscriptions.create({
            customer: customerId,
            items: [{ price: priceId }],
            expand: ["latest_invoice.payment_intent"]
          })
        ).pipe(
          Effect.map((subscription) => ({
            id: subscription.id,
            status: subscription.status,
            unitAmount: subscription.items.data[0]?.price.unit_amount ?? null
          }))
        )
    }
  })
)
