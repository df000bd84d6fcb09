import { ConfigError, Effect, Layer } from "effect"
import { PaymentService } from "./services/PaymentService.js"
import { ContactInfo, CustomerData } from "./domain/Customer.js"
import { PaymentData } from "./domain/Payment.js"
import {
  BillingPaymentServiceLive,
  OfflinePaymentServiceLive,
  SmsPaymentServiceLive
} from "./layers.js"

const customerWithEmail = new CustomerData({
  name: "John Doe",
  contactInfo: new ContactInfo({ email: "example@mail.com" })
})

const customerWithPhone = new CustomerData({
  name: "Jane Roe",
  contactInfo: new ContactInfo({ phone: "1234567890" })
})

const payment = new PaymentData({ amount: 500, source: "tok_mastercard" })

// Each flow builds its own PaymentService, so collaborators are never shared
const processWith = <E>(
  layer: Layer.Layer<PaymentService, E>,
  customer: CustomerData
) =>
  Effect.gen(function* () {
    const service = yield* PaymentService
    const response = yield* service.processPayment(payment, customer)
    yield* Effect.logInfo("Payment processed", {
      customer: customer.name,
      status: response.status,
      transactionId: response.id
    })
    return response
  }).pipe(Effect.provide(layer))

// Gateway flows need STRIPE_SECRET_KEY; without it they are skipped
const processWithGateway = (
  layer: Layer.Layer<PaymentService, ConfigError.ConfigError>,
  customer: CustomerData
) =>
  processWith(layer, customer).pipe(
    Effect.asVoid,
    Effect.catchIf(ConfigError.isConfigError, (error) =>
      Effect.logWarning("Gateway flow skipped, configuration incomplete", {
        customer: customer.name,
        error: String(error)
      })
    )
  )

/**
 * Demonstration run: the same pipeline composed three ways.
 * Offline, gateway-backed with email, and gateway-backed with SMS.
 */
export const main = Effect.gen(function* () {
  yield* Effect.logInfo("Payments demo starting...")

  yield* processWith(OfflinePaymentServiceLive, customerWithEmail)
  yield* processWithGateway(BillingPaymentServiceLive, customerWithEmail)
  yield* processWithGateway(SmsPaymentServiceLive, customerWithPhone)

  yield* Effect.logInfo("Payments demo finished")
}).pipe(Effect.withSpan("payments-demo"))
