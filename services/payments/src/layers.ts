import { Layer } from "effect"
import { NodeFileSystem } from "@effect/platform-node"
import { PaymentsConfigLive, StripeConfigLive } from "./config.js"
import { StripeGatewayLive } from "./clients/StripeGatewayLive.js"
import { EmailTransportLive } from "./clients/EmailTransportLive.js"
import { SmsTransportLive } from "./clients/SmsTransportLive.js"
import { PaymentServiceLive } from "./services/PaymentServiceLive.js"
import { PaymentValidatorLive } from "./services/PaymentValidatorLive.js"
import { TransactionLoggerLive } from "./services/TransactionLoggerLive.js"
import { EmailNotifierLive, SmsNotifierLive } from "./services/NotifierLive.js"
import { OfflineChargeExecutorLive } from "./services/OfflineChargeExecutorLive.js"
import {
  GatewayChargeExecutorLive,
  GatewayPaymentProcessorLive
} from "./services/GatewayPaymentProcessorLive.js"

/**
 * Builds a PaymentService from a set of capability layers. The validator and
 * transaction logger are always included; the charge executor and notifier
 * must come from `capabilities`, and refund/recurrence executors may.
 */
export const makePaymentServiceLayer = <ROut, E, RIn>(
  capabilities: Layer.Layer<ROut, E, RIn>
) =>
  PaymentServiceLive.pipe(
    Layer.provide(capabilities),
    Layer.provide(Layer.merge(PaymentValidatorLive, TransactionLoggerLive))
  )

// Config, notification transports and the file system for the transaction log
export const InfrastructureLive = Layer.mergeAll(
  PaymentsConfigLive,
  NodeFileSystem.layer,
  Layer.merge(EmailTransportLive, SmsTransportLive).pipe(Layer.provide(PaymentsConfigLive))
)

// Only compositions that reach the gateway need STRIPE_SECRET_KEY
export const GatewayLive = StripeGatewayLive.pipe(Layer.provide(StripeConfigLive))

// Default composition: gateway charges, email confirmations, no refund/recurrence
export const PaymentServiceDefaultLive = makePaymentServiceLayer(
  Layer.merge(GatewayChargeExecutorLive, EmailNotifierLive)
).pipe(
  Layer.provide(GatewayLive),
  Layer.provide(InfrastructureLive)
)

export const BillingPaymentServiceLive = makePaymentServiceLayer(
  Layer.merge(GatewayPaymentProcessorLive, EmailNotifierLive)
).pipe(
  Layer.provide(GatewayLive),
  Layer.provide(InfrastructureLive)
)

export const SmsPaymentServiceLive = makePaymentServiceLayer(
  Layer.merge(GatewayChargeExecutorLive, SmsNotifierLive)
).pipe(
  Layer.provide(GatewayLive),
  Layer.provide(InfrastructureLive)
)

export const OfflinePaymentServiceLive = makePaymentServiceLayer(
  Layer.merge(OfflineChargeExecutorLive, EmailNotifierLive)
).pipe(Layer.provide(InfrastructureLive))
