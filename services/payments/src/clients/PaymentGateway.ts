import { Context, Effect } from "effect"
import type { GatewayError } from "../domain/errors.js"

export interface CreateChargeParams {
  readonly amount: number
  readonly currency: string
  readonly source: string
  readonly description: string
}

export interface ChargeRecord {
  readonly id: string
  readonly amount: number
  readonly status: "succeeded" | "pending" | "failed"
  readonly failureMessage?: string
}

export interface CreateCustomerParams {
  readonly name: string
  readonly email?: string
}

export interface SubscriptionRecord {
  readonly id: string
  readonly status: string
  // Unit price of the subscription's first item; null for metered prices
  readonly unitAmount: number | null
}

export class PaymentGateway extends Context.Tag("PaymentGateway")<
  PaymentGateway,
  {
    readonly createCharge: (
      params: CreateChargeParams
    ) => Effect.Effect<ChargeRecord, GatewayError>

    /**
     * Creates a billing profile at the gateway.
     * Returns the gateway's customer id.
     */
    readonly createCustomer: (
      params: CreateCustomerParams
    ) => Effect.Effect<string, GatewayError>

    readonly attachPaymentMethod: (
      paymentMethodId: string,
      customerId: string
    ) => Effect.Effect<string, GatewayError>

    readonly setDefaultPaymentMethod: (
      customerId: string,
      paymentMethodId: string
    ) => Effect.Effect<void, GatewayError>

    readonly createSubscription: (
      customerId: string,
      priceId: string
    ) => Effect.Effect<SubscriptionRecord, GatewayError>
  }
>() {}
