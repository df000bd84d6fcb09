import { Config, Context, Effect, Layer, Option, Redacted } from "effect"

export interface SmtpSettings {
  readonly host: string
  readonly port: number
  readonly user: Option.Option<string>
  readonly password: Option.Option<Redacted.Redacted>
}

export class PaymentsConfig extends Context.Tag("PaymentsConfig")<
  PaymentsConfig,
  {
    readonly currency: string
    readonly recurringPriceId: Option.Option<string>
    readonly transactionLogPath: string
    readonly notificationFromAddress: string
    readonly smsGatewayName: string
    // None -> emails are rendered with nodemailer's JSON transport, never sent
    readonly smtp: Option.Option<SmtpSettings>
  }
>() {}

const SmtpConfig = Config.option(
  Config.all({
    host: Config.string("SMTP_HOST"),
    port: Config.number("SMTP_PORT").pipe(Config.withDefault(587)),
    user: Config.option(Config.string("SMTP_USER")),
    password: Config.option(Config.redacted("SMTP_PASS"))
  })
)

export const PaymentsConfigLive = Layer.effect(
  PaymentsConfig,
  Effect.gen(function* () {
    return {
      currency: yield* Config.string("PAYMENT_CURRENCY").pipe(Config.withDefault("usd")),
      recurringPriceId: yield* Config.option(Config.string("STRIPE_PRICE_ID")),
      transactionLogPath: yield* Config.string("TRANSACTION_LOG_PATH").pipe(
        Config.withDefault("transactions.log")
      ),
      notificationFromAddress: yield* Config.string("NOTIFICATION_FROM_ADDRESS").pipe(
        Config.withDefault("no-reply@example.com")
      ),
      smsGatewayName: yield* Config.string("SMS_GATEWAY_NAME").pipe(
        Config.withDefault("the custom SMS Gateway")
      ),
      smtp: yield* SmtpConfig
    }
  })
)

export class StripeConfig extends Context.Tag("StripeConfig")<
  StripeConfig,
  {
    readonly secretKey: Redacted.Redacted
  }
>() {}

// Separate from PaymentsConfig so offline-only compositions never need a key
export const StripeConfigLive = Layer.effect(
  StripeConfig,
  Effect.gen(function* () {
    return {
      secretKey: yield* Config.redacted("STRIPE_SECRET_KEY")
    }
  })
)
