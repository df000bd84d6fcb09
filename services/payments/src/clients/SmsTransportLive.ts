import { Effect, Layer } from "effect"
import { SmsTransport, type SmsMessage } from "./SmsTransport.js"
import { PaymentsConfig } from "../config.js"

// No SMS provider is wired in; messages go to the log under the gateway's name.
export const SmsTransportLive = Layer.effect(
  SmsTransport,
  Effect.gen(function* () {
    const config = yield* PaymentsConfig

    return {
      send: (message: SmsMessage) =>
        Effect.logInfo("SMS sent", {
          gateway: config.smsGatewayName,
          phoneNumber: message.phoneNumber,
          body: message.body
        })
    }
  })
)
