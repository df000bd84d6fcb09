import { Context, Effect } from "effect"
import type { NotificationError } from "../domain/errors.js"

export interface SmsMessage {
  readonly phoneNumber: string
  readonly body: string
}

export class SmsTransport extends Context.Tag("SmsTransport")<
  SmsTransport,
  {
    readonly send: (message: SmsMessage) => Effect.Effect<void, NotificationError>
  }
>() {}
