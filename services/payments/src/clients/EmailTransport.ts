import { Context, Effect } from "effect"
import type { NotificationError } from "../domain/errors.js"

export interface EmailMessage {
  readonly subject: string
  readonly from: string
  readonly to: string
  readonly body: string
}

export class EmailTransport extends Context.Tag("EmailTransport")<
  EmailTransport,
  {
    /**
     * Hands the message to the mail transport. Fire-and-forget: success means
     * the transport accepted it, not that it was delivered.
     */
    readonly send: (message: EmailMessage) => Effect.Effect<void, NotificationError>
  }
>() {}
