import { Context, Effect } from "effect"
import type { CustomerData } from "../domain/Customer.js"
import type { NotificationError } from "../domain/errors.js"

/**
 * Sends a payment confirmation to a customer over one channel.
 * The channel is fixed by the layer the service is built with;
 * adding a channel means adding a layer, not editing the existing ones.
 */
export class Notifier extends Context.Tag("Notifier")<
  Notifier,
  {
    readonly notify: (customer: CustomerData) => Effect.Effect<void, NotificationError>
  }
>() {}
