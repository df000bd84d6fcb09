import { Context, Effect } from "effect"
import type { CustomerData } from "../domain/Customer.js"
import type { PaymentData } from "../domain/Payment.js"
import type { ValidationError } from "../domain/errors.js"

export class PaymentValidator extends Context.Tag("PaymentValidator")<
  PaymentValidator,
  {
    /**
     * Fails when the name is empty, contact info is absent,
     * or neither email nor phone is present.
     */
    readonly validateCustomer: (customer: CustomerData) => Effect.Effect<void, ValidationError>

    // Fails when amount <= 0 or source is empty
    readonly validatePayment: (payment: PaymentData) => Effect.Effect<void, ValidationError>
  }
>() {}
