import { Effect, Layer } from "effect"
import { PaymentValidator } from "./PaymentValidator.js"
import { ValidationError } from "../domain/errors.js"
import type { CustomerData } from "../domain/Customer.js"
import type { PaymentData } from "../domain/Payment.js"

const reject = (field: ValidationError["field"], reason: string) =>
  Effect.logWarning("Invalid payment request", { field, reason }).pipe(
    Effect.zipRight(Effect.fail(new ValidationError({ field, reason })))
  )

export const PaymentValidatorLive = Layer.succeed(PaymentValidator, {
  validateCustomer: (customer: CustomerData) =>
    Effect.gen(function* () {
      if (!customer.name) {
        return yield* reject("name", "missing name")
      }
      if (!customer.contactInfo) {
        return yield* reject("contactInfo", "missing contact info")
      }
      if (!customer.contactInfo.email && !customer.contactInfo.phone) {
        return yield* reject("contactInfo", "missing email or phone")
      }
    }),

  validatePayment: (payment: PaymentData) =>
    Effect.gen(function* () {
      if (payment.amount <= 0) {
        return yield* reject("amount", "amount must be positive")
      }
      if (!payment.source) {
        return yield* reject("source", "missing payment source")
      }
    })
})
