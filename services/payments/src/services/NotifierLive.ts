import { Effect, Layer } from "effect"
import { Notifier } from "./Notifier.js"
import { EmailTransport } from "../clients/EmailTransport.js"
import { SmsTransport } from "../clients/SmsTransport.js"
import { PaymentsConfig } from "../config.js"
import type { CustomerData } from "../domain/Customer.js"

export const CONFIRMATION_SUBJECT = "Payment Confirmation"
export const CONFIRMATION_BODY = "Thank you for your payment."

const skip = (channel: "email" | "sms", customer: CustomerData) =>
  Effect.logWarning("Notification skipped, channel not available for customer", {
    channel,
    customer: customer.name
  })

const makeEmailSender = Effect.gen(function* () {
  const config = yield* PaymentsConfig
  const transport = yield* EmailTransport

  return (to: string) =>
    transport.send({
      subject: CONFIRMATION_SUBJECT,
      from: config.notificationFromAddress,
      to,
      body: CONFIRMATION_BODY
    })
})

const makeSmsSender = Effect.gen(function* () {
  const transport = yield* SmsTransport

  return (phoneNumber: string) =>
    transport.send({ phoneNumber, body: CONFIRMATION_BODY })
})

export const EmailNotifierLive = Layer.effect(
  Notifier,
  Effect.gen(function* () {
    const sendEmail = yield* makeEmailSender

    return {
      notify: (customer: CustomerData) => {
        const email = customer.contactInfo?.email
        return email ? sendEmail(email) : skip("email", customer)
      }
    }
  })
)

export const SmsNotifierLive = Layer.effect(
  Notifier,
  Effect.gen(function* () {
    const sendSms = yield* makeSmsSender

    return {
      notify: (customer: CustomerData) => {
        const phone = customer.contactInfo?.phone
        return phone ? sendSms(phone) : skip("sms", customer)
      }
    }
  })
)

// Picks the channel per customer: email first, then SMS
export const ContactNotifierLive = Layer.effect(
  Notifier,
  Effect.gen(function* () {
    const sendEmail = yield* makeEmailSender
    const sendSms = yield* makeSmsSender

    return {
      notify: (customer: CustomerData) => {
        const contact = customer.contactInfo
        if (contact?.email) {
          return sendEmail(contact.email)
        }
        if (contact?.phone) {
          return sendSms(contact.phone)
        }
        return Effect.logWarning("No valid contact information for notification", {
          customer: customer.name
        })
      }
    }
  })
)
