import { describe, it, expect } from "vitest"
import { Effect, Exit, Layer, Option } from "effect"
import { Notifier } from "../services/Notifier.js"
import {
  CONFIRMATION_BODY,
  CONFIRMATION_SUBJECT,
  ContactNotifierLive,
  EmailNotifierLive,
  SmsNotifierLive
} from "../services/NotifierLive.js"
import { EmailTransport, type EmailMessage } from "../clients/EmailTransport.js"
import { SmsTransport, type SmsMessage } from "../clients/SmsTransport.js"
import { PaymentsConfig } from "../config.js"
import { ContactInfo, CustomerData } from "../domain/Customer.js"
import { NotificationError } from "../domain/errors.js"

// ═══════════════════════════════════════════════════════════════════════════
// Mock Factories
// ═══════════════════════════════════════════════════════════════════════════

interface Sent {
  readonly emails: EmailMessage[]
  readonly sms: SmsMessage[]
}

const createMockConfig = () =>
  Layer.succeed(PaymentsConfig, {
    currency: "usd",
    recurringPriceId: Option.none(),
    transactionLogPath: "transactions.log",
    notificationFromAddress: "no-reply@example.com",
    smsGatewayName: "test-sms-gateway",
    smtp: Option.none()
  })

const createMockTransports = (sent: Sent, overrides: {
  sendEmail?: (message: EmailMessage) => Effect.Effect<void, NotificationError>
} = {}) =>
  Layer.merge(
    Layer.succeed(EmailTransport, {
      send: overrides.sendEmail ?? ((message) => Effect.sync(() => {
        sent.emails.push(message)
      }))
    }),
    Layer.succeed(SmsTransport, {
      send: (message) => Effect.sync(() => {
        sent.sms.push(message)
      })
    })
  )

const notifyWith = (
  notifierLayer: Layer.Layer<Notifier, never, PaymentsConfig | EmailTransport | SmsTransport>,
  customer: CustomerData,
  transports: Layer.Layer<EmailTransport | SmsTransport>
) =>
  Effect.flatMap(Notifier, (notifier) => notifier.notify(customer)).pipe(
    Effect.provide(notifierLayer.pipe(
      Layer.provide(transports),
      Layer.provide(createMockConfig())
    )),
    Effect.runPromiseExit
  )

const emailCustomer = new CustomerData({
  name: "John Doe",
  contactInfo: new ContactInfo({ email: "example@mail.com" })
})

const phoneCustomer = new CustomerData({
  name: "John Doe",
  contactInfo: new ContactInfo({ phone: "1234567890" })
})

const bothChannelsCustomer = new CustomerData({
  name: "John Doe",
  contactInfo: new ContactInfo({ email: "example@mail.com", phone: "1234567890" })
})

// ═══════════════════════════════════════════════════════════════════════════
// Tests
// ═══════════════════════════════════════════════════════════════════════════

describe("Notifier", () => {
  describe("EmailNotifierLive", () => {
    it("should send the confirmation email", async () => {
      const sent: Sent = { emails: [], sms: [] }

      const exit = await notifyWith(EmailNotifierLive, emailCustomer, createMockTransports(sent))

      expect(Exit.isSuccess(exit)).toBe(true)
      expect(sent.emails).toEqual([{
        subject: "Payment Confirmation",
        from: "no-reply@example.com",
        to: "example@mail.com",
        body: "Thank you for your payment."
      }])
      expect(sent.sms).toHaveLength(0)
    })

    it("should skip a customer without an email", async () => {
      const sent: Sent = { emails: [], sms: [] }

      const exit = await notifyWith(EmailNotifierLive, phoneCustomer, createMockTransports(sent))

      expect(Exit.isSuccess(exit)).toBe(true)
      expect(sent.emails).toHaveLength(0)
      expect(sent.sms).toHaveLength(0)
    })

    it("should propagate transport failures", async () => {
      const sent: Sent = { emails: [], sms: [] }
      const transports = createMockTransports(sent, {
        sendEmail: () => Effect.fail(new NotificationError({ channel: "email", reason: "SMTP unavailable" }))
      })

      const exit = await notifyWith(EmailNotifierLive, emailCustomer, transports)

      expect(Exit.isFailure(exit)).toBe(true)
      if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
        expect(exit.cause.error._tag).toBe("NotificationError")
        expect(exit.cause.error.channel).toBe("email")
      }
    })
  })

  describe("SmsNotifierLive", () => {
    it("should send exactly one SMS and no email", async () => {
      const sent: Sent = { emails: [], sms: [] }

      const exit = await notifyWith(SmsNotifierLive, phoneCustomer, createMockTransports(sent))

      expect(Exit.isSuccess(exit)).toBe(true)
      expect(sent.sms).toEqual([{ phoneNumber: "1234567890", body: CONFIRMATION_BODY }])
      expect(sent.emails).toHaveLength(0)
    })

    it("should use the phone even when an email is present", async () => {
      const sent: Sent = { emails: [], sms: [] }

      await notifyWith(SmsNotifierLive, bothChannelsCustomer, createMockTransports(sent))

      expect(sent.sms).toHaveLength(1)
      expect(sent.emails).toHaveLength(0)
    })
  })

  describe("ContactNotifierLive", () => {
    it("should prefer email when both channels are present", async () => {
      const sent: Sent = { emails: [], sms: [] }

      await notifyWith(ContactNotifierLive, bothChannelsCustomer, createMockTransports(sent))

      expect(sent.emails).toHaveLength(1)
      expect(sent.emails[0]?.subject).toBe(CONFIRMATION_SUBJECT)
      expect(sent.sms).toHaveLength(0)
    })

    it("should fall back to SMS when there is no email", async () => {
      const sent: Sent = { emails: [], sms: [] }

      await notifyWith(ContactNotifierLive, phoneCustomer, createMockTransports(sent))

      expect(sent.emails).toHaveLength(0)
      expect(sent.sms).toEqual([{ phoneNumber: "1234567890", body: CONFIRMATION_BODY }])
    })

    it("should do nothing when no channel is reachable", async () => {
      const sent: Sent = { emails: [], sms: [] }
      const unreachable = new CustomerData({ name: "John Doe", contactInfo: new ContactInfo({}) })

      const exit = await notifyWith(ContactNotifierLive, unreachable, createMockTransports(sent))

      expect(Exit.isSuccess(exit)).toBe(true)
      expect(sent.emails).toHaveLength(0)
      expect(sent.sms).toHaveLength(0)
    })

    it("should do nothing when contact info is missing", async () => {
      const sent: Sent = { emails: [], sms: [] }

      const exit = await notifyWith(ContactNotifierLive, new CustomerData({ name: "John Doe" }), createMockTransports(sent))

      expect(Exit.isSuccess(exit)).toBe(true)
      expect(sent.emails).toHaveLength(0)
      expect(sent.sms).toHaveLength(0)
    })
  })
})
