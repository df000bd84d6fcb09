import { Effect, Layer, Option, Redacted } from "effect"
import nodemailer, { type Transporter } from "nodemailer"
import { EmailTransport, type EmailMessage } from "./EmailTransport.js"
import { PaymentsConfig, type SmtpSettings } from "../config.js"
import { NotificationError } from "../domain/errors.js"

const createTransporter = (smtp: Option.Option<SmtpSettings>): Transporter =>
  Option.match(smtp, {
    // Renders the MIME message without delivering it
    onNone: () => nodemailer.createTransport({ jsonTransport: true }),
    onSome: (settings) =>
      nodemailer.createTransport({
        host: settings.host,
        port: settings.port,
        auth: Option.isSome(settings.user)
          ? {
              user: settings.user.value,
              pass: Option.match(settings.password, {
                onNone: () => undefined,
                onSome: Redacted.value
              })
            }
          : undefined
      })
  })

/**
 * Wraps a nodemailer transporter; any rejection from `sendMail` becomes a
 * NotificationError on the email channel.
 */
export const makeEmailTransport = (transporter: Pick<Transporter, "sendMail">) =>
  EmailTransport.of({
    send: (message: EmailMessage) =>
      Effect.tryPromise({
        try: () =>
          transporter.sendMail({
            subject: message.subject,
            from: message.from,
            to: message.to,
            text: message.body
          }),
        catch: (cause) =>
          new NotificationError({
            channel: "email",
            reason: `Failed to send email to ${message.to}`,
            cause
          })
      }).pipe(
        Effect.tap(() => Effect.logInfo("Email sent", { to: message.to, subject: message.subject })),
        Effect.asVoid
      )
  })

export const EmailTransportLive = Layer.effect(
  EmailTransport,
  Effect.gen(function* () {
    const config = yield* PaymentsConfig

    if (Option.isNone(config.smtp)) {
      yield* Effect.logWarning("SMTP_HOST not set, emails are rendered but not delivered")
    }

    return makeEmailTransport(createTransporter(config.smtp))
  })
)
