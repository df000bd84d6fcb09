import { describe, it, expect } from "vitest"
import { Effect, Exit, Layer, Option } from "effect"
import { FileSystem } from "@effect/platform"
import { NodeFileSystem } from "@effect/platform-node"
import { TransactionLogger } from "../services/TransactionLogger.js"
import { TransactionLoggerLive, formatTransactionRecord } from "../services/TransactionLoggerLive.js"
import { PaymentsConfig } from "../config.js"
import { ContactInfo, CustomerData } from "../domain/Customer.js"
import { PaymentData, PaymentResponse } from "../domain/Payment.js"

const customer = new CustomerData({
  name: "John Doe",
  contactInfo: new ContactInfo({ email: "example@mail.com" })
})

const payment = new PaymentData({ amount: 500, source: "tok_mastercard" })

const success = new PaymentResponse({
  status: "success",
  amount: 500,
  id: "ch_test_123",
  message: "Payment successful"
})

const createMockConfig = (transactionLogPath: string) =>
  Layer.succeed(PaymentsConfig, {
    currency: "usd",
    recurringPriceId: Option.none(),
    transactionLogPath,
    notificationFromAddress: "no-reply@example.com",
    smsGatewayName: "test-sms-gateway",
    smtp: Option.none()
  })

// Runs `use` against a logger writing to a fresh temporary directory
const withLogFile = <A, E>(
  use: (path: string) => Effect.Effect<A, E, TransactionLogger | FileSystem.FileSystem>,
  fileName = "transactions.log"
) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const dir = yield* fs.makeTempDirectoryScoped()
    const path = `${dir}/${fileName}`
    return yield* use(path).pipe(
      Effect.provide(TransactionLoggerLive.pipe(Layer.provide(createMockConfig(path))))
    )
  }).pipe(
    Effect.scoped,
    Effect.provide(NodeFileSystem.layer),
    Effect.runPromiseExit
  )

describe("TransactionLogger", () => {
  describe("formatTransactionRecord", () => {
    it("should write name and amount, transaction id and status", () => {
      expect(formatTransactionRecord({ customer, payment, response: success })).toBe(
        "John Doe paid 500\nTransaction ID: ch_test_123\nStatus: success\n"
      )
    })

    it("should omit the transaction id line when there is none", () => {
      const failed = new PaymentResponse({ status: "failed", amount: 0, message: "Your card was declined." })

      expect(formatTransactionRecord({ customer, payment, response: failed })).toBe(
        "John Doe paid 500\nStatus: failed\n"
      )
    })

    it("should log a refund without customer and payment", () => {
      const refunded = new PaymentResponse({ status: "refunded", amount: 0, id: "ch_test_123" })

      expect(formatTransactionRecord({ response: refunded })).toBe(
        "Transaction ID: ch_test_123\nStatus: refunded\n"
      )
    })
  })

  describe("TransactionLoggerLive", () => {
    it("should append the record to the configured file", async () => {
      const exit = await withLogFile((path) =>
        Effect.gen(function* () {
          const logger = yield* TransactionLogger
          yield* logger.log({ customer, payment, response: success })
          const fs = yield* FileSystem.FileSystem
          return yield* fs.readFileString(path)
        })
      )

      expect(Exit.isSuccess(exit)).toBe(true)
      if (Exit.isSuccess(exit)) {
        expect(exit.value).toBe("John Doe paid 500\nTransaction ID: ch_test_123\nStatus: success\n")
      }
    })

    it("should never truncate existing content", async () => {
      const exit = await withLogFile((path) =>
        Effect.gen(function* () {
          const fs = yield* FileSystem.FileSystem
          yield* fs.writeFileString(path, "earlier entry\n")
          const logger = yield* TransactionLogger
          yield* logger.log({ customer, payment, response: success })
          yield* logger.log({ response: new PaymentResponse({ status: "refunded", amount: 0, id: "ch_test_123" }) })
          return yield* fs.readFileString(path)
        })
      )

      expect(Exit.isSuccess(exit)).toBe(true)
      if (Exit.isSuccess(exit)) {
        expect(exit.value).toBe(
          "earlier entry\n" +
          "John Doe paid 500\nTransaction ID: ch_test_123\nStatus: success\n" +
          "Transaction ID: ch_test_123\nStatus: refunded\n"
        )
      }
    })

    it("should propagate write failures", async () => {
      const exit = await withLogFile(
        () => Effect.flatMap(TransactionLogger, (logger) => logger.log({ customer, payment, response: success })),
        "missing-dir/transactions.log"
      )

      expect(Exit.isFailure(exit)).toBe(true)
      if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
        expect(exit.cause.error._tag).toBe("SystemError")
      }
    })
  })
})
