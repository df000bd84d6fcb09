import { FileSystem } from "@effect/platform"
import { Effect, Layer } from "effect"
import { TransactionLogger, type TransactionRecord } from "./TransactionLogger.js"
import { PaymentsConfig } from "../config.js"

export const formatTransactionRecord = (record: TransactionRecord): string => {
  const lines: string[] = []
  if (record.customer && record.payment) {
    lines.push(`${record.customer.name} paid ${record.payment.amount}`)
  }
  if (record.response.id) {
    lines.push(`Transaction ID: ${record.response.id}`)
  }
  lines.push(`Status: ${record.response.status}`)
  return lines.map((line) => `${line}\n`).join("")
}

export const TransactionLoggerLive = Layer.effect(
  TransactionLogger,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const config = yield* PaymentsConfig

    return {
      log: (record: TransactionRecord) =>
        fs.writeFileString(config.transactionLogPath, formatTransactionRecord(record), { flag: "a" }).pipe(
          Effect.tap(() =>
            Effect.logDebug("Transaction logged", {
              path: config.transactionLogPath,
              status: record.response.status
            })
          )
        )
    }
  })
)
