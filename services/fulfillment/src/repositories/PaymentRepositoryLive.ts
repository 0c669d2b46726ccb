import { Layer, Effect, Option, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { PaymentRepository, type ReservePaymentResult } from "./PaymentRepository.js"
import { Payment, PaymentStatus } from "../domain/Payment.js"

interface PaymentRow {
  payment_id: string
  order_id: string
  status: string
  // NUMERIC arrives as a string
  amount: string | number
  created_at: Date
  updated_at: Date
}

const rowToPayment = (row: PaymentRow) =>
  Schema.decodeUnknown(PaymentStatus)(row.status).pipe(
    Effect.map((status) =>
      new Payment({
        paymentId: row.payment_id,
        orderId: row.order_id,
        status,
        amount: Number(row.amount),
        createdAt: DateTime.unsafeFromDate(row.created_at),
        updatedAt: DateTime.unsafeFromDate(row.updated_at)
      })
    ),
    Effect.orDie
  )

const firstPayment = (rows: ReadonlyArray<PaymentRow>) =>
  rows.length === 0
    ? Effect.succeed(Option.none<Payment>())
    : rowToPayment(rows[0]).pipe(Effect.map(Option.some))

export const PaymentRepositoryLive = Layer.effect(
  PaymentRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    const findById = (paymentId: string) =>
      Effect.gen(function* () {
        const rows = yield* sql<PaymentRow>`
          SELECT payment_id, order_id, status, amount, created_at, updated_at
          FROM payments
          WHERE payment_id = ${paymentId}
        `
        return yield* firstPayment(rows)
      })

    return {
      insertIfAbsent: (paymentId: string, orderId: string) =>
        Effect.gen(function* () {
          // Unique payment_id is the fence against duplicate reservations
          const inserted = yield* sql<PaymentRow>`
            INSERT INTO payments (payment_id, order_id, status, amount, created_at, updated_at)
            VALUES (${paymentId}, ${orderId}, 'INIT', 0, now(), now())
            ON CONFLICT (payment_id) DO NOTHING
            RETURNING payment_id, order_id, status, amount, created_at, updated_at
          `
          if (inserted.length > 0) {
            yield* Effect.logDebug("Reserved payment row", { paymentId, orderId })
            return { _tag: "Reserved", payment: yield* rowToPayment(inserted[0]) } satisfies ReservePaymentResult
          }

          const existing = yield* findById(paymentId)
          if (Option.isNone(existing)) {
            return yield* Effect.dieMessage(`Payment ${paymentId} vanished after conflicting insert`)
          }
          return { _tag: "AlreadyExists", payment: existing.value } satisfies ReservePaymentResult
        }),

      findById,

      // Nested under the charge lock this is a savepoint: a failed write leaves the lock's
      // transaction usable, so the write can be retried without releasing the row
      markCharged: (paymentId: string, amount: number) =>
        Effect.gen(function* () {
          const rows = yield* sql<PaymentRow>`
            UPDATE payments
            SET status = 'CHARGED', amount = ${amount}, updated_at = now()
            WHERE payment_id = ${paymentId} AND status <> 'CHARGED'
            RETURNING payment_id, order_id, status, amount, created_at, updated_at
          `
          yield* Effect.logDebug("Marked payment charged", { paymentId, amount, updated: rows.length })
          return yield* firstPayment(rows)
        }).pipe(sql.withTransaction),

      markFailed: (paymentId: string) =>
        Effect.gen(function* () {
          const rows = yield* sql<PaymentRow>`
            UPDATE payments
            SET status = 'FAILED', updated_at = now()
            WHERE payment_id = ${paymentId} AND status <> 'CHARGED'
            RETURNING payment_id, order_id, status, amount, created_at, updated_at
          `
          yield* Effect.logDebug("Marked payment failed", { paymentId, updated: rows.length })
          return yield* firstPayment(rows)
        }).pipe(sql.withTransaction),

      withChargeLock: <A, E, R>(paymentId: string, effect: Effect.Effect<A, E, R>) =>
        sql.withTransaction(
          Effect.gen(function* () {
            // Row lock held until the transaction ends
            yield* sql`SELECT payment_id FROM payments WHERE payment_id = ${paymentId} FOR UPDATE`
            return yield* effect
          })
        )
    }
  })
)
