import { Duration, Effect, Either, Layer, Match, Option, Schedule } from "effect"
import { PaymentLedger } from "./PaymentLedger.js"
import { PaymentRepository } from "../repositories/PaymentRepository.js"
import { EventLogRepository } from "../repositories/EventLogRepository.js"
import { OrderRepository } from "../repositories/OrderRepository.js"
import { PaymentGatewayClient } from "../clients/PaymentGatewayClient.js"
import type { OrderPayload } from "../domain/Order.js"
import type {
  ChargeResult,
  PaymentAlreadyCharged,
  PaymentChargeFailed,
  PaymentCharged
} from "../domain/Payment.js"
import { UNKNOWN_ORDER_ID } from "../domain/OrderEvent.js"
import { ChargeUnrecordedError } from "../domain/errors.js"

// What happened under the charge lock
type Settlement =
  | { readonly _tag: "AlreadyCharged"; readonly amount: number }
  | { readonly _tag: "Charged"; readonly amount: number; readonly transactionId: string }
  | { readonly _tag: "Declined"; readonly reason: string }

type Restore = <A, E, R>(effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>

// Writes made after the gateway answered are retried on their own, never the gateway call
const recordRetry = Schedule.exponential(Duration.millis(10)).pipe(
  Schedule.intersect(Schedule.recurs(3))
)

export const PaymentLedgerLive = Layer.effect(
  PaymentLedger,
  Effect.gen(function* () {
    const paymentRepo = yield* PaymentRepository
    const orderRepo = yield* OrderRepository
    const eventLog = yield* EventLogRepository
    const gateway = yield* PaymentGatewayClient

    // Runs under the lock with interruption masked; only the lookup and the gateway call can be cut short
    const settle = (order: OrderPayload, paymentId: string, restore: Restore) =>
      Effect.gen(function* () {
        const existing = yield* restore(paymentRepo.findById(paymentId))
        if (Option.isSome(existing) && existing.value.status === "CHARGED") {
          return { _tag: "AlreadyCharged", amount: existing.value.amount } satisfies Settlement
        }

        const answer = yield* restore(Effect.either(gateway.charge(order, paymentId)))

        if (Either.isLeft(answer)) {
          const reason = answer.left.reason
          yield* paymentRepo.markFailed(paymentId).pipe(
            Effect.retry(recordRetry),
            Effect.catchAll((dbError) =>
              Effect.logError("Failed to mark payment FAILED", { paymentId, error: dbError.message })
            )
          )
          return { _tag: "Declined", reason } satisfies Settlement
        }

        const { amount, transactionId } = answer.right
        yield* paymentRepo.markCharged(paymentId, amount).pipe(
          Effect.retry(recordRetry),
          Effect.catchAll((dbError) =>
            Effect.fail(
              new ChargeUnrecordedError({ paymentId, transactionId, reason: dbError.message })
            )
          )
        )
        return { _tag: "Charged", amount, transactionId } satisfies Settlement
      })

    // Audit trail after the lock is released; the payment row is already settled
    const record = (
      orderId: string,
      paymentId: string,
      settlement: Settlement
    ): Effect.Effect<ChargeResult> => {
      const bestEffort = <E extends { readonly message: string }>(
        what: string,
        write: Effect.Effect<unknown, E>
      ) =>
        write.pipe(
          Effect.retry(recordRetry),
          Effect.catchAll((dbError) =>
            Effect.logError(`Failed to record ${what}`, { orderId, paymentId, error: dbError.message })
          )
        )

      return Match.value(settlement).pipe(
        Match.tag("AlreadyCharged", ({ amount }) =>
          Effect.gen(function* () {
            yield* Effect.logInfo("Payment already charged - skipping gateway", { paymentId, amount })
            yield* bestEffort(
              "PAYMENT_ALREADY_CHARGED",
              eventLog.append(orderId, "PAYMENT_ALREADY_CHARGED", { payment_id: paymentId, amount })
            )
            return { status: "already_charged", paymentId, amount } satisfies PaymentAlreadyCharged
          })
        ),
        Match.tag("Charged", ({ amount, transactionId }) =>
          Effect.gen(function* () {
            yield* bestEffort(
              "PAYMENT_CHARGED",
              eventLog.append(orderId, "PAYMENT_CHARGED", {
                payment_id: paymentId,
                amount,
                transaction_id: transactionId
              })
            )
            yield* bestEffort("order PAID", orderRepo.upsertStatus(orderId, "PAID"))
            yield* Effect.logInfo("Payment charged", { orderId, paymentId, amount })
            return { status: "charged", paymentId, amount } satisfies PaymentCharged
          })
        ),
        Match.tag("Declined", ({ reason }) =>
          Effect.gen(function* () {
            yield* Effect.logWarning("Payment declined", { orderId, paymentId, reason })
            yield* bestEffort(
              "PAYMENT_FAILED",
              eventLog.append(orderId, "PAYMENT_FAILED", { payment_id: paymentId, error: reason })
            )
            yield* bestEffort("order PAYMENT_FAILED", orderRepo.upsertStatus(orderId, "PAYMENT_FAILED"))
            return { status: "failed", paymentId, error: reason } satisfies PaymentChargeFailed
          })
        ),
        Match.exhaustive
      )
    }

    return {
      charge: (order: OrderPayload, paymentId: string) =>
        Effect.gen(function* () {
          const orderId = order.order_id

          if (orderId.length === 0 || paymentId.length === 0) {
            const error = `missing identifiers (order_id=${orderId}, payment_id=${paymentId})`
            yield* Effect.logWarning("Refusing to charge", { error })
            yield* eventLog.append(orderId.length > 0 ? orderId : UNKNOWN_ORDER_ID, "PAYMENT_FAILED", {
              payment_id: paymentId,
              error
            })
            return { status: "failed", paymentId, error } satisfies PaymentChargeFailed
          }

          const reservation = yield* paymentRepo.insertIfAbsent(paymentId, orderId)
          yield* Effect.logDebug("Payment reserved", { paymentId, outcome: reservation._tag })

          return yield* Effect.uninterruptibleMask((restore) =>
            paymentRepo.withChargeLock(paymentId, settle(order, paymentId, restore)).pipe(
              Effect.flatMap((settlement) => record(orderId, paymentId, settlement))
            )
          )
        }).pipe(
          Effect.tapErrorTag("ChargeUnrecordedError", (error) =>
            Effect.logError("Payment charged but not recorded", {
              paymentId: error.paymentId,
              transactionId: error.transactionId,
              error: error.reason
            })
          ),
          Effect.withSpan("payment-ledger-charge", { attributes: { paymentId } })
        )
    }
  })
)
