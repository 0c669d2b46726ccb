import { Context, Effect, Option } from "effect"
import type { SqlError } from "@effect/sql"
import type { Payment } from "../domain/Payment.js"

// Result of the insert-if-absent reservation
export type ReservePaymentResult =
  | { readonly _tag: "Reserved"; readonly payment: Payment }
  | { readonly _tag: "AlreadyExists"; readonly payment: Payment }

export class PaymentRepository extends Context.Tag("PaymentRepository")<
  PaymentRepository,
  {
    /**
     * Reserves an INIT row for the payment id.
     * No-op if a row already exists; the existing row is returned instead.
     */
    readonly insertIfAbsent: (
      paymentId: string,
      orderId: string
    ) => Effect.Effect<ReservePaymentResult, SqlError.SqlError>

    readonly findById: (
      paymentId: string
    ) => Effect.Effect<Option.Option<Payment>, SqlError.SqlError>

    /**
     * Marks the payment CHARGED with the amount.
     * Returns Option.none() when the row is missing or already CHARGED.
     */
    readonly markCharged: (
      paymentId: string,
      amount: number
    ) => Effect.Effect<Option.Option<Payment>, SqlError.SqlError>

    /**
     * Marks the payment FAILED unless it is already CHARGED.
     */
    readonly markFailed: (
      paymentId: string
    ) => Effect.Effect<Option.Option<Payment>, SqlError.SqlError>

    /**
     * Runs `effect` while holding the payment row's charge lock.
     * Concurrent holders for the same payment id are serialized.
     */
    readonly withChargeLock: <A, E, R>(
      paymentId: string,
      effect: Effect.Effect<A, E, R>
    ) => Effect.Effect<A, E | SqlError.SqlError, R>
  }
>() {}
