import { Context, Effect } from "effect"
import type { SqlError } from "@effect/sql"
import type { OrderPayload } from "../domain/Order.js"
import type { ChargeResult } from "../domain/Payment.js"
import type { ChargeUnrecordedError } from "../domain/errors.js"

export class PaymentLedger extends Context.Tag("PaymentLedger")<
  PaymentLedger,
  {
    /**
     * Charge a payment at most once per payment id.
     *
     * Declines and missing identifiers are returned as `{ status: "failed" }`.
     * A payment already CHARGED returns `{ status: "already_charged" }` without
     * reaching the gateway. Storage faults before the gateway call fail with
     * SqlError. A charge whose CHARGED mark cannot be stored fails with
     * ChargeUnrecordedError and must not be retried.
     */
    readonly charge: (
      order: OrderPayload,
      paymentId: string
    ) => Effect.Effect<ChargeResult, SqlError.SqlError | ChargeUnrecordedError>
  }
>() {}
