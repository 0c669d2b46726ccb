import { Context, Effect } from "effect"
import type { SqlError } from "@effect/sql"
import type { SignalDelivery } from "./SagaRuntime.js"
import type { SagaStatus } from "../domain/SagaState.js"
import type { SagaSignal } from "../domain/Signal.js"
import type { OrderEvent } from "../domain/OrderEvent.js"
import type { SagaAlreadyStartedError, SagaNotFoundError } from "../domain/errors.js"

export interface StartOrderResult {
  readonly sagaId: string
}

export interface LiveOrderStatus {
  readonly _tag: "Live"
  readonly status: SagaStatus
}

// Served from the event log when the saga itself cannot answer
export interface DegradedOrderStatus {
  readonly _tag: "Degraded"
  readonly queryError: string
  readonly recentEvents: readonly OrderEvent[]
}

export type OrderStatusView = LiveOrderStatus | DegradedOrderStatus

export class FulfillmentService extends Context.Tag("FulfillmentService")<
  FulfillmentService,
  {
    readonly start: (
      orderId: string,
      paymentId: string
    ) => Effect.Effect<StartOrderResult, SagaAlreadyStartedError>

    readonly signal: (
      orderId: string,
      signal: SagaSignal
    ) => Effect.Effect<SignalDelivery, SagaNotFoundError>

    /**
     * Live saga status, or the most recent audit events for the order
     * when no saga answers.
     */
    readonly query: (orderId: string) => Effect.Effect<OrderStatusView, SqlError.SqlError>
  }
>() {}
