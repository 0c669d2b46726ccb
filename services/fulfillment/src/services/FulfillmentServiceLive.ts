import { Effect, Layer } from "effect"
import { FulfillmentService, type OrderStatusView } from "./FulfillmentService.js"
import { OrderSaga } from "./OrderSaga.js"
import { SagaRuntime } from "./SagaRuntime.js"
import { EventLogRepository } from "../repositories/EventLogRepository.js"
import { FulfillmentConfig } from "../config.js"
import type { SagaSignal } from "../domain/Signal.js"

export const FulfillmentServiceLive = Layer.effect(
  FulfillmentService,
  Effect.gen(function* () {
    const config = yield* FulfillmentConfig
    const orderSaga = yield* OrderSaga
    const runtime = yield* SagaRuntime
    const eventLog = yield* EventLogRepository

    return {
      start: (orderId: string, paymentId: string) =>
        orderSaga.start(orderId, paymentId).pipe(
          Effect.map(({ sagaId }) => ({ sagaId })),
          Effect.withSpan("fulfillment-start", { attributes: { orderId } })
        ),

      signal: (orderId: string, signal: SagaSignal) =>
        runtime.signal(orderId, signal).pipe(
          Effect.withSpan("fulfillment-signal", { attributes: { orderId, signal: signal._tag } })
        ),

      query: (orderId: string) =>
        runtime.query(orderId).pipe(
          Effect.map((status): OrderStatusView => ({ _tag: "Live", status })),
          Effect.catchTag("SagaNotFoundError", () =>
            Effect.gen(function* () {
              yield* Effect.logWarning("Saga query failed - falling back to event log", { orderId })
              const recentEvents = yield* eventLog.findRecent(orderId, config.recentEventsLimit)
              return {
                _tag: "Degraded",
                queryError: `No running or finished saga for order ${orderId}`,
                recentEvents
              } satisfies OrderStatusView
            })
          ),
          Effect.withSpan("fulfillment-query", { attributes: { orderId } })
        )
    }
  })
)
