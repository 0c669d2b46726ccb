import { Duration, Effect, Layer } from "effect"
import { ShippingSaga, shippingSagaId } from "./ShippingSaga.js"
import { SagaRuntime, type SagaContext } from "./SagaRuntime.js"
import { ActivityExecutor } from "./ActivityExecutor.js"
import { OrderActivities } from "./OrderActivities.js"
import { EventLogRepository } from "../repositories/EventLogRepository.js"
import { FulfillmentConfig } from "../config.js"
import type { ShipmentRequest, ShippingSagaResult } from "../domain/SagaResult.js"
import { SagaSignal } from "../domain/Signal.js"
import { ShippingFailedError, type SagaFault } from "../domain/errors.js"

export const ShippingSagaLive = Layer.effect(
  ShippingSaga,
  Effect.gen(function* () {
    const config = yield* FulfillmentConfig
    const runtime = yield* SagaRuntime
    const executor = yield* ActivityExecutor
    const activities = yield* OrderActivities
    const eventLog = yield* EventLogRepository

    // The parent may be gone or finished; neither stops this saga from failing
    const notifyParent = (parentSagaId: string, reason: string) =>
      runtime.signal(parentSagaId, SagaSignal.DispatchFailed({ reason })).pipe(
        Effect.flatMap((delivery) =>
          delivery === "Dropped"
            ? Effect.logWarning("Parent saga ignored DispatchFailed", { parentSagaId })
            : Effect.void
        ),
        Effect.catchTag("SagaNotFoundError", () =>
          Effect.logWarning("Parent saga not found for DispatchFailed", { parentSagaId })
        )
      )

    const failShipment = (
      context: SagaContext,
      request: ShipmentRequest,
      reason: string
    ): Effect.Effect<never, SagaFault> =>
      Effect.gen(function* () {
        const orderId = request.order.order_id

        yield* context.update((state) => ({ ...state, lastError: reason }))
        yield* context.transition("SHIPPING_FAILED")
        yield* Effect.logError("Shipping failed", { sagaId: context.sagaId, orderId, reason })

        yield* eventLog.append(orderId, "SHIPPING_FAILED", { error: reason }).pipe(
          Effect.catchAll((error) =>
            Effect.logError("Failed to record SHIPPING_FAILED", { orderId, error: error.message })
          )
        )
        yield* notifyParent(request.parentSagaId, reason)

        return yield* Effect.fail(
          new ShippingFailedError({ sagaId: context.sagaId, orderId, reason })
        )
      })

    const run = (request: ShipmentRequest) => (context: SagaContext) =>
      Effect.gen(function* () {
        yield* context.transition("PREPARING_PACKAGE")

        return yield* Effect.gen(function* () {
          yield* executor.execute("PreparePackage", activities.preparePackage(request))
          yield* context.transition("DISPATCHING")
          yield* executor.execute("DispatchCarrier", activities.dispatchCarrier(request))
          yield* context.transition("DISPATCHED")

          return {
            status: "dispatched",
            orderId: request.order.order_id
          } satisfies ShippingSagaResult
        }).pipe(
          Effect.catchTag("ActivityExhaustedError", (exhausted) =>
            failShipment(context, request, exhausted.reason)
          )
        )
      })

    return {
      start: (request: ShipmentRequest) =>
        runtime.spawn<ShippingSagaResult>({
          sagaId: shippingSagaId(request.parentSagaId),
          kind: "ShippingSaga",
          orderId: request.order.order_id,
          run: run(request),
          executionTimeout: Duration.millis(config.shippingExecutionTimeoutMs)
        })
    }
  })
)
