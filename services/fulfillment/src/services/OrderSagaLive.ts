import { Duration, Effect, Either, Layer } from "effect"
import { OrderSaga } from "./OrderSaga.js"
import { SagaRuntime, type SagaContext } from "./SagaRuntime.js"
import { ShippingSaga } from "./ShippingSaga.js"
import { ActivityExecutor } from "./ActivityExecutor.js"
import { OrderActivities } from "./OrderActivities.js"
import { FulfillmentConfig } from "../config.js"
import { emptyOrderPayload } from "../domain/Order.js"
import type { OrderSagaResult } from "../domain/SagaResult.js"
import type { ActivityExhaustedError } from "../domain/errors.js"

type Stage = "RECEIVE" | "VALIDATION" | "CHARGE"

const stageLabels: Record<Stage, string> = {
  RECEIVE: "Receive",
  VALIDATION: "Validation",
  CHARGE: "Charge"
}

export const activityErrorText = (stage: Stage, error: ActivityExhaustedError): string =>
  error.fault === "timeout"
    ? `Activity task timed out during ${stage}`
    : `${stageLabels[stage]} error: ${error.reason}`

export const OrderSagaLive = Layer.effect(
  OrderSaga,
  Effect.gen(function* () {
    const config = yield* FulfillmentConfig
    const runtime = yield* SagaRuntime
    const shipping = yield* ShippingSaga
    const executor = yield* ActivityExecutor
    const activities = yield* OrderActivities

    const recordError = (context: SagaContext, lastError: string) =>
      context.update((state) => ({ ...state, lastError })).pipe(
        Effect.zipRight(Effect.logError("Order saga step failed", {
          sagaId: context.sagaId,
          error: lastError
        }))
      )

    const run = (orderId: string, paymentId: string) => (context: SagaContext) =>
      Effect.gen(function* () {
        // 1. Receive; an unusable order continues as an empty one
        yield* context.transition("RECEIVING_ORDER")
        const order = yield* executor
          .execute("ReceiveOrder", activities.receiveOrder(orderId))
          .pipe(
            Effect.catchTag("ActivityExhaustedError", (error) =>
              recordError(context, activityErrorText("RECEIVE", error)).pipe(
                Effect.as(emptyOrderPayload(orderId))
              )
            )
          )
        yield* context.applyPendingSignals

        // 2. Validate; the verdict is only acted on after the approval gate
        yield* context.transition("VALIDATING_ORDER")
        const valid = yield* executor
          .execute("ValidateOrder", activities.validateOrder(order))
          .pipe(
            Effect.catchTag("ActivityExhaustedError", (error) =>
              recordError(context, activityErrorText("VALIDATION", error)).pipe(Effect.as(false))
            )
          )

        // 3. Approval gate
        yield* context.transition("WAITING_FOR_APPROVAL")
        const resolved = yield* context.awaitCondition(
          (state) => state.approved || state.cancelled,
          Duration.millis(config.approvalWindowMs)
        )
        const gate = yield* context.state
        yield* Effect.logInfo("Approval gate resolved", {
          sagaId: context.sagaId,
          resolved,
          approved: gate.approved,
          cancelled: gate.cancelled
        })

        if (gate.cancelled) {
          yield* context.transition("CANCELLED")
          return { status: "cancelled", orderId } satisfies OrderSagaResult
        }

        if (!gate.approved) {
          const error = gate.lastError ?? "Manual review timed out"
          yield* context.update((state) => ({ ...state, lastError: error }))
          yield* context.transition("AWAITING_APPROVAL_TIMEOUT")
          return { status: "manual_review_timeout", orderId, error } satisfies OrderSagaResult
        }

        if (!valid) {
          const error = gate.lastError ?? "Order validation failed"
          yield* context.update((state) => ({ ...state, lastError: error }))
          yield* context.transition("VALIDATION_FAILED")
          return { status: "validation_failed", orderId, error } satisfies OrderSagaResult
        }

        // 4. Charge
        yield* context.transition("CHARGING_PAYMENT")
        const charge = yield* executor
          .execute("ChargePayment", activities.chargePayment({ order, payment_id: paymentId }))
          .pipe(Effect.either)

        if (Either.isLeft(charge)) {
          const error = activityErrorText("CHARGE", charge.left)
          yield* recordError(context, error)
          yield* context.transition("CHARGE_FAILED")
          return { status: "payment_failed", orderId, error } satisfies OrderSagaResult
        }

        const payment = charge.right
        if (payment.status === "failed") {
          const error = `Charge error: ${payment.error}`
          yield* recordError(context, error)
          yield* context.transition("CHARGE_FAILED")
          return { status: "payment_failed", orderId, error } satisfies OrderSagaResult
        }
        yield* context.applyPendingSignals

        // 5. Hand off to shipping without waiting for it
        yield* context.transition("STARTING_SHIPPING")
        const { addressOverride } = yield* context.state
        const started = yield* shipping
          .start({ order, parentSagaId: context.sagaId, address: addressOverride })
          .pipe(Effect.either)

        if (Either.isLeft(started)) {
          const error = `Failed to start shipping child saga: saga ${started.left.sagaId} is already running`
          yield* recordError(context, error)
          yield* context.transition("SHIPPING_START_FAILED")
          return { status: "shipping_start_failed", orderId, error } satisfies OrderSagaResult
        }

        yield* context.update((state) => ({ ...state, lastError: null }))
        yield* context.transition("COMPLETED")
        return { status: "success", orderId, payment } satisfies OrderSagaResult
      })

    return {
      start: (orderId: string, paymentId: string) =>
        runtime.spawn<OrderSagaResult>({
          sagaId: orderId,
          kind: "OrderSaga",
          orderId,
          run: run(orderId, paymentId)
        })
    }
  })
)
