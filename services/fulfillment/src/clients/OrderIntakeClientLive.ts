import { Effect, Layer } from "effect"
import { OrderIntakeClient } from "./OrderIntakeClient.js"
import { makeCallSimulator } from "./simulation.js"
import type { OrderPayload } from "../domain/Order.js"
import { OrderIntakeError } from "../domain/errors.js"

// Every stub order carries the same two lines (2 x 12.50 + 1 x 17.50 = 42.50)
const stubOrderLines: OrderPayload["items"] = [
  { sku: "SKU-STANDARD", qty: 2, unit_price: 12.5 },
  { sku: "SKU-EXPRESS", qty: 1, unit_price: 17.5 }
]

export const OrderIntakeClientLive = Layer.effect(
  OrderIntakeClient,
  Effect.gen(function* () {
    const simulateCall = yield* makeCallSimulator

    return {
      fetchOrder: (orderId: string) =>
        Effect.gen(function* () {
          yield* simulateCall(() => new OrderIntakeError({
            orderId,
            operation: "fetchOrder",
            reason: "Simulated intake outage"
          }))

          yield* Effect.logDebug("Fetched order from intake", { orderId })
          return { order_id: orderId, items: stubOrderLines } satisfies OrderPayload
        }),

      validateOrder: (order: OrderPayload) =>
        Effect.gen(function* () {
          yield* simulateCall(() => new OrderIntakeError({
            orderId: order.order_id,
            operation: "validateOrder",
            reason: "Simulated validation service outage"
          }))

          const valid = order.order_id.length > 0 && order.items.length > 0
          yield* Effect.logDebug("Validated order", { orderId: order.order_id, valid })
          return valid
        })
    }
  })
)
