import { Effect, Layer } from "effect"
import { CarrierClient } from "./CarrierClient.js"
import { makeCallSimulator } from "./simulation.js"
import type { Address, OrderPayload } from "../domain/Order.js"
import { CarrierError } from "../domain/errors.js"

export const CarrierClientLive = Layer.effect(
  CarrierClient,
  Effect.gen(function* () {
    const simulateCall = yield* makeCallSimulator

    return {
      preparePackage: (order: OrderPayload, address: Address | null) =>
        Effect.gen(function* () {
          yield* simulateCall(() => new CarrierError({
            orderId: order.order_id,
            operation: "preparePackage",
            reason: "Simulated warehouse outage"
          }))

          yield* Effect.logDebug("Package prepared", {
            orderId: order.order_id,
            addressOverride: address !== null
          })
          return `Package ready for ${order.order_id}`
        }),

      dispatch: (order: OrderPayload) =>
        Effect.gen(function* () {
          yield* simulateCall(() => new CarrierError({
            orderId: order.order_id,
            operation: "dispatch",
            reason: "Simulated carrier outage"
          }))

          yield* Effect.logInfo("Package handed to carrier", { orderId: order.order_id })
          return `Dispatched ${order.order_id}`
        })
    }
  })
)
