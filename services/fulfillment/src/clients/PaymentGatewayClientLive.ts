import { Effect, Layer } from "effect"
import { PaymentGatewayClient, type GatewayChargeResult } from "./PaymentGatewayClient.js"
import { makeCallSimulator } from "./simulation.js"
import type { OrderPayload } from "../domain/Order.js"
import { PaymentGatewayError } from "../domain/errors.js"

// Sum of line totals, rounded to cents
export const orderTotal = (order: OrderPayload): number =>
  Math.round(order.items.reduce((sum, line) => sum + line.qty * line.unit_price, 0) * 100) / 100

export const PaymentGatewayClientLive = Layer.effect(
  PaymentGatewayClient,
  Effect.gen(function* () {
    const simulateCall = yield* makeCallSimulator

    return {
      charge: (order: OrderPayload, paymentId: string) =>
        Effect.gen(function* () {
          yield* simulateCall(() => new PaymentGatewayError({
            paymentId,
            reason: "Simulated gateway timeout"
          }))

          // Magic payment ids for testing declines
          if (paymentId.includes("decline")) {
            return yield* Effect.fail(new PaymentGatewayError({
              paymentId,
              reason: "Payment declined"
            }))
          }

          const amount = orderTotal(order)
          if (amount <= 0) {
            return yield* Effect.fail(new PaymentGatewayError({
              paymentId,
              reason: "Nothing to charge"
            }))
          }

          yield* Effect.logInfo("Payment charged at gateway", { paymentId, amount })
          return { transactionId: `txn_${paymentId}`, amount } satisfies GatewayChargeResult
        })
    }
  })
)
