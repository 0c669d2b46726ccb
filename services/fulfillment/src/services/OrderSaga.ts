import { Context, Effect } from "effect"
import type { SagaRef } from "./SagaRuntime.js"
import type { OrderSagaResult } from "../domain/SagaResult.js"
import type { SagaAlreadyStartedError } from "../domain/errors.js"

export class OrderSaga extends Context.Tag("OrderSaga")<
  OrderSaga,
  {
    /**
     * Start fulfillment of an order. The saga id is the order id.
     * Progress is observed through SagaRuntime queries.
     */
    readonly start: (
      orderId: string,
      paymentId: string
    ) => Effect.Effect<SagaRef<OrderSagaResult>, SagaAlreadyStartedError>
  }
>() {}
