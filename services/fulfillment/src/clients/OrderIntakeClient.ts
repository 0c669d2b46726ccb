import { Context, Effect } from "effect"
import type { OrderPayload } from "../domain/Order.js"
import type { OrderIntakeError } from "../domain/errors.js"

export class OrderIntakeClient extends Context.Tag("OrderIntakeClient")<
  OrderIntakeClient,
  {
    /**
     * Fetch the order as placed by the storefront.
     */
    readonly fetchOrder: (orderId: string) => Effect.Effect<OrderPayload, OrderIntakeError>

    /**
     * Business validation of an order. `false` means the order must not be charged.
     */
    readonly validateOrder: (order: OrderPayload) => Effect.Effect<boolean, OrderIntakeError>
  }
>() {}
