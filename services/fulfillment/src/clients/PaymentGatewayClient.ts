import { Context, Effect } from "effect"
import type { OrderPayload } from "../domain/Order.js"
import type { PaymentGatewayError } from "../domain/errors.js"

export interface GatewayChargeResult {
  readonly transactionId: string
  readonly amount: number
}

export class PaymentGatewayClient extends Context.Tag("PaymentGatewayClient")<
  PaymentGatewayClient,
  {
    /**
     * Charge the customer for the order. Not idempotent: every call moves money.
     */
    readonly charge: (
      order: OrderPayload,
      paymentId: string
    ) => Effect.Effect<GatewayChargeResult, PaymentGatewayError>
  }
>() {}
