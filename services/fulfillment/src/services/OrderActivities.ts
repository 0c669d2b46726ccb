import { Context, Effect } from "effect"
import type { OrderPayload } from "../domain/Order.js"
import type { ChargePaymentInput, ChargeResult } from "../domain/Payment.js"
import type { ShipmentRequest } from "../domain/SagaResult.js"
import type { InvocationFault } from "../domain/errors.js"

/**
 * The units of work the sagas run through the ActivityExecutor.
 * Each call is a single attempt; retries belong to the executor.
 */
export class OrderActivities extends Context.Tag("OrderActivities")<
  OrderActivities,
  {
    /**
     * Intake faults are absorbed: the order is marked RECEIVE_ERROR and
     * an empty payload is returned.
     */
    readonly receiveOrder: (orderId: string) => Effect.Effect<OrderPayload, InvocationFault>

    /**
     * Intake faults are absorbed as `false`.
     */
    readonly validateOrder: (order: OrderPayload) => Effect.Effect<boolean, InvocationFault>

    readonly chargePayment: (
      input: ChargePaymentInput
    ) => Effect.Effect<ChargeResult, InvocationFault>

    readonly preparePackage: (shipment: ShipmentRequest) => Effect.Effect<string, InvocationFault>

    readonly dispatchCarrier: (shipment: ShipmentRequest) => Effect.Effect<string, InvocationFault>
  }
>() {}
