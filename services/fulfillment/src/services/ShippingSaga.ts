import { Context, Effect } from "effect"
import type { SagaRef } from "./SagaRuntime.js"
import type { ShipmentRequest, ShippingSagaResult } from "../domain/SagaResult.js"
import type { SagaAlreadyStartedError } from "../domain/errors.js"
import { SHIPPING_SAGA_SUFFIX } from "../domain/Order.js"

export const shippingSagaId = (parentSagaId: string): string =>
  `${parentSagaId}${SHIPPING_SAGA_SUFFIX}`

export class ShippingSaga extends Context.Tag("ShippingSaga")<
  ShippingSaga,
  {
    /**
     * Start the shipping saga for a paid order. The saga outlives its caller
     * and runs under its own execution timeout.
     */
    readonly start: (
      request: ShipmentRequest
    ) => Effect.Effect<SagaRef<ShippingSagaResult>, SagaAlreadyStartedError>
  }
>() {}
