import { Context, Effect } from "effect"
import type { Address, OrderPayload } from "../domain/Order.js"
import type { CarrierError } from "../domain/errors.js"

export class CarrierClient extends Context.Tag("CarrierClient")<
  CarrierClient,
  {
    readonly preparePackage: (
      order: OrderPayload,
      address: Address | null
    ) => Effect.Effect<string, CarrierError>

    /**
     * Hand the package to the carrier. Not idempotent.
     */
    readonly dispatch: (order: OrderPayload) => Effect.Effect<string, CarrierError>
  }
>() {}
