import { Context, Effect, Option } from "effect"
import type { SqlError } from "@effect/sql"
import type { Order, OrderStatus } from "../domain/Order.js"

export class OrderRepository extends Context.Tag("OrderRepository")<
  OrderRepository,
  {
    /**
     * Inserts the order or overwrites its status.
     * Idempotent: repeating the call leaves a single row with that status.
     */
    readonly upsertStatus: (
      orderId: string,
      status: OrderStatus
    ) => Effect.Effect<Order, SqlError.SqlError>

    /**
     * Finds an order by its ID.
     * Returns Option.none() if not found.
     */
    readonly findById: (
      orderId: string
    ) => Effect.Effect<Option.Option<Order>, SqlError.SqlError>
  }
>() {}
