import { Layer, Effect, Option, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { OrderRepository } from "./OrderRepository.js"
import { Order, OrderStatus } from "../domain/Order.js"

// Database row type (snake_case)
interface OrderRow {
  id: string
  state: string
  created_at: Date
  updated_at: Date
}

const rowToOrder = (row: OrderRow) =>
  Schema.decodeUnknown(OrderStatus)(row.state).pipe(
    Effect.map((status) =>
      new Order({
        id: row.id,
        status,
        createdAt: DateTime.unsafeFromDate(row.created_at),
        updatedAt: DateTime.unsafeFromDate(row.updated_at)
      })
    ),
    Effect.orDie
  )

export const OrderRepositoryLive = Layer.effect(
  OrderRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      upsertStatus: (orderId: string, status: OrderStatus) =>
        Effect.gen(function* () {
          const rows = yield* sql<OrderRow>`
            INSERT INTO orders (id, state, created_at, updated_at)
            VALUES (${orderId}, ${status}, now(), now())
            ON CONFLICT (id) DO UPDATE SET
              state = EXCLUDED.state,
              updated_at = now()
            RETURNING id, state, created_at, updated_at
          `
          yield* Effect.logDebug("Upserted order status", { orderId, status })
          return yield* rowToOrder(rows[0])
        }),

      findById: (orderId: string) =>
        Effect.gen(function* () {
          const rows = yield* sql<OrderRow>`
            SELECT id, state, created_at, updated_at
            FROM orders
            WHERE id = ${orderId}
          `
          if (rows.length === 0) {
            return Option.none()
          }
          return Option.some(yield* rowToOrder(rows[0]))
        })
    }
  })
)
