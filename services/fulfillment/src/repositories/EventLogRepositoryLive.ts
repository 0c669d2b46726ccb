import { Layer, Effect, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { EventLogRepository } from "./EventLogRepository.js"
import { OrderEvent, OrderEventType } from "../domain/OrderEvent.js"

interface EventRow {
  id: number
  order_id: string
  type: string
  payload_json: unknown
  ts: Date
}

const rowToEvent = (row: EventRow) =>
  Schema.decodeUnknown(OrderEventType)(row.type).pipe(
    Effect.map((type) =>
      new OrderEvent({
        id: row.id,
        orderId: row.order_id,
        type,
        payload: row.payload_json,
        ts: DateTime.unsafeFromDate(row.ts)
      })
    ),
    Effect.orDie
  )

export const EventLogRepositoryLive = Layer.effect(
  EventLogRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      append: (orderId: string, type: OrderEventType, payload: Readonly<Record<string, unknown>>) =>
        Effect.gen(function* () {
          yield* sql`
            INSERT INTO events (order_id, type, payload_json, ts)
            VALUES (${orderId}, ${type}, ${JSON.stringify(payload)}::jsonb, now())
          `
          yield* Effect.logDebug("Appended order event", { orderId, type })
        }),

      findRecent: (orderId: string, limit: number) =>
        Effect.gen(function* () {
          const rows = yield* sql<EventRow>`
            SELECT id, order_id, type, payload_json, ts
            FROM events
            WHERE order_id = ${orderId}
            ORDER BY ts DESC, id DESC
            LIMIT ${limit}
          `
          return yield* Effect.forEach(rows, rowToEvent)
        })
    }
  })
)
