import { Context, Effect } from "effect"
import type { SqlError } from "@effect/sql"
import type { OrderEvent, OrderEventType } from "../domain/OrderEvent.js"

export class EventLogRepository extends Context.Tag("EventLogRepository")<
  EventLogRepository,
  {
    /**
     * Appends an audit event. Events are never updated or deleted.
     */
    readonly append: (
      orderId: string,
      type: OrderEventType,
      payload: Readonly<Record<string, unknown>>
    ) => Effect.Effect<void, SqlError.SqlError>

    /**
     * Most recent events for an order, newest first.
     */
    readonly findRecent: (
      orderId: string,
      limit: number
    ) => Effect.Effect<readonly OrderEvent[], SqlError.SqlError>
  }
>() {}
