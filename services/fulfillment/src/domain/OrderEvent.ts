import { Schema } from "effect"

// Audit event types
export const OrderEventType = Schema.Literal(
  "ORDER_RECEIVED",
  "ORDER_RECEIVE_FAILED",
  "ORDER_VALIDATED",
  "ORDER_VALIDATION_FAILED",
  "PAYMENT_CHARGED",
  "PAYMENT_ALREADY_CHARGED",
  "PAYMENT_FAILED",
  "PACKAGE_PREPARED",
  "PACKAGE_PREPARE_FAILED",
  "CARRIER_DISPATCHED",
  "CARRIER_DISPATCH_FAILED",
  "SHIPPING_FAILED",
  "SAGA_STEP_CHANGED"
)
export type OrderEventType = typeof OrderEventType.Type

// Order id under which events without an order id are filed
export const UNKNOWN_ORDER_ID = "unknown"

// Append-only audit record
export class OrderEvent extends Schema.Class<OrderEvent>("OrderEvent")({
  id: Schema.Number,
  orderId: Schema.String,
  type: OrderEventType,
  payload: Schema.Unknown,
  ts: Schema.DateTimeUtc
}) {}
