import { Schema } from "effect"

// Order status - use Schema.Literal for exhaustive matching
export const OrderStatus = Schema.Literal(
  "RECEIVED",
  "RECEIVE_ERROR",
  "VALIDATED",
  "INVALID",
  "VALIDATION_ERROR",
  "PAID",
  "PAYMENT_FAILED",
  "SHIPPED",
  "SHIP_ERROR"
)
export type OrderStatus = typeof OrderStatus.Type

// Free-form shipping address override (line1, city, postal_code, ...)
export const Address = Schema.Record({ key: Schema.String, value: Schema.String })
export type Address = typeof Address.Type

export class Order extends Schema.Class<Order>("Order")({
  id: Schema.String,
  status: OrderStatus,
  createdAt: Schema.DateTimeUtc,
  updatedAt: Schema.DateTimeUtc
}) {}

// Activity wire shape of an order (snake_case, as received from intake)
export const OrderLine = Schema.Struct({
  sku: Schema.String,
  qty: Schema.Int.pipe(Schema.positive({ message: () => "Quantity must be positive" })),
  unit_price: Schema.Number.pipe(
    Schema.nonNegative({ message: () => "Unit price cannot be negative" })
  )
})
export type OrderLine = typeof OrderLine.Type

export const OrderPayload = Schema.Struct({
  order_id: Schema.String,
  items: Schema.Array(OrderLine)
})
export type OrderPayload = typeof OrderPayload.Type

/**
 * Payload substituted when the receive step could not produce one.
 */
export const emptyOrderPayload = (orderId: string): OrderPayload => ({
  order_id: orderId,
  items: []
})

// Request schemas for API input
export const StartOrderRequest = Schema.Struct({
  payment_id: Schema.NonEmptyTrimmedString
})

export const CancelOrderRequest = Schema.Struct({
  reason: Schema.optionalWith(Schema.String, { default: () => "" })
})

export const UpdateAddressRequest = Schema.Struct({
  address: Address
})

// Suffix that names an order's shipping saga; both share one saga registry
export const SHIPPING_SAGA_SUFFIX = "-shipping"

// Path parameter schema for routes
export const OrderIdParams = Schema.Struct({
  order_id: Schema.NonEmptyTrimmedString
})

// Starting an order may not claim an id reserved for a shipping saga
export const StartOrderParams = Schema.Struct({
  order_id: Schema.NonEmptyTrimmedString.pipe(
    Schema.filter(
      (orderId) =>
        !orderId.endsWith(SHIPPING_SAGA_SUFFIX) ||
        `order_id must not end with ${SHIPPING_SAGA_SUFFIX}`
    )
  )
})
