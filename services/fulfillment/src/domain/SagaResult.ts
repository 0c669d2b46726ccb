import type { Address, OrderPayload } from "./Order.js"
import type { ChargeResult } from "./Payment.js"

export interface OrderSagaSucceeded {
  readonly status: "success"
  readonly orderId: string
  readonly payment: ChargeResult
}

export interface OrderSagaCancelled {
  readonly status: "cancelled"
  readonly orderId: string
}

export interface OrderSagaRejected {
  readonly status:
    | "manual_review_timeout"
    | "validation_failed"
    | "payment_failed"
    | "shipping_start_failed"
  readonly orderId: string
  readonly error: string
}

export type OrderSagaResult = OrderSagaSucceeded | OrderSagaCancelled | OrderSagaRejected

export interface ShippingSagaResult {
  readonly status: "dispatched"
  readonly orderId: string
}

export type SagaOutcome = OrderSagaResult | ShippingSagaResult

// Input handed to the detached shipping saga
export interface ShipmentRequest {
  readonly order: OrderPayload
  readonly parentSagaId: string
  readonly address: Address | null
}
