import { Schema } from "effect"
import { OrderPayload } from "./Order.js"

export const PaymentStatus = Schema.Literal("INIT", "CHARGED", "FAILED")
export type PaymentStatus = typeof PaymentStatus.Type

export class Payment extends Schema.Class<Payment>("Payment")({
  paymentId: Schema.String,
  orderId: Schema.String,
  status: PaymentStatus,
  // Only meaningful once CHARGED
  amount: Schema.Number.pipe(Schema.nonNegative()),
  createdAt: Schema.DateTimeUtc,
  updatedAt: Schema.DateTimeUtc
}) {}

// Input of the charge activity; identifiers may be empty and are checked by the ledger
export const ChargePaymentInput = Schema.Struct({
  order: OrderPayload,
  payment_id: Schema.String
})
export type ChargePaymentInput = typeof ChargePaymentInput.Type

export interface PaymentCharged {
  readonly status: "charged"
  readonly paymentId: string
  readonly amount: number
}

export interface PaymentAlreadyCharged {
  readonly status: "already_charged"
  readonly paymentId: string
  readonly amount: number
}

export interface PaymentChargeFailed {
  readonly status: "failed"
  readonly paymentId: string
  readonly error: string
}

/**
 * Every business outcome of a charge. Never raised as an error.
 */
export type ChargeResult = PaymentCharged | PaymentAlreadyCharged | PaymentChargeFailed
