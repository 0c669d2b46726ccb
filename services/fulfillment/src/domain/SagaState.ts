import { Schema } from "effect"
import type { Address } from "./Order.js"

export const OrderSagaStep = Schema.Literal(
  "INITIALIZED",
  "RECEIVING_ORDER",
  "VALIDATING_ORDER",
  "WAITING_FOR_APPROVAL",
  "CANCELLED",
  "AWAITING_APPROVAL_TIMEOUT",
  "VALIDATION_FAILED",
  "CHARGING_PAYMENT",
  "CHARGE_FAILED",
  "STARTING_SHIPPING",
  "SHIPPING_START_FAILED",
  "COMPLETED",
  "FAILED"
)
export type OrderSagaStep = typeof OrderSagaStep.Type

export const ShippingSagaStep = Schema.Literal(
  "INITIALIZED",
  "PREPARING_PACKAGE",
  "DISPATCHING",
  "DISPATCHED",
  "SHIPPING_FAILED",
  "FAILED"
)
export type ShippingSagaStep = typeof ShippingSagaStep.Type

export type SagaStep = OrderSagaStep | ShippingSagaStep

export type SagaKind = "OrderSaga" | "ShippingSaga"

/**
 * Valid step transitions for both sagas.
 * FAILED is reachable from every non-terminal step.
 */
export const VALID_TRANSITIONS: Record<SagaStep, readonly SagaStep[]> = {
  INITIALIZED: ["RECEIVING_ORDER", "PREPARING_PACKAGE", "FAILED"],
  RECEIVING_ORDER: ["VALIDATING_ORDER", "FAILED"],
  VALIDATING_ORDER: ["WAITING_FOR_APPROVAL", "FAILED"],
  WAITING_FOR_APPROVAL: [
    "CANCELLED",
    "AWAITING_APPROVAL_TIMEOUT",
    "VALIDATION_FAILED",
    "CHARGING_PAYMENT",
    "FAILED"
  ],
  CHARGING_PAYMENT: ["CHARGE_FAILED", "STARTING_SHIPPING", "FAILED"],
  STARTING_SHIPPING: ["SHIPPING_START_FAILED", "COMPLETED", "FAILED"],
  PREPARING_PACKAGE: ["DISPATCHING", "SHIPPING_FAILED", "FAILED"],
  DISPATCHING: ["DISPATCHED", "SHIPPING_FAILED", "FAILED"],
  CANCELLED: [], // Terminal state
  AWAITING_APPROVAL_TIMEOUT: [], // Terminal state
  VALIDATION_FAILED: [], // Terminal state
  CHARGE_FAILED: [], // Terminal state
  SHIPPING_START_FAILED: [], // Terminal state
  COMPLETED: [], // Terminal state
  DISPATCHED: [], // Terminal state
  SHIPPING_FAILED: [], // Terminal state
  FAILED: [] // Terminal state
}

/**
 * Check if a step transition is valid.
 */
export const isValidTransition = (from: SagaStep, to: SagaStep): boolean =>
  VALID_TRANSITIONS[from].includes(to)

export const isTerminalStep = (step: SagaStep): boolean =>
  VALID_TRANSITIONS[step].length === 0

/**
 * Mutable record owned by exactly one saga instance.
 */
export interface SagaState {
  readonly sagaId: string
  readonly kind: SagaKind
  readonly orderId: string
  readonly step: SagaStep
  readonly approved: boolean
  readonly cancelled: boolean
  readonly lastError: string | null
  readonly addressOverride: Address | null
}

export const initialSagaState = (
  sagaId: string,
  kind: SagaKind,
  orderId: string
): SagaState => ({
  sagaId,
  kind,
  orderId,
  step: "INITIALIZED",
  approved: false,
  cancelled: false,
  lastError: null,
  addressOverride: null
})

/**
 * Read-only snapshot returned by queries.
 */
export interface SagaStatus {
  readonly orderId: string
  readonly step: SagaStep
  readonly lastError: string | null
}

export const toSagaStatus = (state: SagaState): SagaStatus => ({
  orderId: state.orderId,
  step: state.step,
  lastError: state.lastError
})
