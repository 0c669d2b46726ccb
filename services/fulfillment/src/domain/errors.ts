import { Data } from "effect"
import type { ActivityName } from "./Activity.js"
import type { SagaStep } from "./SagaState.js"

// ═══════════════════════════════════════════════════════════════════════════
// Activity Invocation Faults
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Transient failure of a single activity attempt (retryable)
 */
export class ActivityFailedError extends Data.TaggedError("ActivityFailedError")<{
  readonly activity: ActivityName
  readonly reason: string
}> {}

/**
 * An attempt or the whole invocation ran past its time budget (retryable)
 */
export class ActivityTimeoutError extends Data.TaggedError("ActivityTimeoutError")<{
  readonly activity: ActivityName
  readonly timeoutType: "StartToClose" | "ScheduleToClose"
  readonly timeoutMs: number
}> {}

/**
 * Malformed activity input (never retried)
 */
export class DomainValidationError extends Data.TaggedError("DomainValidationError")<{
  readonly activity: ActivityName
  readonly reason: string
}> {}

/**
 * Failure after a side effect that another attempt would repeat (never retried)
 */
export class ActivityAbortedError extends Data.TaggedError("ActivityAbortedError")<{
  readonly activity: ActivityName
  readonly reason: string
}> {}

export type InvocationFault =
  | ActivityFailedError
  | ActivityTimeoutError
  | DomainValidationError
  | ActivityAbortedError

/**
 * Activity invocation gave up: retries exhausted or a non-retryable fault
 */
export class ActivityExhaustedError extends Data.TaggedError("ActivityExhaustedError")<{
  readonly activity: ActivityName
  readonly attempts: number
  readonly fault: "timeout" | "failure" | "validation"
  readonly reason: string
}> {}

// ═══════════════════════════════════════════════════════════════════════════
// External Integration Errors
// ═══════════════════════════════════════════════════════════════════════════

export class OrderIntakeError extends Data.TaggedError("OrderIntakeError")<{
  readonly orderId: string
  readonly operation: "fetchOrder" | "validateOrder"
  readonly reason: string
}> {}

export class PaymentGatewayError extends Data.TaggedError("PaymentGatewayError")<{
  readonly paymentId: string
  readonly reason: string
}> {}

/**
 * The gateway charged the payment but the CHARGED mark could not be stored
 */
export class ChargeUnrecordedError extends Data.TaggedError("ChargeUnrecordedError")<{
  readonly paymentId: string
  readonly transactionId: string
  readonly reason: string
}> {}

export class CarrierError extends Data.TaggedError("CarrierError")<{
  readonly orderId: string
  readonly operation: "preparePackage" | "dispatch"
  readonly reason: string
}> {}

// ═══════════════════════════════════════════════════════════════════════════
// Saga Runtime Errors
// ═══════════════════════════════════════════════════════════════════════════

export class SagaAlreadyStartedError extends Data.TaggedError("SagaAlreadyStartedError")<{
  readonly sagaId: string
}> {}

export class SagaNotFoundError extends Data.TaggedError("SagaNotFoundError")<{
  readonly sagaId: string
}> {}

/**
 * Invalid saga step transition attempted
 */
export class InvalidStepTransitionError extends Data.TaggedError("InvalidStepTransitionError")<{
  readonly sagaId: string
  readonly fromStep: SagaStep
  readonly toStep: SagaStep
}> {}

/**
 * Unclassified fault escaping a saga's own control flow
 */
export class SagaExecutionError extends Data.TaggedError("SagaExecutionError")<{
  readonly sagaId: string
  readonly reason: string
}> {}

export class SagaTimeoutError extends Data.TaggedError("SagaTimeoutError")<{
  readonly sagaId: string
  readonly timeoutMs: number
}> {}

export class ShippingFailedError extends Data.TaggedError("ShippingFailedError")<{
  readonly sagaId: string
  readonly orderId: string
  readonly reason: string
}> {}

// ═══════════════════════════════════════════════════════════════════════════
// Aggregate Error Types for Pattern Matching
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Every way a saga instance can end in failure
 */
export type SagaFault =
  | InvalidStepTransitionError
  | SagaExecutionError
  | SagaTimeoutError
  | ShippingFailedError
