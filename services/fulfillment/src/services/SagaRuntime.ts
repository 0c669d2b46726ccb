import { Context, Duration, Effect, Exit } from "effect"
import type { SagaKind, SagaState, SagaStatus, SagaStep } from "../domain/SagaState.js"
import type { SagaSignal } from "../domain/Signal.js"
import type { SagaOutcome } from "../domain/SagaResult.js"
import type {
  InvalidStepTransitionError,
  SagaAlreadyStartedError,
  SagaFault,
  SagaNotFoundError
} from "../domain/errors.js"

/**
 * Handle a running saga uses to read and advance its own state.
 * Signals are only folded into the state by `applyPendingSignals`
 * and `awaitCondition`.
 */
export interface SagaContext {
  readonly sagaId: string
  readonly orderId: string
  readonly state: Effect.Effect<SagaState>
  readonly transition: (to: SagaStep) => Effect.Effect<void, InvalidStepTransitionError>
  readonly update: (f: (state: SagaState) => SagaState) => Effect.Effect<void>
  readonly applyPendingSignals: Effect.Effect<void>
  /**
   * Suspend until `predicate` holds or `window` elapses.
   * Every signal queued at wake-up is applied before the predicate is checked.
   * Returns false on timeout.
   */
  readonly awaitCondition: (
    predicate: (state: SagaState) => boolean,
    window: Duration.DurationInput
  ) => Effect.Effect<boolean>
}

export interface SagaDefinition<A extends SagaOutcome> {
  readonly sagaId: string
  readonly kind: SagaKind
  readonly orderId: string
  readonly run: (context: SagaContext) => Effect.Effect<A, SagaFault>
  readonly executionTimeout?: Duration.DurationInput
}

export interface SagaRef<A extends SagaOutcome> {
  readonly sagaId: string
  readonly await: Effect.Effect<Exit.Exit<A, SagaFault>>
}

// Delivery outcome of a signal; terminated sagas drop what they receive
export type SignalDelivery = "Delivered" | "Dropped"

export class SagaRuntime extends Context.Tag("SagaRuntime")<
  SagaRuntime,
  {
    /**
     * Start a saga on its own fiber, detached from the caller.
     * Fails while an instance with the same id is still running.
     */
    readonly spawn: <A extends SagaOutcome>(
      definition: SagaDefinition<A>
    ) => Effect.Effect<SagaRef<A>, SagaAlreadyStartedError>

    readonly signal: (
      sagaId: string,
      signal: SagaSignal
    ) => Effect.Effect<SignalDelivery, SagaNotFoundError>

    /**
     * Status snapshot. Still answers after the saga terminated.
     */
    readonly query: (sagaId: string) => Effect.Effect<SagaStatus, SagaNotFoundError>

    readonly await: (
      sagaId: string
    ) => Effect.Effect<Exit.Exit<SagaOutcome, SagaFault>, SagaNotFoundError>
  }
>() {}
