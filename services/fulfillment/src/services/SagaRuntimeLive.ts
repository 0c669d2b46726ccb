import {
  Chunk,
  Duration,
  Effect,
  Exit,
  Fiber,
  Layer,
  Match,
  Option,
  Queue,
  Ref,
  SynchronizedRef
} from "effect"
import {
  SagaRuntime,
  type SagaContext,
  type SagaDefinition,
  type SagaRef,
  type SignalDelivery
} from "./SagaRuntime.js"
import { EventLogRepository } from "../repositories/EventLogRepository.js"
import { FulfillmentConfig } from "../config.js"
import {
  initialSagaState,
  isTerminalStep,
  isValidTransition,
  toSagaStatus,
  type SagaState,
  type SagaStatus,
  type SagaStep
} from "../domain/SagaState.js"
import { applySignal, type SagaSignal } from "../domain/Signal.js"
import type { SagaOutcome } from "../domain/SagaResult.js"
import {
  InvalidStepTransitionError,
  SagaAlreadyStartedError,
  SagaExecutionError,
  SagaNotFoundError,
  SagaTimeoutError,
  type SagaFault
} from "../domain/errors.js"

interface SagaInstance {
  readonly _tag: "Running"
  readonly state: Ref.Ref<SagaState>
  readonly inbox: Queue.Queue<SagaSignal>
  // Wakes the saga when the inbox may hold something; losing a token loses no signal
  readonly doorbell: Queue.Queue<void>
  readonly fiber: Fiber.RuntimeFiber<SagaOutcome, SagaFault>
}

// What is kept of a saga once its fiber has exited
interface FinishedSaga {
  readonly _tag: "Finished"
  readonly status: SagaStatus
  readonly exit: Exit.Exit<SagaOutcome, SagaFault>
}

type RegistryEntry = SagaInstance | FinishedSaga

// Evicts the oldest finished entries beyond `limit`; running ones are never evicted
const pruneFinished = (
  entries: ReadonlyMap<string, RegistryEntry>,
  limit: number
): Map<string, RegistryEntry> => {
  const next = new Map(entries)
  let excess = Array.from(next.values()).filter((entry) => entry._tag === "Finished").length - limit
  for (const [sagaId, entry] of next) {
    if (excess <= 0) {
      break
    }
    if (entry._tag === "Finished") {
      next.delete(sagaId)
      excess--
    }
  }
  return next
}

export const describeSagaFault = (fault: SagaFault): string =>
  Match.value(fault).pipe(
    Match.tag("InvalidStepTransitionError", ({ fromStep, toStep }) =>
      `Invalid step transition: ${fromStep} -> ${toStep}`
    ),
    Match.tag("SagaTimeoutError", ({ timeoutMs }) =>
      `Saga exceeded its execution timeout of ${timeoutMs}ms`
    ),
    Match.tag("SagaExecutionError", ({ reason }) => reason),
    Match.tag("ShippingFailedError", ({ reason }) => reason),
    Match.exhaustive
  )

const defectMessage = (defect: unknown): string =>
  defect instanceof Error ? defect.message : String(defect)

export const SagaRuntimeLive = Layer.scoped(
  SagaRuntime,
  Effect.gen(function* () {
    const eventLog = yield* EventLogRepository
    const config = yield* FulfillmentConfig
    const registry = yield* SynchronizedRef.make<ReadonlyMap<string, RegistryEntry>>(new Map())

    const lookup = (sagaId: string) =>
      SynchronizedRef.get(registry).pipe(
        Effect.flatMap((entries) => {
          const entry = entries.get(sagaId)
          return entry === undefined
            ? Effect.fail(new SagaNotFoundError({ sagaId }))
            : Effect.succeed(entry)
        })
      )

    // Drops the fiber, inbox and state of an exited saga, keeping its final status
    const retire = (
      sagaId: string,
      stateRef: Ref.Ref<SagaState>,
      exit: Exit.Exit<SagaOutcome, SagaFault>
    ) =>
      Effect.gen(function* () {
        const status = toSagaStatus(yield* Ref.get(stateRef))
        yield* SynchronizedRef.update(registry, (entries) => {
          const current = entries.get(sagaId)
          if (current === undefined || current._tag !== "Running" || current.state !== stateRef) {
            return entries
          }
          const next = new Map(entries)
          next.delete(sagaId)
          next.set(sagaId, { _tag: "Finished", status, exit })
          return pruneFinished(next, config.finishedSagaRetention)
        })
      })

    const makeContext = (
      sagaId: string,
      orderId: string,
      stateRef: Ref.Ref<SagaState>,
      inbox: Queue.Queue<SagaSignal>,
      doorbell: Queue.Queue<void>
    ): SagaContext => {
      const applyAll = (signals: Chunk.Chunk<SagaSignal>) =>
        Ref.update(stateRef, (state) => Chunk.reduce(signals, state, applySignal))

      // Taking and folding happen together or not at all
      const applyPendingSignals = Effect.uninterruptible(
        Queue.takeAll(inbox).pipe(Effect.flatMap(applyAll))
      )

      const transition = (to: SagaStep) =>
        Effect.gen(function* () {
          const current = yield* Ref.get(stateRef)
          if (!isValidTransition(current.step, to)) {
            return yield* Effect.fail(
              new InvalidStepTransitionError({ sagaId, fromStep: current.step, toStep: to })
            )
          }

          yield* Ref.update(stateRef, (state) => ({ ...state, step: to }))
          yield* Effect.logDebug("Saga step changed", { sagaId, from: current.step, to })

          // The audit trail is best-effort; the in-memory step is authoritative
          yield* eventLog
            .append(orderId, "SAGA_STEP_CHANGED", {
              saga_id: sagaId,
              kind: current.kind,
              from: current.step,
              to
            })
            .pipe(
              Effect.catchAll((error) =>
                Effect.logError("Failed to record step change", {
                  sagaId,
                  step: to,
                  error: error.message
                })
              )
            )
        })

      const awaitCondition = (
        predicate: (state: SagaState) => boolean,
        window: Duration.DurationInput
      ) => {
        const waitUntilSatisfied: Effect.Effect<void> = Effect.gen(function* () {
          yield* applyPendingSignals
          while (!predicate(yield* Ref.get(stateRef))) {
            yield* Queue.take(doorbell)
            yield* applyPendingSignals
          }
        })

        return waitUntilSatisfied.pipe(
          Effect.timeoutOption(window),
          // Signals delivered as the window closed are still folded in
          Effect.zipLeft(applyPendingSignals),
          Effect.map(Option.isSome)
        )
      }

      return {
        sagaId,
        orderId,
        state: Ref.get(stateRef),
        transition,
        update: (f) => Ref.update(stateRef, f),
        applyPendingSignals,
        awaitCondition
      }
    }

    const supervise = <A extends SagaOutcome>(
      definition: SagaDefinition<A>,
      stateRef: Ref.Ref<SagaState>,
      context: SagaContext
    ): Effect.Effect<A, SagaFault> => {
      const { sagaId, kind, executionTimeout } = definition

      const bounded = definition.run(context).pipe(
        Effect.catchAllDefect((defect) =>
          Effect.fail(new SagaExecutionError({ sagaId, reason: defectMessage(defect) }))
        )
      )

      const timed =
        executionTimeout === undefined
          ? bounded
          : bounded.pipe(
              Effect.timeoutFail({
                duration: executionTimeout,
                onTimeout: () =>
                  new SagaTimeoutError({
                    sagaId,
                    timeoutMs: Duration.toMillis(executionTimeout)
                  })
              })
            )

      return timed.pipe(
        Effect.tap((outcome) =>
          Effect.logInfo("Saga finished", { sagaId, kind, status: outcome.status })
        ),
        Effect.tapError((fault) =>
          Effect.gen(function* () {
            const reason = describeSagaFault(fault)
            // A saga that already recorded its own terminal step keeps it
            yield* Ref.update(stateRef, (state): SagaState =>
              isTerminalStep(state.step)
                ? state
                : { ...state, step: "FAILED", lastError: reason }
            )
            yield* Effect.logError("Saga failed", { sagaId, kind, errorType: fault._tag, reason })
          })
        ),
        Effect.withSpan("saga", { attributes: { sagaId, kind } })
      )
    }

    const spawn = <A extends SagaOutcome>(
      definition: SagaDefinition<A>
    ): Effect.Effect<SagaRef<A>, SagaAlreadyStartedError> =>
      SynchronizedRef.modifyEffect(registry, (entries) =>
        Effect.gen(function* () {
          const { sagaId, kind, orderId } = definition
          const running = entries.get(sagaId)
          if (running !== undefined && running._tag === "Running") {
            const exit = yield* Fiber.poll(running.fiber)
            if (Option.isNone(exit)) {
              return yield* Effect.fail(new SagaAlreadyStartedError({ sagaId }))
            }
          }

          const stateRef = yield* Ref.make(initialSagaState(sagaId, kind, orderId))
          const inbox = yield* Queue.unbounded<SagaSignal>()
          const doorbell = yield* Queue.sliding<void>(1)
          const context = makeContext(sagaId, orderId, stateRef, inbox, doorbell)
          // Retiring waits on the registry lock, so it always sees the entry set below
          const fiber = yield* Effect.forkDaemon(
            supervise(definition, stateRef, context).pipe(
              Effect.onExit((exit) => retire(sagaId, stateRef, exit))
            )
          )

          yield* Effect.logInfo("Saga started", { sagaId, kind, orderId })

          const ref: SagaRef<A> = { sagaId, await: Fiber.await(fiber) }
          const next = new Map(entries)
          next.delete(sagaId)
          next.set(sagaId, { _tag: "Running", state: stateRef, inbox, doorbell, fiber })
          return [ref, next] as const
        })
      )

    const signal = (
      sagaId: string,
      sagaSignal: SagaSignal
    ): Effect.Effect<SignalDelivery, SagaNotFoundError> =>
      Effect.gen(function* () {
        const entry = yield* lookup(sagaId)
        if (entry._tag === "Finished") {
          yield* Effect.logWarning("Signal dropped - saga already terminated", {
            sagaId,
            signal: sagaSignal._tag,
            step: entry.status.step
          })
          return "Dropped" as const
        }

        const { step } = yield* Ref.get(entry.state)
        const exit = yield* Fiber.poll(entry.fiber)

        if (isTerminalStep(step) || Option.isSome(exit)) {
          yield* Effect.logWarning("Signal dropped - saga already terminated", {
            sagaId,
            signal: sagaSignal._tag,
            step
          })
          return "Dropped" as const
        }

        yield* Queue.offer(entry.inbox, sagaSignal)
        yield* Queue.offer(entry.doorbell, undefined)
        yield* Effect.logInfo("Signal delivered", { sagaId, signal: sagaSignal._tag })
        return "Delivered" as const
      })

    yield* Effect.addFinalizer(() =>
      SynchronizedRef.get(registry).pipe(
        Effect.flatMap((entries) =>
          Fiber.interruptAll(
            Array.from(entries.values()).flatMap((entry) =>
              entry._tag === "Running" ? [entry.fiber] : []
            )
          )
        )
      )
    )

    return {
      spawn,
      signal,
      query: (sagaId: string) =>
        lookup(sagaId).pipe(
          Effect.flatMap((entry) =>
            entry._tag === "Running"
              ? Ref.get(entry.state).pipe(Effect.map(toSagaStatus))
              : Effect.succeed(entry.status)
          )
        ),
      await: (sagaId: string) =>
        lookup(sagaId).pipe(
          Effect.flatMap((entry) =>
            entry._tag === "Running" ? Fiber.await(entry.fiber) : Effect.succeed(entry.exit)
          )
        )
    }
  })
)
