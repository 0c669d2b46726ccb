import { Duration, Effect, Layer, Match, Ref } from "effect"
import { ActivityExecutor } from "./ActivityExecutor.js"
import { FulfillmentConfig } from "../config.js"
import type { ActivityName } from "../domain/Activity.js"
import {
  ActivityExhaustedError,
  ActivityTimeoutError,
  type InvocationFault
} from "../domain/errors.js"
import { retrySchedule, type RetryPolicy } from "../domain/RetryPolicy.js"

export const isRetryable = (fault: InvocationFault): boolean =>
  fault._tag !== "DomainValidationError" && fault._tag !== "ActivityAbortedError"

export const describeFault = (fault: InvocationFault): string =>
  Match.value(fault).pipe(
    Match.tag("ActivityTimeoutError", ({ timeoutType, timeoutMs }) =>
      `${timeoutType} timeout of ${timeoutMs}ms exceeded`
    ),
    Match.tag("ActivityFailedError", ({ reason }) => reason),
    Match.tag("DomainValidationError", ({ reason }) => reason),
    Match.tag("ActivityAbortedError", ({ reason }) => reason),
    Match.exhaustive
  )

const toExhausted = (
  activity: ActivityName,
  attempts: number,
  fault: InvocationFault
): ActivityExhaustedError =>
  new ActivityExhaustedError({
    activity,
    attempts,
    fault: Match.value(fault).pipe(
      Match.tag("ActivityTimeoutError", () => "timeout" as const),
      Match.tag("ActivityFailedError", () => "failure" as const),
      Match.tag("DomainValidationError", () => "validation" as const),
      Match.tag("ActivityAbortedError", () => "failure" as const),
      Match.exhaustive
    ),
    reason: describeFault(fault)
  })

export const ActivityExecutorLive = Layer.effect(
  ActivityExecutor,
  Effect.gen(function* () {
    const config = yield* FulfillmentConfig

    // Shared by every saga in the process
    const workerPool = yield* Effect.makeSemaphore(config.maxConcurrentActivities)

    const policy: RetryPolicy = {
      maxAttempts: config.retryMaxAttempts,
      initialIntervalMs: config.retryInitialIntervalMs,
      maxIntervalMs: config.retryMaxIntervalMs,
      backoffCoefficient: config.retryBackoffCoefficient
    }

    const execute = <A>(
      activity: ActivityName,
      invocation: Effect.Effect<A, InvocationFault>
    ): Effect.Effect<A, ActivityExhaustedError> =>
      Effect.gen(function* () {
        const attempts = yield* Ref.make(0)

        const attempt = Ref.updateAndGet(attempts, (n) => n + 1).pipe(
          Effect.flatMap((attemptNumber) =>
            invocation.pipe(
              Effect.timeoutFail({
                duration: Duration.millis(config.activityStartToCloseMs),
                onTimeout: () =>
                  new ActivityTimeoutError({
                    activity,
                    timeoutType: "StartToClose",
                    timeoutMs: config.activityStartToCloseMs
                  })
              }),
              Effect.tapError((fault) =>
                Effect.logWarning("Activity attempt failed", {
                  activity,
                  attempt: attemptNumber,
                  maxAttempts: policy.maxAttempts,
                  errorType: fault._tag,
                  reason: describeFault(fault),
                  retryable: isRetryable(fault)
                })
              )
            )
          ),
          workerPool.withPermits(1)
        )

        return yield* attempt.pipe(
          Effect.retry(retrySchedule(policy, isRetryable)),
          Effect.timeoutFail({
            duration: Duration.millis(config.activityScheduleToCloseMs),
            onTimeout: () =>
              new ActivityTimeoutError({
                activity,
                timeoutType: "ScheduleToClose",
                timeoutMs: config.activityScheduleToCloseMs
              })
          }),
          Effect.catchAll((fault) =>
            Effect.gen(function* () {
              const exhausted = toExhausted(activity, yield* Ref.get(attempts), fault)
              yield* Effect.logError("Activity gave up", {
                activity,
                attempts: exhausted.attempts,
                fault: exhausted.fault,
                reason: exhausted.reason
              })
              return yield* Effect.fail(exhausted)
            })
          )
        )
      }).pipe(Effect.withSpan("activity", { attributes: { activity } }))

    return { execute }
  })
)
