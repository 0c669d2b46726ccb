import { Config, Context, Effect, Layer } from "effect"

export class FulfillmentConfig extends Context.Tag("FulfillmentConfig")<
  FulfillmentConfig,
  {
    readonly port: number
    readonly approvalWindowMs: number
    // Activity timeouts: whole invocation vs. a single attempt
    readonly activityScheduleToCloseMs: number
    readonly activityStartToCloseMs: number
    readonly retryInitialIntervalMs: number
    readonly retryMaxIntervalMs: number
    readonly retryBackoffCoefficient: number
    readonly retryMaxAttempts: number
    readonly shippingExecutionTimeoutMs: number
    readonly maxConcurrentActivities: number
    readonly recentEventsLimit: number
    // Terminated sagas kept in memory for query; older ones fall back to the event log
    readonly finishedSagaRetention: number
    // Stub integrations
    readonly flakyMode: boolean
    readonly mockFailureRate: number // 0.0 to 1.0
    readonly mockSlowCallRate: number // 0.0 to 1.0
    readonly mockLatencyMs: number
  }
>() {}

export const FulfillmentConfigLive = Layer.effect(
  FulfillmentConfig,
  Effect.gen(function* () {
    return {
      port: yield* Config.number("PORT").pipe(Config.withDefault(3000)),
      approvalWindowMs: yield* Config.number("APPROVAL_WINDOW_MS").pipe(
        Config.withDefault(10000)
      ),
      activityScheduleToCloseMs: yield* Config.number("ACTIVITY_SCHEDULE_TO_CLOSE_MS").pipe(
        Config.withDefault(12000)
      ),
      activityStartToCloseMs: yield* Config.number("ACTIVITY_START_TO_CLOSE_MS").pipe(
        Config.withDefault(4000)
      ),
      retryInitialIntervalMs: yield* Config.number("RETRY_INITIAL_INTERVAL_MS").pipe(
        Config.withDefault(250)
      ),
      retryMaxIntervalMs: yield* Config.number("RETRY_MAX_INTERVAL_MS").pipe(
        Config.withDefault(2000)
      ),
      retryBackoffCoefficient: yield* Config.number("RETRY_BACKOFF_COEFFICIENT").pipe(
        Config.withDefault(2)
      ),
      retryMaxAttempts: yield* Config.number("RETRY_MAX_ATTEMPTS").pipe(
        Config.withDefault(5)
      ),
      shippingExecutionTimeoutMs: yield* Config.number("SHIPPING_EXECUTION_TIMEOUT_MS").pipe(
        Config.withDefault(12000)
      ),
      maxConcurrentActivities: yield* Config.number("MAX_CONCURRENT_ACTIVITIES").pipe(
        Config.withDefault(10)
      ),
      recentEventsLimit: yield* Config.number("RECENT_EVENTS_LIMIT").pipe(
        Config.withDefault(50)
      ),
      finishedSagaRetention: yield* Config.integer("FINISHED_SAGA_RETENTION").pipe(
        Config.withDefault(1000)
      ),
      flakyMode: yield* Config.boolean("FLAKY_MODE").pipe(Config.withDefault(false)),
      mockFailureRate: yield* Config.number("MOCK_FAILURE_RATE").pipe(Config.withDefault(0.2)),
      mockSlowCallRate: yield* Config.number("MOCK_SLOW_CALL_RATE").pipe(Config.withDefault(0.05)),
      mockLatencyMs: yield* Config.number("MOCK_LATENCY_MS").pipe(Config.withDefault(50))
    }
  })
)
