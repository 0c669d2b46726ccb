import { Duration, Effect, Random } from "effect"
import { FulfillmentConfig } from "../config.js"

/**
 * Latency and fault injection shared by the stub integrations.
 * Faults and slow calls only happen in flaky mode.
 */
export const makeCallSimulator = Effect.gen(function* () {
  const config = yield* FulfillmentConfig

  return <E>(onFailure: () => E): Effect.Effect<void, E> =>
    Effect.gen(function* () {
      if (config.mockLatencyMs > 0) {
        yield* Effect.sleep(Duration.millis(config.mockLatencyMs))
      }
      if (!config.flakyMode) {
        return
      }

      const roll = yield* Random.next
      if (roll < config.mockFailureRate) {
        return yield* Effect.fail(onFailure())
      }
      if (roll < config.mockFailureRate + config.mockSlowCallRate) {
        // Outlives the per-attempt budget
        yield* Effect.sleep(Duration.millis(config.activityStartToCloseMs + 1000))
      }
    })
})
