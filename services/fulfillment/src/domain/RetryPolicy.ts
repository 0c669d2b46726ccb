import { Duration, Schedule } from "effect"

/**
 * Configuration for activity retry behavior.
 */
export interface RetryPolicy {
  readonly maxAttempts: number
  readonly initialIntervalMs: number
  readonly maxIntervalMs: number
  readonly backoffCoefficient: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialIntervalMs: 250,
  maxIntervalMs: 2000,
  backoffCoefficient: 2
}

/**
 * Calculate the delay before a given attempt.
 *
 * Formula: delay = min(initialInterval * coefficient^(attempt - 2), maxInterval)
 *
 * | Attempt | Calculation     | Delay  |
 * |---------|-----------------|--------|
 * | 1       | (immediate)     | 0ms    |
 * | 2       | 250 * 2^0       | 250ms  |
 * | 3       | 250 * 2^1       | 500ms  |
 * | 4       | 250 * 2^2       | 1000ms |
 * | 5       | 250 * 2^3       | 2000ms |
 * | 6+      | capped          | 2000ms |
 *
 * @param attemptNumber - The next attempt number (1-indexed)
 */
export const calculateRetryDelay = (
  attemptNumber: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Duration.Duration => {
  if (attemptNumber <= 1) {
    return Duration.zero
  }

  const exponent = attemptNumber - 2
  const delayMs = policy.initialIntervalMs * Math.pow(policy.backoffCoefficient, exponent)
  return Duration.millis(Math.min(delayMs, policy.maxIntervalMs))
}

/**
 * Check if the attempt budget is used up.
 *
 * @param attemptsMade - Attempts already executed (0 = never run)
 */
export const isMaxRetriesExceeded = (
  attemptsMade: number,
  maxAttempts: number = DEFAULT_RETRY_POLICY.maxAttempts
): boolean => attemptsMade >= maxAttempts

/**
 * Schedule that re-runs a failed attempt until the policy is exhausted.
 * Recurrence n (0-indexed) precedes attempt n + 2.
 * `shouldRetry` decides per error whether another attempt is allowed at all.
 */
export const retrySchedule = <E>(
  policy: RetryPolicy,
  shouldRetry: (error: E) => boolean
): Schedule.Schedule<number, E> =>
  Schedule.recurs(Math.max(policy.maxAttempts - 1, 0)).pipe(
    Schedule.addDelay((recurrence) => calculateRetryDelay(recurrence + 2, policy)),
    Schedule.whileInput(shouldRetry)
  )
