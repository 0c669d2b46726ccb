import { Context, Effect } from "effect"
import type { ActivityName } from "../domain/Activity.js"
import type { ActivityExhaustedError, InvocationFault } from "../domain/errors.js"

export class ActivityExecutor extends Context.Tag("ActivityExecutor")<
  ActivityExecutor,
  {
    /**
     * Run an activity under the retry policy and both timeout budgets.
     * Each retry re-runs `invocation` from scratch.
     * Fails with ActivityExhaustedError once no further attempt is allowed.
     */
    readonly execute: <A>(
      activity: ActivityName,
      invocation: Effect.Effect<A, InvocationFault>
    ) => Effect.Effect<A, ActivityExhaustedError>
  }
>() {}
