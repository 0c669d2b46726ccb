import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { SqlClient } from "@effect/sql"
import { Cause, DateTime, Duration, Effect } from "effect"

const PING_TIMEOUT = Duration.seconds(2)

// Round-trip to PostgreSQL; resolves to the latency in milliseconds
const pingDatabase = Effect.flatMap(SqlClient.SqlClient, (sql) => sql`SELECT 1`).pipe(
  Effect.timeoutFail({
    duration: PING_TIMEOUT,
    onTimeout: () =>
      new Cause.TimeoutException(
        `Database did not answer within ${Duration.toMillis(PING_TIMEOUT)}ms`
      )
  }),
  Effect.timed,
  Effect.map(([elapsed]) => Duration.toMillis(elapsed))
)

export const healthCheck = Effect.gen(function* () {
  const checkedAt = DateTime.formatIso(yield* DateTime.now)

  return yield* pingDatabase.pipe(
    Effect.matchEffect({
      onSuccess: (latencyMs) =>
        HttpServerResponse.json({
          status: "healthy",
          database: { status: "up", latency_ms: latencyMs },
          checked_at: checkedAt
        }),
      onFailure: (error) =>
        Effect.logWarning("Health check failed", { error: error.message }).pipe(
          Effect.zipRight(
            HttpServerResponse.json(
              {
                status: "unhealthy",
                database: { status: "down", error: error.message },
                checked_at: checkedAt
              },
              { status: 503 }
            )
          )
        )
    })
  )
})

export const HealthRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/health", healthCheck)
)
