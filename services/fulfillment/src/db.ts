import { FileSystem, Path } from "@effect/platform"
import { SqlClient } from "@effect/sql"
import { PgClient } from "@effect/sql-pg"
import { Config, Effect, Layer, Redacted } from "effect"

export const DatabaseLive = PgClient.layerConfig({
  host: Config.string("DATABASE_HOST").pipe(Config.withDefault("localhost")),
  port: Config.number("DATABASE_PORT").pipe(Config.withDefault(5432)),
  database: Config.string("DATABASE_NAME").pipe(Config.withDefault("fulfillment")),
  username: Config.string("DATABASE_USER").pipe(Config.withDefault("fulfillment")),
  password: Config.redacted("DATABASE_PASSWORD").pipe(
    Config.withDefault(Redacted.make("fulfillment"))
  )
})

/**
 * Applies every `*.sql` file in MIGRATIONS_PATH in file-name order.
 * Migrations are written to be re-runnable (IF NOT EXISTS).
 */
export const MigrationsLive = Layer.effectDiscard(
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const directory = yield* Config.string("MIGRATIONS_PATH").pipe(
      Config.withDefault("migrations")
    )

    const files = (yield* fs.readDirectory(directory))
      .filter((file) => file.endsWith(".sql"))
      .sort()

    for (const file of files) {
      const statements = yield* fs.readFileString(path.join(directory, file))
      yield* sql.unsafe(statements)
      yield* Effect.logInfo("Applied migration", { file })
    }
  })
)
