#!/usr/bin/env node
import { HttpClient } from "@effect/platform"
import { NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Config, Console, Data, Effect, Either } from "effect"
import { parseArgs, toRequest } from "./commands.js"

class CliRequestError extends Data.TaggedError("CliRequestError")<{
  readonly status: number
}> {}

const program = Effect.gen(function* () {
  const parsed = parseArgs(process.argv.slice(2))
  if (Either.isLeft(parsed)) {
    yield* Console.error(parsed.left.message)
    return yield* Effect.fail(parsed.left)
  }
  const command = parsed.right

  const baseUrl = yield* Config.string("FULFILLMENT_API_URL").pipe(
    Config.withDefault("http://localhost:3000")
  )
  const client = yield* HttpClient.HttpClient

  const response = yield* client.execute(toRequest(baseUrl, command))
  const body = yield* response.json
  yield* Console.log(JSON.stringify(body, null, 2))

  if (response.status >= 400) {
    return yield* Effect.fail(new CliRequestError({ status: response.status }))
  }
})

program.pipe(Effect.provide(NodeHttpClient.layer), NodeRuntime.runMain)
