/**
 * Command-line client for the fulfillment HTTP API.
 *
 * Usage:
 *   fulfillment start <order_id> <payment_id>
 *   fulfillment signal <order_id> <CancelOrder|Approve|UpdateAddress> [payload_json]
 *   fulfillment query <order_id>
 */

import { HttpClientRequest } from "@effect/platform"
import { Data, Either, Schema } from "effect"
import { Address } from "../domain/Order.js"

export type CliSignalName = "CancelOrder" | "Approve" | "UpdateAddress"

export type CliCommand =
  | { readonly _tag: "Start"; readonly orderId: string; readonly paymentId: string }
  | {
      readonly _tag: "Signal"
      readonly orderId: string
      readonly signal: CliSignalName
      readonly body: Readonly<Record<string, unknown>>
    }
  | { readonly _tag: "Query"; readonly orderId: string }

export class CliUsageError extends Data.TaggedError("CliUsageError")<{
  readonly message: string
}> {}

export const usage = `Usage:
  fulfillment start <order_id> <payment_id>
  fulfillment signal <order_id> <CancelOrder|Approve|UpdateAddress> [payload_json]
  fulfillment query <order_id>

Environment:
  FULFILLMENT_API_URL   Base URL of the fulfillment API (default http://localhost:3000)`

const decodePayload = Schema.decodeUnknownEither(Schema.parseJson())

// CancelOrder takes a reason string or {"reason": ...}; UpdateAddress takes the address object
const signalBody = (
  signal: CliSignalName,
  raw: string | undefined
): Either.Either<Readonly<Record<string, unknown>>, CliUsageError> => {
  if (signal === "Approve") {
    return Either.right({})
  }
  if (raw === undefined) {
    return signal === "CancelOrder"
      ? Either.right({})
      : Either.left(new CliUsageError({ message: "UpdateAddress requires an address payload" }))
  }

  return decodePayload(raw).pipe(
    Either.mapLeft(() => new CliUsageError({ message: `Invalid payload JSON: ${raw}` })),
    Either.flatMap((payload): Either.Either<Readonly<Record<string, unknown>>, CliUsageError> => {
      if (signal === "CancelOrder") {
        return typeof payload === "string"
          ? Either.right({ reason: payload })
          : Schema.decodeUnknownEither(Schema.Struct({ reason: Schema.String }))(payload).pipe(
              Either.mapLeft(() =>
                new CliUsageError({ message: "CancelOrder payload must be a string or {\"reason\": string}" })
              )
            )
      }
      return Schema.decodeUnknownEither(Address)(payload).pipe(
        Either.map((address) => ({ address })),
        Either.mapLeft(() =>
          new CliUsageError({ message: "UpdateAddress payload must be an object of strings" })
        )
      )
    })
  )
}

const isSignalName = (name: string): name is CliSignalName =>
  name === "CancelOrder" || name === "Approve" || name === "UpdateAddress"

export const parseArgs = (args: readonly string[]): Either.Either<CliCommand, CliUsageError> => {
  const [command, orderId, third, payload] = args

  if (command === "start" && args.length === 3 && orderId !== undefined && third !== undefined) {
    return Either.right({ _tag: "Start", orderId, paymentId: third })
  }

  const signalArity = args.length === 3 || args.length === 4
  if (command === "signal" && signalArity && orderId !== undefined && third !== undefined) {
    if (!isSignalName(third)) {
      return Either.left(new CliUsageError({ message: `Unknown signal: ${third}` }))
    }
    return signalBody(third, payload).pipe(
      Either.map((body): CliCommand => ({ _tag: "Signal", orderId, signal: third, body }))
    )
  }

  if (command === "query" && args.length === 2 && orderId !== undefined) {
    return Either.right({ _tag: "Query", orderId })
  }

  return Either.left(new CliUsageError({ message: usage }))
}

const signalPaths: Record<CliSignalName, string> = {
  CancelOrder: "cancel",
  Approve: "approve",
  UpdateAddress: "update-address"
}

export const toRequest = (
  baseUrl: string,
  command: CliCommand
): HttpClientRequest.HttpClientRequest => {
  const orderPath = (orderId: string) => `${baseUrl}/orders/${encodeURIComponent(orderId)}`

  switch (command._tag) {
    case "Start":
      return HttpClientRequest.post(`${orderPath(command.orderId)}/start`).pipe(
        HttpClientRequest.bodyUnsafeJson({ payment_id: command.paymentId })
      )
    case "Signal":
      return HttpClientRequest.post(
        `${orderPath(command.orderId)}/signals/${signalPaths[command.signal]}`
      ).pipe(HttpClientRequest.bodyUnsafeJson(command.body))
    case "Query":
      return HttpClientRequest.get(`${orderPath(command.orderId)}/status`)
  }
}
