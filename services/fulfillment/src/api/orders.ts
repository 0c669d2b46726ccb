import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import type { HttpServerError } from "@effect/platform"
import type { SqlError } from "@effect/sql"
import { DateTime, Effect, Match, type ParseResult } from "effect"
import {
  CancelOrderRequest,
  OrderIdParams,
  StartOrderParams,
  StartOrderRequest,
  UpdateAddressRequest
} from "../domain/Order.js"
import { SagaSignal } from "../domain/Signal.js"
import type { SagaAlreadyStartedError, SagaNotFoundError } from "../domain/errors.js"
import { FulfillmentService } from "../services/FulfillmentService.js"

const validationError = (error: ParseResult.ParseError) =>
  HttpServerResponse.json(
    {
      error: "validation_error",
      message: "Invalid request data",
      details: error.message
    },
    { status: 400 }
  )

const requestError = (_error: HttpServerError.RequestError) =>
  HttpServerResponse.json(
    {
      error: "request_error",
      message: "Failed to parse request body"
    },
    { status: 400 }
  )

// POST /orders/:order_id/start - Start the fulfillment saga
export const startOrder = Effect.gen(function* () {
  const { order_id: orderId } = yield* HttpRouter.schemaPathParams(StartOrderParams)
  const { payment_id: paymentId } = yield* HttpServerRequest.schemaBodyJson(StartOrderRequest)

  const service = yield* FulfillmentService
  const { sagaId } = yield* service.start(orderId, paymentId)

  yield* Effect.logInfo("Order saga started", { orderId, paymentId })

  return HttpServerResponse.json({ saga_id: sagaId }, { status: 202 })
}).pipe(
  Effect.withSpan("POST /orders/:order_id/start"),
  Effect.flatten,
  Effect.catchTags({
    ParseError: validationError,
    RequestError: requestError,

    // Saga still running for this order (409 Conflict)
    SagaAlreadyStartedError: (error: SagaAlreadyStartedError) =>
      HttpServerResponse.json(
        {
          error: "already_started",
          message: `Saga ${error.sagaId} is already running`
        },
        { status: 409 }
      )
  })
)

type SignalReader = Effect.Effect<
  SagaSignal,
  ParseResult.ParseError | HttpServerError.RequestError,
  HttpServerRequest.HttpServerRequest
>

const routeSignal = (route: string, readSignal: SignalReader) =>
  Effect.gen(function* () {
    const { order_id: orderId } = yield* HttpRouter.schemaPathParams(OrderIdParams)
    const signal = yield* readSignal

    const service = yield* FulfillmentService
    const delivery = yield* service.signal(orderId, signal)

    yield* Effect.logInfo("Signal routed", { orderId, signal: signal._tag, delivery })

    return HttpServerResponse.json(
      { status: delivery === "Delivered" ? "signalled" : "dropped" },
      { status: 202 }
    )
  }).pipe(
    Effect.withSpan(`POST ${route}`),
    Effect.flatten,
    Effect.catchTags({
      ParseError: validationError,
      RequestError: requestError,

      SagaNotFoundError: (error: SagaNotFoundError) =>
        HttpServerResponse.json(
          {
            error: "not_found",
            message: `No saga found for order ${error.sagaId}`
          },
          { status: 404 }
        )
    })
  )

// POST /orders/:order_id/signals/cancel
export const cancelOrder = routeSignal(
  "/orders/:order_id/signals/cancel",
  HttpServerRequest.schemaBodyJson(CancelOrderRequest).pipe(
    Effect.map(({ reason }) => SagaSignal.CancelOrder({ reason }))
  )
)

// POST /orders/:order_id/signals/approve - no body
export const approveOrder = routeSignal(
  "/orders/:order_id/signals/approve",
  Effect.succeed(SagaSignal.Approve())
)

// POST /orders/:order_id/signals/update-address
export const updateAddress = routeSignal(
  "/orders/:order_id/signals/update-address",
  HttpServerRequest.schemaBodyJson(UpdateAddressRequest).pipe(
    Effect.map(({ address }) => SagaSignal.UpdateAddress({ address }))
  )
)

// GET /orders/:order_id/status - Live saga status or the audit-trail fallback
export const getOrderStatus = Effect.gen(function* () {
  const { order_id: orderId } = yield* HttpRouter.schemaPathParams(OrderIdParams)

  const service = yield* FulfillmentService
  const view = yield* service.query(orderId)

  return Match.value(view).pipe(
    Match.tag("Live", ({ status }) =>
      HttpServerResponse.json({
        order_id: status.orderId,
        step: status.step,
        last_error: status.lastError
      })
    ),
    Match.tag("Degraded", ({ queryError, recentEvents }) =>
      HttpServerResponse.json({
        order_id: orderId,
        query_error: queryError,
        recent_events: recentEvents.map((event) => ({
          id: event.id,
          type: event.type,
          payload: event.payload,
          ts: DateTime.formatIso(event.ts)
        }))
      })
    ),
    Match.exhaustive
  )
}).pipe(
  Effect.withSpan("GET /orders/:order_id/status"),
  Effect.flatten,
  Effect.catchTags({
    ParseError: validationError,

    // SQL errors (500 Internal Server Error)
    SqlError: (error: SqlError.SqlError) =>
      Effect.gen(function* () {
        yield* Effect.logError("Database error in getOrderStatus", { error })
        return HttpServerResponse.json(
          {
            error: "internal_error",
            message: "An unexpected error occurred"
          },
          { status: 500 }
        )
      }).pipe(Effect.flatten)
  })
)

export const OrderRoutes = HttpRouter.empty.pipe(
  HttpRouter.post("/orders/:order_id/start", startOrder),
  HttpRouter.post("/orders/:order_id/signals/cancel", cancelOrder),
  HttpRouter.post("/orders/:order_id/signals/approve", approveOrder),
  HttpRouter.post("/orders/:order_id/signals/update-address", updateAddress),
  HttpRouter.get("/orders/:order_id/status", getOrderStatus)
)
