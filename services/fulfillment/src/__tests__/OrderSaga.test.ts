import { describe, it, expect } from "vitest"
import { Clock, Duration, Effect, Layer, TestClock, TestContext } from "effect"
import { OrderSaga } from "../services/OrderSaga.js"
import { SagaRuntime } from "../services/SagaRuntime.js"
import { OrderIntakeClient } from "../clients/OrderIntakeClient.js"
import { PaymentGatewayClient } from "../clients/PaymentGatewayClient.js"
import { SagaSignal } from "../domain/Signal.js"
import type { ShippingSagaResult } from "../domain/SagaResult.js"
import { OrderIntakeError } from "../domain/errors.js"
import {
  eventPayloads,
  eventTypes,
  makeTestLayer,
  orderStatusOf,
  paymentOf,
  stepChanges,
  waitForStep
} from "./fixtures.js"

// Intake that returns an order without lines, which validation rejects
const emptyOrderIntake = Layer.succeed(OrderIntakeClient, {
  fetchOrder: (orderId: string) => Effect.succeed({ order_id: orderId, items: [] }),
  validateOrder: (order) => Effect.succeed(order.items.length > 0)
})

const unavailableIntake = Layer.succeed(OrderIntakeClient, {
  fetchOrder: (orderId: string) =>
    Effect.fail(new OrderIntakeError({ orderId, operation: "fetchOrder", reason: "intake offline" })),
  validateOrder: (order) => Effect.succeed(order.items.length > 0)
})

const hangingGateway = Layer.succeed(PaymentGatewayClient, {
  charge: () => Effect.never
})

// Start a saga, approve it and wait for its result
const startApproved = (orderId: string, paymentId: string) =>
  Effect.gen(function* () {
    const orderSaga = yield* OrderSaga
    const runtime = yield* SagaRuntime
    const ref = yield* orderSaga.start(orderId, paymentId)
    yield* runtime.signal(orderId, SagaSignal.Approve())
    return yield* Effect.flatten(ref.await)
  })

describe("OrderSaga", () => {
  describe("happy path", () => {
    it("should receive, validate, charge and hand off to shipping once approved", async () => {
      const result = await Effect.gen(function* () {
        const runtime = yield* SagaRuntime
        const outcome = yield* startApproved("O1", "P1")
        const shipping = yield* Effect.flatten(runtime.await("O1-shipping"))

        return {
          outcome,
          shipping,
          status: yield* runtime.query("O1"),
          payment: yield* paymentOf("P1"),
          orderStatus: yield* orderStatusOf("O1"),
          events: yield* eventTypes("O1")
        }
      }).pipe(Effect.provide(makeTestLayer()), Effect.runPromise)

      expect(result.outcome).toEqual({
        status: "success",
        orderId: "O1",
        payment: { status: "charged", paymentId: "P1", amount: 42.5 }
      })
      expect(result.status).toEqual({ orderId: "O1", step: "COMPLETED", lastError: null })
      expect(result.payment?.status).toBe("CHARGED")
      expect(result.payment?.amount).toBe(42.5)
      expect(result.shipping).toEqual({ status: "dispatched", orderId: "O1" })
      expect(result.orderStatus).toBe("SHIPPED")
      expect(result.events).toEqual([
        "ORDER_RECEIVED",
        "ORDER_VALIDATED",
        "PAYMENT_CHARGED",
        "PACKAGE_PREPARED",
        "CARRIER_DISPATCHED"
      ])
    })

    it("should record every step change in the event log", async () => {
      const steps = await Effect.gen(function* () {
        yield* startApproved("O1", "P1")
        return yield* stepChanges("O1")
      }).pipe(Effect.provide(makeTestLayer()), Effect.runPromise)

      expect(steps).toEqual([
        "RECEIVING_ORDER",
        "VALIDATING_ORDER",
        "WAITING_FOR_APPROVAL",
        "CHARGING_PAYMENT",
        "STARTING_SHIPPING",
        "COMPLETED"
      ])
    })

    it("should pass an address override to the shipping saga", async () => {
      const prepared = await Effect.gen(function* () {
        const orderSaga = yield* OrderSaga
        const runtime = yield* SagaRuntime
        const ref = yield* orderSaga.start("O2", "P2")
        yield* runtime.signal("O2", SagaSignal.UpdateAddress({ address: { city: "Springfield" } }))
        yield* runtime.signal("O2", SagaSignal.Approve())
        yield* Effect.flatten(ref.await)
        yield* Effect.flatten(runtime.await("O2-shipping"))
        return yield* eventPayloads("O2", "PACKAGE_PREPARED")
      }).pipe(Effect.provide(makeTestLayer()), Effect.runPromise)

      expect(prepared).toEqual([{ result: "Package ready for O2", address: { city: "Springfield" } }])
    })
  })

  describe("approval gate", () => {
    it("should end cancelled when CancelOrder arrives 1s into the window", async () => {
      const result = await Effect.gen(function* () {
        const orderSaga = yield* OrderSaga
        const runtime = yield* SagaRuntime
        const ref = yield* orderSaga.start("O3", "P3")

        yield* waitForStep("O3", "WAITING_FOR_APPROVAL")
        yield* TestClock.adjust(Duration.seconds(1))
        yield* runtime.signal("O3", SagaSignal.CancelOrder({ reason: "customer request" }))

        const outcome = yield* Effect.flatten(ref.await)
        return {
          outcome,
          elapsedMs: yield* Clock.currentTimeMillis,
          status: yield* runtime.query("O3"),
          payment: yield* paymentOf("P3")
        }
      }).pipe(
        Effect.provide(makeTestLayer()),
        Effect.provide(TestContext.TestContext),
        Effect.runPromise
      )

      expect(result.outcome).toEqual({ status: "cancelled", orderId: "O3" })
      expect(result.elapsedMs).toBe(1000)
      expect(result.status).toEqual({ orderId: "O3", step: "CANCELLED", lastError: null })
      expect(result.payment).toBeUndefined()
    })

    it("should time out exactly at the end of the approval window", async () => {
      const result = await Effect.gen(function* () {
        const orderSaga = yield* OrderSaga
        const runtime = yield* SagaRuntime
        const ref = yield* orderSaga.start("O4", "P4")

        yield* waitForStep("O4", "WAITING_FOR_APPROVAL")
        yield* TestClock.adjust(Duration.millis(9999))
        const beforeBoundary = yield* runtime.query("O4")

        yield* TestClock.adjust(Duration.millis(1))
        const outcome = yield* Effect.flatten(ref.await)

        return {
          beforeBoundary,
          outcome,
          elapsedMs: yield* Clock.currentTimeMillis,
          status: yield* runtime.query("O4")
        }
      }).pipe(
        Effect.provide(makeTestLayer()),
        Effect.provide(TestContext.TestContext),
        Effect.runPromise
      )

      expect(result.beforeBoundary.step).toBe("WAITING_FOR_APPROVAL")
      expect(result.outcome).toEqual({
        status: "manual_review_timeout",
        orderId: "O4",
        error: "Manual review timed out"
      })
      expect(result.elapsedMs).toBe(10000)
      expect(result.status).toEqual({
        orderId: "O4",
        step: "AWAITING_APPROVAL_TIMEOUT",
        lastError: "Manual review timed out"
      })
    })

    it("should prefer cancellation when approve and cancel both arrive", async () => {
      const result = await Effect.gen(function* () {
        const orderSaga = yield* OrderSaga
        const runtime = yield* SagaRuntime
        const ref = yield* orderSaga.start("O5", "P5")
        yield* runtime.signal("O5", SagaSignal.Approve())
        yield* runtime.signal("O5", SagaSignal.CancelOrder({ reason: "" }))
        return {
          outcome: yield* Effect.flatten(ref.await),
          payment: yield* paymentOf("P5")
        }
      }).pipe(Effect.provide(makeTestLayer()), Effect.runPromise)

      expect(result.outcome).toEqual({ status: "cancelled", orderId: "O5" })
      expect(result.payment).toBeUndefined()
    })

    it("should reject an approved order that failed validation", async () => {
      const result = await Effect.gen(function* () {
        const runtime = yield* SagaRuntime
        const outcome = yield* startApproved("O6", "P6")
        return {
          outcome,
          status: yield* runtime.query("O6"),
          orderStatus: yield* orderStatusOf("O6"),
          payment: yield* paymentOf("P6")
        }
      }).pipe(Effect.provide(makeTestLayer({ intake: emptyOrderIntake })), Effect.runPromise)

      expect(result.outcome).toEqual({
        status: "validation_failed",
        orderId: "O6",
        error: "Order validation failed"
      })
      expect(result.status.step).toBe("VALIDATION_FAILED")
      expect(result.orderStatus).toBe("INVALID")
      expect(result.payment).toBeUndefined()
    })
  })

  describe("receive and validate failures", () => {
    it("should continue with an empty order when intake is unavailable", async () => {
      const result = await Effect.gen(function* () {
        const outcome = yield* startApproved("O7", "P7")
        return {
          outcome,
          orderStatus: yield* orderStatusOf("O7"),
          events: yield* eventTypes("O7")
        }
      }).pipe(Effect.provide(makeTestLayer({ intake: unavailableIntake })), Effect.runPromise)

      expect(result.outcome).toEqual({
        status: "validation_failed",
        orderId: "O7",
        error: "Order validation failed"
      })
      expect(result.orderStatus).toBe("INVALID")
      expect(result.events).toEqual(["ORDER_RECEIVE_FAILED", "ORDER_VALIDATED"])
    })

    it("should keep the receive error as the reason when the order id is empty", async () => {
      const result = await Effect.gen(function* () {
        const runtime = yield* SagaRuntime
        const outcome = yield* startApproved("", "P8")
        return { outcome, status: yield* runtime.query("") }
      }).pipe(Effect.provide(makeTestLayer()), Effect.runPromise)

      expect(result.outcome).toEqual({
        status: "validation_failed",
        orderId: "",
        error: "Receive error: order_id is required"
      })
      expect(result.status.lastError).toBe("Receive error: order_id is required")
    })
  })

  describe("charge failures", () => {
    it("should end CHARGE_FAILED when the gateway declines", async () => {
      const result = await Effect.gen(function* () {
        const runtime = yield* SagaRuntime
        const outcome = yield* startApproved("O9", "P9-decline")
        return {
          outcome,
          status: yield* runtime.query("O9"),
          payment: yield* paymentOf("P9-decline"),
          orderStatus: yield* orderStatusOf("O9")
        }
      }).pipe(Effect.provide(makeTestLayer()), Effect.runPromise)

      expect(result.outcome).toEqual({
        status: "payment_failed",
        orderId: "O9",
        error: "Charge error: Payment declined"
      })
      expect(result.status).toEqual({
        orderId: "O9",
        step: "CHARGE_FAILED",
        lastError: "Charge error: Payment declined"
      })
      expect(result.payment?.status).toBe("FAILED")
      expect(result.orderStatus).toBe("PAYMENT_FAILED")
    })

    it("should report a timed-out charge as a timeout", async () => {
      const outcome = await startApproved("O10", "P10").pipe(
        Effect.provide(
          makeTestLayer({
            gateway: hangingGateway,
            config: { activityStartToCloseMs: 20, activityScheduleToCloseMs: 60 }
          })
        ),
        Effect.runPromise
      )

      expect(outcome).toEqual({
        status: "payment_failed",
        orderId: "O10",
        error: "Activity task timed out during CHARGE"
      })
    })
  })

  describe("shipping hand-off", () => {
    it("should end SHIPPING_START_FAILED when the shipping saga is already running", async () => {
      const result = await Effect.gen(function* () {
        const runtime = yield* SagaRuntime
        yield* runtime.spawn<ShippingSagaResult>({
          sagaId: "O11-shipping",
          kind: "ShippingSaga",
          orderId: "O11",
          run: () => Effect.never
        })

        const outcome = yield* startApproved("O11", "P11")
        return {
          outcome,
          status: yield* runtime.query("O11"),
          payment: yield* paymentOf("P11")
        }
      }).pipe(Effect.provide(makeTestLayer()), Effect.runPromise)

      const error = "Failed to start shipping child saga: saga O11-shipping is already running"
      expect(result.outcome).toEqual({ status: "shipping_start_failed", orderId: "O11", error })
      expect(result.status).toEqual({ orderId: "O11", step: "SHIPPING_START_FAILED", lastError: error })
      expect(result.payment?.status).toBe("CHARGED")
    })
  })

  describe("signals after termination", () => {
    it("should drop DispatchFailed sent to a completed saga", async () => {
      const result = await Effect.gen(function* () {
        const runtime = yield* SagaRuntime
        yield* startApproved("O12", "P12")
        const delivery = yield* runtime.signal(
          "O12",
          SagaSignal.DispatchFailed({ reason: "late failure" })
        )
        return { delivery, status: yield* runtime.query("O12") }
      }).pipe(Effect.provide(makeTestLayer()), Effect.runPromise)

      expect(result.delivery).toBe("Dropped")
      expect(result.status).toEqual({ orderId: "O12", step: "COMPLETED", lastError: null })
    })
  })
})
