import { Effect, Layer, Schema } from "effect"
import type { SqlError } from "@effect/sql"
import { OrderActivities } from "./OrderActivities.js"
import { PaymentLedger } from "./PaymentLedger.js"
import { OrderRepository } from "../repositories/OrderRepository.js"
import { EventLogRepository } from "../repositories/EventLogRepository.js"
import { OrderIntakeClient } from "../clients/OrderIntakeClient.js"
import { CarrierClient } from "../clients/CarrierClient.js"
import type { ActivityName } from "../domain/Activity.js"
import { OrderPayload, emptyOrderPayload } from "../domain/Order.js"
import { ChargePaymentInput } from "../domain/Payment.js"
import type { ShipmentRequest } from "../domain/SagaResult.js"
import {
  ActivityAbortedError,
  ActivityFailedError,
  DomainValidationError
} from "../domain/errors.js"

// Storage faults on the success path are worth another attempt
const storageFault = (activity: ActivityName) => (error: SqlError.SqlError) =>
  new ActivityFailedError({ activity, reason: `Storage error: ${error.message}` })

const decodeInput = <A, I>(activity: ActivityName, schema: Schema.Schema<A, I>) =>
  (input: unknown) =>
    Schema.decodeUnknown(schema)(input).pipe(
      Effect.mapError((error) =>
        new DomainValidationError({
          activity,
          reason: error.message
        })
      )
    )

const decodeOrder = decodeInput("ValidateOrder", OrderPayload)
const decodeChargeInput = decodeInput("ChargePayment", ChargePaymentInput)

export const OrderActivitiesLive = Layer.effect(
  OrderActivities,
  Effect.gen(function* () {
    const orderRepo = yield* OrderRepository
    const eventLog = yield* EventLogRepository
    const intake = yield* OrderIntakeClient
    const carrier = yield* CarrierClient
    const ledger = yield* PaymentLedger

    // Recording an absorbed failure is best-effort
    const logStorageFault = (operation: string, orderId: string) =>
      (error: SqlError.SqlError) =>
        Effect.logError(`DB write failed during ${operation}`, { orderId, error: error.message })

    const receiveOrder = (orderId: string) =>
      Effect.gen(function* () {
        if (orderId.trim().length === 0) {
          return yield* Effect.fail(
            new DomainValidationError({ activity: "ReceiveOrder", reason: "order_id is required" })
          )
        }

        return yield* intake.fetchOrder(orderId).pipe(
          Effect.matchEffect({
            onSuccess: (order) =>
              Effect.gen(function* () {
                yield* orderRepo.upsertStatus(orderId, "RECEIVED")
                yield* eventLog.append(orderId, "ORDER_RECEIVED", order)
                return order
              }).pipe(Effect.mapError(storageFault("ReceiveOrder"))),
            onFailure: (intakeError) =>
              Effect.gen(function* () {
                yield* Effect.logWarning("Order intake failed", {
                  orderId,
                  reason: intakeError.reason
                })
                yield* orderRepo.upsertStatus(orderId, "RECEIVE_ERROR").pipe(
                  Effect.zipRight(
                    eventLog.append(orderId, "ORDER_RECEIVE_FAILED", { error: intakeError.reason })
                  ),
                  Effect.catchAll(logStorageFault("receive_order", orderId))
                )
                return emptyOrderPayload(orderId)
              })
          })
        )
      }).pipe(Effect.withSpan("activity-receive-order", { attributes: { orderId } }))

    const validateOrder = (input: OrderPayload) =>
      Effect.gen(function* () {
        const order = yield* decodeOrder(input)
        const orderId = order.order_id

        return yield* intake.validateOrder(order).pipe(
          Effect.matchEffect({
            onSuccess: (valid) =>
              Effect.gen(function* () {
                yield* orderRepo.upsertStatus(orderId, valid ? "VALIDATED" : "INVALID")
                yield* eventLog.append(orderId, "ORDER_VALIDATED", { valid })
                return valid
              }).pipe(Effect.mapError(storageFault("ValidateOrder"))),
            onFailure: (intakeError) =>
              Effect.gen(function* () {
                yield* Effect.logWarning("Order validation failed", {
                  orderId,
                  reason: intakeError.reason
                })
                yield* orderRepo.upsertStatus(orderId, "VALIDATION_ERROR").pipe(
                  Effect.zipRight(
                    eventLog.append(orderId, "ORDER_VALIDATION_FAILED", { error: intakeError.reason })
                  ),
                  Effect.catchAll(logStorageFault("validate_order", orderId))
                )
                return false
              })
          })
        )
      }).pipe(Effect.withSpan("activity-validate-order"))

    const chargePayment = (input: ChargePaymentInput) =>
      decodeChargeInput(input).pipe(
        Effect.flatMap(({ order, payment_id }) =>
          ledger.charge(order, payment_id).pipe(
            Effect.catchTags({
              SqlError: (error) => Effect.fail(storageFault("ChargePayment")(error)),
              ChargeUnrecordedError: ({ transactionId, reason }) =>
                Effect.fail(
                  new ActivityAbortedError({
                    activity: "ChargePayment",
                    reason: `Charged as ${transactionId} but not recorded: ${reason}`
                  })
                )
            })
          )
        ),
        Effect.withSpan("activity-charge-payment")
      )

    const preparePackage = ({ order, address }: ShipmentRequest) =>
      Effect.gen(function* () {
        const orderId = order.order_id

        return yield* carrier.preparePackage(order, address).pipe(
          Effect.matchEffect({
            onSuccess: (result) =>
              eventLog.append(orderId, "PACKAGE_PREPARED", { result, address }).pipe(
                Effect.as(result),
                Effect.mapError(storageFault("PreparePackage"))
              ),
            onFailure: (carrierError) =>
              eventLog
                .append(orderId, "PACKAGE_PREPARE_FAILED", { error: carrierError.reason })
                .pipe(
                  Effect.catchAll(logStorageFault("prepare_package", orderId)),
                  Effect.zipRight(
                    Effect.fail(
                      new ActivityFailedError({
                        activity: "PreparePackage",
                        reason: carrierError.reason
                      })
                    )
                  )
                )
          })
        )
      }).pipe(Effect.withSpan("activity-prepare-package"))

    const dispatchCarrier = ({ order }: ShipmentRequest) =>
      Effect.gen(function* () {
        const orderId = order.order_id

        return yield* carrier.dispatch(order).pipe(
          Effect.matchEffect({
            onSuccess: (result) =>
              Effect.gen(function* () {
                yield* eventLog.append(orderId, "CARRIER_DISPATCHED", { result })
                yield* orderRepo.upsertStatus(orderId, "SHIPPED")
                return result
              }).pipe(Effect.mapError(storageFault("DispatchCarrier"))),
            onFailure: (carrierError) =>
              eventLog
                .append(orderId, "CARRIER_DISPATCH_FAILED", { error: carrierError.reason })
                .pipe(
                  Effect.zipRight(orderRepo.upsertStatus(orderId, "SHIP_ERROR")),
                  Effect.catchAll(logStorageFault("dispatch_carrier", orderId)),
                  Effect.zipRight(
                    Effect.fail(
                      new ActivityFailedError({
                        activity: "DispatchCarrier",
                        reason: carrierError.reason
                      })
                    )
                  )
                )
          })
        )
      }).pipe(Effect.withSpan("activity-dispatch-carrier"))

    return {
      receiveOrder,
      validateOrder,
      chargePayment,
      preparePackage,
      dispatchCarrier
    }
  })
)
