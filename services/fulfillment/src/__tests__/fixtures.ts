import { Context, DateTime, Effect, Layer, Option, Ref, Schema } from "effect"
import { FulfillmentConfig } from "../config.js"
import { FulfillmentCoreLive } from "../layers.js"
import { OrderRepository } from "../repositories/OrderRepository.js"
import { PaymentRepository } from "../repositories/PaymentRepository.js"
import { EventLogRepository } from "../repositories/EventLogRepository.js"
import { OrderIntakeClient } from "../clients/OrderIntakeClient.js"
import { PaymentGatewayClient } from "../clients/PaymentGatewayClient.js"
import { CarrierClient } from "../clients/CarrierClient.js"
import { OrderIntakeClientLive } from "../clients/OrderIntakeClientLive.js"
import { PaymentGatewayClientLive } from "../clients/PaymentGatewayClientLive.js"
import { CarrierClientLive } from "../clients/CarrierClientLive.js"
import { SagaRuntime } from "../services/SagaRuntime.js"
import { Order, type OrderStatus } from "../domain/Order.js"
import { Payment, type PaymentStatus } from "../domain/Payment.js"
import { OrderEvent, type OrderEventType } from "../domain/OrderEvent.js"
import type { SagaStep } from "../domain/SagaState.js"

export type TestConfig = Context.Tag.Service<typeof FulfillmentConfig>

// Retries are near-instant and stubs are deterministic
export const baseTestConfig: TestConfig = {
  port: 0,
  approvalWindowMs: 10000,
  activityScheduleToCloseMs: 12000,
  activityStartToCloseMs: 4000,
  retryInitialIntervalMs: 1,
  retryMaxIntervalMs: 2,
  retryBackoffCoefficient: 2,
  retryMaxAttempts: 5,
  shippingExecutionTimeoutMs: 12000,
  maxConcurrentActivities: 10,
  recentEventsLimit: 50,
  finishedSagaRetention: 100,
  flakyMode: false,
  mockFailureRate: 0,
  mockSlowCallRate: 0,
  mockLatencyMs: 0
}

export const testConfigLayer = (overrides: Partial<TestConfig> = {}) =>
  Layer.succeed(FulfillmentConfig, { ...baseTestConfig, ...overrides })

// ═══════════════════════════════════════════════════════════════════════════
// In-memory store standing in for PostgreSQL
// ═══════════════════════════════════════════════════════════════════════════

export class InMemoryStore extends Context.Tag("test/InMemoryStore")<
  InMemoryStore,
  {
    readonly orders: Ref.Ref<ReadonlyMap<string, Order>>
    readonly payments: Ref.Ref<ReadonlyMap<string, Payment>>
    readonly events: Ref.Ref<ReadonlyArray<OrderEvent>>
  }
>() {}

export const InMemoryStoreLive = Layer.effect(
  InMemoryStore,
  Effect.gen(function* () {
    return {
      orders: yield* Ref.make<ReadonlyMap<string, Order>>(new Map()),
      payments: yield* Ref.make<ReadonlyMap<string, Payment>>(new Map()),
      events: yield* Ref.make<ReadonlyArray<OrderEvent>>([])
    }
  })
)

const withEntry = <V>(map: ReadonlyMap<string, V>, key: string, value: V): ReadonlyMap<string, V> =>
  new Map(map).set(key, value)

export const OrderRepositoryInMemory = Layer.effect(
  OrderRepository,
  Effect.gen(function* () {
    const { orders } = yield* InMemoryStore

    return {
      upsertStatus: (orderId: string, status: OrderStatus) =>
        Effect.gen(function* () {
          const now = yield* DateTime.now
          const existing = (yield* Ref.get(orders)).get(orderId)
          const order = new Order({
            id: orderId,
            status,
            createdAt: existing?.createdAt ?? now,
            updatedAt: now
          })
          yield* Ref.update(orders, (map) => withEntry(map, orderId, order))
          return order
        }),

      findById: (orderId: string) =>
        Ref.get(orders).pipe(Effect.map((map) => Option.fromNullable(map.get(orderId))))
    }
  })
)

export const PaymentRepositoryInMemory = Layer.effect(
  PaymentRepository,
  Effect.gen(function* () {
    const { payments } = yield* InMemoryStore
    const locks = new Map<string, Effect.Semaphore>()

    const lockFor = (paymentId: string) => {
      const existing = locks.get(paymentId)
      if (existing !== undefined) {
        return existing
      }
      const created = Effect.unsafeMakeSemaphore(1)
      locks.set(paymentId, created)
      return created
    }

    const transitionUnlessCharged = (paymentId: string, status: PaymentStatus, amount?: number) =>
      Effect.gen(function* () {
        const now = yield* DateTime.now
        const existing = (yield* Ref.get(payments)).get(paymentId)
        if (existing === undefined || existing.status === "CHARGED") {
          return Option.none<Payment>()
        }
        const updated = new Payment({
          ...existing,
          status,
          amount: amount ?? existing.amount,
          updatedAt: now
        })
        yield* Ref.update(payments, (map) => withEntry(map, paymentId, updated))
        return Option.some(updated)
      })

    return {
      insertIfAbsent: (paymentId: string, orderId: string) =>
        Effect.gen(function* () {
          const existing = (yield* Ref.get(payments)).get(paymentId)
          if (existing !== undefined) {
            return { _tag: "AlreadyExists", payment: existing } as const
          }
          const now = yield* DateTime.now
          const payment = new Payment({
            paymentId,
            orderId,
            status: "INIT",
            amount: 0,
            createdAt: now,
            updatedAt: now
          })
          yield* Ref.update(payments, (map) => withEntry(map, paymentId, payment))
          return { _tag: "Reserved", payment } as const
        }),

      findById: (paymentId: string) =>
        Ref.get(payments).pipe(Effect.map((map) => Option.fromNullable(map.get(paymentId)))),

      markCharged: (paymentId: string, amount: number) =>
        transitionUnlessCharged(paymentId, "CHARGED", amount),

      markFailed: (paymentId: string) => transitionUnlessCharged(paymentId, "FAILED"),

      withChargeLock: <A, E, R>(paymentId: string, effect: Effect.Effect<A, E, R>) =>
        lockFor(paymentId).withPermits(1)(effect)
    }
  })
)

export const EventLogRepositoryInMemory = Layer.effect(
  EventLogRepository,
  Effect.gen(function* () {
    const { events } = yield* InMemoryStore

    return {
      append: (orderId: string, type: OrderEventType, payload: Readonly<Record<string, unknown>>) =>
        Effect.gen(function* () {
          const ts = yield* DateTime.now
          yield* Ref.update(events, (log) => [
            ...log,
            new OrderEvent({ id: log.length + 1, orderId, type, payload, ts })
          ])
        }),

      findRecent: (orderId: string, limit: number) =>
        Ref.get(events).pipe(
          Effect.map((log) =>
            log
              .filter((event) => event.orderId === orderId)
              .sort((a, b) =>
                DateTime.toEpochMillis(b.ts) - DateTime.toEpochMillis(a.ts) || b.id - a.id
              )
              .slice(0, limit)
          )
        )
    }
  })
)

export const InMemoryRepositoriesLive = Layer.mergeAll(
  OrderRepositoryInMemory,
  PaymentRepositoryInMemory,
  EventLogRepositoryInMemory
)

// ═══════════════════════════════════════════════════════════════════════════
// Full engine over the in-memory store
// ═══════════════════════════════════════════════════════════════════════════

export interface TestLayerOptions {
  readonly config?: Partial<TestConfig>
  readonly repositories?: Layer.Layer<
    OrderRepository | PaymentRepository | EventLogRepository,
    never,
    InMemoryStore
  >
  readonly intake?: Layer.Layer<OrderIntakeClient, never, FulfillmentConfig>
  readonly gateway?: Layer.Layer<PaymentGatewayClient, never, FulfillmentConfig>
  readonly carrier?: Layer.Layer<CarrierClient, never, FulfillmentConfig>
}

/**
 * Everything the sagas need, with the stub integrations in their
 * deterministic mode unless replaced.
 */
export const makeTestLayer = (options: TestLayerOptions = {}) => {
  const ConfigLive = testConfigLayer(options.config)

  const ClientsLive = Layer.mergeAll(
    options.intake ?? OrderIntakeClientLive,
    options.gateway ?? PaymentGatewayClientLive,
    options.carrier ?? CarrierClientLive
  ).pipe(Layer.provide(ConfigLive))

  return FulfillmentCoreLive.pipe(
    Layer.provideMerge(
      Layer.mergeAll(options.repositories ?? InMemoryRepositoriesLive, ClientsLive)
    ),
    Layer.provideMerge(Layer.mergeAll(InMemoryStoreLive, ConfigLive))
  )
}

// ═══════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════

// Real macrotask yield; lets saga fibers progress while a TestClock holds time still
const yieldToScheduler = Effect.async<void>((resume) => {
  const handle = setTimeout(() => resume(Effect.void), 1)
  return Effect.sync(() => clearTimeout(handle))
})

export const waitForStep = (sagaId: string, step: SagaStep) =>
  Effect.gen(function* () {
    const runtime = yield* SagaRuntime
    for (let i = 0; i < 500; i++) {
      const status = yield* runtime.query(sagaId)
      if (status.step === step) {
        return status
      }
      yield* yieldToScheduler
    }
    return yield* Effect.dieMessage(`Saga ${sagaId} never reached ${step}`)
  })

export const eventTypes = (orderId: string) =>
  Effect.gen(function* () {
    const { events } = yield* InMemoryStore
    const log = yield* Ref.get(events)
    return log
      .filter((event) => event.orderId === orderId && event.type !== "SAGA_STEP_CHANGED")
      .map((event) => event.type)
  })

export const orderStatusOf = (orderId: string) =>
  Effect.gen(function* () {
    const { orders } = yield* InMemoryStore
    return (yield* Ref.get(orders)).get(orderId)?.status
  })

export const paymentOf = (paymentId: string) =>
  Effect.gen(function* () {
    const { payments } = yield* InMemoryStore
    return (yield* Ref.get(payments)).get(paymentId)
  })

export const eventPayloads = (orderId: string, type: OrderEventType) =>
  Effect.gen(function* () {
    const { events } = yield* InMemoryStore
    const log = yield* Ref.get(events)
    return log
      .filter((event) => event.orderId === orderId && event.type === type)
      .map((event) => event.payload)
  })

const StepChanged = Schema.Struct({ saga_id: Schema.String, to: Schema.String })

// Steps a saga moved through, as recorded in the audit trail
export const stepChanges = (sagaId: string) =>
  Effect.gen(function* () {
    const { events } = yield* InMemoryStore
    const log = yield* Ref.get(events)
    return log.flatMap((event) => {
      if (event.type !== "SAGA_STEP_CHANGED") {
        return []
      }
      const change = Schema.decodeUnknownOption(StepChanged)(event.payload)
      return Option.isSome(change) && change.value.saga_id === sagaId ? [change.value.to] : []
    })
  })
