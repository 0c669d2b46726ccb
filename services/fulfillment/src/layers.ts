import { Config, Effect, Layer, Logger, LogLevel } from "effect"
import { NodeContext } from "@effect/platform-node"
import { DatabaseLive, MigrationsLive } from "./db.js"
import { FulfillmentConfigLive } from "./config.js"
import { OrderRepositoryLive } from "./repositories/OrderRepositoryLive.js"
import { PaymentRepositoryLive } from "./repositories/PaymentRepositoryLive.js"
import { EventLogRepositoryLive } from "./repositories/EventLogRepositoryLive.js"
import { OrderIntakeClientLive } from "./clients/OrderIntakeClientLive.js"
import { PaymentGatewayClientLive } from "./clients/PaymentGatewayClientLive.js"
import { CarrierClientLive } from "./clients/CarrierClientLive.js"
import { PaymentLedgerLive } from "./services/PaymentLedgerLive.js"
import { OrderActivitiesLive } from "./services/OrderActivitiesLive.js"
import { ActivityExecutorLive } from "./services/ActivityExecutorLive.js"
import { SagaRuntimeLive } from "./services/SagaRuntimeLive.js"
import { ShippingSagaLive } from "./services/ShippingSagaLive.js"
import { OrderSagaLive } from "./services/OrderSagaLive.js"
import { FulfillmentServiceLive } from "./services/FulfillmentServiceLive.js"

// Minimum log level from LOG_LEVEL (Info by default)
export const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const level = yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))
    return Logger.minimumLogLevel(level)
  })
)

/**
 * Saga engine and boundary service. Needs repositories, clients and config;
 * every service inside shares one SagaRuntime.
 */
export const FulfillmentCoreLive = FulfillmentServiceLive.pipe(
  Layer.provideMerge(OrderSagaLive),
  Layer.provideMerge(ShippingSagaLive),
  Layer.provideMerge(Layer.mergeAll(SagaRuntimeLive, ActivityExecutorLive, OrderActivitiesLive)),
  Layer.provideMerge(PaymentLedgerLive)
)

// Repository layers (depend on Database)
const RepositoriesLive = Layer.mergeAll(
  OrderRepositoryLive,
  PaymentRepositoryLive,
  EventLogRepositoryLive
).pipe(Layer.provide(DatabaseLive))

// Stub integrations (depend on config for fault injection)
const ClientsLive = Layer.mergeAll(
  OrderIntakeClientLive,
  PaymentGatewayClientLive,
  CarrierClientLive
).pipe(Layer.provide(FulfillmentConfigLive))

const SchemaLive = MigrationsLive.pipe(
  Layer.provide(DatabaseLive),
  Layer.provide(NodeContext.layer)
)

// Complete application layer
export const AppLive = FulfillmentCoreLive.pipe(
  Layer.provideMerge(Layer.mergeAll(RepositoriesLive, ClientsLive)),
  Layer.provideMerge(Layer.mergeAll(DatabaseLive, FulfillmentConfigLive, SchemaLive))
)
