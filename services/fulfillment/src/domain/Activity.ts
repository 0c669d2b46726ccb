import { Schema } from "effect"

// Closed set of activities the sagas may invoke
export const ActivityName = Schema.Literal(
  "ReceiveOrder",
  "ValidateOrder",
  "ChargePayment",
  "PreparePackage",
  "DispatchCarrier"
)
export type ActivityName = typeof ActivityName.Type
