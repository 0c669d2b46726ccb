import { Data } from "effect"
import type { Address } from "./Order.js"
import type { SagaState } from "./SagaState.js"

/**
 * Asynchronous events delivered into a saga's inbox.
 */
export type SagaSignal = Data.TaggedEnum<{
  CancelOrder: { readonly reason: string }
  Approve: {}
  UpdateAddress: { readonly address: Address }
  DispatchFailed: { readonly reason: string }
}>

export const SagaSignal = Data.taggedEnum<SagaSignal>()

export type SagaSignalName = SagaSignal["_tag"]

/**
 * Fold one signal into the owning saga's state.
 * Only called by the runtime at a suspension point of that saga.
 */
export const applySignal = (state: SagaState, signal: SagaSignal): SagaState =>
  SagaSignal.$match(signal, {
    CancelOrder: () => ({ ...state, cancelled: true }),
    Approve: () => ({ ...state, approved: true }),
    UpdateAddress: ({ address }) => ({ ...state, addressOverride: address }),
    DispatchFailed: ({ reason }) => ({ ...state, lastError: `DispatchFailed: ${reason}` })
  })
