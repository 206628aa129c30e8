import { Context, Effect, Layer, Option } from 'effect'

import type { SearchState } from '../state/searchState.js'

export interface TransitionSink {
  readonly record: (state: SearchState) => Effect.Effect<void>
}

export class TransitionSinkTag extends Context.Tag('@photo-search/core/TransitionSink')<
  TransitionSinkTag,
  TransitionSink
>() {}

export const defaultSink: TransitionSink = {
  record: (state) => Effect.logDebug(`[PhotoSearch] -> ${state._tag}`),
}

export const resolveSink: Effect.Effect<TransitionSink> = Effect.serviceOption(TransitionSinkTag).pipe(
  Effect.map((maybe) => (Option.isSome(maybe) ? maybe.value : defaultSink)),
)

export const layer = (sink: TransitionSink): Layer.Layer<TransitionSinkTag> => Layer.succeed(TransitionSinkTag, sink)
