import { Duration, Effect, Fiber, Queue, Scope, Stream } from 'effect'

import * as JobSlot from './jobSlot.js'

export interface KeywordDebouncer {
  readonly submit: (keyword: string) => Effect.Effect<void>
  readonly shutdown: Effect.Effect<void>
}

export interface KeywordDebouncerOptions {
  /**
   * Quiet period before a keyword is handed to the pipeline; 0 disables the timer.
   */
  readonly debounceMs: number
}

export type KeywordPipeline = (keyword: string, isCurrent: Effect.Effect<boolean>) => Effect.Effect<void>

/**
 * One-slot mailbox + latest-wins pipeline.
 *
 * - The mailbox is a sliding queue of capacity 1: a keyword nobody has taken yet is replaced by the newer one.
 * - Every accepted keyword interrupts the running pipeline and starts a fresh one.
 */
export const make = (
  pipeline: KeywordPipeline,
  options: KeywordDebouncerOptions,
): Effect.Effect<KeywordDebouncer, never, Scope.Scope> =>
  Effect.gen(function* () {
    const mailbox = yield* Queue.sliding<string>(1)
    const slot = yield* JobSlot.make

    const keywords = Stream.fromQueue(mailbox)
    const accepted =
      options.debounceMs > 0 ? keywords.pipe(Stream.debounce(Duration.millis(options.debounceMs))) : keywords

    const consumer = yield* Effect.forkScoped(
      Stream.runForEach(accepted, (keyword) => slot.start((isCurrent) => pipeline(keyword, isCurrent))),
    )

    const shutdown = Effect.gen(function* () {
      yield* Queue.shutdown(mailbox)
      yield* slot.cancel
      yield* Fiber.interrupt(consumer)
    })

    yield* Effect.addFinalizer(() => shutdown)

    const submit = (keyword: string): Effect.Effect<void> =>
      Effect.gen(function* () {
        if (yield* Queue.isShutdown(mailbox)) {
          return
        }
        yield* Queue.offer(mailbox, keyword)
      })

    return { submit, shutdown }
  })
