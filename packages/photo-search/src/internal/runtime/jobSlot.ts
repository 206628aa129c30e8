import { Effect, Fiber, Ref, Scope } from 'effect'

/**
 * A single "current job" slot.
 *
 * - `start` interrupts the previous job (without waiting for it) and forks the new one.
 * - Each job receives `isCurrent`: true until another job starts or the slot is cancelled.
 *   Jobs check it right before writing back, so a job that is still unwinding never overwrites newer state.
 */
export interface JobSlot {
  readonly start: (job: (isCurrent: Effect.Effect<boolean>) => Effect.Effect<void>) => Effect.Effect<void>
  readonly cancel: Effect.Effect<void>
}

export const make: Effect.Effect<JobSlot, never, Scope.Scope> = Effect.gen(function* () {
  const scope = yield* Effect.scope
  const generationRef = yield* Ref.make(0)
  const currentFiberRef = yield* Ref.make<Fiber.RuntimeFiber<void, never> | undefined>(undefined)

  const cancel = Effect.gen(function* () {
    yield* Ref.update(generationRef, (n) => n + 1)
    const prev = yield* Ref.getAndSet(currentFiberRef, undefined)
    if (prev) {
      yield* Fiber.interruptFork(prev)
    }
  })

  const start = (job: (isCurrent: Effect.Effect<boolean>) => Effect.Effect<void>) =>
    Effect.gen(function* () {
      const prev = yield* Ref.get(currentFiberRef)
      if (prev) {
        yield* Fiber.interruptFork(prev)
      }

      const generation = yield* Ref.updateAndGet(generationRef, (n) => n + 1)
      const isCurrent = Ref.get(generationRef).pipe(Effect.map((current) => current === generation))

      // Owned by the slot's scope: the job outlives the command that started it.
      const fiber = yield* Effect.forkIn(
        job(isCurrent).pipe(Effect.catchAllCause((cause) => Effect.logError('[PhotoSearch] job failed', cause))),
        scope,
      )
      yield* Ref.set(currentFiberRef, fiber)
    })

  return { start, cancel }
})
