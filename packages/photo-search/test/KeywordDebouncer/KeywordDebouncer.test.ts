import { describe } from 'vitest'
import { it, expect } from '@effect/vitest'
import { Effect, Queue, TestClock } from 'effect'
import * as KeywordDebouncer from '../../src/internal/runtime/keywordDebouncer.js'
import { PhotoSearchTag } from '../../src/index.js'
import { makeFakeRepository, makeRecorder, photos, searchLayer, settle, waitFor } from '../support/fakeRepository.js'

const makeProbe = Effect.gen(function* () {
  const started = yield* Queue.unbounded<string>()
  const interrupted = yield* Queue.unbounded<string>()
  const guards = new Map<string, Effect.Effect<boolean>>()

  const pipeline: KeywordDebouncer.KeywordPipeline = (keyword, isCurrent) =>
    Effect.gen(function* () {
      guards.set(keyword, isCurrent)
      yield* Queue.offer(started, keyword)
      yield* Effect.never
    }).pipe(Effect.onInterrupt(() => Queue.offer(interrupted, keyword)))

  return { started, interrupted, guards, pipeline } as const
})

describe('KeywordDebouncer', () => {
  it.scoped('runs the latest keyword and interrupts the previous pipeline', () =>
    Effect.gen(function* () {
      const probe = yield* makeProbe
      const debouncer = yield* KeywordDebouncer.make(probe.pipeline, { debounceMs: 0 })

      yield* debouncer.submit('sea')
      expect(yield* Queue.take(probe.started)).toBe('sea')

      yield* debouncer.submit('seal')
      expect(yield* Queue.take(probe.started)).toBe('seal')
      expect(yield* Queue.take(probe.interrupted)).toBe('sea')
    }),
  )

  it.scoped('only the newest pipeline stays current', () =>
    Effect.gen(function* () {
      const probe = yield* makeProbe
      const debouncer = yield* KeywordDebouncer.make(probe.pipeline, { debounceMs: 0 })

      yield* debouncer.submit('owl')
      yield* Queue.take(probe.started)
      yield* debouncer.submit('owls')
      yield* Queue.take(probe.started)

      const stale = probe.guards.get('owl')
      const fresh = probe.guards.get('owls')
      expect(stale && (yield* stale)).toBe(false)
      expect(fresh && (yield* fresh)).toBe(true)
    }),
  )

  it.scoped('keeps only the newest keyword that was not taken yet', () =>
    Effect.gen(function* () {
      const probe = yield* makeProbe
      const debouncer = yield* KeywordDebouncer.make(probe.pipeline, { debounceMs: 0 })

      yield* debouncer.submit('f')
      yield* debouncer.submit('fo')
      yield* debouncer.submit('fox')
      yield* settle

      const started = yield* Queue.takeAll(probe.started)
      expect(Array.from(started)).not.toContain('fo')
      expect(Array.from(started).at(-1)).toBe('fox')
    }),
  )

  it.scoped('waits for the quiet period before starting', () =>
    Effect.gen(function* () {
      const probe = yield* makeProbe
      const debouncer = yield* KeywordDebouncer.make(probe.pipeline, { debounceMs: 300 })

      yield* debouncer.submit('c')
      yield* TestClock.adjust('100 millis')
      yield* debouncer.submit('ca')
      yield* TestClock.adjust('100 millis')
      yield* debouncer.submit('cat')
      yield* TestClock.adjust('299 millis')
      expect(yield* Queue.size(probe.started)).toBe(0)

      yield* TestClock.adjust('1 millis')
      expect(yield* Queue.take(probe.started)).toBe('cat')
      yield* settle
      expect(yield* Queue.size(probe.started)).toBe(0)
    }),
  )

  it.scoped('shutdown interrupts the pipeline and drops later keywords', () =>
    Effect.gen(function* () {
      const probe = yield* makeProbe
      const debouncer = yield* KeywordDebouncer.make(probe.pipeline, { debounceMs: 0 })

      yield* debouncer.submit('elk')
      yield* Queue.take(probe.started)

      yield* debouncer.shutdown
      expect(yield* Queue.take(probe.interrupted)).toBe('elk')

      yield* debouncer.submit('emu')
      yield* debouncer.shutdown
      yield* settle
      expect(yield* Queue.size(probe.started)).toBe(0)
    }),
  )
})

describe('PhotoSearch with a debounce period', () => {
  it.scoped('searches once the keyword has been stable for debounce_ms', () => {
    const fake = makeFakeRepository()
    const recorder = makeRecorder()
    return Effect.gen(function* () {
      const search = yield* PhotoSearchTag

      yield* fake.succeed('cat', 1, { photos: photos(1, 4), totalPages: 1 })
      yield* search.searchPhotos('ca')
      yield* TestClock.adjust('100 millis')
      yield* search.searchPhotos('cat')
      yield* TestClock.adjust('200 millis')
      expect(recorder.states).toEqual([])

      yield* TestClock.adjust('100 millis')
      const fetched = yield* waitFor(search, 'PhotosFetched')
      expect(fetched.keyword).toBe('cat')
      expect(fake.calls).toEqual([{ keyword: 'cat', page: 1 }])
    }).pipe(Effect.provide(searchLayer(fake, recorder, { debounceMs: 300 })))
  })
})
