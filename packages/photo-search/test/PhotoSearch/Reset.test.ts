import { describe } from 'vitest'
import { it, expect } from '@effect/vitest'
import { Effect } from 'effect'
import { PhotoSearchTag, SearchState } from '../../src/index.js'
import { makeFakeRepository, makeRecorder, photos, searchLayer, settle, waitFor } from '../support/fakeRepository.js'

describe('PhotoSearch resetSearch', () => {
  it.scoped('publishes Idling even when already idle', () => {
    const fake = makeFakeRepository()
    const recorder = makeRecorder()
    return Effect.gen(function* () {
      const search = yield* PhotoSearchTag
      yield* search.resetSearch
      expect(yield* search.get).toEqual(SearchState.Idling())
      expect(recorder.tags()).toEqual(['Idling'])
    }).pipe(Effect.provide(searchLayer(fake, recorder)))
  })

  it.scoped('returns to Idling from a terminal state', () => {
    const fake = makeFakeRepository()
    const recorder = makeRecorder()
    return Effect.gen(function* () {
      const search = yield* PhotoSearchTag

      yield* fake.succeed('cat', 1, { photos: [], totalPages: 0 })
      yield* search.searchPhotos('cat')
      yield* waitFor(search, 'NotFound')

      yield* search.resetSearch
      expect(yield* search.get).toEqual(SearchState.Idling())
      expect(recorder.tags()).toEqual(['Searching', 'NotFound', 'Idling'])
    }).pipe(Effect.provide(searchLayer(fake, recorder)))
  })

  it.scoped('cancels the page being loaded and ignores its late result', () => {
    const fake = makeFakeRepository()
    const recorder = makeRecorder()
    return Effect.gen(function* () {
      const search = yield* PhotoSearchTag

      yield* fake.succeed('cat', 1, { photos: photos(1, 20), totalPages: 3 })
      yield* search.searchPhotos('cat')
      yield* waitFor(search, 'PhotosFetched')

      yield* search.loadNextPage
      yield* settle
      yield* search.resetSearch
      yield* fake.interruptedOnce('cat', 2)

      yield* fake.succeed('cat', 2, { photos: photos(21, 40), totalPages: 3 })
      yield* settle

      expect(yield* search.get).toEqual(SearchState.Idling())
      expect(recorder.tags()).toEqual(['Searching', 'PhotosFetched', 'LoadingNextPage', 'Idling'])
    }).pipe(Effect.provide(searchLayer(fake, recorder)))
  })

  it.scoped('a search after reset starts over from page 1', () => {
    const fake = makeFakeRepository()
    const recorder = makeRecorder()
    return Effect.gen(function* () {
      const search = yield* PhotoSearchTag

      yield* fake.succeed('cat', 1, { photos: photos(1, 20), totalPages: 3 })
      yield* search.searchPhotos('cat')
      yield* waitFor(search, 'PhotosFetched')
      yield* search.resetSearch

      yield* search.loadNextPage
      expect(yield* search.get).toEqual(SearchState.Idling())

      yield* fake.succeed('cat', 1, { photos: photos(1, 20), totalPages: 3 })
      yield* search.searchPhotos('cat')
      const fetched = yield* waitFor(search, 'PhotosFetched')
      expect(fetched.page).toBe(1)
      expect(fake.calls).toEqual([
        { keyword: 'cat', page: 1 },
        { keyword: 'cat', page: 1 },
      ])
    }).pipe(Effect.provide(searchLayer(fake, recorder)))
  })
})
