import { Cause, ConfigError, Context, Effect, Exit, Fiber, Layer, Option, Ref, Scope, Stream, SubscriptionRef } from 'effect'

import { PhotoSearchConfig } from '../config/config.js'
import { PhotoRepositoryTag } from '../repository/photoRepository.js'
import { SearchState, fromFirstPage, mergePhotos, nextPageRequest, toKeywordWithState } from '../state/searchState.js'
import * as JobSlot from './jobSlot.js'
import * as KeywordDebouncer from './keywordDebouncer.js'
import { resolveSink } from './transitionSink.js'

export interface PhotoSearchService {
  readonly state: SubscriptionRef.SubscriptionRef<SearchState>
  readonly get: Effect.Effect<SearchState>
  /**
   * The current state, then every published state.
   */
  readonly changes: Stream.Stream<SearchState>
  /**
   * Hands the keyword to the debouncer and returns right away.
   */
  readonly searchPhotos: (keyword: string) => Effect.Effect<void>
  readonly loadNextPage: Effect.Effect<void>
  readonly resetSearch: Effect.Effect<void>
  readonly dispose: Effect.Effect<void>
}

export class PhotoSearchTag extends Context.Tag('@photo-search/core/PhotoSearch')<PhotoSearchTag, PhotoSearchService>() {}

// The typed error behind a failed fetch, or the defect when there is none.
const failureOf = <E>(cause: Cause.Cause<E>): unknown =>
  Option.getOrElse(Cause.failureOption(cause), (): unknown =>
    Option.getOrElse(Cause.dieOption(cause), () => Cause.squash(cause)),
  )

const make: Effect.Effect<PhotoSearchService, ConfigError.ConfigError, PhotoRepositoryTag | Scope.Scope> = Effect.gen(
  function* () {
    const repository = yield* PhotoRepositoryTag
    const config = yield* PhotoSearchConfig.load
    const sink = yield* resolveSink

    const stateRef = yield* SubscriptionRef.make<SearchState>(SearchState.Idling())
    // Serializes "decide + write" sections so a guard check and its write cannot interleave with another writer.
    const writeLock = yield* Effect.makeSemaphore(1)
    const disposedRef = yield* Ref.make(false)
    const nextPageJob = yield* JobSlot.make

    const write = (next: SearchState): Effect.Effect<void> =>
      SubscriptionRef.set(stateRef, next).pipe(Effect.zipRight(sink.record(next)))

    const publishIfCurrent = (isCurrent: Effect.Effect<boolean>, next: SearchState): Effect.Effect<void> =>
      writeLock.withPermits(1)(
        Effect.gen(function* () {
          if (yield* isCurrent) {
            yield* write(next)
          }
        }),
      )

    const searchPipeline: KeywordDebouncer.KeywordPipeline = (keyword, isCurrent) =>
      Effect.gen(function* () {
        const started = yield* writeLock.withPermits(1)(
          Effect.gen(function* () {
            if (!(yield* isCurrent)) {
              return false
            }
            yield* nextPageJob.cancel
            yield* write(SearchState.Searching({ keyword }))
            return true
          }),
        )
        if (!started) {
          return
        }

        const exit = yield* Effect.exit(repository.fetchPhotos(keyword, 1))
        if (Exit.isSuccess(exit)) {
          yield* publishIfCurrent(isCurrent, fromFirstPage(keyword, exit.value))
          return
        }
        if (Cause.isInterruptedOnly(exit.cause)) {
          return
        }
        yield* Effect.logDebug('[PhotoSearch] search failed', exit.cause)
        yield* publishIfCurrent(isCurrent, SearchState.SearchFailed({ keyword }))
      }).pipe(Effect.annotateLogs({ module: 'PhotoSearch', keyword }))

    const debouncer = yield* KeywordDebouncer.make(searchPipeline, { debounceMs: config.debounceMs })

    const loadSuggestions = repository.fetchKeywordSuggestions.pipe(
      Effect.map((keywords) => keywords.map(toKeywordWithState)),
      Effect.catchAllCause((cause) =>
        Effect.logDebug('[PhotoSearch] keyword suggestions unavailable', cause).pipe(Effect.as([])),
      ),
      Effect.flatMap((suggestions) => writeLock.withPermits(1)(write(SearchState.KeywordsLoaded({ suggestions })))),
    )
    const suggestionsFiber = config.loadSuggestions ? yield* Effect.forkScoped(loadSuggestions) : undefined

    const whenActive = (effect: Effect.Effect<void>): Effect.Effect<void> =>
      Effect.flatMap(Ref.get(disposedRef), (disposed) => (disposed ? Effect.void : effect))

    const loadNextPage = whenActive(
      writeLock.withPermits(1)(
        Effect.gen(function* () {
          const request = nextPageRequest(yield* SubscriptionRef.get(stateRef))
          if (Option.isNone(request)) {
            return
          }
          const { keyword, photos, nextPage, totalPages } = request.value
          yield* write(SearchState.LoadingNextPage({ photos }))

          yield* nextPageJob.start((isCurrent) =>
            Effect.gen(function* () {
              const exit = yield* Effect.exit(repository.fetchPhotos(keyword, nextPage))
              if (Exit.isSuccess(exit)) {
                yield* publishIfCurrent(
                  isCurrent,
                  SearchState.PhotosFetched({
                    keyword,
                    photos: mergePhotos(photos, exit.value.photos),
                    page: nextPage,
                    totalPages: exit.value.totalPages,
                  }),
                )
                return
              }
              if (Cause.isInterruptedOnly(exit.cause)) {
                return
              }
              yield* Effect.logDebug(`[PhotoSearch] page ${nextPage} failed`, exit.cause)
              yield* publishIfCurrent(
                isCurrent,
                SearchState.LoadPageFailed({
                  keyword,
                  photos,
                  pageFailedToLoad: nextPage,
                  totalPages,
                  cause: failureOf(exit.cause),
                }),
              )
            }).pipe(Effect.annotateLogs({ module: 'PhotoSearch', keyword, page: nextPage })),
          )
        }),
      ),
    )

    const resetSearch = whenActive(
      writeLock.withPermits(1)(
        Effect.gen(function* () {
          yield* nextPageJob.cancel
          yield* write(SearchState.Idling())
        }),
      ),
    )

    const dispose = Effect.gen(function* () {
      if (yield* Ref.getAndSet(disposedRef, true)) {
        return
      }
      yield* debouncer.shutdown
      yield* nextPageJob.cancel
      if (suggestionsFiber) {
        yield* Fiber.interrupt(suggestionsFiber)
      }
    })

    yield* Effect.addFinalizer(() => dispose)

    return {
      state: stateRef,
      get: SubscriptionRef.get(stateRef),
      changes: stateRef.changes,
      searchPhotos: (keyword: string) => whenActive(debouncer.submit(keyword)),
      loadNextPage,
      resetSearch,
      dispose,
    }
  },
)

export const PhotoSearch = {
  tag: PhotoSearchTag,
  make,
  layer: Layer.scoped(PhotoSearchTag, make),
} as const
