import { Effect, Layer, Logger, ManagedRuntime } from 'effect'
import type { LogLevel } from 'effect'

import type { PhotoSearchConfigShape } from '../config/config.js'
import { PhotoSearchConfig } from '../config/config.js'
import type { PhotoClient, PhotoRepositoryService } from '../repository/photoRepository.js'
import { PhotoRepository } from '../repository/photoRepository.js'
import { PhotoSearch, PhotoSearchTag } from '../runtime/photoSearch.js'
import * as TransitionSink from '../runtime/transitionSink.js'
import type { SearchState } from '../state/searchState.js'
import * as ExternalStore from '../store/searchStateExternalStore.js'

export interface PhotoSearchControllerOptions {
  readonly config?: Partial<PhotoSearchConfigShape>
  readonly sink?: TransitionSink.TransitionSink
  /**
   * Minimum level for the controller's logs. Effect's default (Info) hides transition logs.
   */
  readonly logLevel?: LogLevel.LogLevel
}

/**
 * Plain-function facade for UI code that does not run Effect itself.
 * Commands are fire-and-forget; observe the outcome through the store.
 */
export interface PhotoSearchController extends ExternalStore.ExternalStore<SearchState> {
  readonly searchPhotos: (keyword: string) => void
  readonly loadNextPage: () => void
  readonly resetSearch: () => void
  readonly dispose: () => Promise<void>
}

const isClient = (source: PhotoClient | PhotoRepositoryService): source is PhotoClient =>
  !Effect.isEffect(source.fetchKeywordSuggestions)

export const make = async (
  source: PhotoClient | PhotoRepositoryService,
  options: PhotoSearchControllerOptions = {},
): Promise<PhotoSearchController> => {
  const repository = isClient(source) ? PhotoRepository.fromClient(source) : PhotoRepository.layer(source)

  const env = Layer.mergeAll(
    repository,
    options.config ? PhotoSearchConfig.replace(options.config) : Layer.empty,
    options.sink ? TransitionSink.layer(options.sink) : Layer.empty,
    options.logLevel ? Logger.minimumLogLevel(options.logLevel) : Layer.empty,
  )

  const runtime = ManagedRuntime.make(PhotoSearch.layer.pipe(Layer.provide(env)))
  const search = await runtime.runPromise(PhotoSearchTag).catch(async (error: unknown) => {
    await runtime.dispose()
    throw error
  })
  const store = ExternalStore.make(runtime, search)

  let disposing: Promise<void> | undefined
  const run = (command: Effect.Effect<void>) => {
    if (disposing) return
    runtime.runFork(command)
  }

  return {
    getSnapshot: store.getSnapshot,
    subscribe: store.subscribe,
    searchPhotos: (keyword) => run(search.searchPhotos(keyword)),
    loadNextPage: () => run(search.loadNextPage),
    resetSearch: () => run(search.resetSearch),
    dispose: () => {
      disposing ??= runtime.runPromise(search.dispose).then(() => {
        store.close()
        return runtime.dispose()
      })
      return disposing
    },
  }
}
