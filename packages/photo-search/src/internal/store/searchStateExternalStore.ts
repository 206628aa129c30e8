import { Effect, Fiber, Stream } from 'effect'
import type { ManagedRuntime } from 'effect'

import type { PhotoSearchService } from '../runtime/photoSearch.js'
import type { SearchState } from '../state/searchState.js'

export interface ExternalStore<S> {
  readonly getSnapshot: () => S
  readonly subscribe: (listener: () => void) => () => void
}

export interface ClosableExternalStore<S> extends ExternalStore<S> {
  /**
   * Freezes the snapshot and detaches from the runtime. Must run before the runtime is disposed.
   */
  readonly close: () => void
}

/**
 * Bridges the state ref to `useSyncExternalStore`-style consumers.
 * Listeners are notified at most once per microtask; the snapshot is always the latest published state.
 * After `close()` the last known state stays readable and the runtime is never touched again.
 */
export const make = <R, ER>(
  runtime: ManagedRuntime.ManagedRuntime<R, ER>,
  search: PhotoSearchService,
): ClosableExternalStore<SearchState> => {
  let currentState: SearchState | undefined
  let closed = false
  const listeners = new Set<() => void>()

  let notifyScheduled = false
  const scheduleNotify = () => {
    if (notifyScheduled) return
    notifyScheduled = true
    queueMicrotask(() => {
      notifyScheduled = false
      for (const listener of listeners) {
        listener()
      }
    })
  }

  let fiber: Fiber.RuntimeFiber<void, ER> | undefined

  const ensureSubscription = () => {
    if (fiber) return
    fiber = runtime.runFork(
      Stream.runForEach(search.changes, (state) =>
        Effect.sync(() => {
          currentState = state
          scheduleNotify()
        }),
      ),
    )
  }

  const readState = () => {
    const latest = runtime.runSync(search.get)
    currentState = latest
    return latest
  }

  // Catches an update published between a previous getSnapshot() and subscribe().
  const refreshSnapshotIfStale = () => {
    if (currentState === undefined) return
    const previous = currentState
    if (!Object.is(previous, readState())) {
      scheduleNotify()
    }
  }

  const stopSubscription = () => {
    const running = fiber
    if (!running) return
    fiber = undefined
    runtime.runFork(Fiber.interrupt(running))
  }

  const getSnapshot = () => {
    if (closed && currentState !== undefined) return currentState
    // Without a live subscription the cached value may be stale.
    if (fiber && currentState !== undefined) return currentState
    return readState()
  }

  const subscribe = (listener: () => void) => {
    listeners.add(listener)
    if (!closed) {
      ensureSubscription()
      refreshSnapshotIfStale()
    }
    return () => {
      listeners.delete(listener)
      if (closed || listeners.size > 0) return
      stopSubscription()
    }
  }

  const close = () => {
    if (closed) return
    readState()
    closed = true
    stopSubscription()
  }

  return { getSnapshot, subscribe, close }
}
