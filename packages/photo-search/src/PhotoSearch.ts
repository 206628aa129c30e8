export type { PhotoSearchService } from './internal/runtime/photoSearch.js'
export { PhotoSearch, PhotoSearchTag } from './internal/runtime/photoSearch.js'
export type { TransitionSink } from './internal/runtime/transitionSink.js'
export { TransitionSinkTag, layer as transitionSinkLayer } from './internal/runtime/transitionSink.js'
