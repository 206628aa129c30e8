export type {
  Keyword,
  KeywordWithState,
  NextPageRequest,
  Photo,
  PhotoPage,
  SearchStateTag,
} from './internal/state/searchState.js'
export {
  KeywordSchema,
  PhotoPageSchema,
  PhotoSchema,
  SearchState,
  dedupePhotos,
  fromFirstPage,
  mergePhotos,
  nextPageRequest,
  toKeywordWithState,
} from './internal/state/searchState.js'
