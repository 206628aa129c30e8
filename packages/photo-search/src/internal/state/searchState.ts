import { Data, Option, Schema } from 'effect'

export const PhotoSchema = Schema.Struct({
  id: Schema.String,
  title: Schema.String,
  url: Schema.String,
})

export type Photo = Schema.Schema.Type<typeof PhotoSchema>

export const PhotoPageSchema = Schema.Struct({
  photos: Schema.Array(PhotoSchema),
  totalPages: Schema.Int.pipe(Schema.nonNegative()),
})

export type PhotoPage = Schema.Schema.Type<typeof PhotoPageSchema>

export const KeywordSchema = Schema.Struct({
  keyword: Schema.String,
})

export type Keyword = Schema.Schema.Type<typeof KeywordSchema>

export interface KeywordWithState {
  readonly keyword: string
  readonly selected: boolean
}

export const toKeywordWithState = (keyword: Keyword): KeywordWithState => ({
  keyword: keyword.keyword,
  selected: false,
})

/**
 * UI-facing state of the search screen.
 *
 * - `PhotosFetched` / `LoadPageFailed` are the only variants that carry enough progress to continue paging.
 * - `LoadingNextPage` keeps the photos fetched so far so the list does not blink while the next page loads.
 * - `KeywordsLoaded` is a side channel, published once at startup.
 */
export type SearchState = Data.TaggedEnum<{
  Idling: {}
  Searching: { readonly keyword: string }
  PhotosFetched: {
    readonly keyword: string
    readonly photos: ReadonlyArray<Photo>
    readonly page: number
    readonly totalPages: number
  }
  NotFound: { readonly keyword: string }
  SearchFailed: { readonly keyword: string }
  LoadingNextPage: { readonly photos: ReadonlyArray<Photo> }
  LoadPageFailed: {
    readonly keyword: string
    readonly photos: ReadonlyArray<Photo>
    readonly pageFailedToLoad: number
    readonly totalPages: number
    readonly cause: unknown
  }
  KeywordsLoaded: { readonly suggestions: ReadonlyArray<KeywordWithState> }
}>

export const SearchState = Data.taggedEnum<SearchState>()

export type SearchStateTag = SearchState['_tag']

// Keeps the first occurrence of every id, in order.
export const dedupePhotos = (photos: ReadonlyArray<Photo>): ReadonlyArray<Photo> => {
  const seen = new Set<string>()
  const out: Array<Photo> = []
  for (const photo of photos) {
    if (seen.has(photo.id)) continue
    seen.add(photo.id)
    out.push(photo)
  }
  return out
}

export const mergePhotos = (fetched: ReadonlyArray<Photo>, incoming: ReadonlyArray<Photo>): ReadonlyArray<Photo> =>
  dedupePhotos([...fetched, ...incoming])

export interface NextPageRequest {
  readonly keyword: string
  readonly photos: ReadonlyArray<Photo>
  readonly nextPage: number
  readonly totalPages: number
}

/**
 * Resolves what `loadNextPage` should fetch from the current state.
 * `None` means the command is a no-op: wrong state, or already past the last page.
 */
export const nextPageRequest = (state: SearchState): Option.Option<NextPageRequest> => {
  const request: Option.Option<NextPageRequest> = SearchState.$match(state, {
    PhotosFetched: (s) =>
      Option.some({ keyword: s.keyword, photos: s.photos, nextPage: s.page + 1, totalPages: s.totalPages }),
    LoadPageFailed: (s) =>
      Option.some({ keyword: s.keyword, photos: s.photos, nextPage: s.pageFailedToLoad, totalPages: s.totalPages }),
    Idling: () => Option.none(),
    Searching: () => Option.none(),
    NotFound: () => Option.none(),
    SearchFailed: () => Option.none(),
    LoadingNextPage: () => Option.none(),
    KeywordsLoaded: () => Option.none(),
  })
  return Option.filter(request, (r) => r.nextPage <= r.totalPages)
}

/**
 * Resolution of a first-page fetch: zero pages means nothing matched the keyword.
 */
export const fromFirstPage = (keyword: string, page: PhotoPage): SearchState =>
  page.totalPages === 0
    ? SearchState.NotFound({ keyword })
    : SearchState.PhotosFetched({ keyword, photos: dedupePhotos(page.photos), page: 1, totalPages: page.totalPages })
