import { Context, Effect, Layer, ParseResult, Schema } from 'effect'

import type { Keyword, PhotoPage } from '../state/searchState.js'
import { KeywordSchema, PhotoPageSchema } from '../state/searchState.js'
import { PhotoServiceError, UnexpectedFetchError, isPhotoServiceError } from './errors.js'

/**
 * Data source behind the search screen.
 *
 * - Typed failures are domain errors of the remote service (`PhotoServiceError`).
 * - Anything unexpected travels as a defect.
 * - Cancellation is fiber interruption.
 */
export interface PhotoRepositoryService {
  readonly fetchPhotos: (keyword: string, page: number) => Effect.Effect<PhotoPage, PhotoServiceError>
  readonly fetchKeywordSuggestions: Effect.Effect<ReadonlyArray<Keyword>, PhotoServiceError>
}

export class PhotoRepositoryTag extends Context.Tag('@photo-search/core/PhotoRepository')<
  PhotoRepositoryTag,
  PhotoRepositoryService
>() {}

/**
 * Promise-based client, e.g. a thin wrapper over `fetch`. Payloads are decoded here, so the client can return raw JSON.
 */
export interface PhotoClient {
  readonly fetchPhotos: (keyword: string, page: number, signal: AbortSignal) => Promise<unknown>
  readonly fetchKeywordSuggestions: (signal: AbortSignal) => Promise<unknown>
}

const callClient = <A>(
  operation: string,
  run: (signal: AbortSignal) => Promise<unknown>,
  decode: (payload: unknown) => Effect.Effect<A, ParseResult.ParseError>,
): Effect.Effect<A, PhotoServiceError> =>
  Effect.tryPromise({
    try: run,
    catch: (cause): PhotoServiceError | UnexpectedFetchError =>
      isPhotoServiceError(cause) ? cause : new UnexpectedFetchError(operation, cause),
  }).pipe(
    Effect.flatMap((payload) =>
      decode(payload).pipe(Effect.mapError((error) => new UnexpectedFetchError(operation, error))),
    ),
    Effect.catchTag('UnexpectedFetchError', (error) => Effect.die(error)),
  )

const decodePhotoPage = Schema.decodeUnknown(PhotoPageSchema)
const decodeKeywords = Schema.decodeUnknown(Schema.Array(KeywordSchema))

const fromPromise = (client: PhotoClient): PhotoRepositoryService => ({
  fetchPhotos: (keyword, page) =>
    callClient(`fetchPhotos(${page})`, (signal) => client.fetchPhotos(keyword, page, signal), decodePhotoPage),
  fetchKeywordSuggestions: callClient(
    'fetchKeywordSuggestions',
    (signal) => client.fetchKeywordSuggestions(signal),
    decodeKeywords,
  ),
})

export const PhotoRepository = {
  tag: PhotoRepositoryTag,
  fromPromise,
  layer: (service: PhotoRepositoryService): Layer.Layer<PhotoRepositoryTag> => Layer.succeed(PhotoRepositoryTag, service),
  fromClient: (client: PhotoClient): Layer.Layer<PhotoRepositoryTag> => Layer.succeed(PhotoRepositoryTag, fromPromise(client)),
} as const
