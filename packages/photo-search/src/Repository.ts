export type { PhotoClient, PhotoRepositoryService } from './internal/repository/photoRepository.js'
export { PhotoRepository, PhotoRepositoryTag } from './internal/repository/photoRepository.js'
export type { PhotoSearchErrorTag } from './internal/repository/errors.js'
export { PhotoServiceError, UnexpectedFetchError, isPhotoServiceError } from './internal/repository/errors.js'
