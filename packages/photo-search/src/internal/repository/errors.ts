export type PhotoSearchErrorTag = 'PhotoServiceError' | 'UnexpectedFetchError'

const summarizeCause = (cause: unknown): { name?: string; message?: string } => {
  if (cause instanceof Error) {
    return { name: cause.name, message: cause.message }
  }
  return { message: typeof cause === 'string' ? cause : undefined }
}

/**
 * Failure reported by the remote photo service itself (quota exceeded, invalid key, service down...).
 * This is the typed error channel of the repository.
 */
export class PhotoServiceError extends Error {
  readonly _tag = 'PhotoServiceError' as const
  readonly code: string

  constructor(params: { readonly code: string; readonly message: string }) {
    super(params.message)
    this.name = 'PhotoServiceError'
    this.code = params.code
  }

  toJSON(): Record<string, unknown> {
    return { _tag: this._tag, name: this.name, message: this.message, code: this.code }
  }
}

/**
 * Anything else that went wrong while fetching: a rejected promise of unknown shape, or a payload
 * that does not decode. Raised as a defect, not as a typed failure.
 */
export class UnexpectedFetchError extends Error {
  readonly _tag = 'UnexpectedFetchError' as const
  readonly operation: string
  readonly detail: { name?: string; message?: string }

  constructor(operation: string, cause: unknown) {
    super(`[PhotoSearch] ${operation} failed unexpectedly`)
    this.name = 'UnexpectedFetchError'
    this.operation = operation
    this.detail = summarizeCause(cause)
  }

  toJSON(): Record<string, unknown> {
    return { _tag: this._tag, name: this.name, message: this.message, operation: this.operation, detail: this.detail }
  }
}

export const isPhotoServiceError = (value: unknown): value is PhotoServiceError => value instanceof PhotoServiceError
