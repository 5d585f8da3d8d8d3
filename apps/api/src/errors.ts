import { Data } from 'effect'
import { HttpServerResponse } from '@effect/platform'

/** Unknown sandbox version, missing file, or a gist with nothing to load. */
export class NotFoundError extends Data.TaggedError('NotFoundError')<{
  readonly message: string
}> {}

/** The gist API (or a raw gist URL) failed. `status` is passed through to the client. */
export class UpstreamError extends Data.TaggedError('UpstreamError')<{
  readonly message: string
  readonly status: number
}> {}

/** The sandbox's index.html could not be rendered. */
export class TemplateError extends Data.TaggedError('TemplateError')<{
  readonly message: string
}> {}

export type ApiError = NotFoundError | UpstreamError | TemplateError

type JsonErrorTag = Exclude<ApiError['_tag'], 'UpstreamError'>

const STATUS_MAP: Record<JsonErrorTag, number> = {
  NotFoundError: 404,
  TemplateError: 500,
}

const CODE_MAP: Record<JsonErrorTag, string> = {
  NotFoundError: 'not_found',
  TemplateError: 'template_error',
}

function jsonError(status: number, error: string, message: string, requestId: string) {
  return HttpServerResponse.unsafeJson(
    {
      error,
      message,
      request_id: requestId,
    },
    {
      status,
      headers: { 'content-type': 'application/json' },
    },
  )
}

export function errorToResponse(error: ApiError, requestId: string) {
  if (error._tag === 'UpstreamError') {
    return HttpServerResponse.empty({ status: error.status })
  }
  return jsonError(STATUS_MAP[error._tag], CODE_MAP[error._tag], error.message, requestId)
}

function isApiError(error: unknown): error is ApiError {
  return (
    error instanceof NotFoundError ||
    error instanceof UpstreamError ||
    error instanceof TemplateError
  )
}

function isRouteNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    '_tag' in error &&
    error._tag === 'RouteNotFound'
  )
}

/** Formats any error as an API error response. Handles ApiError, router misses and unknown errors. */
export function formatApiError(error: unknown, requestId: string = '') {
  if (isApiError(error)) {
    return errorToResponse(error, requestId)
  }
  if (isRouteNotFound(error)) {
    return jsonError(404, 'not_found', 'Route not found', requestId)
  }
  return jsonError(500, 'internal_error', 'An unexpected error occurred', requestId)
}
