import { HttpMiddleware, HttpServerRequest, HttpServerResponse } from '@effect/platform'
import { Effect } from 'effect'

/**
 * Tags each request with an id: the proxy's `x-request-id` when one was sent,
 * a fresh UUID otherwise. Every log line written while the request runs
 * carries it as `requestId`, and the response echoes it back.
 */
export const withRequestId = HttpMiddleware.make((app) =>
  Effect.gen(function* () {
    const request = yield* HttpServerRequest.HttpServerRequest
    const incoming = request.headers['x-request-id']
    const requestId = incoming ?? crypto.randomUUID()
    const response = yield* app.pipe(Effect.annotateLogs('requestId', requestId))
    return response.pipe(HttpServerResponse.setHeader('x-request-id', requestId))
  }),
)
