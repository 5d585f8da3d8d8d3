import { HttpMiddleware, HttpServerRequest, HttpServerResponse } from '@effect/platform'
import { Effect } from 'effect'

/**
 * Returns the redirect target for a URL whose path ends in `/`, or `null` when
 * the path is `/` or has no trailing slash. Leading slashes collapse to one so
 * the target can never become protocol-relative (`//host`).
 */
export function stripTrailingSlash(url: string): string | null {
  const queryStart = url.indexOf('?')
  const path = queryStart === -1 ? url : url.slice(0, queryStart)
  const query = queryStart === -1 ? '' : url.slice(queryStart)

  if (path === '/' || !path.endsWith('/')) return null

  const trimmed = path.replace(/\/+$/, '').replace(/^\/+/, '')
  return `/${trimmed}${query}`
}

/** Redirects `GET /sandbox/1.0/` to `/sandbox/1.0` (301) before routing. */
export const withTrailingSlashRedirect = HttpMiddleware.make((app) =>
  Effect.gen(function* () {
    const request = yield* HttpServerRequest.HttpServerRequest
    // Routes are GET-only; a redirected HEAD would only reach a 404
    if (request.method === 'GET') {
      const target = stripTrailingSlash(request.url)
      if (target !== null) {
        return HttpServerResponse.redirect(target, { status: 301 })
      }
    }
    return yield* app
  }),
)
