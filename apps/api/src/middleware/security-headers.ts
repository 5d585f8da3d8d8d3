import { HttpMiddleware, HttpServerResponse } from '@effect/platform'
import { Effect } from 'effect'

/** Headers added to every response, page or asset. */
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  'x-frame-options': 'SAMEORIGIN',
  'x-content-type-options': 'nosniff',
  'referrer-policy': 'strict-origin-when-cross-origin',
}

/**
 * Security headers middleware: framing, MIME sniffing and referrer policy.
 * Headers already set by a handler are left as they are.
 */
export const withSecurityHeaders = HttpMiddleware.make((app) =>
  Effect.gen(function* () {
    const response = yield* app
    let result = response
    for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
      if (result.headers[name] === undefined) {
        result = result.pipe(HttpServerResponse.setHeader(name, value))
      }
    }
    return result
  }),
)
