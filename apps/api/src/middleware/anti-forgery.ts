import { HttpMiddleware, HttpServerRequest, HttpServerResponse } from '@effect/platform'
import { Effect } from 'effect'
import { randomBytes } from 'node:crypto'
import { AntiForgery } from '../context.js'

export const ANTI_FORGERY_COOKIE = '__anti-forgery-token'

// 32 random bytes, base64url without padding
const TOKEN_PATTERN = /^[A-Za-z0-9_-]{43}$/

export function mintAntiForgeryToken(): string {
  return randomBytes(32).toString('base64url')
}

export function isWellFormedToken(token: string): boolean {
  return TOKEN_PATTERN.test(token)
}

export interface AntiForgeryOptions {
  /** Mark the cookie `Secure`. Enable whenever the site is served over HTTPS. */
  readonly secure: boolean
}

/**
 * Provides the AntiForgery service to handlers. Reuses the token from the
 * request cookie when present; otherwise mints one and sets the cookie on the
 * response.
 */
export const withAntiForgery = (options: AntiForgeryOptions) =>
  HttpMiddleware.make((app) =>
    Effect.gen(function* () {
      const request = yield* HttpServerRequest.HttpServerRequest
      const existing = request.cookies[ANTI_FORGERY_COOKIE]

      if (existing !== undefined && isWellFormedToken(existing)) {
        return yield* Effect.provideService(app, AntiForgery, { token: existing })
      }

      const token = mintAntiForgeryToken()
      const response = yield* Effect.provideService(app, AntiForgery, { token })
      return response.pipe(
        HttpServerResponse.unsafeSetCookie(ANTI_FORGERY_COOKIE, token, {
          path: '/',
          httpOnly: true,
          sameSite: 'strict',
          secure: options.secure,
        }),
      )
    }),
  )
