import { HttpMiddleware, HttpRouter, HttpServer } from '@effect/platform'
import { Effect } from 'effect'
import { formatApiError } from './errors.js'
import { withRequestId } from './middleware.js'
import { withSecurityHeaders } from './middleware/security-headers.js'
import { withTrailingSlashRedirect } from './middleware/trailing-slash.js'
import { HealthRouter } from './routes/health.js'
import { SandboxRouter } from './routes/sandbox.js'
import { GistRouter } from './routes/gist.js'

export const ApiRouter = HttpRouter.empty.pipe(
  HttpRouter.concat(HealthRouter),
  HttpRouter.concat(SandboxRouter),
  HttpRouter.concat(GistRouter),
  HttpRouter.catchAll((error) => Effect.succeed(formatApiError(error))),
)

/** Router with the request pipeline. The AntiForgery service is left for the caller to provide. */
export const AppLive = ApiRouter.pipe(
  withTrailingSlashRedirect,
  withRequestId,
  withSecurityHeaders,
  HttpMiddleware.logger,
  HttpServer.serve(),
)
