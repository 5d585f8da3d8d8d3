import { HttpRouter, HttpServerResponse } from '@effect/platform'
import { Effect } from 'effect'
import { SandboxRegistry } from '../services/sandbox-registry.js'

export const HealthRouter = HttpRouter.empty.pipe(
  HttpRouter.get(
    '/health',
    Effect.map(SandboxRegistry, (registry) =>
      HttpServerResponse.unsafeJson({ status: 'ok', versions: registry.versions.length }),
    ),
  ),
)
