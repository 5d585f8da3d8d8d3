import { FetchHttpClient, HttpMiddleware, HttpServer } from '@effect/platform'
import { NodeHttpServer, NodeRuntime } from '@effect/platform-node'
import { Effect, Layer } from 'effect'
import { createServer } from 'node:http'
import { loadEnv } from './env.js'
import { ApiRouter } from './server.js'
import { withRequestId } from './middleware.js'
import { withAntiForgery } from './middleware/anti-forgery.js'
import { withSecurityHeaders } from './middleware/security-headers.js'
import { withTrailingSlashRedirect } from './middleware/trailing-slash.js'
import { createObjectStorageLayer } from './services/object-storage.live.js'
import { SandboxRegistryLive } from './services/sandbox-registry.js'
import { GistFetcherLive, GitHubSettings } from './services/gist-fetcher.js'
import { JsonLoggerLive } from './logger.js'

const env = loadEnv()

// Production pipeline: the anti-forgery token is minted before any page renders
const AppLive = ApiRouter.pipe(
  withTrailingSlashRedirect,
  withAntiForgery({ secure: env.NODE_ENV === 'production' }),
  withRequestId,
  withSecurityHeaders,
  HttpMiddleware.logger,
  HttpServer.serve(),
)

const ObjectStorageLive = createObjectStorageLayer({
  region: env.S3_REGION,
  bucket: env.S3_BUCKET,
  endpoint: env.S3_ENDPOINT,
  accessKeyId: env.S3_ACCESS_KEY,
  secretAccessKey: env.S3_SECRET_KEY,
})

const GitHubSettingsLive = Layer.succeed(GitHubSettings, {
  apiUrl: env.GITHUB_API_URL.replace(/\/+$/, ''),
  clientId: env.GITHUB_CLIENT_ID,
  clientSecret: env.GITHUB_CLIENT_SECRET,
  fileExtension: env.GIST_FILE_EXTENSION,
})

const StartupLogLive = Layer.effectDiscard(
  Effect.log(`Server started on port ${env.PORT}`).pipe(
    Effect.annotateLogs({ bucket: env.S3_BUCKET, region: env.S3_REGION }),
  ),
)

// The registry lists the bucket while the layer is built: a failure aborts startup.
const ServerLive = Layer.mergeAll(AppLive, StartupLogLive).pipe(
  Layer.provide(SandboxRegistryLive),
  Layer.provide(GistFetcherLive),
  Layer.provide(ObjectStorageLive),
  Layer.provide(GitHubSettingsLive),
  Layer.provide(FetchHttpClient.layer),
  Layer.provide(NodeHttpServer.layer(() => createServer(), { port: env.PORT })),
  Layer.provide(JsonLoggerLive),
)

NodeRuntime.runMain(Layer.launch(ServerLive))
