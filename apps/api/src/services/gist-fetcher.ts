import { HttpClient, HttpClientRequest, HttpClientResponse } from '@effect/platform'
import { Cache, Context, Duration, Effect, Layer, Option, Schema } from 'effect'
import { selectGistFile, type GistFiles } from '@fiddlebox/contract'
import { NotFoundError, UpstreamError } from '../errors.js'

/** Keeps the gist API under its hourly rate limit when a shared link gets popular. */
export const GIST_CACHE_TTL = Duration.seconds(30)
export const GIST_CACHE_CAPACITY = 10_000
export const GIST_REQUEST_TIMEOUT = Duration.seconds(10)

const USER_AGENT = 'fiddlebox'

export interface GitHubConfig {
  /** API root, without trailing slash. */
  readonly apiUrl: string
  /** OAuth app credentials, sent as basic auth when both are set. */
  readonly clientId?: string | undefined
  readonly clientSecret?: string | undefined
  /** Files ending with this suffix are preferred when a gist has several. */
  readonly fileExtension: string
}

export class GitHubSettings extends Context.Tag('GitHubSettings')<GitHubSettings, GitHubConfig>() {}

/** Outcome of `GET /gists/{id}`. `files` is empty unless `status` is 200. */
export interface GistMetadata {
  readonly status: number
  readonly files: GistFiles
}

export interface GistFetcherApi {
  /** Source text of the gist's playground file. */
  readonly fetch: (gistId: string) => Effect.Effect<string, NotFoundError | UpstreamError>
}

export class GistFetcher extends Context.Tag('GistFetcher')<GistFetcher, GistFetcherApi>() {}

const GistFileSchema = Schema.Struct({
  content: Schema.optional(Schema.NullOr(Schema.String)),
  truncated: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  raw_url: Schema.optional(Schema.String),
})

const GistBodySchema = Schema.Struct({
  files: Schema.Record({ key: Schema.String, value: GistFileSchema }),
})

/** Bounds a gist API call and folds transport, decode and timeout failures into UpstreamError. */
function upstream<A, E extends { readonly message: string }>(
  description: string,
  effect: Effect.Effect<A, E>,
): Effect.Effect<A, UpstreamError> {
  return effect.pipe(
    Effect.mapError(
      (cause) => new UpstreamError({ status: 502, message: `${description} failed: ${cause.message}` }),
    ),
    Effect.timeoutFail({
      duration: GIST_REQUEST_TIMEOUT,
      onTimeout: () =>
        new UpstreamError({
          status: 504,
          message: `${description} timed out after ${Duration.format(GIST_REQUEST_TIMEOUT)}`,
        }),
    }),
  )
}

export const makeGistFetcher = Effect.gen(function* () {
  const client = yield* HttpClient.HttpClient
  const config = yield* GitHubSettings

  const requestMetadata = (gistId: string): Effect.Effect<GistMetadata, UpstreamError> => {
    const base = HttpClientRequest.get(`${config.apiUrl}/gists/${encodeURIComponent(gistId)}`).pipe(
      HttpClientRequest.setHeader('accept', 'application/vnd.github+json'),
      HttpClientRequest.setHeader('user-agent', USER_AGENT),
    )
    const request =
      config.clientId && config.clientSecret
        ? base.pipe(HttpClientRequest.basicAuth(config.clientId, config.clientSecret))
        : base

    return upstream(
      `Gist API lookup of ${gistId}`,
      client.execute(request).pipe(
        Effect.flatMap((response) =>
          response.status === 200
            ? HttpClientResponse.schemaBodyJson(GistBodySchema)(response).pipe(
                Effect.map((body): GistMetadata => ({ status: 200, files: body.files })),
              )
            : Effect.succeed<GistMetadata>({ status: response.status, files: {} }),
        ),
        Effect.scoped,
      ),
    )
  }

  // Truncated files are fetched fresh each time; only metadata is cached.
  const requestRaw = (url: string): Effect.Effect<Option.Option<string>, UpstreamError> =>
    upstream(
      `Raw gist fetch of ${url}`,
      client
        .execute(HttpClientRequest.get(url).pipe(HttpClientRequest.setHeader('user-agent', USER_AGENT)))
        .pipe(
          Effect.flatMap((response) =>
            response.status === 200
              ? Effect.map(response.text, Option.some)
              : Effect.succeed(Option.none<string>()),
          ),
          Effect.scoped,
        ),
    )

  const metadataCache = yield* Cache.make({
    capacity: GIST_CACHE_CAPACITY,
    timeToLive: GIST_CACHE_TTL,
    lookup: requestMetadata,
  })

  // A failed lookup is not worth remembering: drop it so the next request retries.
  const metadata = (gistId: string) =>
    metadataCache.get(gistId).pipe(Effect.tapError(() => metadataCache.invalidate(gistId)))

  const fetch = (gistId: string) =>
    Effect.gen(function* () {
      const { status, files } = yield* metadata(gistId)
      if (status !== 200) {
        yield* Effect.logWarning(`Gist API returned ${status} for ${gistId}`)
        return yield* Effect.fail(
          new UpstreamError({ status, message: `Gist API returned ${status} for ${gistId}` }),
        )
      }

      const selected = selectGistFile(files, config.fileExtension)
      if (!selected) {
        return yield* Effect.fail(new NotFoundError({ message: `Gist ${gistId} has no files` }))
      }

      const { filename, file } = selected
      if (file.truncated) {
        if (!file.raw_url) {
          return yield* Effect.fail(
            new NotFoundError({ message: `Gist ${gistId} file ${filename} is truncated and has no raw URL` }),
          )
        }
        const raw = yield* requestRaw(file.raw_url)
        if (Option.isNone(raw)) {
          return yield* Effect.fail(
            new NotFoundError({ message: `Raw content of gist ${gistId} file ${filename} is unavailable` }),
          )
        }
        return raw.value
      }

      if (file.content === undefined || file.content === null) {
        return yield* Effect.fail(
          new NotFoundError({ message: `Gist ${gistId} file ${filename} has no content` }),
        )
      }
      return file.content
    }).pipe(Effect.withLogSpan('gist.fetch'))

  return GistFetcher.of({ fetch })
})

/** Requires HttpClient and GitHubSettings. */
export const GistFetcherLive = Layer.effect(GistFetcher, makeGistFetcher)
