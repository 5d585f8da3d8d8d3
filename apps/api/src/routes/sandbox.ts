import { HttpRouter, HttpServerRequest, HttpServerResponse } from '@effect/platform'
import { Effect, Option } from 'effect'
import { NotFoundError } from '../errors.js'
import { AntiForgery } from '../context.js'
import { renderIndexTemplate, type PlaygroundOptions } from '../template.js'
import { SandboxRegistry, type FileContent } from '../services/sandbox-registry.js'

const INDEX_FILE = 'index.html'

/** Response headers for an asset. A header is present only if the store reported its value. */
export function assetHeaders(file: FileContent): Record<string, string> {
  const headers: Record<string, string> = {}
  if (file.contentType) headers['content-type'] = file.contentType
  if (file.contentLength !== undefined && file.contentLength > 0) {
    headers['content-length'] = String(file.contentLength)
  }
  if (file.lastModified) headers['last-modified'] = file.lastModified.toUTCString()
  if (file.etag) headers['etag'] = file.etag
  return headers
}

/** File path below `/sandbox/:version/`, percent-decoded. `None` if empty or malformed. */
export function assetPath(url: string): Option.Option<string> {
  const queryStart = url.indexOf('?')
  const pathname = queryStart === -1 ? url : url.slice(0, queryStart)
  // '', 'sandbox', version, ...rest
  const rest = pathname.split('/').slice(3).join('/')
  if (rest.length === 0) return Option.none()
  try {
    return Option.some(decodeURIComponent(rest))
  } catch {
    return Option.none()
  }
}

const lookupReader = (version: string) =>
  Effect.flatMap(SandboxRegistry, (registry) =>
    Option.match(registry.reader(version), {
      onNone: () => Effect.fail(new NotFoundError({ message: `Sandbox ${version} not found` })),
      onSome: Effect.succeed,
    }),
  )

// -- Assets -------------------------------------------------------------------

export const serveAsset = (version: string, path: string) =>
  Effect.gen(function* () {
    const reader = yield* lookupReader(version)
    const file = yield* reader.get(path)
    if (Option.isNone(file)) {
      return yield* Effect.fail(
        new NotFoundError({ message: `File ${path} not found in sandbox ${version}` }),
      )
    }
    const headers = assetHeaders(file.value)
    // uint8Array() would default the type to application/octet-stream
    return file.value.contentType
      ? HttpServerResponse.uint8Array(file.value.body, { headers, contentType: file.value.contentType })
      : HttpServerResponse.raw(file.value.body, { headers })
  })

const assetHandler = Effect.gen(function* () {
  const request = yield* HttpServerRequest.HttpServerRequest
  const params = yield* HttpRouter.params
  const version = params.version
  const path = assetPath(request.url)
  if (!version || Option.isNone(path)) {
    return yield* Effect.fail(new NotFoundError({ message: `No file at ${request.url}` }))
  }
  return yield* serveAsset(version, path.value)
})

// -- Playground page ----------------------------------------------------------

/** Renders a sandbox's index.html; the registry's latest version when `version` is `None`. */
export const renderIndex = (version: Option.Option<string>, gistId: Option.Option<string>) =>
  Effect.gen(function* () {
    const registry = yield* SandboxRegistry
    const { token } = yield* AntiForgery

    const resolved = Option.orElse(version, () => registry.latest)
    if (Option.isNone(resolved)) {
      return yield* Effect.fail(new NotFoundError({ message: 'No sandbox versions are published' }))
    }

    const reader = yield* lookupReader(resolved.value)
    const index = yield* reader.get(INDEX_FILE)
    if (Option.isNone(index)) {
      return yield* Effect.fail(
        new NotFoundError({ message: `Sandbox ${resolved.value} has no ${INDEX_FILE}` }),
      )
    }

    const latest = Option.getOrElse(registry.latest, () => resolved.value)
    const opts: PlaygroundOptions = Option.match(gistId, {
      onNone: () => ({ latest }),
      onSome: (id) => ({ latest, gist_id: id }),
    })

    const html = yield* renderIndexTemplate(new TextDecoder().decode(index.value.body), {
      sandbox_version: resolved.value,
      opts,
      anti_forgery_token: token,
    })

    return HttpServerResponse.text(html, { contentType: 'text/html; charset=utf-8' })
  })

const indexHandler = Effect.gen(function* () {
  const params = yield* HttpRouter.params
  return yield* renderIndex(Option.fromNullable(params.version), Option.fromNullable(params.gistId))
})

// -- Router -------------------------------------------------------------------

export const SandboxRouter = HttpRouter.empty.pipe(
  HttpRouter.get('/', indexHandler),
  HttpRouter.get('/sandbox/:version', indexHandler),
  HttpRouter.get('/gist/:gistId', indexHandler),
  HttpRouter.get('/gist/:version/:gistId', indexHandler),
  HttpRouter.get('/sandbox/:version/*', assetHandler),
)
