import { HttpClient, HttpClientError, HttpClientRequest, HttpClientResponse } from '@effect/platform'
import { NodeHttpServer } from '@effect/platform-node'
import { Effect, Layer } from 'effect'
import { AppLive } from '../server.js'
import { AntiForgery } from '../context.js'
import { ObjectStorage, type ObjectStorageApi } from '../services/object-storage.js'
import { createInMemoryObjectStorage } from '../services/object-storage.memory.js'
import { SandboxRegistryLive } from '../services/sandbox-registry.js'
import { GistFetcherLive, GitHubSettings } from '../services/gist-fetcher.js'

export const TEST_TOKEN = 'test-anti-forgery-token'
export const GITHUB_API = 'https://api.github.test'

/** A canned answer, a request that never completes, or a connection failure. */
export type StubResponse =
  | { readonly status: number; readonly body?: unknown }
  | 'hang'
  | 'network-error'

/** GitHub stand-in answering by exact URL; unknown URLs get a 404. Records every request. */
export function createStubGitHub(routes: Record<string, StubResponse>) {
  const requests: HttpClientRequest.HttpClientRequest[] = []
  const client = HttpClient.make((request) => {
    requests.push(request)
    const stub = routes[request.url]
    if (stub === 'hang') return Effect.never
    if (stub === 'network-error') {
      return Effect.fail(
        new HttpClientError.RequestError({ request, reason: 'Transport', description: 'connection reset' }),
      )
    }
    const body =
      stub?.body === undefined ? null : typeof stub.body === 'string' ? stub.body : JSON.stringify(stub.body)
    return Effect.succeed(HttpClientResponse.fromWeb(request, new Response(body, { status: stub?.status ?? 404 })))
  })
  return { client, requests }
}

/** Records every key read from the wrapped storage. */
export function countingStorage(inner: ObjectStorageApi) {
  const reads: string[] = []
  const api: ObjectStorageApi = {
    listPrefixes: inner.listPrefixes,
    getObject: (key) =>
      Effect.suspend(() => {
        reads.push(key)
        return inner.getObject(key)
      }),
  }
  return { api, reads }
}

export interface TestEnvOptions {
  readonly gists?: Record<string, StubResponse>
}

/**
 * The real router on an ephemeral port, backed by an in-memory bucket and a
 * stub GitHub. Each `runTest` builds fresh layers, so caches start empty.
 */
export function createTestEnv(options: TestEnvOptions = {}) {
  const bucket = createInMemoryObjectStorage()
  const storage = countingStorage(bucket)
  const github = createStubGitHub(options.gists ?? {})

  const GistLayer = GistFetcherLive.pipe(
    Layer.provide(Layer.succeed(HttpClient.HttpClient, github.client)),
    Layer.provide(Layer.succeed(GitHubSettings, { apiUrl: GITHUB_API, fileExtension: '.cljs' })),
  )

  const TestLayer = AppLive.pipe(
    Layer.provideMerge(NodeHttpServer.layerTest),
    Layer.provide(SandboxRegistryLive),
    Layer.provide(GistLayer),
    Layer.provide(Layer.succeed(ObjectStorage, storage.api)),
    Layer.provide(Layer.succeed(AntiForgery, { token: TEST_TOKEN })),
  )

  function runTest<A>(effect: Effect.Effect<A, unknown, HttpClient.HttpClient>) {
    return effect.pipe(Effect.provide(TestLayer), Effect.scoped, Effect.runPromise)
  }

  return { runTest, bucket, reads: storage.reads, githubRequests: github.requests }
}

/** GET `path` and collect status, headers and text body. */
export const get = (path: string) =>
  Effect.gen(function* () {
    const client = yield* HttpClient.HttpClient
    const response = yield* client.execute(HttpClientRequest.get(path))
    const body = yield* response.text
    return { status: response.status, headers: response.headers, body }
  })
