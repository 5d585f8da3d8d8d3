import { HttpClient } from '@effect/platform'
import { Effect, Either, Fiber, Layer, TestClock, TestContext } from 'effect'
import { describe, expect, test } from 'vitest'
import { GistFetcher, GistFetcherLive, GitHubSettings, type GitHubConfig } from './gist-fetcher.js'
import { GITHUB_API as API, createStubGitHub } from '../test-support/app.js'

function fetcherLayer(client: HttpClient.HttpClient, config: Partial<GitHubConfig> = {}) {
  return GistFetcherLive.pipe(
    Layer.provide(Layer.succeed(HttpClient.HttpClient, client)),
    Layer.provide(
      Layer.succeed(GitHubSettings, { apiUrl: API, fileExtension: '.cljs', ...config }),
    ),
  )
}

function runTest<A, E>(
  layer: Layer.Layer<GistFetcher>,
  effect: Effect.Effect<A, E, GistFetcher>,
): Promise<A> {
  return effect.pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext), Effect.runPromise)
}

const fetchGist = (id: string) => Effect.flatMap(GistFetcher, (gists) => gists.fetch(id))

const gist = (files: Record<string, { content?: string; truncated?: boolean; raw_url?: string }>) => ({
  status: 200,
  body: { id: 'abc', files },
})

describe('GistFetcher.fetch', () => {
  test('returns the inline content of the preferred file', async () => {
    const { client, requests } = createStubGitHub({
      [`${API}/gists/abc`]: gist({
        'README.md': { content: '# notes', truncated: false },
        'core.cljs': { content: '(ns core)', truncated: false, raw_url: 'https://raw.test/core.cljs' },
      }),
    })
    const source = await runTest(fetcherLayer(client), fetchGist('abc'))
    expect(source).toBe('(ns core)')
    expect(requests.map((r) => r.url)).toEqual([`${API}/gists/abc`])
  })

  test('falls back to the first file when none has the extension', async () => {
    const { client } = createStubGitHub({
      [`${API}/gists/abc`]: gist({
        'first.txt': { content: 'first', truncated: false },
        'second.clj': { content: 'second', truncated: false },
      }),
    })
    expect(await runTest(fetcherLayer(client), fetchGist('abc'))).toBe('first')
  })

  test('uses the configured extension', async () => {
    const { client } = createStubGitHub({
      [`${API}/gists/abc`]: gist({
        'a.cljs': { content: 'cljs', truncated: false },
        'b.ts': { content: 'ts', truncated: false },
      }),
    })
    expect(await runTest(fetcherLayer(client, { fileExtension: '.ts' }), fetchGist('abc'))).toBe('ts')
  })

  test('fetches truncated files from their raw URL', async () => {
    const { client, requests } = createStubGitHub({
      [`${API}/gists/big`]: gist({
        'big.cljs': { content: '(ns big) ;; cut', truncated: true, raw_url: 'https://raw.test/big.cljs' },
      }),
      'https://raw.test/big.cljs': { status: 200, body: '(ns big) ;; the whole file' },
    })
    const source = await runTest(fetcherLayer(client), fetchGist('big'))
    expect(source).toBe('(ns big) ;; the whole file')
    expect(requests.map((r) => r.url)).toEqual([`${API}/gists/big`, 'https://raw.test/big.cljs'])
  })

  test('does not cache raw content', async () => {
    const { client, requests } = createStubGitHub({
      [`${API}/gists/big`]: gist({
        'big.cljs': { truncated: true, raw_url: 'https://raw.test/big.cljs' },
      }),
      'https://raw.test/big.cljs': { status: 200, body: 'full' },
    })
    await runTest(
      fetcherLayer(client),
      Effect.gen(function* () {
        yield* fetchGist('big')
        yield* fetchGist('big')
      }),
    )
    expect(requests.map((r) => r.url)).toEqual([
      `${API}/gists/big`,
      'https://raw.test/big.cljs',
      'https://raw.test/big.cljs',
    ])
  })

  test('is NotFound when the raw URL does not answer 200', async () => {
    const { client } = createStubGitHub({
      [`${API}/gists/big`]: gist({
        'big.cljs': { content: 'partial', truncated: true, raw_url: 'https://raw.test/big.cljs' },
      }),
      'https://raw.test/big.cljs': { status: 500 },
    })
    const result = await runTest(fetcherLayer(client), Effect.either(fetchGist('big')))
    expect(Either.isLeft(result) && result.left._tag).toBe('NotFoundError')
  })

  test('is NotFound when the gist has no files', async () => {
    const { client } = createStubGitHub({ [`${API}/gists/empty`]: gist({}) })
    const result = await runTest(fetcherLayer(client), Effect.either(fetchGist('empty')))
    expect(Either.isLeft(result) && result.left._tag).toBe('NotFoundError')
  })

  test('is NotFound when a file carries no content', async () => {
    const { client } = createStubGitHub({
      [`${API}/gists/abc`]: gist({ 'core.cljs': { truncated: false } }),
    })
    const result = await runTest(fetcherLayer(client), Effect.either(fetchGist('abc')))
    expect(Either.isLeft(result) && result.left._tag).toBe('NotFoundError')
  })

  test('propagates a non-200 status from the gist API', async () => {
    const { client } = createStubGitHub({ [`${API}/gists/nope`]: { status: 404, body: { message: 'Not Found' } } })
    const result = await runTest(fetcherLayer(client), Effect.either(fetchGist('nope')))
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe('UpstreamError')
      expect(result.left._tag === 'UpstreamError' && result.left.status).toBe(404)
    }
  })

  test('reports an undecodable body as a bad gateway', async () => {
    const { client } = createStubGitHub({ [`${API}/gists/abc`]: { status: 200, body: 'not json' } })
    const result = await runTest(fetcherLayer(client), Effect.either(fetchGist('abc')))
    expect(Either.isLeft(result) && result.left._tag === 'UpstreamError' && result.left.status).toBe(502)
  })

  test('reports transport failures as a bad gateway', async () => {
    const { client } = createStubGitHub({ [`${API}/gists/abc`]: 'network-error' })
    const result = await runTest(fetcherLayer(client), Effect.either(fetchGist('abc')))
    expect(Either.isLeft(result) && result.left._tag === 'UpstreamError' && result.left.status).toBe(502)
  })

  test('escapes the gist id in the API URL', async () => {
    const { client, requests } = createStubGitHub({})
    await runTest(fetcherLayer(client), Effect.either(fetchGist('a/b')))
    expect(requests.map((r) => r.url)).toEqual([`${API}/gists/a%2Fb`])
  })
})

describe('GistFetcher authentication', () => {
  const files = gist({ 'core.cljs': { content: '(ns core)', truncated: false } })

  test('sends basic auth when client id and secret are configured', async () => {
    const { client, requests } = createStubGitHub({ [`${API}/gists/abc`]: files })
    await runTest(
      fetcherLayer(client, { clientId: 'test-client', clientSecret: 'test-secret' }),
      fetchGist('abc'),
    )
    const expected = `Basic ${Buffer.from('test-client:test-secret').toString('base64')}`
    expect(requests[0]?.headers['authorization']).toBe(expected)
  })

  test('omits auth when only one credential is set', async () => {
    const { client, requests } = createStubGitHub({ [`${API}/gists/abc`]: files })
    await runTest(fetcherLayer(client, { clientId: 'test-client' }), fetchGist('abc'))
    expect(requests[0]?.headers['authorization']).toBeUndefined()
  })

  test('identifies itself and asks for the GitHub media type', async () => {
    const { client, requests } = createStubGitHub({ [`${API}/gists/abc`]: files })
    await runTest(fetcherLayer(client), fetchGist('abc'))
    expect(requests[0]?.headers['accept']).toBe('application/vnd.github+json')
    expect(requests[0]?.headers['user-agent']).toBe('fiddlebox')
  })
})

describe('GistFetcher caching', () => {
  const files = gist({ 'core.cljs': { content: '(ns core)', truncated: false } })

  test('serves repeated lookups within 30 seconds from the cache', async () => {
    const { client, requests } = createStubGitHub({ [`${API}/gists/abc`]: files })
    const [first, second] = await runTest(
      fetcherLayer(client),
      Effect.gen(function* () {
        const a = yield* fetchGist('abc')
        yield* TestClock.adjust('29 seconds')
        const b = yield* fetchGist('abc')
        return [a, b] as const
      }),
    )
    expect(first).toBe('(ns core)')
    expect(second).toBe(first)
    expect(requests).toHaveLength(1)
  })

  test('looks the gist up again once the entry expires', async () => {
    const { client, requests } = createStubGitHub({ [`${API}/gists/abc`]: files })
    await runTest(
      fetcherLayer(client),
      Effect.gen(function* () {
        yield* fetchGist('abc')
        yield* TestClock.adjust('31 seconds')
        yield* fetchGist('abc')
      }),
    )
    expect(requests).toHaveLength(2)
  })

  test('caches non-200 responses too', async () => {
    const { client, requests } = createStubGitHub({ [`${API}/gists/nope`]: { status: 404 } })
    await runTest(
      fetcherLayer(client),
      Effect.gen(function* () {
        yield* Effect.either(fetchGist('nope'))
        yield* Effect.either(fetchGist('nope'))
      }),
    )
    expect(requests).toHaveLength(1)
  })

  test('keys the cache by gist id', async () => {
    const { client, requests } = createStubGitHub({
      [`${API}/gists/abc`]: files,
      [`${API}/gists/def`]: gist({ 'other.cljs': { content: '(ns other)', truncated: false } }),
    })
    const sources = await runTest(
      fetcherLayer(client),
      Effect.all([fetchGist('abc'), fetchGist('def'), fetchGist('abc')]),
    )
    expect(sources).toEqual(['(ns core)', '(ns other)', '(ns core)'])
    expect(requests.map((r) => r.url)).toEqual([`${API}/gists/abc`, `${API}/gists/def`])
  })

  test('does not cache transport failures', async () => {
    const { client, requests } = createStubGitHub({ [`${API}/gists/abc`]: 'network-error' })
    await runTest(
      fetcherLayer(client),
      Effect.gen(function* () {
        yield* Effect.either(fetchGist('abc'))
        yield* Effect.either(fetchGist('abc'))
      }),
    )
    expect(requests).toHaveLength(2)
  })
})

describe('GistFetcher timeouts', () => {
  test('gives up on the gist API after 10 seconds with a gateway timeout', async () => {
    const { client } = createStubGitHub({ [`${API}/gists/slow`]: 'hang' })
    const result = await runTest(
      fetcherLayer(client),
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(Effect.either(fetchGist('slow')))
        yield* TestClock.adjust('10 seconds')
        return yield* Fiber.join(fiber)
      }),
    )
    expect(Either.isLeft(result) && result.left._tag === 'UpstreamError' && result.left.status).toBe(504)
  })

  test('gives up on a raw URL after 10 seconds', async () => {
    const { client } = createStubGitHub({
      [`${API}/gists/big`]: gist({ 'big.cljs': { truncated: true, raw_url: 'https://raw.test/big.cljs' } }),
      'https://raw.test/big.cljs': 'hang',
    })
    const result = await runTest(
      fetcherLayer(client),
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(Effect.either(fetchGist('big')))
        yield* TestClock.adjust('10 seconds')
        return yield* Fiber.join(fiber)
      }),
    )
    expect(Either.isLeft(result) && result.left._tag === 'UpstreamError' && result.left.status).toBe(504)
  })
})
