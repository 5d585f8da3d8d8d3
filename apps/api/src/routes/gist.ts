import { HttpRouter, HttpServerResponse } from '@effect/platform'
import { Effect } from 'effect'
import { NotFoundError } from '../errors.js'
import { GistFetcher } from '../services/gist-fetcher.js'

const loadGist = Effect.gen(function* () {
  const params = yield* HttpRouter.params
  const gistId = params.gistId
  if (!gistId) {
    return yield* Effect.fail(new NotFoundError({ message: 'Missing gist ID' }))
  }
  const gists = yield* GistFetcher
  const source = yield* gists.fetch(gistId)
  return HttpServerResponse.text(source)
})

export const GistRouter = HttpRouter.empty.pipe(
  HttpRouter.get('/api/v1/gist/:gistId', loadGist),
)
