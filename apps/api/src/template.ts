import nunjucks from 'nunjucks'
import { Effect } from 'effect'
import { safeJsonStringify } from '@fiddlebox/contract'
import { TemplateError } from './errors.js'

/** Options the playground page reads on boot. */
export interface PlaygroundOptions {
  readonly latest: string
  readonly gist_id?: string
}

export interface IndexTemplateContext {
  readonly sandbox_version: string
  readonly opts: PlaygroundOptions
  readonly anti_forgery_token: string
}

const environment = new nunjucks.Environment(null, { autoescape: true })

/**
 * Renders a sandbox's `index.html`. Besides the context fields the template
 * gets `opts_json`, the options as JSON that is safe inside `<script>`.
 */
export function renderIndexTemplate(
  source: string,
  context: IndexTemplateContext,
): Effect.Effect<string, TemplateError> {
  return Effect.try({
    try: () =>
      environment.renderString(source, {
        ...context,
        opts_json: new nunjucks.runtime.SafeString(safeJsonStringify(context.opts)),
      }),
    catch: (cause) =>
      new TemplateError({
        message: `Failed to render index.html for ${context.sandbox_version}: ${
          cause instanceof Error ? cause.message : String(cause)
        }`,
      }),
  })
}
