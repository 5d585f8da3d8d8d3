import { Context } from 'effect'

export interface AntiForgeryToken {
  /** Token the rendered page embeds; matches the request's anti-forgery cookie. */
  readonly token: string
}

export class AntiForgery extends Context.Tag('AntiForgery')<AntiForgery, AntiForgeryToken>() {}
