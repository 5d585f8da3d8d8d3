import { describe, expect, test } from 'vitest'
import { safeJsonStringify } from './safe-json.js'

describe('safeJsonStringify', () => {
  test('serializes plain values like JSON.stringify', () => {
    expect(safeJsonStringify({ latest: '2.0', gist_id: 'abc' })).toBe('{"latest":"2.0","gist_id":"abc"}')
  })

  test('escapes characters that could close a script element', () => {
    expect(safeJsonStringify({ gist_id: '</script><b>&' })).toBe(
      '{"gist_id":"\\u003c/script\\u003e\\u003cb\\u003e\\u0026"}',
    )
  })

  test('escapes line and paragraph separators', () => {
    expect(safeJsonStringify('a\u2028b\u2029c')).toBe('"a\\u2028b\\u2029c"')
  })

  test('output parses back to the same value', () => {
    const value = { gist_id: '<x> & y' }
    expect(JSON.parse(safeJsonStringify(value))).toEqual(value)
  })
})
