/**
 * Sandbox versions are the top-level prefixes of the bundle bucket, e.g. `2024.03.01-a1b2c3/`.
 */

/** Strips the trailing delimiter from a listed prefix. Returns `undefined` for an empty id. */
export function versionFromPrefix(prefix: string, delimiter = '/'): string | undefined {
  let end = prefix.length
  while (end > 0 && prefix.startsWith(delimiter, end - delimiter.length)) {
    end -= delimiter.length
  }
  const version = prefix.slice(0, end)
  return version.length > 0 ? version : undefined
}

/** Lexicographically greatest version, by UTF-16 code unit order. */
export function latestVersion(versions: Iterable<string>): string | undefined {
  let latest: string | undefined
  for (const version of versions) {
    if (latest === undefined || version > latest) latest = version
  }
  return latest
}
