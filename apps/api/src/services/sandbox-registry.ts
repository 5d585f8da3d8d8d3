import { Cache, Context, Duration, Effect, Layer, Option } from 'effect'
import { latestVersion, versionFromPrefix } from '@fiddlebox/contract'
import { ObjectStorage, type ObjectStorageApi, type StoredObject } from './object-storage.js'

const VERSION_DELIMITER = '/'

/** A file of a published sandbox bundle. */
export type FileContent = StoredObject

/** Memoized reader over one version's files. Absence is memoized too. */
export interface FileReader {
  readonly version: string
  readonly get: (path: string) => Effect.Effect<Option.Option<FileContent>>
}

/** The sandbox versions published at startup and a reader for each. */
export interface SandboxRegistryApi {
  /** Known versions, sorted ascending. Fixed for the lifetime of the process. */
  readonly versions: readonly string[]
  /** The default version served when a request names none. */
  readonly latest: Option.Option<string>
  readonly reader: (version: string) => Option.Option<FileReader>
}

export class SandboxRegistry extends Context.Tag('SandboxRegistry')<
  SandboxRegistry,
  SandboxRegistryApi
>() {}

/**
 * Published bundles are immutable, so every (version, path) is fetched at most
 * once per process. Store errors are treated as a missing file.
 */
export function makeFileReader(storage: ObjectStorageApi, version: string) {
  return Effect.gen(function* () {
    const cache = yield* Cache.make({
      capacity: Number.MAX_SAFE_INTEGER,
      timeToLive: Duration.infinity,
      lookup: (path: string) =>
        storage.getObject(`${version}${VERSION_DELIMITER}${path}`).pipe(
          Effect.catchAll((error) =>
            Effect.logWarning(`Treating ${version}/${path} as missing: ${error.message}`).pipe(
              Effect.as(Option.none<FileContent>()),
            ),
          ),
        ),
    })

    const reader: FileReader = {
      version,
      get: (path) => cache.get(path),
    }
    return reader
  })
}

/** Lists the bucket's top-level prefixes and builds one reader per version. */
export function makeSandboxRegistry(storage: ObjectStorageApi) {
  return Effect.gen(function* () {
    const prefixes = yield* storage.listPrefixes(VERSION_DELIMITER)

    const versions = [
      ...new Set(
        prefixes.flatMap((prefix) => {
          const version = versionFromPrefix(prefix, VERSION_DELIMITER)
          return version === undefined ? [] : [version]
        }),
      ),
    ].sort()

    const readers = new Map<string, FileReader>()
    for (const version of versions) {
      readers.set(version, yield* makeFileReader(storage, version))
    }

    const latest = Option.fromNullable(latestVersion(versions))

    yield* Effect.log(`Discovered ${versions.length} sandbox version(s)`).pipe(
      Effect.annotateLogs({
        versions: versions.join(','),
        latest: Option.getOrElse(latest, () => ''),
      }),
    )

    const registry: SandboxRegistryApi = {
      versions: Object.freeze(versions),
      latest,
      reader: (version) => Option.fromNullable(readers.get(version)),
    }
    return registry
  })
}

export const SandboxRegistryLive = Layer.effect(
  SandboxRegistry,
  Effect.flatMap(ObjectStorage, makeSandboxRegistry),
)
