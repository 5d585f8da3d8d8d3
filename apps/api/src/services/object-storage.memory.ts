import { Effect, Layer, Option } from 'effect'
import { ObjectStorage, type ObjectStorageApi, type StoredObject } from './object-storage.js'

export interface InMemoryObjectStorage extends ObjectStorageApi {
  /** Seed an object. Strings are stored as UTF-8. */
  readonly putObject: (
    key: string,
    body: Uint8Array | string,
    metadata?: Omit<StoredObject, 'body'>,
  ) => Effect.Effect<void, never, never>
}

/** In-memory object storage implementation for testing and local development. */
export function createInMemoryObjectStorage(): InMemoryObjectStorage {
  const store = new Map<string, StoredObject>()

  return {
    putObject: (key, body, metadata = {}) =>
      Effect.sync(() => {
        const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body
        store.set(key, { ...metadata, body: bytes })
      }),

    listPrefixes: (delimiter) =>
      Effect.sync(() => {
        const prefixes = new Set<string>()
        for (const key of store.keys()) {
          const idx = key.indexOf(delimiter)
          if (idx >= 0) prefixes.add(key.slice(0, idx + delimiter.length))
        }
        return [...prefixes].sort()
      }),

    getObject: (key) =>
      Effect.sync(() => Option.fromNullable(store.get(key))),
  }
}

export const ObjectStorageMemory = Layer.sync(ObjectStorage, createInMemoryObjectStorage)
