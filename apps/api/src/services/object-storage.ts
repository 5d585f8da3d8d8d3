import { Context, Data, type Effect, type Option } from 'effect'

/** An object read from the bundle bucket. Metadata fields are present only when the store returned them. */
export interface StoredObject {
  readonly body: Uint8Array
  readonly contentType?: string | undefined
  readonly contentLength?: number | undefined
  readonly lastModified?: Date | undefined
  readonly etag?: string | undefined
}

/** The store rejected or failed a request (access denied, network, throttling, ...). */
export class ObjectStorageError extends Data.TaggedError('ObjectStorageError')<{
  readonly message: string
  readonly cause?: unknown
}> {}

/** Read-only access to one S3-compatible bucket. */
export interface ObjectStorageApi {
  /** All common prefixes directly under the bucket root, grouped by `delimiter`. */
  readonly listPrefixes: (
    delimiter: string,
  ) => Effect.Effect<readonly string[], ObjectStorageError, never>

  /** Read an object. `None` if the key does not exist. */
  readonly getObject: (
    key: string,
  ) => Effect.Effect<Option.Option<StoredObject>, ObjectStorageError, never>
}

export class ObjectStorage extends Context.Tag('ObjectStorage')<ObjectStorage, ObjectStorageApi>() {}
