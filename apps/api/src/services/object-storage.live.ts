import {
  GetObjectCommand,
  ListObjectsV2Command,
  S3Client,
  type S3ClientConfig,
} from '@aws-sdk/client-s3'
import { Effect, Layer, Option } from 'effect'
import {
  ObjectStorage,
  ObjectStorageError,
  type ObjectStorageApi,
  type StoredObject,
} from './object-storage.js'

export interface S3Config {
  readonly region: string
  readonly bucket: string
  /** S3-compatible endpoint (MinIO, R2, ...). Omit for AWS. */
  readonly endpoint?: string | undefined
  /** Static credentials. Omit to use the SDK's default provider chain. */
  readonly accessKeyId?: string | undefined
  readonly secretAccessKey?: string | undefined
}

const NOT_FOUND_ERRORS = new Set(['NoSuchKey', 'NotFound'])

function errorName(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string') {
    return err.name
  }
  return undefined
}

export function createS3ObjectStorageApi(client: S3Client, bucket: string): ObjectStorageApi {
  return {
    listPrefixes: (delimiter) =>
      Effect.tryPromise({
        try: async () => {
          const prefixes: string[] = []
          let continuationToken: string | undefined
          do {
            const page = await client.send(
              new ListObjectsV2Command({
                Bucket: bucket,
                Delimiter: delimiter,
                ContinuationToken: continuationToken,
              }),
            )
            for (const entry of page.CommonPrefixes ?? []) {
              if (entry.Prefix) prefixes.push(entry.Prefix)
            }
            continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined
          } while (continuationToken)
          return prefixes
        },
        catch: (cause) =>
          new ObjectStorageError({ message: `Failed to list bucket ${bucket}`, cause }),
      }),

    getObject: (key) =>
      Effect.tryPromise({
        try: async (): Promise<Option.Option<StoredObject>> => {
          try {
            const response = await client.send(
              new GetObjectCommand({
                Bucket: bucket,
                Key: key,
              }),
            )
            if (!response.Body) return Option.none()
            const body = await response.Body.transformToByteArray()
            return Option.some({
              body,
              contentType: response.ContentType,
              contentLength: response.ContentLength,
              lastModified: response.LastModified,
              etag: response.ETag,
            })
          } catch (err: unknown) {
            const name = errorName(err)
            if (name !== undefined && NOT_FOUND_ERRORS.has(name)) {
              return Option.none()
            }
            throw err
          }
        },
        catch: (cause) =>
          new ObjectStorageError({
            message: `Failed to read ${key} (${errorName(cause) ?? 'unknown error'})`,
            cause,
          }),
      }),
  }
}

/** Create an ObjectStorage Layer from S3 configuration. */
export function createObjectStorageLayer(config: S3Config): Layer.Layer<ObjectStorage> {
  return Layer.sync(ObjectStorage, () => {
    const clientConfig: S3ClientConfig = { region: config.region }
    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint
      clientConfig.forcePathStyle = true
    }
    if (config.accessKeyId && config.secretAccessKey) {
      clientConfig.credentials = {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      }
    }
    return createS3ObjectStorageApi(new S3Client(clientConfig), config.bucket)
  })
}
