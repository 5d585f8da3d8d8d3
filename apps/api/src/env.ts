/**
 * Centralized environment configuration.
 *
 * Required variables abort startup when missing; everything else has a default
 * or is left undefined so the caller can fall back (e.g. the AWS default
 * credential chain, anonymous GitHub access).
 */

function required(name: string): string {
  const value = process.env[name]
  if (!value) throw new Error(`Missing required environment variable: ${name}`)
  return value
}

function optional(name: string, fallback: string): string {
  return process.env[name] || fallback
}

function optionalUnset(name: string): string | undefined {
  return process.env[name] || undefined
}

function port(name: string, fallback: string): number {
  const raw = optional(name, fallback)
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new Error(`Invalid port in environment variable ${name}: ${raw}`)
  }
  return value
}

/** Load and validate all environment variables. */
export function loadEnv() {
  return {
    PORT: port('PORT', '3000'),
    NODE_ENV: optional('NODE_ENV', 'development'),

    // Sandbox bundle bucket
    S3_BUCKET: required('S3_BUCKET'),
    S3_REGION: required('S3_REGION'),
    S3_ENDPOINT: optionalUnset('S3_ENDPOINT'),
    S3_ACCESS_KEY: optionalUnset('S3_ACCESS_KEY'),
    S3_SECRET_KEY: optionalUnset('S3_SECRET_KEY'),

    // GitHub gist API. Credentials raise the rate limit from 60 to 5000 req/hour.
    GITHUB_API_URL: optional('GITHUB_API_URL', 'https://api.github.com'),
    GITHUB_CLIENT_ID: optionalUnset('GITHUB_CLIENT_ID'),
    GITHUB_CLIENT_SECRET: optionalUnset('GITHUB_CLIENT_SECRET'),
    GIST_FILE_EXTENSION: optional('GIST_FILE_EXTENSION', '.cljs'),
  }
}

export type Env = ReturnType<typeof loadEnv>
