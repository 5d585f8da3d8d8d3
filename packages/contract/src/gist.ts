/** A file entry of the GitHub gist API response (`GET /gists/{id}`). */
export interface GistFile {
  /** Inline body. Withheld or cut short when `truncated` is set. */
  readonly content?: string | null | undefined
  readonly truncated: boolean
  readonly raw_url?: string | undefined
}

/** Filename to file, in the order the API returned them. */
export type GistFiles = Readonly<Record<string, GistFile>>

export interface SelectedGistFile {
  readonly filename: string
  readonly file: GistFile
}

/**
 * Picks the file a playground should load: the first file whose name ends with
 * `extension`, otherwise the first file. Order follows the API response as given.
 */
export function selectGistFile(files: GistFiles, extension: string): SelectedGistFile | undefined {
  const entries = Object.entries(files)
  const match = entries.find(([filename]) => filename.endsWith(extension)) ?? entries[0]
  if (!match) return undefined
  const [filename, file] = match
  return { filename, file }
}
