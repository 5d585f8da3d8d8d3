export { versionFromPrefix, latestVersion } from './version.js'

export type { GistFile, GistFiles, SelectedGistFile } from './gist.js'
export { selectGistFile } from './gist.js'

export { safeJsonStringify } from './safe-json.js'
