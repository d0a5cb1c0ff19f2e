/**
 * env-store module — barrel exports
 */

export type { EnvEntries } from './env-format.js'
export { parseEnvContent, serializeEnvMap } from './env-format.js'
export type { EnvStore } from './env-store.js'
export { FileEnvStore, createFileEnvStore } from './file-env-store.js'
