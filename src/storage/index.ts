export { parseStoredJson, readJsonFile, readTextFile, removeFile, writeJsonAtomic } from './atomic'
export { isErrnoCode, StorageError, type StorageErrorKind } from './errors'
