/**
 * Port Record Repository Implementations
 *
 * These implement the core ports against the local filesystem.
 */

export { FilePortRecordRepository, DEFAULT_RECORD_FILE } from "./file-port-record-repository"
export type { FilePortRecordRepositoryOptions } from "./file-port-record-repository"
