/**
 * Persistence Adapters Module Exports
 */

export { FilePortRecordRepository, DEFAULT_RECORD_FILE } from "./repositories"
export type { FilePortRecordRepositoryOptions } from "./repositories"
