/**
 * Port Record Repository Port
 * Defines the interface for the per-project sticky port record.
 */

export interface PortRecordRepository {
  /**
   * Read the recorded port
   * @returns null when no record exists
   * @throws RecordCorruptError when the record exists but holds no valid port
   */
  read(projectDir: string): Promise<number | null>

  /**
   * Overwrite the recorded port
   */
  write(projectDir: string, port: number): Promise<void>
}
