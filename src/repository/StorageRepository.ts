/**
 * StorageRepository: Abstract interface for reading schema and data documents.
 *
 * The DataSpec facade reads through it, so documents can come from the local
 * file system or from any other store.
 */
export interface StorageRepository {
  /**
   * Reads the content of a file.
   *
   * @param path - The file path to read.
   * @returns File content as a UTF-8 string.
   */
  readFile(path: string): Promise<string>;

  /**
   * Checks if a file exists.
   *
   * @param path - The file path to check.
   * @returns `true` if the file exists, otherwise `false`.
   */
  exists(path: string): Promise<boolean>;
}
