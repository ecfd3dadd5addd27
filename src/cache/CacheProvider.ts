/**
 * Key/value store. The DataSpec facade keeps loaded schema models in one,
 * keyed by file path and format.
 */
export interface CacheProvider<T> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T): Promise<void>;
}
