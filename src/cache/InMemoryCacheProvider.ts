import type { CacheProvider } from "./CacheProvider.js";

export class InMemoryCacheProvider<T> implements CacheProvider<T> {
  private cache = new Map<string, T>();

  async get(key: string): Promise<T | undefined> {
    return this.cache.get(key);
  }

  async set(key: string, value: T): Promise<void> {
    this.cache.set(key, value);
  }
}
