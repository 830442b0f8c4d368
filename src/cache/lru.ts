import { LRUCache } from "lru-cache";
import { appConfig } from "../config.js";

export function createTTLCache<
  K extends NonNullable<unknown>,
  V extends NonNullable<unknown>,
>(
  ttlMs = appConfig.cache.ttlMs,
  max = appConfig.cache.maxEntries,
): LRUCache<K, V> {
  return new LRUCache<K, V>({
    max,
    ttl: ttlMs,
    updateAgeOnGet: true,
    updateAgeOnHas: true,
  });
}

/** Stable key for adapter caches: `source::part1::part2`, lower-cased and whitespace-collapsed. */
export function sourceCacheKey(
  source: string,
  ...parts: Array<string | number | boolean>
): string {
  const normalized = parts.map((part) =>
    String(part).replace(/\s+/g, " ").trim().toLowerCase(),
  );
  return [source, ...normalized].join("::");
}
