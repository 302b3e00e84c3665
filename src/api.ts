import { LruCache } from "./cache/lru-cache.js";
import type { SsmlNode, SsmlTagNode } from "./core/types.js";
import { parseSsml } from "./markup/parser.js";
import { renderSsml } from "./markup/serializer.js";

export const DEFAULT_CACHE_SIZE = 128;

export interface SsmlProcessorOptions {
  cacheSize?: number;
}

export interface SsmlProcessorStats {
  hits: number;
  misses: number;
}

export interface SsmlProcessor {
  parse: (markup: string) => SsmlTagNode;
  render: (node: SsmlNode) => string;
  normalize: (markup: string) => string;
  stats: () => SsmlProcessorStats;
}

export const parse = (markup: string): SsmlTagNode => parseSsml(markup);

export const render = (node: SsmlNode): string => renderSsml(node);

/**
 * Parse/render pair memoized through LRU caches. Trees are readonly, so a
 * cached tree is handed to every caller that asks for the same markup.
 * Failed parses are not cached.
 */
export const createSsmlProcessor = (options: SsmlProcessorOptions = {}): SsmlProcessor => {
  const cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
  const trees = new LruCache<string, SsmlTagNode>(cacheSize);
  const renders = new LruCache<SsmlNode, string>(cacheSize);
  const normalized = new LruCache<string, string>(cacheSize);
  const counters: SsmlProcessorStats = { hits: 0, misses: 0 };

  const memo = <K, V>(cache: LruCache<K, V>, key: K, compute: () => V): V => {
    const cached = cache.get(key);
    if (cached !== undefined) {
      counters.hits += 1;
      return cached;
    }
    counters.misses += 1;
    const value = compute();
    cache.set(key, value);
    return value;
  };

  const parseCached = (markup: string): SsmlTagNode => memo(trees, markup, () => parseSsml(markup));
  const renderCached = (node: SsmlNode): string => memo(renders, node, () => renderSsml(node));

  return {
    parse: parseCached,
    render: renderCached,
    normalize: (markup) => memo(normalized, markup, () => renderCached(parseCached(markup))),
    stats: () => ({ ...counters }),
  };
};
