import NodeCache from 'node-cache';

/**
 * Embedding vector cache (in-memory)
 * TTL: 1 day. Vectors are stored once and only read afterwards.
 */
export function createEmbeddingCache(): NodeCache {
    return new NodeCache({
        stdTTL: 86400,
        maxKeys: 20000,
        useClones: false
    });
}

/**
 * Get cached vectors for every title, encoding only the missing ones in a single batch
 */
export async function getCachedEmbeddings(
    cache: NodeCache,
    titles: string[],
    encode: (titles: string[]) => Promise<number[][]>
): Promise<number[][]> {
    const found = new Map<string, number[]>();
    for (const title of titles) {
        const cached = cache.get<number[]>(title);
        if (cached) found.set(title, cached);
    }

    const missing = [...new Set(titles.filter(title => !found.has(title)))];
    if (missing.length > 0) {
        const vectors = await encode(missing);
        if (vectors.length !== missing.length) {
            throw new Error(`Embedding batch returned ${vectors.length} vectors for ${missing.length} titles`);
        }

        missing.forEach((title, index) => {
            found.set(title, vectors[index]);
            try {
                cache.set(title, vectors[index]);
            } catch (error) {
                // ECACHEFULL: the vector is still used for this call, just not kept
                console.warn('[EmbeddingCache] Cache full, skipping store:', error);
            }
        });
    }

    return titles.map(title => found.get(title) ?? []);
}

export function getCacheStats(cache: NodeCache) {
    const stats = cache.getStats();
    return {
        keys: stats.keys,
        hits: stats.hits,
        misses: stats.misses
    };
}
