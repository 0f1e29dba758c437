import { renumber } from '../matching/matcher';
import type { Listing, MatchStrategy, SearchResponse, SortOption, UnifiedProduct } from '../types';
import { withTimeout } from '../utils/timeout';
import type { ProductMatcher } from './productMatcher';
import type { ListingSource } from './sources/types';

export interface SearchOptions {
    sort: SortOption;
    mock: boolean;
    strategy?: MatchStrategy;
}

export interface SearchDependencies {
    sourceA: ListingSource;
    sourceB: ListingSource;
    fallbackA: ListingSource;
    fallbackB: ListingSource;
    matcher: ProductMatcher;
    sourceTimeoutMs: number;
}

/**
 * Lowest known price of a product, or Infinity when neither store has one.
 */
export function lowestPrice(product: UnifiedProduct): number {
    const prices = [product.priceA, product.priceB].filter((price): price is number => price !== null);
    return prices.length > 0 ? Math.min(...prices) : Infinity;
}

const missingLast = (a: number, b: number, descending: boolean): number => {
    if (a === b) return 0;
    if (!Number.isFinite(a)) return 1;
    if (!Number.isFinite(b)) return -1;
    return descending ? b - a : a - b;
};

/**
 * Orders products for display. `relevance` keeps the matcher's matched-first order.
 */
export function sortProducts(products: UnifiedProduct[], sort: SortOption): UnifiedProduct[] {
    const sorted = [...products];
    switch (sort) {
        case 'price_asc':
            sorted.sort((a, b) => missingLast(lowestPrice(a), lowestPrice(b), false));
            break;
        case 'price_desc':
            sorted.sort((a, b) => missingLast(lowestPrice(a), lowestPrice(b), true));
            break;
        case 'rating':
            sorted.sort((a, b) => missingLast(a.rating ?? Infinity, b.rating ?? Infinity, true));
            break;
        case 'relevance':
            break;
    }
    return renumber(sorted);
}

async function acquire(source: ListingSource, query: string, timeoutMs: number): Promise<Listing[]> {
    try {
        return await withTimeout(source.search(query), timeoutMs, `Source ${source.source}`);
    } catch (error) {
        console.warn(`[Search] Source ${source.source} failed, continuing without it:`, error);
        return [];
    }
}

/**
 * Searches both stores in parallel and returns the unified, sorted product list.
 * When both stores come back empty (or mock mode is on) the bundled fallback listings are used.
 */
export async function searchProducts(
    query: string,
    options: SearchOptions,
    deps: SearchDependencies
): Promise<SearchResponse> {
    const startedAt = Date.now();
    console.log(`[Search] Searching for: ${query} (Sort: ${options.sort}, Mock: ${options.mock})`);

    let isFallback = options.mock;
    let listingsA: Listing[] = [];
    let listingsB: Listing[] = [];
    if (!options.mock) {
        [listingsA, listingsB] = await Promise.all([
            acquire(deps.sourceA, query, deps.sourceTimeoutMs),
            acquire(deps.sourceB, query, deps.sourceTimeoutMs)
        ]);
    }

    if (listingsA.length === 0 && listingsB.length === 0) {
        if (!options.mock) console.log('[Search] Both sources empty, serving fallback listings');
        isFallback = true;
        [listingsA, listingsB] = await Promise.all([
            acquire(deps.fallbackA, query, deps.sourceTimeoutMs),
            acquire(deps.fallbackB, query, deps.sourceTimeoutMs)
        ]);
    }

    const { strategy, products } = await deps.matcher.match(listingsA, listingsB, options.strategy);
    const sorted = sortProducts(products, options.sort);

    const elapsed = (Date.now() - startedAt) / 1000;
    console.log(`[Search] Returning ${sorted.length} products in ${elapsed.toFixed(2)}s (fallback=${isFallback})`);

    return {
        success: true,
        query,
        count: sorted.length,
        isFallback,
        strategy,
        products: sorted,
        elapsedTime: Math.round(elapsed * 100) / 100
    };
}
