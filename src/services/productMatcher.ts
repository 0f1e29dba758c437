import { matchListings } from '../matching/matcher';
import { buildProfile } from '../matching/scoring';
import type { Listing, MatchStrategy, UnifiedProduct } from '../types';
import type { SimilarityScorer } from './similarity/scorer';

export interface ProductMatcherOptions {
    defaultStrategy: MatchStrategy;
    aiMinConfidence: number;
}

export interface MatchOutcome {
    /** Strategy that produced the scores; differs from the requested one after a fallback. */
    strategy: MatchStrategy;
    products: UnifiedProduct[];
}

/**
 * Pairs listings from the two stores into unified products.
 * Always resolves: scoring failures degrade to lexical scoring, empty sides yield unmatched records.
 */
export class ProductMatcher {
    constructor(
        private readonly scorer: SimilarityScorer,
        private readonly options: ProductMatcherOptions
    ) {}

    async match(listingsA: Listing[], listingsB: Listing[], strategy?: MatchStrategy): Promise<MatchOutcome> {
        const requested = strategy ?? this.options.defaultStrategy;
        const profilesA = listingsA.map(listing => buildProfile(listing.title));
        const profilesB = listingsB.map(listing => buildProfile(listing.title));

        const similarity = await this.scorer.score(profilesA, profilesB, requested);

        const products = matchListings(
            {
                listingsA,
                listingsB,
                profilesA,
                profilesB,
                scores: similarity.scores,
                strategy: similarity.strategy
            },
            { aiMinConfidence: this.options.aiMinConfidence }
        );

        return { strategy: similarity.strategy, products };
    }
}
