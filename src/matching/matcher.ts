import type { Listing, MatchStrategy, UnifiedProduct } from '../types';
import { isAcceptable, scoreCandidate } from './scoring';
import type { AcceptanceOptions, CandidateScore, TitleProfile } from './scoring';
import { findConflict } from './veto';
import type { VetoReason } from './veto';

export interface MatchInput {
    listingsA: Listing[];
    listingsB: Listing[];
    profilesA: TitleProfile[];
    profilesB: TitleProfile[];
    scores: number[][];
    strategy: MatchStrategy;
}

export interface MatchCandidate {
    indexA: number;
    indexB: number;
    score: CandidateScore;
}

const round = (value: number, digits: number): number => {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
};

function toUnified(a: Listing | null, b: Listing | null, confidence: number): UnifiedProduct {
    // Source-A fields lead; B fills what A lacks
    const lead = a ?? b;
    if (!lead) throw new Error('A unified product needs at least one listing');

    const priceA = a?.price ?? null;
    const priceB = b?.price ?? null;
    return {
        id: 0,
        title: lead.title,
        image: a?.image ?? b?.image ?? null,
        rating: a?.rating ?? b?.rating ?? null,
        isPrimaryBadge: lead.flags.isPrimaryBadge,
        priceA,
        linkA: a?.link ?? null,
        priceB,
        linkB: b?.link ?? null,
        hasComparison: priceA !== null && priceB !== null,
        matchConfidence: round(confidence, 3)
    };
}

/**
 * Reassigns ids 1..N in the current order.
 */
export function renumber(products: UnifiedProduct[]): UnifiedProduct[] {
    return products.map((product, index) => ({ ...product, id: index + 1 }));
}

/**
 * Stable partition: products with both prices first, then the rest, ids renumbered.
 */
export function rankMatchedFirst(products: UnifiedProduct[]): UnifiedProduct[] {
    const matched = products.filter(product => product.hasComparison);
    const unmatched = products.filter(product => !product.hasComparison);
    return renumber([...matched, ...unmatched]);
}

/**
 * Greedy one-to-one assignment.
 *
 * Each A listing, in input order, takes the unclaimed B listing with the highest combined
 * score among those that pass every veto and the acceptance rule. There is no backtracking:
 * a later A listing with a better claim to an already-claimed B listing loses it.
 */
export function matchListings(input: MatchInput, options: AcceptanceOptions): UnifiedProduct[] {
    const { listingsA, listingsB, profilesA, profilesB, scores, strategy } = input;
    const claimed = new Set<number>();
    const vetoCounts = new Map<VetoReason, number>();
    const results: UnifiedProduct[] = [];

    listingsA.forEach((listingA, i) => {
        let best: MatchCandidate | null = null;

        for (let j = 0; j < listingsB.length; j++) {
            if (claimed.has(j)) continue;

            const conflict = findConflict(profilesA[i].identifiers, profilesB[j].identifiers);
            if (conflict) {
                vetoCounts.set(conflict, (vetoCounts.get(conflict) ?? 0) + 1);
                continue;
            }

            const score = scoreCandidate(profilesA[i], profilesB[j], scores[i]?.[j] ?? 0);
            if (!isAcceptable(score, strategy, options)) continue;

            if (!best || score.combinedScore > best.score.combinedScore) {
                best = { indexA: i, indexB: j, score };
            }
        }

        if (best) {
            claimed.add(best.indexB);
            results.push(toUnified(listingA, listingsB[best.indexB], best.score.semanticScore));
        } else {
            results.push(toUnified(listingA, null, 0));
        }
    });

    listingsB.forEach((listingB, j) => {
        if (!claimed.has(j)) results.push(toUnified(null, listingB, 0));
    });

    const vetoSummary = [...vetoCounts].map(([reason, count]) => `${reason}=${count}`).join(', ');
    console.log(`[Matcher] ${strategy}: paired ${claimed.size} of ${listingsA.length}/${listingsB.length}` +
        (vetoSummary ? ` | vetoes: ${vetoSummary}` : ''));

    return rankMatchedFirst(results);
}
