import { extractIdentifiers, toIdentifierTokens } from './identifiers';
import type { ProductIdentifiers } from './identifiers';
import { intersects } from './veto';
import type { MatchStrategy } from '../types';

/**
 * A title with its identifiers parsed once, shared by every pairing that involves it.
 */
export interface TitleProfile {
    title: string;
    identifiers: ProductIdentifiers;
    tokens: ReadonlySet<string>;
}

export interface CandidateScore {
    semanticScore: number;   // 0~1
    combinedScore: number;   // semantic + identifier boosts
    overlap: number;         // shared identifier tokens
    brandMatch: boolean;
    modelMatch: boolean;
    colorConflict: boolean;
}

export interface AcceptanceOptions {
    aiMinConfidence: number;
}

const SHARED_TOKEN_BOOST = 0.05;
const BRAND_BOOST = 0.15;
const MODEL_BOOST = 0.4;
const COLOR_PENALTY = 0.2;

export function buildProfile(title: string): TitleProfile {
    const identifiers = extractIdentifiers(title);
    return { title, identifiers, tokens: toIdentifierTokens(identifiers) };
}

export function countShared(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    let shared = 0;
    a.forEach(token => {
        if (b.has(token)) shared++;
    });
    return shared;
}

/**
 * Combines a semantic score with identifier overlap.
 * Only meaningful for pairs that already survived the veto rules.
 */
export function scoreCandidate(a: TitleProfile, b: TitleProfile, semanticScore: number): CandidateScore {
    const overlap = countShared(a.tokens, b.tokens);
    const brandMatch = intersects(a.identifiers.brands, b.identifiers.brands);
    const modelMatch = intersects(a.identifiers.models, b.identifiers.models);
    const colorConflict = a.identifiers.colors.size > 0
        && b.identifiers.colors.size > 0
        && !intersects(a.identifiers.colors, b.identifiers.colors);

    let combinedScore = semanticScore + overlap * SHARED_TOKEN_BOOST;
    if (brandMatch) combinedScore += BRAND_BOOST;
    if (modelMatch) combinedScore += MODEL_BOOST;
    if (colorConflict) combinedScore -= COLOR_PENALTY;

    return { semanticScore, combinedScore, overlap, brandMatch, modelMatch, colorConflict };
}

/**
 * Decides whether a surviving candidate is trustworthy enough to pair.
 *
 * - embedding: exact model number with s > 0.4, brand + 4 shared identifiers with s > 0.55, or s > 0.82 alone
 * - lexical: same model rule, a shared brand with s >= 0.6, or s > 0.82
 * - ai: the service's own confidence must reach `aiMinConfidence`
 */
export function isAcceptable(score: CandidateScore, strategy: MatchStrategy, options: AcceptanceOptions): boolean {
    const s = score.semanticScore;

    switch (strategy) {
        case 'ai':
            return s >= options.aiMinConfidence;
        case 'lexical':
            return (score.modelMatch && s > 0.4)
                || (score.brandMatch && s >= 0.6)
                || s > 0.82;
        case 'embedding':
            return (score.modelMatch && s > 0.4)
                || (score.brandMatch && score.overlap >= 4 && s > 0.55)
                || s > 0.82;
    }
}
