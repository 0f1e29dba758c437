import { ScoringUnavailableError } from '../../errors';
import type { TitleProfile } from '../../matching/scoring';
import { countShared } from '../../matching/scoring';
import { intersects } from '../../matching/veto';
import type { MatchStrategy } from '../../types';
import { getTextSimilarity } from '../../utils/textSimilarity';
import { withTimeout } from '../../utils/timeout';
import { parseMatchTriples } from './responseParser';
import type { EmbeddingProvider, ReasoningClient, SimilarityMatrix } from './types';

export interface SimilarityScorerOptions {
    embeddings?: EmbeddingProvider;
    reasoning?: ReasoningClient;
    timeoutMs: number;
    aiMinConfidence: number;
}

const LEXICAL_TOKEN_WEIGHT = 0.6;
const LEXICAL_TEXT_WEIGHT = 0.4;
const LEXICAL_BRAND_BONUS = 0.1;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export function cosineSimilarity(a: number[], b: number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    const shared = countShared(a, b);
    const union = a.size + b.size - shared;
    return union > 0 ? shared / union : 0;
}

/**
 * Deterministic fallback: identifier Jaccard blended with normalized-title overlap,
 * plus a flat bonus when the pair shares a recognized brand.
 */
export function lexicalScore(a: TitleProfile, b: TitleProfile): number {
    const tokenScore = jaccard(a.tokens, b.tokens);
    const textScore = getTextSimilarity(a.title, b.title);
    const brandBonus = intersects(a.identifiers.brands, b.identifiers.brands) ? LEXICAL_BRAND_BONUS : 0;
    return clamp01(tokenScore * LEXICAL_TOKEN_WEIGHT + textScore * LEXICAL_TEXT_WEIGHT + brandBonus);
}

export function buildMatchPrompt(titlesA: string[], titlesB: string[]): string {
    const listA = titlesA.map((title, index) => `${index}. ${title}`).join('\n');
    const listB = titlesB.map((title, index) => `${index}. ${title}`).join('\n');

    return `You are a strict e-commerce product matcher.
Two stores listed products for the same search. Pair listings that are the EXACT same physical product.

Rules:
- Same brand, same model, same storage/size/variant. "Pro" is not "Pro Max", 128GB is not 256GB.
- A case, cover or accessory never matches the device it fits.
- Refurbished never matches new.
- Each index may appear in at most one pair. Leave items unpaired when unsure.

List A:
${listA}

List F:
${listB}

Return ONLY a JSON array: [{"a": <index in List A>, "f": <index in List F>, "confidence": <0 to 1>}]`;
}

/**
 * Computes the semantic score matrix for two title lists.
 *
 * Backends are injected at construction. Whatever goes wrong with the embedding or
 * reasoning backend (missing, timing out, erroring, unparsable output), the caller gets
 * the lexical matrix instead of an error.
 */
export class SimilarityScorer {
    constructor(private readonly options: SimilarityScorerOptions) {}

    async score(itemsA: TitleProfile[], itemsB: TitleProfile[], strategy: MatchStrategy): Promise<SimilarityMatrix> {
        if (itemsA.length === 0 || itemsB.length === 0) {
            return { strategy, scores: itemsA.map(() => []) };
        }

        if (strategy === 'lexical') return this.scoreLexical(itemsA, itemsB);

        try {
            const scores = strategy === 'embedding'
                ? await this.scoreWithEmbeddings(itemsA, itemsB)
                : await this.scoreWithReasoning(itemsA, itemsB);
            return { strategy, scores };
        } catch (error) {
            console.warn(`[Similarity] ${strategy} scoring unavailable, falling back to lexical:`, error);
            return this.scoreLexical(itemsA, itemsB);
        }
    }

    scoreLexical(itemsA: TitleProfile[], itemsB: TitleProfile[]): SimilarityMatrix {
        return {
            strategy: 'lexical',
            scores: itemsA.map(a => itemsB.map(b => lexicalScore(a, b)))
        };
    }

    private async scoreWithEmbeddings(itemsA: TitleProfile[], itemsB: TitleProfile[]): Promise<number[][]> {
        const provider = this.options.embeddings;
        if (!provider) throw new ScoringUnavailableError('No embedding provider configured');

        // One batched call per side; the pairwise matrix is computed once from the vectors
        const [vectorsA, vectorsB] = await withTimeout(
            Promise.all([
                provider.encode(itemsA.map(item => item.title)),
                provider.encode(itemsB.map(item => item.title))
            ]),
            this.options.timeoutMs,
            'Embedding request'
        );

        if (vectorsA.length !== itemsA.length || vectorsB.length !== itemsB.length) {
            throw new ScoringUnavailableError('Embedding provider returned the wrong number of vectors');
        }
        const dimension = vectorsA[0]?.length ?? 0;
        const allVectors = [...vectorsA, ...vectorsB];
        if (dimension === 0 || allVectors.some(vector => vector.length !== dimension)) {
            throw new ScoringUnavailableError('Embedding vectors have inconsistent dimensions');
        }

        return vectorsA.map(a => vectorsB.map(b => clamp01(cosineSimilarity(a, b))));
    }

    private async scoreWithReasoning(itemsA: TitleProfile[], itemsB: TitleProfile[]): Promise<number[][]> {
        const client = this.options.reasoning;
        if (!client) throw new ScoringUnavailableError('No reasoning service configured');

        const prompt = buildMatchPrompt(itemsA.map(item => item.title), itemsB.map(item => item.title));
        const text = await withTimeout(client.complete(prompt), this.options.timeoutMs, 'Reasoning request');
        const triples = parseMatchTriples(text);

        const scores = itemsA.map(() => itemsB.map(() => 0));
        let skipped = 0;
        for (const { a, f, confidence } of triples) {
            const validIndex = Number.isInteger(a) && Number.isInteger(f)
                && a >= 0 && a < itemsA.length && f >= 0 && f < itemsB.length;
            if (!validIndex || confidence < this.options.aiMinConfidence) {
                skipped++;
                continue;
            }
            scores[a][f] = Math.max(scores[a][f], clamp01(confidence));
        }

        console.log(`[Similarity] Reasoning service proposed ${triples.length} pairs (${skipped} skipped)`);
        return scores;
    }
}
