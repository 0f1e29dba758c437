import type { MatchStrategy } from '../../types';

/**
 * Sentence-embedding backend. Must return one vector per title, all of the same dimension.
 */
export interface EmbeddingProvider {
    encode(titles: string[]): Promise<number[][]>;
}

/**
 * External reasoning service: takes a prompt, returns free text.
 */
export interface ReasoningClient {
    complete(prompt: string): Promise<string>;
}

/**
 * Semantic scores for every (A, B) pair: `scores[i][j]` is in [0, 1].
 * `strategy` names the backend that actually produced the numbers, which may be the lexical fallback.
 */
export interface SimilarityMatrix {
    strategy: MatchStrategy;
    scores: number[][];
}
