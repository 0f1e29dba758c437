import { describe, it, expect, vi } from 'vitest';
import { buildProfile } from '../../matching/scoring';
import { buildMatchPrompt, cosineSimilarity, lexicalScore, SimilarityScorer } from './scorer';
import type { EmbeddingProvider, ReasoningClient } from './types';

const IPHONE_A = 'Apple iPhone 15 (128 GB) - Black';
const IPHONE_B = 'Apple iPhone 15 (Black, 128 GB)';
const EARBUDS = 'boAt Airdopes 141';
const GRINDER = 'Prestige Iris 750 Watt Mixer Grinder';

const embeddingsFrom = (vectors: Record<string, number[]>): EmbeddingProvider => ({
    encode: vi.fn(async (titles: string[]) => titles.map(title => vectors[title] ?? [0, 0]))
});

const reasoningReplying = (text: string): ReasoningClient => ({
    complete: vi.fn(async () => text)
});

const itemsA = [buildProfile(IPHONE_A), buildProfile(EARBUDS)];
const itemsB = [buildProfile(IPHONE_B), buildProfile(GRINDER)];

describe('cosineSimilarity', () => {
    it('should handle parallel, orthogonal and zero vectors', () => {
        expect(cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1, 10);
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });
});

describe('lexicalScore', () => {
    it('should score the same product under different wording as a match', () => {
        expect(lexicalScore(buildProfile(IPHONE_A), buildProfile(IPHONE_B))).toBe(1);
    });

    it('should score unrelated products low', () => {
        expect(lexicalScore(buildProfile(EARBUDS), buildProfile(GRINDER))).toBeLessThan(0.3);
    });
});

describe('buildMatchPrompt', () => {
    it('should list both sides with their indices', () => {
        const prompt = buildMatchPrompt(['First A', 'Second A'], ['Only F']);

        expect(prompt).toContain('List A:\n0. First A\n1. Second A');
        expect(prompt).toContain('List F:\n0. Only F');
    });
});

describe('SimilarityScorer', () => {
    it('should build the cosine matrix from one encode call per side', async () => {
        const embeddings = embeddingsFrom({
            [IPHONE_A]: [1, 0],
            [EARBUDS]: [0, 1],
            [IPHONE_B]: [1, 0],
            [GRINDER]: [-1, 0]
        });
        const scorer = new SimilarityScorer({ embeddings, timeoutMs: 1000, aiMinConfidence: 0.7 });

        const result = await scorer.score(itemsA, itemsB, 'embedding');

        expect(result.strategy).toBe('embedding');
        expect(result.scores).toEqual([[1, 0], [0, 0]]);
        expect(embeddings.encode).toHaveBeenCalledTimes(2);
    });

    it('should fall back to lexical scores without an embedding provider', async () => {
        const scorer = new SimilarityScorer({ timeoutMs: 1000, aiMinConfidence: 0.7 });

        const result = await scorer.score(itemsA, itemsB, 'embedding');

        expect(result.strategy).toBe('lexical');
        expect(result.scores).toEqual(scorer.scoreLexical(itemsA, itemsB).scores);
    });

    it('should fall back to lexical scores on a wrong vector count', async () => {
        const embeddings: EmbeddingProvider = { encode: vi.fn(async () => [[1, 0]]) };
        const scorer = new SimilarityScorer({ embeddings, timeoutMs: 1000, aiMinConfidence: 0.7 });

        expect((await scorer.score(itemsA, itemsB, 'embedding')).strategy).toBe('lexical');
    });

    it('should fall back to lexical scores on mixed dimensions', async () => {
        const embeddings = embeddingsFrom({
            [IPHONE_A]: [1, 0],
            [EARBUDS]: [0, 1],
            [IPHONE_B]: [1, 0, 0],
            [GRINDER]: [0, 1]
        });
        const scorer = new SimilarityScorer({ embeddings, timeoutMs: 1000, aiMinConfidence: 0.7 });

        expect((await scorer.score(itemsA, itemsB, 'embedding')).strategy).toBe('lexical');
    });

    it('should fall back to lexical scores when the provider hangs', async () => {
        const embeddings: EmbeddingProvider = { encode: () => new Promise<number[][]>(() => undefined) };
        const scorer = new SimilarityScorer({ embeddings, timeoutMs: 10, aiMinConfidence: 0.7 });

        expect((await scorer.score(itemsA, itemsB, 'embedding')).strategy).toBe('lexical');
    });

    it('should not call any backend when a side is empty', async () => {
        const embeddings = embeddingsFrom({});
        const scorer = new SimilarityScorer({ embeddings, timeoutMs: 1000, aiMinConfidence: 0.7 });

        expect(await scorer.score([], itemsB, 'embedding')).toEqual({ strategy: 'embedding', scores: [] });
        expect(await scorer.score(itemsA, [], 'embedding')).toEqual({ strategy: 'embedding', scores: [[], []] });
        expect(embeddings.encode).not.toHaveBeenCalled();
    });

    it('should keep confident, in-range pairs from the reasoning service', async () => {
        const reasoning = reasoningReplying(
            '[{"a": 0, "f": 0, "confidence": 0.9}, {"a": 1, "f": 1, "confidence": 0.5}, {"a": 5, "f": 0, "confidence": 0.95}]'
        );
        const scorer = new SimilarityScorer({ reasoning, timeoutMs: 1000, aiMinConfidence: 0.7 });

        const result = await scorer.score(itemsA, itemsB, 'ai');

        expect(result).toEqual({ strategy: 'ai', scores: [[0.9, 0], [0, 0]] });
        expect(reasoning.complete).toHaveBeenCalledTimes(1);
    });

    it('should fall back to lexical scores on an unreadable reply', async () => {
        const scorer = new SimilarityScorer({
            reasoning: reasoningReplying('Sorry, I cannot help with that.'),
            timeoutMs: 1000,
            aiMinConfidence: 0.7
        });

        expect((await scorer.score(itemsA, itemsB, 'ai')).strategy).toBe('lexical');
    });

    it('should fall back to lexical scores when the reasoning service fails', async () => {
        const reasoning: ReasoningClient = { complete: vi.fn(async () => { throw new Error('quota exceeded'); }) };
        const scorer = new SimilarityScorer({ reasoning, timeoutMs: 1000, aiMinConfidence: 0.7 });

        expect((await scorer.score(itemsA, itemsB, 'ai')).strategy).toBe('lexical');
    });
});
