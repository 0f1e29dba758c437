import { beforeEach, describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../config';
import { createGeminiBackends, GeminiEmbeddingProvider, GeminiIntentProvider, GeminiReasoningClient } from './gemini';

const { batchEmbedContents, generateContent } = vi.hoisted(() => ({
    batchEmbedContents: vi.fn(),
    generateContent: vi.fn()
}));

vi.mock('@google/generative-ai', () => ({
    GoogleGenerativeAI: class {
        getGenerativeModel() {
            return { batchEmbedContents, generateContent };
        }
    }
}));

const textResponse = (text: string) => ({ response: { text: () => text } });

describe('GeminiEmbeddingProvider', () => {
    beforeEach(() => {
        batchEmbedContents.mockReset();
        batchEmbedContents.mockImplementation(async ({ requests }: { requests: unknown[] }) => ({
            embeddings: requests.map((_, index) => ({ values: [index, 1] }))
        }));
    });

    it('should split large inputs into batches of 100', async () => {
        const provider = new GeminiEmbeddingProvider('test-key', 'text-embedding-004');
        const titles = Array.from({ length: 150 }, (_, index) => `Listing ${index}`);

        const vectors = await provider.encode(titles);

        expect(vectors).toHaveLength(150);
        expect(batchEmbedContents).toHaveBeenCalledTimes(2);
        expect(batchEmbedContents.mock.calls[0][0].requests).toHaveLength(100);
        expect(batchEmbedContents.mock.calls[1][0].requests).toHaveLength(50);
        expect(vectors[100]).toEqual([0, 1]);
    });

    it('should serve repeated titles from its cache', async () => {
        const provider = new GeminiEmbeddingProvider('test-key', 'text-embedding-004');

        await provider.encode(['Apple iPhone 15', 'boAt Airdopes 141']);
        const again = await provider.encode(['boAt Airdopes 141']);

        expect(again).toEqual([[1, 1]]);
        expect(batchEmbedContents).toHaveBeenCalledTimes(1);
        expect(provider.cacheHandle.keys()).toHaveLength(2);
    });
});

describe('GeminiReasoningClient', () => {
    it('should return the raw completion text', async () => {
        generateContent.mockResolvedValueOnce(textResponse('[{"a":0,"f":0,"confidence":0.9}]'));

        const client = new GeminiReasoningClient('test-key', 'gemini-2.0-flash-lite');

        await expect(client.complete('prompt')).resolves.toBe('[{"a":0,"f":0,"confidence":0.9}]');
        expect(generateContent).toHaveBeenLastCalledWith('prompt');
    });
});

describe('GeminiIntentProvider', () => {
    it('should parse the intent and send the product context', async () => {
        generateContent.mockResolvedValueOnce(textResponse('{"action":"reply","reply":"Hi!"}'));

        const provider = new GeminiIntentProvider('test-key', 'gemini-2.0-flash-lite');
        const intent = await provider.resolveIntent('hello', []);

        expect(intent).toMatchObject({ action: 'reply', reply: 'Hi!' });
        expect(generateContent).toHaveBeenLastCalledWith(
            'User message: hello\n\nNo products are currently loaded. If the user asks about results, tell them to search first.'
        );
    });
});

describe('createGeminiBackends', () => {
    it('should build nothing without an API key', () => {
        expect(createGeminiBackends(loadConfig({}))).toEqual({});
    });

    it('should build every backend with an API key', () => {
        const backends = createGeminiBackends(loadConfig({ GEMINI_API_KEY: 'test-key' }));

        expect(backends.embeddings).toBeInstanceOf(GeminiEmbeddingProvider);
        expect(backends.reasoning).toBeInstanceOf(GeminiReasoningClient);
        expect(backends.intents).toBeInstanceOf(GeminiIntentProvider);
    });
});
