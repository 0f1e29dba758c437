import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerativeModel } from '@google/generative-ai';
import type NodeCache from 'node-cache';
import type { AppConfig } from '../config';
import type { ChatIntent, UnifiedProduct } from '../types';
import { createEmbeddingCache, getCachedEmbeddings } from '../utils/cache';
import { buildChatContext, CHAT_SYSTEM_PROMPT, parseChatIntent } from './assistant';
import type { IntentProvider } from './assistant';
import type { EmbeddingProvider, ReasoningClient } from './similarity/types';

// batchEmbedContents accepts at most 100 requests per call
const EMBED_BATCH_LIMIT = 100;

/**
 * Sentence embeddings from Gemini.
 * The model handle is created once here and only read afterwards, so one instance can
 * serve concurrent matches; vectors are cached per title.
 */
export class GeminiEmbeddingProvider implements EmbeddingProvider {
    private readonly model: GenerativeModel;

    constructor(
        apiKey: string,
        modelName: string,
        private readonly cache: NodeCache = createEmbeddingCache()
    ) {
        this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });
    }

    async encode(titles: string[]): Promise<number[][]> {
        return getCachedEmbeddings(this.cache, titles, async (missing) => {
            const vectors: number[][] = [];
            for (let start = 0; start < missing.length; start += EMBED_BATCH_LIMIT) {
                const batch = missing.slice(start, start + EMBED_BATCH_LIMIT);
                const result = await this.model.batchEmbedContents({
                    requests: batch.map(text => ({ content: { role: 'user', parts: [{ text }] } }))
                });
                vectors.push(...result.embeddings.map(embedding => embedding.values));
            }
            return vectors;
        });
    }

    get cacheHandle(): NodeCache {
        return this.cache;
    }
}

/**
 * Free-text completions used by the AI-assisted matching strategy.
 */
export class GeminiReasoningClient implements ReasoningClient {
    private readonly model: GenerativeModel;

    constructor(apiKey: string, modelName: string) {
        this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({
            model: modelName,
            generationConfig: { temperature: 0 }
        });
    }

    async complete(prompt: string): Promise<string> {
        const result = await this.model.generateContent(prompt);
        const text = result.response.text();
        console.log(`[Gemini] Match response: ${text.substring(0, 200)}`);
        return text;
    }
}

/**
 * Turns chat messages into structured intents.
 */
export class GeminiIntentProvider implements IntentProvider {
    private readonly model: GenerativeModel;

    constructor(apiKey: string, modelName: string) {
        this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({
            model: modelName,
            systemInstruction: CHAT_SYSTEM_PROMPT,
            generationConfig: {
                responseMimeType: 'application/json',
                temperature: 0.6,
                topP: 0.9,
                maxOutputTokens: 1024
            }
        });
    }

    async resolveIntent(message: string, products: UnifiedProduct[]): Promise<ChatIntent> {
        const result = await this.model.generateContent(`User message: ${message}${buildChatContext(products)}`);
        const text = result.response.text().trim();
        console.log(`[Chat AI] Raw response: ${text.substring(0, 200)}`);
        return parseChatIntent(text);
    }
}

export interface GeminiBackends {
    embeddings?: GeminiEmbeddingProvider;
    reasoning?: GeminiReasoningClient;
    intents?: GeminiIntentProvider;
}

/**
 * Builds every Gemini-backed collaborator, or none when no API key is configured.
 */
export function createGeminiBackends(config: AppConfig): GeminiBackends {
    const apiKey = config.geminiApiKey;
    if (!apiKey) {
        console.warn('Gemini API Key not found. Matching falls back to lexical scoring and chat to keyword rules.');
        return {};
    }

    return {
        embeddings: new GeminiEmbeddingProvider(apiKey, config.geminiEmbeddingModel),
        reasoning: new GeminiReasoningClient(apiKey, config.geminiModel),
        intents: new GeminiIntentProvider(apiKey, config.geminiModel)
    };
}
