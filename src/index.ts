import { createApp } from './app';
import { loadConfigFromEnvFile } from './config';
import { createGeminiBackends } from './services/gemini';
import { ProductMatcher } from './services/productMatcher';
import { SimilarityScorer } from './services/similarity/scorer';
import { FallbackListingSource } from './services/sources/fallbackSource';
import { HttpListingSource } from './services/sources/httpSource';
import type { ListingSource } from './services/sources/types';
import type { Source } from './types';

const config = loadConfigFromEnvFile();
const gemini = createGeminiBackends(config);

const scorer = new SimilarityScorer({
    embeddings: gemini.embeddings,
    reasoning: gemini.reasoning,
    timeoutMs: config.aiTimeoutMs,
    aiMinConfidence: config.aiMinConfidence
});

const matcher = new ProductMatcher(scorer, {
    defaultStrategy: config.matchStrategy,
    aiMinConfidence: config.aiMinConfidence
});

const liveSource = (source: Source, baseUrl: string | undefined): ListingSource => {
    if (baseUrl) return new HttpListingSource(source, baseUrl, config.sourceTimeoutMs);
    console.warn(`[Startup] No scraper URL for source ${source}; serving fallback listings`);
    return new FallbackListingSource(source);
};

const app = createApp(config, {
    search: {
        sourceA: liveSource('A', config.sourceAUrl),
        sourceB: liveSource('B', config.sourceBUrl),
        fallbackA: new FallbackListingSource('A'),
        fallbackB: new FallbackListingSource('B'),
        matcher,
        sourceTimeoutMs: config.sourceTimeoutMs
    },
    intents: gemini.intents,
    embeddingCache: gemini.embeddings?.cacheHandle
});

// Export for serverless hosts
export default app;

// Only start server if not running in a serverless host
if (!process.env.VERCEL) {
    app.listen(config.port, () => {
        console.log(`Server is running on port ${config.port} (match strategy: ${config.matchStrategy})`);
    });
}
