import dotenv from 'dotenv';
import { MATCH_STRATEGIES } from './types';
import type { MatchStrategy } from './types';

export interface AppConfig {
    port: number;
    nodeEnv: string;
    geminiApiKey: string | undefined;
    geminiModel: string;
    geminiEmbeddingModel: string;
    aiTimeoutMs: number;
    aiMinConfidence: number;
    matchStrategy: MatchStrategy;
    sourceAUrl: string | undefined;
    sourceBUrl: string | undefined;
    sourceTimeoutMs: number;
    corsOrigins: string[];
}

const DEFAULT_CORS_ORIGINS = ['http://localhost:5173'];

const positiveNumber = (raw: string | undefined, fallback: number): number => {
    const parsed = Number(raw);
    return raw !== undefined && raw.trim() !== '' && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const nonEmpty = (raw: string | undefined): string | undefined => {
    const trimmed = raw?.trim();
    return trimmed ? trimmed : undefined;
};

export const isMatchStrategy = (value: string): value is MatchStrategy =>
    MATCH_STRATEGIES.some(strategy => strategy === value);

/**
 * Reads every tunable from the environment once. Bad values fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const strategy = env.MATCH_STRATEGY?.trim().toLowerCase() ?? '';
    const origins = (env.CORS_ORIGINS ?? '')
        .split(',')
        .map(origin => origin.trim())
        .filter(origin => origin.length > 0);

    return {
        port: positiveNumber(env.PORT, 3000),
        nodeEnv: env.NODE_ENV ?? 'development',
        geminiApiKey: nonEmpty(env.GEMINI_API_KEY),
        geminiModel: nonEmpty(env.GEMINI_MODEL) ?? 'gemini-2.0-flash-lite',
        geminiEmbeddingModel: nonEmpty(env.GEMINI_EMBEDDING_MODEL) ?? 'text-embedding-004',
        aiTimeoutMs: positiveNumber(env.AI_TIMEOUT_MS, 15000),
        aiMinConfidence: Math.min(1, positiveNumber(env.AI_MIN_CONFIDENCE, 0.7)),
        matchStrategy: isMatchStrategy(strategy) ? strategy : 'embedding',
        sourceAUrl: nonEmpty(env.SOURCE_A_URL),
        sourceBUrl: nonEmpty(env.SOURCE_B_URL),
        sourceTimeoutMs: positiveNumber(env.SOURCE_TIMEOUT_MS, 45000),
        corsOrigins: origins.length > 0 ? origins : DEFAULT_CORS_ORIGINS
    };
}

/**
 * Loads `.env` into `process.env` and reads the config from it.
 */
export function loadConfigFromEnvFile(): AppConfig {
    dotenv.config();
    return loadConfig(process.env);
}
