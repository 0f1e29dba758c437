import express from 'express';
import cors from 'cors';
import type NodeCache from 'node-cache';
import type { AppConfig } from './config';
import { createChatRouter } from './routes/chat';
import { createSearchRouter } from './routes/search';
import type { IntentProvider } from './services/assistant';
import type { SearchDependencies } from './services/searchService';
import { getCacheStats } from './utils/cache';

export interface AppServices {
    search: SearchDependencies;
    intents?: IntentProvider;
    embeddingCache?: NodeCache;
}

const SERVICE_NAME = 'ShopSync API';

export function createApp(config: AppConfig, services: AppServices) {
    const app = express();

    // Request Logger Middleware
    app.use((req, res, next) => {
        console.log(`[Request] ${req.method} ${req.path} - Origin: ${req.headers.origin || 'No Origin'}`);
        next();
    });

    const corsOptions: cors.CorsOptions = {
        origin: (origin, callback) => {
            // Server-to-server calls carry no origin
            if (!origin || config.corsOrigins.includes(origin)) {
                callback(null, true);
            } else {
                console.error(`[CORS Blocked] Origin: ${origin}`);
                callback(new Error(`CORS blocked for origin: ${origin}`));
            }
        },
        credentials: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin']
    };

    app.use(cors(corsOptions));
    app.options('*', cors(corsOptions));
    app.use(express.json());

    app.use('/api/search', createSearchRouter(services.search));
    app.use('/api/chat', createChatRouter(services.intents));

    app.get('/health', (req, res) => {
        res.json({
            status: 'healthy',
            service: SERVICE_NAME,
            matchStrategy: config.matchStrategy,
            embeddingCache: services.embeddingCache ? getCacheStats(services.embeddingCache) : null
        });
    });

    app.get('/', (req, res) => {
        res.json({
            name: SERVICE_NAME,
            version: '1.0.0',
            endpoints: {
                '/api/search': 'GET - Search products (params: q, sort, mock, strategy)',
                '/api/chat': 'POST - Shopping assistant (body: message, currentProducts)',
                '/health': 'GET - Health check'
            },
            sortOptions: ['relevance', 'price_asc', 'price_desc', 'rating'],
            strategies: ['embedding', 'ai', 'lexical']
        });
    });

    // Global Error Handler
    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        console.error('[Global Error Handler]', err);
        const message = err instanceof Error ? err.message : String(err);

        if (message.includes('CORS blocked')) {
            res.status(403).json({
                error: 'CORS Policy Violation',
                message
            });
            return;
        }

        res.status(500).json({
            error: 'Internal Server Error',
            message: config.nodeEnv === 'development' ? message : 'Something went wrong'
        });
    });

    return app;
}
