import express, { NextFunction, Request, Response } from 'express';
import { processChat } from '../services/assistant';
import type { IntentProvider } from '../services/assistant';
import type { UnifiedProduct } from '../types';

const isNumberOrNull = (value: unknown): boolean =>
    value === null || (typeof value === 'number' && Number.isFinite(value));

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Products echoed back by the client; anything not shaped like a search result is dropped.
 */
const isUnifiedProduct = (value: unknown): value is UnifiedProduct =>
    isRecord(value)
    && typeof value.id === 'number'
    && typeof value.title === 'string'
    && typeof value.hasComparison === 'boolean'
    && isNumberOrNull(value.priceA)
    && isNumberOrNull(value.priceB)
    && isNumberOrNull(value.rating);

export function createChatRouter(intents?: IntentProvider) {
    const router = express.Router();

    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body: unknown = req.body;
            const message = isRecord(body) && typeof body.message === 'string' ? body.message.trim() : '';
            const rawProducts = isRecord(body) ? body.currentProducts : undefined;
            const products = Array.isArray(rawProducts) ? rawProducts.filter(isUnifiedProduct) : [];

            if (!message) {
                res.status(400).json({ success: false, error: 'Message is required' });
                return;
            }

            try {
                const response = await processChat(message, products, intents);
                res.json({ success: true, ...response });
            } catch (error) {
                console.error('[Chat] Assistant failed:', error);
                res.json({
                    success: true,
                    action: 'reply',
                    reply: "I'm having trouble processing that. Could you rephrase your question?"
                });
            }
        } catch (error) {
            console.error('Error in chat route:', error);
            next(error);
        }
    });

    return router;
}
