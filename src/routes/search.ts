import express, { NextFunction, Request, Response } from 'express';
import { isMatchStrategy } from '../config';
import { searchProducts } from '../services/searchService';
import type { SearchDependencies } from '../services/searchService';
import { SORT_OPTIONS } from '../types';
import type { MatchStrategy, SortOption } from '../types';

const isSortOption = (value: string): value is SortOption =>
    SORT_OPTIONS.some(option => option === value);

const queryString = (value: unknown): string =>
    typeof value === 'string' ? value.trim() : '';

export function createSearchRouter(deps: SearchDependencies) {
    const router = express.Router();

    router.get('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const query = queryString(req.query.q);
            const sort = queryString(req.query.sort).toLowerCase() || 'relevance';
            const strategyParam = queryString(req.query.strategy).toLowerCase();
            const mock = queryString(req.query.mock).toLowerCase() === 'true';

            if (!query) {
                res.status(400).json({ success: false, error: 'Query parameter "q" is required', products: [] });
                return;
            }
            if (!isSortOption(sort)) {
                res.status(400).json({ success: false, error: `Unknown sort option "${sort}"`, products: [] });
                return;
            }

            let strategy: MatchStrategy | undefined;
            if (strategyParam) {
                if (!isMatchStrategy(strategyParam)) {
                    res.status(400).json({ success: false, error: `Unknown strategy "${strategyParam}"`, products: [] });
                    return;
                }
                strategy = strategyParam;
            }

            const response = await searchProducts(query, { sort, mock, strategy }, deps);
            res.json(response);
        } catch (error) {
            console.error('Error in search route:', error);
            next(error);
        }
    });

    return router;
}
