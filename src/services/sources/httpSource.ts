import axios from 'axios';
import type { Listing, Source } from '../../types';
import type { ListingSource } from './types';

interface RawListing {
    title?: unknown;
    price?: unknown;
    image?: unknown;
    link?: unknown;
    rating?: unknown;
    is_prime?: unknown;
    isPrimaryBadge?: unknown;
}

const asString = (value: unknown): string | null =>
    typeof value === 'string' && value.trim() !== '' ? value.trim() : null;

/**
 * Accepts numbers and price strings such as "₹1,29,999" or "$65.00".
 */
export function parsePrice(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) && value > 0 ? value : null;
    if (typeof value !== 'string') return null;

    const parsed = parseFloat(value.replace(/[^0-9.]/g, ''));
    return !isNaN(parsed) && parsed > 0 ? parsed : null;
}

export function parseRating(value: unknown): number | null {
    const match = typeof value === 'number' ? [String(value)] : asString(value)?.match(/\d+(\.\d+)?/);
    if (!match) return null;
    const rating = parseFloat(match[0]);
    return rating >= 0 && rating <= 5 ? rating : null;
}

/**
 * Maps one scraper row to a Listing. Rows without a title or a usable price are dropped.
 */
export function toListing(raw: RawListing, source: Source): Listing | null {
    const title = asString(raw.title);
    const price = parsePrice(raw.price);
    if (!title || price === null) return null;

    return {
        title,
        price,
        image: asString(raw.image),
        link: asString(raw.link),
        rating: parseRating(raw.rating),
        source,
        flags: {
            isPrimaryBadge: raw.isPrimaryBadge === true || raw.is_prime === true
        }
    };
}

const isRawListing = (value: unknown): value is RawListing =>
    typeof value === 'object' && value !== null;

/**
 * Reads listings from a scraper service: GET <baseUrl>/search?q=<query>.
 * The service may answer with an array or with `{ products: [...] }`.
 */
export class HttpListingSource implements ListingSource {
    constructor(
        readonly source: Source,
        private readonly baseUrl: string,
        private readonly timeoutMs: number
    ) {}

    async search(query: string): Promise<Listing[]> {
        try {
            const response = await axios.get<unknown>(`${this.baseUrl.replace(/\/+$/, '')}/search`, {
                params: { q: query },
                timeout: this.timeoutMs
            });

            const body = response.data;
            const rows: unknown[] = Array.isArray(body)
                ? body
                : isRawListing(body) && 'products' in body && Array.isArray(body.products) ? body.products : [];

            const listings: Listing[] = [];
            for (const row of rows) {
                const listing = isRawListing(row) ? toListing(row, this.source) : null;
                if (listing) listings.push(listing);
            }

            console.log(`[Source ${this.source}] ${listings.length} listings for "${query}" (${rows.length} rows)`);
            return listings;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                console.warn(`[Source ${this.source}] Network error: ${error.message}`);
            } else {
                console.error(`[Source ${this.source}] Failed to read listings:`, error);
            }
            return [];
        }
    }
}
