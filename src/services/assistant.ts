import type { ChatIntent, ChatResponse, RecommendCriteria, UnifiedProduct } from '../types';
import { lowestPrice } from './searchService';

/**
 * Resolves a chat message into a structured intent (search / recommend / reply).
 */
export interface IntentProvider {
    resolveIntent(message: string, products: UnifiedProduct[]): Promise<ChatIntent>;
}

export const CHAT_SYSTEM_PROMPT = `You are ShopSync Assistant, a shopping helper for a price comparison platform that aggregates products from two stores.

Your capabilities:
1. Recommend products from the currently loaded search results
2. Understand vague product descriptions and convert them into search queries
3. Answer shopping questions naturally

RESPONSE FORMAT: respond with valid JSON only (no markdown, no code fences):
{
  "action": "reply" | "search" | "recommend",
  "reply": "Your message to the user (use markdown bold ** for emphasis)",
  "search_query": "product search term (only when action=search)",
  "criteria": "best" | "cheapest" | "rating" | "compare" (only when action=recommend),
  "budget": null or number
}

RULES:
- When the user describes something they need, set action="search" and search_query to a real product search term.
- When the user asks about current results ("best deal?", "cheapest one?"), set action="recommend" with the matching criteria.
- When the user asks to compare, set action="recommend" with criteria="compare".
- For greetings, help questions, thanks or general chat, set action="reply".
- Put budgets such as "under 5000" in the budget field, never in search_query.
- Keep replies concise and friendly.`;

const CONTEXT_PRODUCT_LIMIT = 15;
const ACTIONS: readonly ChatIntent['action'][] = ['reply', 'search', 'recommend'];
const CRITERIA: readonly RecommendCriteria[] = ['best', 'cheapest', 'rating', 'compare'];

const priceFormatter = new Intl.NumberFormat('en-IN', {
    style: 'currency',
    currency: 'INR',
    maximumFractionDigits: 0
});

export const formatPrice = (amount: number): string => priceFormatter.format(amount);

const savingsOf = (product: UnifiedProduct): number =>
    product.priceA !== null && product.priceB !== null ? Math.abs(product.priceA - product.priceB) : 0;

/**
 * Summarizes the loaded products for the intent model.
 */
export function buildChatContext(products: UnifiedProduct[]): string {
    if (products.length === 0) {
        return '\n\nNo products are currently loaded. If the user asks about results, tell them to search first.';
    }

    const lines = products.slice(0, CONTEXT_PRODUCT_LIMIT).map((product, index) => {
        const prices: string[] = [];
        if (product.priceA !== null) prices.push(`Store A: ${formatPrice(product.priceA)}`);
        if (product.priceB !== null) prices.push(`Store B: ${formatPrice(product.priceB)}`);
        const priceText = prices.length > 0 ? prices.join(' | ') : 'Price N/A';
        const ratingText = product.rating !== null ? ` ★${product.rating}` : '';
        return `${index + 1}. ${product.title.substring(0, 80)} - ${priceText}${ratingText}`;
    });

    return `\n\nCURRENT SEARCH RESULTS (${products.length} products loaded):\n${lines.join('\n')}`;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const asBudget = (value: unknown): number | null => {
    const budget = typeof value === 'string' ? Number(value.replace(/[^0-9.]/g, '')) : value;
    return typeof budget === 'number' && Number.isFinite(budget) && budget > 0 ? budget : null;
};

/**
 * Parses the intent model's JSON reply. Throws when the reply is not a JSON object.
 */
export function parseChatIntent(text: string): ChatIntent {
    const cleaned = text
        .trim()
        .replace(/^```(?:json)?\s*/, '')
        .replace(/\s*```$/, '')
        .trim();

    const parsed: unknown = JSON.parse(cleaned);
    if (!isRecord(parsed)) throw new Error('Intent reply is not a JSON object');

    const action = ACTIONS.find(candidate => candidate === parsed.action) ?? 'reply';
    const criteria = CRITERIA.find(candidate => candidate === parsed.criteria) ?? 'best';
    const rawQuery = parsed.search_query ?? parsed.searchQuery;

    return {
        action,
        reply: typeof parsed.reply === 'string' ? parsed.reply : '',
        searchQuery: typeof rawQuery === 'string' && rawQuery.trim() !== '' ? rawQuery.trim() : undefined,
        criteria,
        budget: asBudget(parsed.budget)
    };
}

/**
 * Picks the top three products for a criterion, optionally within a budget.
 */
export function recommendBest(
    products: UnifiedProduct[],
    criteria: Exclude<RecommendCriteria, 'compare'> = 'best',
    budget: number | null = null
): ChatResponse {
    if (products.length === 0) {
        return {
            action: 'reply',
            reply: 'There are no products loaded yet. Search for something first, then ask me for recommendations!'
        };
    }

    let filtered = products;
    if (budget !== null) {
        const limit = budget;
        filtered = products.filter(product => lowestPrice(product) <= limit);
        if (filtered.length === 0) {
            const cheapest = Math.min(...products.map(lowestPrice));
            const hint = Number.isFinite(cheapest) ? ` The cheapest option is ${formatPrice(cheapest)}.` : '';
            return {
                action: 'reply',
                reply: `No products found under ${formatPrice(budget)}.${hint} Try a higher budget?`
            };
        }
    }

    let ranked: UnifiedProduct[];
    let label: string;
    if (criteria === 'cheapest') {
        ranked = [...filtered].sort((a, b) => lowestPrice(a) - lowestPrice(b));
        label = budget !== null ? `💰 **Best Options Under ${formatPrice(budget)}**` : '💰 **Cheapest Options**';
    } else if (criteria === 'rating') {
        ranked = [...filtered].sort((a, b) => (b.rating ?? 0) - (a.rating ?? 0));
        label = '⭐ **Highest Rated Products**';
    } else {
        // Balance of rating, price, savings and having both stores to compare
        const score = (product: UnifiedProduct): number => {
            const price = lowestPrice(product);
            const priceScore = Number.isFinite(price) ? Math.max(0, 100 - price / 1000) : 0;
            return (product.rating ?? 0) * 20 + priceScore + savingsOf(product) / 100 + (product.hasComparison ? 10 : 0);
        };
        ranked = [...filtered].sort((a, b) => score(b) - score(a));
        label = '🏆 **Best Deals - Top Picks**';
    }

    const top = ranked.slice(0, 3);
    const lines = [`${label}\n`];
    top.forEach((product, index) => {
        const price = lowestPrice(product);
        const priceText = Number.isFinite(price) ? formatPrice(price) : 'Price N/A';
        const ratingText = product.rating !== null ? ` | ★ ${product.rating}` : '';
        const savings = savingsOf(product);
        const savingsText = savings > 0 ? ` | Save ${formatPrice(savings)}` : '';
        lines.push(`${index + 1}. **${product.title.substring(0, 60)}**\n   ${priceText}${ratingText}${savingsText}`);
    });
    lines.push('\n👆 Here are the product details with links:');

    return { action: 'recommend', reply: lines.join('\n'), recommendedProducts: top };
}

/**
 * Puts the cheapest and the highest rated of the first ten products side by side.
 */
export function compareProducts(products: UnifiedProduct[]): ChatResponse {
    if (products.length < 2) {
        return { action: 'reply', reply: 'Need at least 2 products to compare. Search for more items first!' };
    }

    const pool = products.slice(0, 10);
    const cheapest = pool.reduce((best, product) => (lowestPrice(product) < lowestPrice(best) ? product : best));
    const highestRated = pool.reduce((best, product) => ((product.rating ?? 0) > (best.rating ?? 0) ? product : best));

    const top: UnifiedProduct[] = [];
    const seenTitles = new Set<string>();
    for (const product of [cheapest, highestRated]) {
        const key = product.title.substring(0, 40);
        if (!seenTitles.has(key)) {
            top.push(product);
            seenTitles.add(key);
        }
    }

    const cheapestPrice = lowestPrice(cheapest);
    const priceText = Number.isFinite(cheapestPrice) ? formatPrice(cheapestPrice) : 'Price N/A';
    const reply = '📊 **Quick Comparison**\n\n'
        + `💰 **Cheapest**: ${cheapest.title.substring(0, 50)}\n   → ${priceText}\n\n`
        + `⭐ **Top Rated**: ${highestRated.title.substring(0, 50)}\n   → ★ ${highestRated.rating ?? 'N/A'}\n`;

    return { action: 'recommend', reply, recommendedProducts: top };
}

const BUDGET_PATTERN = /under\s*(?:₹|rs\.?|inr)?\s*(\d[\d,]*)/i;

/**
 * Keyword rules used when no intent model is configured or it fails.
 */
export function processChatFallback(message: string, products: UnifiedProduct[]): ChatResponse {
    const msg = message.toLowerCase().trim();
    const hasProducts = products.length > 0;
    const mentions = (keywords: string[]) => keywords.some(keyword => msg.includes(keyword));

    if (hasProducts && mentions(['best', 'recommend', 'top', 'suggest', 'deal'])) {
        return recommendBest(products, 'best');
    }

    if (hasProducts && mentions(['cheap', 'lowest', 'budget', 'affordable'])) {
        const budgetMatch = BUDGET_PATTERN.exec(msg);
        const budget = budgetMatch ? parseInt(budgetMatch[1].replace(/,/g, ''), 10) : null;
        return recommendBest(products, 'cheapest', budget);
    }

    if (hasProducts && mentions(['rated', 'rating', 'stars', 'popular'])) {
        return recommendBest(products, 'rating');
    }

    if (hasProducts && mentions(['compare', 'vs', 'versus'])) {
        return compareProducts(products);
    }

    if (msg.split(/\s+/).length >= 2) {
        return { action: 'search', searchQuery: msg, reply: `🔍 Searching for **"${msg}"**...` };
    }

    return {
        action: 'reply',
        reply: "Tell me what you're looking for, or ask about the current search results!"
    };
}

function intentToResponse(intent: ChatIntent, products: UnifiedProduct[]): ChatResponse {
    if (intent.action === 'search' && intent.searchQuery) {
        const budgetNote = intent.budget ? `\n\n💰 Budget noted: under ${formatPrice(intent.budget)}` : '';
        const reply = intent.reply
            ? intent.reply + budgetNote
            : `🔍 Searching for **"${intent.searchQuery}"**... Results will appear in the main area!${budgetNote}`;
        return { action: 'search', searchQuery: intent.searchQuery, reply };
    }

    if (intent.action === 'recommend' && products.length > 0) {
        const criteria = intent.criteria ?? 'best';
        const result = criteria === 'compare'
            ? compareProducts(products)
            : recommendBest(products, criteria, intent.budget ?? null);
        // The model's wording leads, the product data comes from our own ranking
        return intent.reply ? { ...result, reply: `${intent.reply}\n\n${result.reply}` } : result;
    }

    return {
        action: 'reply',
        reply: intent.reply || "I'm not sure what you mean. Try describing a product or asking about current results!"
    };
}

/**
 * Answers a chat message, using the intent model when available and keyword rules otherwise.
 */
export async function processChat(
    message: string,
    products: UnifiedProduct[],
    provider?: IntentProvider
): Promise<ChatResponse> {
    console.log(`[Chat] User: ${message}`);
    if (!provider) return processChatFallback(message, products);

    try {
        const intent = await provider.resolveIntent(message, products);
        const response = intentToResponse(intent, products);
        console.log(`[Chat] Action: ${response.action}`);
        return response;
    } catch (error) {
        console.error('[Chat] AI Error, using keyword rules:', error);
        return processChatFallback(message, products);
    }
}
