export type Source = 'A' | 'B';

export interface Listing {
    title: string;
    price: number | null;
    image: string | null;
    link: string | null;
    rating: number | null;
    source: Source;
    flags: {
        isPrimaryBadge: boolean;
    };
}

export interface UnifiedProduct {
    id: number;
    title: string;
    image: string | null;
    rating: number | null;
    isPrimaryBadge: boolean;
    priceA: number | null;
    linkA: string | null;
    priceB: number | null;
    linkB: string | null;
    hasComparison: boolean;
    matchConfidence: number;
}

export type MatchStrategy = 'embedding' | 'ai' | 'lexical';

export const MATCH_STRATEGIES: readonly MatchStrategy[] = ['embedding', 'ai', 'lexical'];

export type SortOption = 'relevance' | 'price_asc' | 'price_desc' | 'rating';

export const SORT_OPTIONS: readonly SortOption[] = ['relevance', 'price_asc', 'price_desc', 'rating'];

export interface SearchResponse {
    success: true;
    query: string;
    count: number;
    isFallback: boolean;
    strategy: MatchStrategy;
    products: UnifiedProduct[];
    elapsedTime: number;
}

export type RecommendCriteria = 'best' | 'cheapest' | 'rating' | 'compare';

export interface ChatIntent {
    action: 'reply' | 'search' | 'recommend';
    reply: string;
    searchQuery?: string;
    criteria?: RecommendCriteria;
    budget?: number | null;
}

export type ChatResponse =
    | { action: 'reply'; reply: string }
    | { action: 'search'; searchQuery: string; reply: string }
    | { action: 'recommend'; reply: string; recommendedProducts: UnifiedProduct[] };
