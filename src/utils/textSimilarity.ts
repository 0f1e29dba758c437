import { distance } from 'fastest-levenshtein';

/**
 * Marketing filler and connective words that carry no product identity
 */
const NOISE_WORDS = new Set([
    'with', 'and', 'the', 'for', 'of', 'in', 'on', 'to', 'by',
    'new', 'latest', 'buy', 'online', 'best', 'price', 'offer', 'deal', 'sale',
    'warranty', 'year', 'years', 'free', 'delivery', 'shipping', 'original', 'genuine',
    'mobile', 'phone', 'smartphone', 'works', 'camera', 'control', 'chip', 'boost',
    'battery', 'life', 'display', '5g', '4g', 'lte', 'india', 'edition', 'model'
]);

/**
 * Normalize a product title into a bag of comparable words.
 * Only used for lexical overlap, never for identifier extraction.
 */
export function normalizeTitle(title: string): string {
    let cleaned = title.toLowerCase();

    // 1. Drop bracket and punctuation noise
    cleaned = cleaned.replace(/[()[\]{}]/g, ' ');
    cleaned = cleaned.replace(/[^\w\s.+]/g, ' ');

    // 2. Standardize storage units ("128 GB", "128-gb", "1 terabyte")
    cleaned = cleaned.replace(/(\d+)\s*(?:gb|gigabytes?)\b/g, '$1gb');
    cleaned = cleaned.replace(/(\d+)\s*(?:tb|terabytes?)\b/g, '$1tb');

    // 3. Remove filler words and single characters
    return cleaned
        .split(/\s+/)
        .map(word => word.replace(/^\.+|\.+$/g, ''))
        .filter(word => word.length > 1 && !NOISE_WORDS.has(word))
        .join(' ');
}

/**
 * Calculate text similarity score (0 to 1)
 * Combines Levenshtein distance (30%) and Token Overlap (70%)
 */
export function getTextSimilarity(titleA: string, titleB: string): number {
    const cleanA = normalizeTitle(titleA);
    const cleanB = normalizeTitle(titleB);

    if (!cleanA || !cleanB) return 0;

    // Method 1: Levenshtein Distance
    const maxLen = Math.max(cleanA.length, cleanB.length);
    const levenScore = 1 - distance(cleanA, cleanB) / maxLen;

    // Method 2: Token Overlap (Set Intersection)
    const tokensA = new Set(cleanA.split(' '));
    const tokensB = new Set(cleanB.split(' '));

    let intersection = 0;
    tokensA.forEach(token => {
        if (tokensB.has(token)) intersection++;
    });

    const union = new Set([...tokensA, ...tokensB]).size;
    const tokenScore = union > 0 ? intersection / union : 0;

    // Word order matters less than shared words
    return levenScore * 0.3 + tokenScore * 0.7;
}
