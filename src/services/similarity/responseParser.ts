import { MalformedResponseError } from '../../errors';

/**
 * One pairing proposed by the reasoning service: index into list A, index into list B, confidence.
 */
export interface MatchTriple {
    a: number;
    f: number;
    confidence: number;
}

const OBJECT_PATTERN = /\{[^{}]*\}/g;

const stripCodeFences = (text: string): string =>
    text.replace(/```(?:json)?/gi, '').trim();

/**
 * Returns the first balanced `[...]` block at or after `fromIndex`, counting bracket depth
 * and skipping quoted strings.
 */
export function extractFirstArray(text: string, fromIndex = 0): string | null {
    const start = text.indexOf('[', fromIndex);
    if (start === -1) return null;

    let depth = 0;
    let quote: string | null = null;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const ch = text[i];

        if (quote) {
            if (escaped) escaped = false;
            else if (ch === '\\') escaped = true;
            else if (ch === quote) quote = null;
            continue;
        }

        if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '[') {
            depth++;
        } else if (ch === ']') {
            depth--;
            if (depth === 0) return text.slice(start, i + 1);
        }
    }

    return null;
}

/**
 * Rewrites near-JSON into JSON: single quotes, bare keys, trailing commas.
 */
export function normalizeLenientJson(raw: string): string {
    return raw
        .replace(/'/g, '"')
        .replace(/([{,]\s*)([A-Za-z_][A-Za-z0-9_]*)\s*:/g, '$1"$2":')
        .replace(/,\s*([}\]])/g, '$1');
}

const toNumber = (value: unknown): number | null => {
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
};

const pick = (entry: Record<string, unknown>, keys: string[]): number | null => {
    for (const key of keys) {
        const value = toNumber(entry[key]);
        if (value !== null) return value;
    }
    return null;
};

const A_KEYS = ['a', 'a_index', 'aIndex'];
const F_KEYS = ['f', 'f_index', 'fIndex', 'b', 'b_index'];
const CONFIDENCE_KEYS = ['confidence', 'score'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

function toTriples(entries: unknown[]): MatchTriple[] {
    const triples: MatchTriple[] = [];
    for (const entry of entries) {
        if (!isRecord(entry)) continue;
        const a = pick(entry, A_KEYS);
        const f = pick(entry, F_KEYS);
        if (a === null || f === null) continue;
        triples.push({ a, f, confidence: pick(entry, CONFIDENCE_KEYS) ?? 0 });
    }
    return triples;
}

function tryParseArray(candidate: string): unknown[] | null {
    try {
        const parsed: unknown = JSON.parse(candidate);
        return Array.isArray(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

const fieldPattern = (keys: string[]): RegExp =>
    new RegExp(`\\b(?:${keys.join('|')})\\b["']?\\s*[:=]\\s*["']?(-?\\d+(?:\\.\\d+)?)`);

/**
 * Last resort: scan every flat `{...}` in the text and pull the three fields out by pattern.
 */
function recoverObjects(text: string): MatchTriple[] {
    const aField = fieldPattern([...A_KEYS].reverse());
    const fField = fieldPattern([...F_KEYS].reverse());
    const confidenceField = fieldPattern(CONFIDENCE_KEYS);

    const triples: MatchTriple[] = [];
    for (const match of text.matchAll(OBJECT_PATTERN)) {
        const body = match[0];
        const a = aField.exec(body);
        const f = fField.exec(body);
        if (!a || !f) continue;
        const confidence = confidenceField.exec(body);
        triples.push({
            a: parseFloat(a[1]),
            f: parseFloat(f[1]),
            confidence: confidence ? parseFloat(confidence[1]) : 0
        });
    }
    return triples;
}

/**
 * Parse the reasoning service's reply into match triples.
 *
 * Ladder: strict JSON of each balanced array in turn, then the same array after lenient
 * normalization, until one holds an object; then regex recovery of individual objects.
 * Arrays without objects (`A[0]` in a sentence) are skipped. An empty array is a valid
 * "no pairs" answer. Throws `MalformedResponseError` when nothing else can be recovered.
 */
export function parseMatchTriples(text: string): MatchTriple[] {
    const cleaned = stripCodeFences(text);
    let sawEmptyArray = false;

    for (let start = cleaned.indexOf('['); start !== -1; start = cleaned.indexOf('[', start + 1)) {
        const arrayText = extractFirstArray(cleaned, start);
        if (!arrayText) continue;

        const entries = tryParseArray(arrayText) ?? tryParseArray(normalizeLenientJson(arrayText));
        if (!entries) continue;
        if (entries.some(isRecord)) return toTriples(entries);
        if (entries.length === 0) sawEmptyArray = true;
    }

    const recovered = recoverObjects(cleaned);
    if (recovered.length > 0) return recovered;
    if (sawEmptyArray) return [];

    throw new MalformedResponseError('No match array could be recovered from the response', text);
}
