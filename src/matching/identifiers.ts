import vocabulary from './data/vocabulary.json';

export type Condition = 'new' | 'refurbished';
export type ProductKind = 'main' | 'accessory';

/**
 * Typed identifiers parsed out of a listing title.
 * Every field is derived from the title alone and never mutated afterwards.
 */
export interface ProductIdentifiers {
    brands: ReadonlySet<string>;
    brandFamilies: ReadonlySet<string>;
    condition: Condition;
    kind: ProductKind;
    screenInches: number | null;
    storage: ReadonlySet<string>;
    ram: ReadonlySet<string>;
    resolutions: ReadonlySet<string>;
    panels: ReadonlySet<string>;
    wattage: number | null;
    jars: number | null;
    units: ReadonlySet<string>;
    colors: ReadonlySet<string>;
    variants: ReadonlySet<string>;
    series: ReadonlySet<string>;
    models: ReadonlySet<string>;
    phoneModels: ReadonlySet<string>;
    iphoneGeneration: number | null;
}

/** Variants that must overlap when both titles name one. */
export const STRICT_VARIANTS: ReadonlySet<string> = new Set([
    'pro', 'plus', 'max', 'ultra', 'mini', 'air', 'lite', 'fe'
]);

const VARIANT_WORDS = ['pro', 'max', 'plus', 'ultra', 'mini', 'air', 'lite', 'fe', 'promax', 'v2', 'gen'];

const REFURBISHED_PATTERN = /\b(renewed|refurbished|refurb|unboxed|used|pre-?owned|second hand)\b/;

const ACCESSORY_PATTERNS = [
    /\bcompatible\s+(with|for)\b/,
    /\b(case|cover|adapter|charger|cable|protector|tempered glass|skin|strap|stand|holder|mount|pouch|sleeve)\s+for\b/,
    /\b(back cover|flip cover|screen protector|screen guard|tempered glass|phone case)\b/,
    /\bfor\s+(apple\s+)?(iphone|ipad|macbook|airpods|apple watch|samsung|galaxy|pixel|oneplus|redmi)\b/
];

// The lookbehind keeps "15.49 cm" from being read as "49 cm"
const SCREEN_PATTERN = /(?<![\d.])(\d{2,3}(?:\.\d+)?)\s*(inches|inch|cm|"|''|”|″)/g;

const CAPACITY_PATTERN = /(\d+(?:\.\d+)?)\s*(gb|tb)(?![a-z])/g;
const CAPACITY_WINDOW = 12;
const CAPACITY_KEYWORDS: Array<['ram' | 'storage', RegExp]> = [
    ['ram', /\bram\b/g],
    ['storage', /\b(rom|storage|ssd|hdd|emmc|internal)\b/g]
];

const RESOLUTION_PATTERNS: Array<[RegExp, string]> = [
    [/\b(4k|uhd|ultra hd|2160p)\b/, '4k'],
    [/\b8k\b/, '8k'],
    [/\b(full hd|fhd|1080p)\b/, 'fhd'],
    [/\b(hd ready|720p)\b/, 'hd']
];

const PANEL_PATTERN = /\b(neo qled|qled|oled|amoled|mini led|nanocell|led|lcd|ips)\b/g;

const WATTAGE_PATTERN = /(\d{2,4})\s*(?:w|watts?)(?![a-z0-9])/;
const JARS_PATTERN = /(\d+)\s*jars?\b/;

const PACK_PATTERN = /\b(pack|set)\s+of\s+(\d+)\b/g;
const PIECES_PATTERN = /(\d+)\s*(?:pcs|pieces?|pc)\b/g;
const MEASURE_PATTERN = /(\d+(?:\.\d+)?)\s*(kgs?|gms?|grams?|g|ml|litres?|liters?|ltr|l)\b/g;

const UNIT_SHAPED = /^\d+(\.\d+)?(gb|tb|mb|mah|w|watts?|inch|inches|cm|mm|kg|gm?|ml|l|ltr|hz|mp|p|k|pcs|v|nm|ft|m|st|nd|rd|th)$/;

const IPHONE_MODEL = /iphone\s*(\d{1,2})(?:\s*(pro\s*max|pro|plus|max|mini)\b)?/;
const GALAXY_S_MODEL = /\bs(\d{2})(?:\s*(ultra|plus|fe)\b|(\+))?/;
const GALAXY_MODEL = /galaxy\s*(\w+)/;
const NORD_MODEL = /\bnord\s*(\w+)/;
const IPHONE_GENERATION = /iphone\s*(\d{1,2})(?!\d)/;

const familyByBrand = new Map<string, string>();
for (const [family, members] of Object.entries(vocabulary.brandFamilies)) {
    for (const member of members) familyByBrand.set(member, family);
}

const colorAliases: Record<string, string> = vocabulary.colorAliases;
const modelStoplist = new Set(vocabulary.modelStoplist);
const tvSizesByCm: Record<string, number> = vocabulary.tvSizesByCm;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const wordPattern = (phrase: string): RegExp => new RegExp(`\\b${escapeRegExp(phrase)}\\b`);

// Brands may be glued to a model number ("iphone15"), so only letters end a brand word.
const brandPatterns = vocabulary.brands.map(brand => ({
    brand,
    pattern: new RegExp(`\\b${escapeRegExp(brand)}(?![a-z])`)
}));

const seriesPatterns = vocabulary.series.map(name => ({
    token: name.replace(/\s+/g, ''),
    pattern: wordPattern(name)
}));

const colorPatterns = vocabulary.colors.map(color => ({
    color: colorAliases[color] ?? color,
    pattern: wordPattern(color)
}));

const variantPatterns = VARIANT_WORDS.map(variant => ({ variant, pattern: wordPattern(variant) }));

const formatNumber = (value: number): string => String(Number(value.toFixed(2)));

function detectBrands(text: string): { brands: Set<string>; families: Set<string> } {
    const brands = new Set<string>();
    const families = new Set<string>();
    for (const { brand, pattern } of brandPatterns) {
        if (pattern.test(text)) {
            brands.add(brand);
            const family = familyByBrand.get(brand);
            if (family) families.add(family);
        }
    }
    return { brands, families };
}

/**
 * Converts centimetre screen sizes to the inch class TVs are sold under.
 */
export function cmToInchClass(cm: number): number {
    return tvSizesByCm[String(Math.round(cm))] ?? Math.round(cm / 2.54);
}

/**
 * A size stated in inches wins over a centimetre figure in the same title.
 */
function detectScreenSize(text: string): number | null {
    let fromCm: number | null = null;
    for (const match of text.matchAll(SCREEN_PATTERN)) {
        const value = parseFloat(match[1]);
        if (match[2] !== 'cm') return value;
        fromCm ??= cmToInchClass(value);
    }
    return fromCm;
}

function classifyCapacity(text: string, start: number, end: number): 'ram' | 'storage' | null {
    const windowStart = Math.max(0, start - CAPACITY_WINDOW);
    const windowEnd = Math.min(text.length, end + CAPACITY_WINDOW);

    let best: { kind: 'ram' | 'storage'; distance: number; after: boolean } | null = null;
    for (const [kind, keyword] of CAPACITY_KEYWORDS) {
        const pattern = new RegExp(keyword.source, 'g');
        pattern.lastIndex = windowStart;
        let match: RegExpExecArray | null;
        while ((match = pattern.exec(text)) !== null) {
            const keywordStart = match.index;
            const keywordEnd = match.index + match[0].length;
            if (keywordEnd > windowEnd) break;

            let distance: number;
            let after: boolean;
            if (keywordEnd <= start) {
                distance = start - keywordEnd;
                after = false;
            } else if (keywordStart >= end) {
                distance = keywordStart - end;
                after = true;
            } else {
                continue;
            }

            // Labels usually trail the number, so an equally close trailing keyword wins.
            if (!best || distance < best.distance || (distance === best.distance && after && !best.after)) {
                best = { kind, distance, after };
            }
        }
    }
    return best ? best.kind : null;
}

function formatCapacity(value: number, unit: string): string {
    if (unit === 'gb' && value >= 1024 && value % 1024 === 0) {
        return `${formatNumber(value / 1024)}tb`;
    }
    return `${formatNumber(value)}${unit}`;
}

/**
 * Tags every GB/TB figure as RAM or storage from nearby keywords.
 * With no figure explicitly tagged as storage, the largest untagged capacity is taken as storage
 * ("8GB 128GB" reads as 128GB storage).
 */
function detectCapacities(text: string): { storage: Set<string>; ram: Set<string> } {
    const storage = new Set<string>();
    const ram = new Set<string>();
    const untagged: Array<{ label: string; sizeInGb: number }> = [];

    for (const match of text.matchAll(CAPACITY_PATTERN)) {
        const value = parseFloat(match[1]);
        const unit = match[2];
        const start = match.index ?? 0;
        const label = formatCapacity(value, unit);
        const kind = classifyCapacity(text, start, start + match[0].length);

        if (kind === 'ram') ram.add(label);
        else if (kind === 'storage') storage.add(label);
        else untagged.push({ label, sizeInGb: unit === 'tb' ? value * 1024 : value });
    }

    if (storage.size === 0 && untagged.length > 0) {
        const largest = untagged.reduce((a, b) => (b.sizeInGb > a.sizeInGb ? b : a));
        storage.add(largest.label);
    }

    return { storage, ram };
}

function detectResolutions(text: string): Set<string> {
    const resolutions = new Set<string>();
    for (const [pattern, token] of RESOLUTION_PATTERNS) {
        if (pattern.test(text)) resolutions.add(token);
    }
    // "Full HD" and "Ultra HD" already carry their own token
    if (!resolutions.has('fhd') && !resolutions.has('4k') && /\bhd\b/.test(text)) {
        resolutions.add('hd');
    }
    return resolutions;
}

function detectUnits(text: string): Set<string> {
    const units = new Set<string>();

    for (const match of text.matchAll(PACK_PATTERN)) {
        units.add(`${match[1]}of${match[2]}`);
    }
    for (const match of text.matchAll(PIECES_PATTERN)) {
        units.add(`${match[1]}pcs`);
    }
    for (const match of text.matchAll(MEASURE_PATTERN)) {
        const value = parseFloat(match[1]);
        const rawUnit = match[2];
        let unit: string;
        if (rawUnit.startsWith('k')) unit = 'kg';
        else if (rawUnit === 'ml') unit = 'ml';
        else if (rawUnit.startsWith('g')) unit = 'g';
        else unit = 'l';

        // "5g" and "4g" are network generations, not weights
        if (rawUnit === 'g' && value < 10) continue;
        units.add(`${formatNumber(value)}${unit}`);
    }

    return units;
}

function detectVariants(text: string): Set<string> {
    const variants = new Set<string>();
    for (const { variant, pattern } of variantPatterns) {
        if (pattern.test(text)) variants.add(variant);
    }
    if (variants.has('promax')) {
        variants.add('pro');
        variants.add('max');
    }
    if (/[a-z0-9]\+(?![a-z0-9])/.test(text)) variants.add('plus');
    return variants;
}

function detectModels(title: string): Set<string> {
    const models = new Set<string>();
    for (const raw of title.toLowerCase().split(/[\s/]+/)) {
        const token = raw.replace(/[^a-z0-9]/g, '');
        if (token.length < 4) continue;
        if (!/\d/.test(token) || !/[a-z]/.test(token)) continue;
        if (modelStoplist.has(token) || UNIT_SHAPED.test(token)) continue;
        models.add(token);
    }
    return models;
}

function detectPhoneModels(text: string): Set<string> {
    const models = new Set<string>();

    const iphone = IPHONE_MODEL.exec(text);
    if (iphone) models.add(`iphone${iphone[1]}${(iphone[2] ?? '').replace(/\s+/g, '')}`);

    const galaxyS = GALAXY_S_MODEL.exec(text);
    if (galaxyS) models.add(`s${galaxyS[1]}${galaxyS[3] ? 'plus' : galaxyS[2] ?? ''}`);

    const galaxy = GALAXY_MODEL.exec(text);
    if (galaxy) models.add(`galaxy${galaxy[1]}`);

    const nord = NORD_MODEL.exec(text);
    if (nord) models.add(`nord${nord[1]}`);

    return models;
}

const collect = <T extends { pattern: RegExp }>(text: string, entries: T[], pick: (entry: T) => string): Set<string> => {
    const found = new Set<string>();
    for (const entry of entries) {
        if (entry.pattern.test(text)) found.add(pick(entry));
    }
    return found;
};

const firstNumber = (pattern: RegExp, text: string): number | null => {
    const match = pattern.exec(text);
    return match ? parseInt(match[1], 10) : null;
};

/**
 * Parse a free-text product title into typed identifiers.
 * Deterministic and case-insensitive.
 */
export function extractIdentifiers(title: string): ProductIdentifiers {
    const text = title.toLowerCase();
    const { brands, families } = detectBrands(text);
    const { storage, ram } = detectCapacities(text);

    return {
        brands,
        brandFamilies: families,
        condition: REFURBISHED_PATTERN.test(text) ? 'refurbished' : 'new',
        kind: ACCESSORY_PATTERNS.some(pattern => pattern.test(text)) ? 'accessory' : 'main',
        screenInches: detectScreenSize(text),
        storage,
        ram,
        resolutions: detectResolutions(text),
        panels: new Set(Array.from(text.matchAll(PANEL_PATTERN), match => match[1].replace(/\s+/g, ''))),
        wattage: firstNumber(WATTAGE_PATTERN, text),
        jars: firstNumber(JARS_PATTERN, text),
        units: detectUnits(text),
        colors: collect(text, colorPatterns, entry => entry.color),
        variants: detectVariants(text),
        series: collect(text, seriesPatterns, entry => entry.token),
        models: detectModels(title),
        phoneModels: detectPhoneModels(text),
        iphoneGeneration: firstNumber(IPHONE_GENERATION, text)
    };
}

/**
 * Flat, prefix-namespaced view of the identifiers, used for overlap counting and Jaccard similarity.
 */
export function toIdentifierTokens(ids: ProductIdentifiers): Set<string> {
    const tokens = new Set<string>();
    const add = (values: Iterable<string>, prefix = '') => {
        for (const value of values) tokens.add(prefix + value);
    };

    add(ids.brands);
    add(ids.brandFamilies, 'brandfamily_');
    tokens.add(ids.condition === 'refurbished' ? 'flag_refurbished' : 'flag_new');
    tokens.add(ids.kind === 'accessory' ? 'flag_accessory' : 'flag_main_product');
    if (ids.screenInches !== null) tokens.add(`${formatNumber(ids.screenInches)}inch`);
    add(ids.storage, 'storage_');
    add(ids.ram, 'ram_');
    add(ids.resolutions);
    add(ids.panels);
    if (ids.wattage !== null) tokens.add(`watt_${ids.wattage}`);
    if (ids.jars !== null) tokens.add(`jars_${ids.jars}`);
    add(ids.colors, 'color_');
    add(ids.units, 'unit_');
    add(ids.variants);
    add(ids.variants, 'variant_');
    add(ids.series, 'series_');
    add(ids.models, 'model_');
    add(ids.phoneModels);
    if (ids.iphoneGeneration !== null) tokens.add(`iphone_gen_${ids.iphoneGeneration}`);

    return tokens;
}
