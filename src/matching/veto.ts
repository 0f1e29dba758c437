import { STRICT_VARIANTS } from './identifiers';
import type { ProductIdentifiers } from './identifiers';

export type VetoReason =
    | 'accessory'
    | 'condition'
    | 'brand'
    | 'storage'
    | 'unit'
    | 'screen-size'
    | 'resolution'
    | 'wattage'
    | 'jars'
    | 'series'
    | 'variant'
    | 'iphone-generation';

export const intersects = (a: ReadonlySet<string>, b: ReadonlySet<string>): boolean => {
    for (const value of a) {
        if (b.has(value)) return true;
    }
    return false;
};

const sameSet = (a: ReadonlySet<string>, b: ReadonlySet<string>): boolean =>
    a.size === b.size && [...a].every(value => b.has(value));

/** Both sides name something in the category and the sets are not identical. */
const differs = (a: ReadonlySet<string>, b: ReadonlySet<string>): boolean =>
    a.size > 0 && b.size > 0 && !sameSet(a, b);

/** Both sides name something in the category and share nothing. */
const disjoint = (a: ReadonlySet<string>, b: ReadonlySet<string>): boolean =>
    a.size > 0 && b.size > 0 && !intersects(a, b);

const numbersDiffer = (a: number | null, b: number | null): boolean =>
    a !== null && b !== null && a !== b;

/** Centimetre sizes convert to whole inches, so half an inch is within rounding of a stated size. */
const screensDiffer = (a: number | null, b: number | null): boolean =>
    a !== null && b !== null && Math.abs(a - b) >= 0.5;

const strictVariants = (ids: ProductIdentifiers): Set<string> =>
    new Set([...ids.variants].filter(variant => STRICT_VARIANTS.has(variant)));

const looksLikeTv = (ids: ProductIdentifiers): boolean =>
    ids.screenInches !== null || ids.resolutions.size > 0;

const looksLikeAppliance = (ids: ProductIdentifiers): boolean =>
    ids.wattage !== null || ids.jars !== null;

/**
 * Runs the hard-disqualification rules in order and names the first one that fires.
 * A rule only fires on disagreement: a side that says nothing about a category never conflicts.
 */
export function findConflict(a: ProductIdentifiers, b: ProductIdentifiers): VetoReason | null {
    if (a.kind !== b.kind) return 'accessory';
    if (a.condition !== b.condition) return 'condition';

    if (disjoint(a.brands, b.brands) && !intersects(a.brandFamilies, b.brandFamilies)) {
        return 'brand';
    }

    if (differs(a.storage, b.storage)) return 'storage';
    if (differs(a.units, b.units)) return 'unit';

    if (looksLikeTv(a) || looksLikeTv(b)) {
        if (screensDiffer(a.screenInches, b.screenInches)) return 'screen-size';
        if (disjoint(a.resolutions, b.resolutions)) return 'resolution';
    }
    if (looksLikeAppliance(a) || looksLikeAppliance(b)) {
        if (numbersDiffer(a.wattage, b.wattage)) return 'wattage';
        if (numbersDiffer(a.jars, b.jars)) return 'jars';
    }

    if (differs(a.series, b.series)) return 'series';
    if (disjoint(strictVariants(a), strictVariants(b))) return 'variant';
    if (numbersDiffer(a.iphoneGeneration, b.iphoneGeneration)) return 'iphone-generation';

    return null;
}

/**
 * True when the pair must be rejected whatever its similarity score.
 */
export function veto(a: ProductIdentifiers, b: ProductIdentifiers): boolean {
    return findConflict(a, b) !== null;
}
