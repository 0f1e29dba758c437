import type { Listing, Source } from '../../types';

/**
 * Produces listings for one store. Failures surface as an empty array, never as a rejection.
 */
export interface ListingSource {
    readonly source: Source;
    search(query: string): Promise<Listing[]>;
}
