import fallbackListings from '../../data/fallbackListings.json';
import type { Listing, Source } from '../../types';
import { toListing } from './httpSource';
import type { ListingSource } from './types';

/**
 * Bundled demo listings, served when live sources return nothing or when mock mode is requested.
 * The query is ignored.
 */
export class FallbackListingSource implements ListingSource {
    constructor(readonly source: Source) {}

    async search(_query: string): Promise<Listing[]> {
        const rows = this.source === 'A' ? fallbackListings.A : fallbackListings.B;
        const listings: Listing[] = [];
        for (const row of rows) {
            const listing = toListing(row, this.source);
            if (listing) listings.push(listing);
        }
        return listings;
    }
}
