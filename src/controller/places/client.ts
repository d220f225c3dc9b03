/**
 * Google Places "searchText" client
 * One POST per search, bounded by a 10 second timeout and a single try.
 */

import { z } from 'zod';
import { describeIssues } from '../../lib/mcp/tools';
import { ErrorEx, errorMessage } from '../../util/error';
import { createLogger, type Logger } from '../../util/logger';
import { ResilientClient } from '../../util/resilient-client';

export const PLACES_BASE_URL = 'https://places.googleapis.com';
export const SEARCH_TEXT_PATH = '/v1/places:searchText';
export const FIELD_MASK = 'places.displayName,places.formattedAddress,places.priceLevel,places.rating';
export const MAX_RESULTS = 10;
export const SEARCH_REGION = 'Singapore';

export interface PlaceRecord {
    name: string;
    address: string;
    priceLevel: string;
    rating: string;
}

/**
 * The search collaborator the restaurant tool depends on.
 */
export interface PlacesSearch {
    searchText(query: string, apiKey: string): Promise<PlaceRecord[]>;
}

/** The request never got a usable response: HTTP status, network failure or timeout. */
export class PlacesRequestError extends ErrorEx {}

// Only the masked fields are read; anything else in a place is ignored
const present = z
    .unknown()
    .optional()
    .transform((value) => (value === null ? undefined : value));

const placeSchema = z
    .object({
        displayName: z.object({ text: z.string().optional() }).passthrough().nullish(),
        formattedAddress: present,
        priceLevel: present,
        rating: present,
    })
    .passthrough();

const searchResponseSchema = z.object({ places: z.array(placeSchema).optional() }).passthrough();

/**
 * Map a response body to records, with a placeholder for each missing field.
 * Throws ErrorEx when the body is not a search response.
 */
export function toRecords(body: unknown): PlaceRecord[] {
    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
        throw new ErrorEx(`Invalid response: ${describeIssues(parsed.error)}`);
    }
    const { places = [] } = parsed.data;
    return places.map((place) => ({
        name: place.displayName?.text ?? 'Unknown',
        address: String(place.formattedAddress ?? 'No address'),
        priceLevel: String(place.priceLevel ?? 'Unknown'),
        rating: String(place.rating ?? 'No rating'),
    }));
}

export interface GooglePlacesOptions {
    baseURL: string;
    timeout: number;
    maxResults: number;
    region: string;
    log: Logger;
}

export class GooglePlacesClient implements PlacesSearch {
    private readonly _client: ResilientClient;
    private readonly _opts: GooglePlacesOptions;

    constructor(opts: Partial<GooglePlacesOptions> = {}) {
        this._opts = {
            baseURL: PLACES_BASE_URL,
            timeout: 10_000,
            maxResults: MAX_RESULTS,
            region: SEARCH_REGION,
            log: createLogger('places'),
            ...opts,
        };
        this._client = new ResilientClient(this._opts.baseURL, { maxTries: 1, timeout: this._opts.timeout });
    }

    /**
     * Search places matching the query within the configured region.
     * Rejects with PlacesRequestError when the API could not be reached or answered with an error.
     */
    async searchText(query: string, apiKey: string): Promise<PlaceRecord[]> {
        const { maxResults, region, log } = this._opts;
        const textQuery = `${query} in ${region}`;
        log.debug(`searchText: ${textQuery}`);

        let body: unknown;
        try {
            body = await this._client.fetch(SEARCH_TEXT_PATH, {
                method: 'POST',
                headers: {
                    'X-Goog-Api-Key': apiKey,
                    'X-Goog-FieldMask': FIELD_MASK,
                },
                body: JSON.stringify({ textQuery, maxResultCount: maxResults }),
            });
        } catch (err) {
            log.warn(`searchText failed: ${errorMessage(err)}`);
            throw new PlacesRequestError(errorMessage(err));
        }

        const records = toRecords(body);
        log.debug(`searchText: ${records.length} places`);
        return records;
    }
}
