/**
 * search_restaurants tool
 * Finds restaurants or food places in Singapore through the places search collaborator.
 */

import { z } from 'zod';
import type { Tool, ToolOutcome } from '../../lib/mcp';
import { errorMessage } from '../../util/error';
import { type PlaceRecord, PlacesRequestError, type PlacesSearch } from '../places/client';

export const SEARCH_RESTAURANTS = 'search_restaurants';
export const NO_PLACES_FOUND = 'No places found for your query.';
export const API_KEY_MISSING = 'Google Places API key not configured';

const argsSchema = z.object({
    // a missing query searches for "" rather than failing the call
    query: z.string().default(''),
});

export type SearchRestaurantsArgs = z.infer<typeof argsSchema>;

export interface SearchRestaurantsDeps {
    places: PlacesSearch;
    // key used when the process config carries no apiKey
    fallbackApiKey: () => string | undefined;
}

export function renderPlace(place: PlaceRecord): string {
    return `${place.name}\n   Address: ${place.address}\n   Price Level: ${place.priceLevel}\n   Rating: ${place.rating}\n`;
}

export function searchRestaurantsTool({ places, fallbackApiKey }: SearchRestaurantsDeps): Tool<SearchRestaurantsArgs, PlaceRecord> {
    return {
        definition: {
            name: SEARCH_RESTAURANTS,
            description: "Search for restaurants or food places in Singapore using queries like 'laksa' or 'vegan tiramisu'",
            inputSchema: {
                type: 'object',
                properties: {
                    query: { type: 'string', description: 'Search term for food or restaurant type' },
                },
                required: ['query'],
            },
        },
        argsSchema,
        render: renderPlace,

        async invoke({ query }, { config, log }): Promise<ToolOutcome<PlaceRecord>> {
            const configured = config.apiKey;
            const apiKey = (typeof configured === 'string' && configured) || fallbackApiKey();
            if (!apiKey) {
                return { kind: 'error', message: API_KEY_MISSING };
            }

            try {
                const records = await places.searchText(query, apiKey);
                return records.length ? { kind: 'records', records } : { kind: 'empty', message: NO_PLACES_FOUND };
            } catch (err) {
                if (err instanceof PlacesRequestError) {
                    return { kind: 'error', message: `API request failed: ${err.message}` };
                }
                log.error('search_restaurants failed:', err);
                return { kind: 'error', message: `Unexpected error: ${errorMessage(err)}` };
            }
        },
    };
}
