/**
 * MCP Tools - Tool registration for the MCP server
 *
 * Each tool is defined in its own file.
 * Add new tools here and export them.
 */

import { ToolRegistry } from '../../lib/mcp';
import { Env } from '../../util/env';
import { GooglePlacesClient, type PlacesSearch } from '../places/client';
import { searchRestaurantsTool } from './search-restaurants';

export interface ToolDeps {
    places?: PlacesSearch;
    fallbackApiKey?: () => string | undefined;
}

/**
 * Build the registry with every tool this server offers.
 */
export function createToolRegistry({ places = new GooglePlacesClient(), fallbackApiKey = () => Env.placesApiKey }: ToolDeps = {}) {
    return new ToolRegistry().register(searchRestaurantsTool({ places, fallbackApiKey }));
}

export { renderPlace, SEARCH_RESTAURANTS, searchRestaurantsTool } from './search-restaurants';
