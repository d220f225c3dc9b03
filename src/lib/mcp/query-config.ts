/**
 * Query-string configuration
 *
 * MCP hosts pass per-deployment settings on the endpoint URL using dotted keys:
 *   /mcp?apiKey=test-secret&server.port=8080  =>  { apiKey: 'test-secret', server: { port: '8080' } }
 */

export type ConfigValue = string | QueryConfig;
export interface QueryConfig {
    [key: string]: ConfigValue;
}

// never written as config keys
const RESERVED = new Set(['__proto__', 'constructor', 'prototype']);

const isMapping = (value: ConfigValue | undefined): value is QueryConfig => typeof value === 'object' && value !== null;

/**
 * Decode a raw query string (with or without the leading "?") into a nested mapping.
 * Leaf values stay strings. The first value of a repeated key wins, empty values are skipped.
 */
export function parseQueryConfig(query: string): QueryConfig {
    const config: QueryConfig = {};
    const seen = new Set<string>();

    for (const [key, value] of new URLSearchParams(query.startsWith('?') ? query.slice(1) : query)) {
        if (!key || !value || seen.has(key)) continue;
        seen.add(key);

        const path = key.split('.');
        if (path.some((segment) => RESERVED.has(segment))) continue;

        const leaf = path.pop() ?? key;
        let current = config;
        for (const segment of path) {
            const next = current[segment];
            if (isMapping(next)) {
                current = next;
            } else {
                const created: QueryConfig = {};
                current[segment] = created;
                current = created;
            }
        }
        current[leaf] = value;
    }

    return config;
}

/** Deep copy, so callers never share nested mappings with the store. */
export function cloneConfig(config: QueryConfig): QueryConfig {
    return structuredClone(config);
}

/**
 * Process-wide configuration assembled from the query strings of incoming requests.
 * Merges replace top-level keys (last writer wins). Every mutation and read is a single
 * synchronous step, so concurrent requests interleave only between whole merges.
 */
export class ConfigStore {
    private _config: QueryConfig;

    constructor(initial: QueryConfig = {}) {
        this._config = cloneConfig(initial);
    }

    /**
     * Merge a parsed query into the store. Returns the keys that were written.
     */
    merge(partial: QueryConfig): string[] {
        const keys = Object.keys(partial);
        if (keys.length) {
            this._config = { ...this._config, ...cloneConfig(partial) };
        }
        return keys;
    }

    /**
     * Parse and merge a raw query string. An empty query leaves the store untouched.
     */
    mergeQuery(query: string): string[] {
        return query ? this.merge(parseQueryConfig(query)) : [];
    }

    snapshot(): QueryConfig {
        return cloneConfig(this._config);
    }

    /** A top-level string value, undefined when missing or nested. */
    getString(key: string): string | undefined {
        const value = this._config[key];
        return typeof value === 'string' ? value : undefined;
    }

    clear(): void {
        this._config = {};
    }
}
