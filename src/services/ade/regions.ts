/**
 * API regions and their fixed endpoints.
 *
 * @module ade/regions
 */

export const Region = {
    US: 'us',
    EU: 'eu',
} as const;

export type Region = (typeof Region)[keyof typeof Region];

export const DEFAULT_REGION: Region = Region.US;

const BASE_URLS: Record<Region, string> = {
    us: 'https://api.va.landing.ai',
    eu: 'https://api.va.eu-west-1.landing.ai',
};

function isRegion(value: string): value is Region {
    return Object.prototype.hasOwnProperty.call(BASE_URLS, value);
}

/**
 * Base URL for a region. Unknown or empty tags get the US endpoint.
 */
export function getBaseUrl(region: Region | string | undefined): string {
    return region && isRegion(region) ? BASE_URLS[region] : BASE_URLS[DEFAULT_REGION];
}

/**
 * Normalise a free-form region tag (e.g. from the environment)
 */
export function parseRegion(value: string | undefined): Region {
    const tag = value?.trim().toLowerCase() ?? '';
    return isRegion(tag) ? tag : DEFAULT_REGION;
}
