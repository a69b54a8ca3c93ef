/**
 * ADE Client
 *
 * Holds the credential, endpoint and HTTP client shared by parse requests.
 * Options are applied in the order given, so a later `withBaseUrl` beats an
 * earlier `withRegion` and the other way round.
 *
 * @module ade/client
 */

import axios, { type AxiosInstance } from 'axios';
import { getConfig, type AdeConfig } from '../../core/config.js';
import { ConfigurationError } from '../../core/exceptions.js';
import { ParseRequestBuilder } from './parse-request.js';
import { DEFAULT_REGION, getBaseUrl, parseRegion, type Region } from './regions.js';
import { DEFAULT_TIMEOUT_MS } from './types.js';

/**
 * Mutable state that options write to while the client is constructed
 */
export interface ClientSettings {
    region: Region;
    baseUrl: string;
    httpClient: AxiosInstance;
}

export type ClientOption = (settings: ClientSettings) => void;

/**
 * Use a region's endpoint
 */
export function withRegion(region: Region): ClientOption {
    return (settings) => {
        settings.region = region;
        settings.baseUrl = getBaseUrl(region);
    };
}

/**
 * Use a custom endpoint, e.g. a proxy or a test server
 */
export function withBaseUrl(baseUrl: string): ClientOption {
    return (settings) => {
        settings.baseUrl = baseUrl;
    };
}

/**
 * Replace the default axios instance
 */
export function withHttpClient(httpClient: AxiosInstance): ClientOption {
    return (settings) => {
        settings.httpClient = httpClient;
    };
}

/**
 * Set the request timeout on the HTTP client active when the option runs
 */
export function withTimeout(timeoutMs: number): ClientOption {
    return (settings) => {
        settings.httpClient.defaults.timeout = timeoutMs;
    };
}

export function createHttpClient(timeoutMs: number = DEFAULT_TIMEOUT_MS): AxiosInstance {
    return axios.create({ timeout: timeoutMs });
}

export class AdeClient {
    readonly apiKey: string;
    private readonly settings: Readonly<ClientSettings>;

    constructor(apiKey: string, ...options: ClientOption[]) {
        const settings: ClientSettings = {
            region: DEFAULT_REGION,
            baseUrl: '',
            httpClient: createHttpClient(),
        };

        for (const option of options) {
            option(settings);
        }

        if (!settings.baseUrl) {
            settings.baseUrl = getBaseUrl(settings.region);
        }

        this.apiKey = apiKey;
        this.settings = settings;
    }

    /**
     * Build a client from environment configuration
     */
    static fromConfig(adeConfig: AdeConfig = getConfig().ade): AdeClient {
        if (!adeConfig.apiKey) {
            throw new ConfigurationError('ADE_API_KEY is required');
        }

        const options: ClientOption[] = [withRegion(parseRegion(adeConfig.region))];
        if (adeConfig.baseUrl) {
            options.push(withBaseUrl(adeConfig.baseUrl));
        }
        options.push(withTimeout(adeConfig.timeoutMs));

        return new AdeClient(adeConfig.apiKey, ...options);
    }

    get baseUrl(): string {
        return this.settings.baseUrl;
    }

    get region(): Region {
        return this.settings.region;
    }

    get httpClient(): AxiosInstance {
        return this.settings.httpClient;
    }

    /** Milliseconds; 0 means no timeout */
    get timeout(): number {
        return this.settings.httpClient.defaults.timeout ?? 0;
    }

    /**
     * Start a parse request. Aborting `signal` cancels the HTTP call.
     */
    parse(signal?: AbortSignal): ParseRequestBuilder {
        return new ParseRequestBuilder(this, signal);
    }
}
