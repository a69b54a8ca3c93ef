/**
 * Client for the ADE document parsing API.
 *
 * Usage:
 *   import { AdeClient, Region, withRegion } from 'ade-parse-client';
 *
 *   const client = new AdeClient(apiKey, withRegion(Region.EU));
 *   const result = await client.parse(signal).withFile('invoice.pdf').withPageSplit().execute();
 */

export * from './services/ade/index.js';

export {
    AdeError,
    ConfigurationError,
    TransportError,
    DecodingError,
} from './core/exceptions.js';

export { loadConfig, getConfig, resetConfig, LOG_LEVELS } from './core/config.js';
export type { AdeConfig, AppConfig, LogLevelName } from './core/config.js';

export { Logger, LogLevel, getLogger, logger, parseLogLevel } from './core/logging.js';
