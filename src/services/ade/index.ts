/**
 * ADE Parse Module
 *
 * Client, request builder, response records and error classification for
 * the document parsing endpoint.
 *
 * @module ade
 */

// Types
export {
    HttpStatus,
    PARSE_ENDPOINT,
    DEFAULT_TIMEOUT_MS,
    FORM_FIELDS,
    ChunkType,
    SplitType,
    GroundingType,
    MIME_TYPES,
    DEFAULT_MIME_TYPE,
    isChunkType,
    isGroundingType,
} from './types.js';

export type {
    GroundingBox,
    ChunkGrounding,
    ResponseGrounding,
    Chunk,
    Split,
    ParseMetadata,
    ParseResponse,
    JsonValue,
} from './types.js';

// Regions
export { Region, DEFAULT_REGION, getBaseUrl, parseRegion } from './regions.js';

// Errors
export {
    APIError,
    ValidationErrors,
    NO_DETAIL,
    classifyErrorResponse,
    formatDetail,
    getErrorMessage,
} from './errors.js';

export type { ErrorDetail, ValidationError } from './errors.js';

// Response decoding
export {
    decodeParseResponse,
    resolveSplitChunks,
    chunksOfType,
    hasFailedPages,
} from './response.js';

// Client
export {
    AdeClient,
    createHttpClient,
    withRegion,
    withBaseUrl,
    withHttpClient,
    withTimeout,
} from './client.js';

export type { ClientOption, ClientSettings } from './client.js';

export { ParseRequestBuilder, getMimeType } from './parse-request.js';
