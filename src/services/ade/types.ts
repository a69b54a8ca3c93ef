/**
 * ADE Parse Types
 *
 * Records decoded from the parse endpoint, plus the vocabularies and wire
 * constants the client uses.
 *
 * @module ade/types
 */

/**
 * HTTP status codes the client gives meaning to
 */
export const HttpStatus = {
    OK: 200,
    PartialContent: 206,
    BadRequest: 400,
    Unauthorized: 401,
    PaymentRequired: 402,
    UnprocessableEntity: 422,
    TooManyRequests: 429,
    InternalServerError: 500,
    GatewayTimeout: 504,
} as const;

export const PARSE_ENDPOINT = '/v1/ade/parse';

/** 300 seconds */
export const DEFAULT_TIMEOUT_MS = 300_000;

/**
 * Multipart field names understood by the parse endpoint
 */
export const FORM_FIELDS = {
    documentUrl: 'document_url',
    document: 'document',
    model: 'model',
    split: 'split',
} as const;

export const ChunkType = {
    Text: 'text',
    Table: 'table',
    Marginalia: 'marginalia',
    Figure: 'figure',
    Logo: 'logo',
    Card: 'card',
    Attestation: 'attestation',
    ScanCode: 'scan_code',
} as const;

export type ChunkType = (typeof ChunkType)[keyof typeof ChunkType];

export const SplitType = {
    Page: 'page',
} as const;

export type SplitType = (typeof SplitType)[keyof typeof SplitType];

/**
 * Structural role of a box in the response-level grounding map
 */
export const GroundingType = {
    ChunkLogo: 'chunkLogo',
    ChunkCard: 'chunkCard',
    ChunkAttestation: 'chunkAttestation',
    ChunkScanCode: 'chunkScanCode',
    ChunkForm: 'chunkForm',
    ChunkTable: 'chunkTable',
    ChunkFigure: 'chunkFigure',
    ChunkText: 'chunkText',
    ChunkMarginalia: 'chunkMarginalia',
    ChunkTitle: 'chunkTitle',
    ChunkPageHeader: 'chunkPageHeader',
    ChunkPageFooter: 'chunkPageFooter',
    ChunkPageNumber: 'chunkPageNumber',
    ChunkKeyValue: 'chunkKeyValue',
    Table: 'table',
    TableCell: 'tableCell',
} as const;

export type GroundingType = (typeof GroundingType)[keyof typeof GroundingType];

const CHUNK_TYPES: ReadonlySet<string> = new Set(Object.values(ChunkType));
const GROUNDING_TYPES: ReadonlySet<string> = new Set(Object.values(GroundingType));

export function isChunkType(value: string): value is ChunkType {
    return CHUNK_TYPES.has(value);
}

export function isGroundingType(value: string): value is GroundingType {
    return GROUNDING_TYPES.has(value);
}

/**
 * Bounding box in relative page coordinates (0 to 1)
 */
export interface GroundingBox {
    left: number;
    top: number;
    right: number;
    bottom: number;
}

export interface ChunkGrounding {
    box: GroundingBox;
    page: number;            // zero-indexed
}

export interface ResponseGrounding extends ChunkGrounding {
    type: GroundingType | string;
}

export interface Chunk {
    markdown: string;
    type: ChunkType | string;
    id: string;
    grounding: ChunkGrounding;
}

export interface Split {
    class: string;
    identifier: string;
    pages: number[];
    markdown: string;
    chunks: string[];        // chunk ids
}

export interface ParseMetadata {
    filename: string;
    orgId?: string;
    pageCount: number;
    durationMs: number;
    creditUsage: number;
    jobId: string;
    version?: string;
    failedPages?: number[];
}

export interface ParseResponse {
    markdown: string;
    chunks: Chunk[];
    splits: Split[];
    grounding: Record<string, ResponseGrounding>;
    metadata: ParseMetadata;
}

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * MIME types sent with uploaded documents, by extension
 */
export const MIME_TYPES: Record<string, string> = {
    '.pdf': 'application/pdf',
    '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    '.doc': 'application/msword',
    '.pptx': 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
    '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.gif': 'image/gif',
    '.bmp': 'image/bmp',
    '.tif': 'image/tiff',
    '.tiff': 'image/tiff',
    '.webp': 'image/webp',
};

export const DEFAULT_MIME_TYPE = 'application/octet-stream';
