/**
 * Decoding of success bodies and lookups over a decoded response.
 *
 * @module ade/response
 */

import type { z } from 'zod';
import { DecodingError, describeError } from '../../core/exceptions.js';
import { parseResponseSchema } from './schemas.js';
import type { Chunk, ChunkType, ParseMetadata, ParseResponse, Split } from './types.js';

function formatIssues(error: z.ZodError): string {
    return error.errors
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Decode a 2xx body. Invalid JSON and unexpected shapes both throw
 * `DecodingError` carrying the body.
 */
export function decodeParseResponse(body: string): ParseResponse {
    let raw: unknown;
    try {
        raw = JSON.parse(body);
    } catch (error) {
        throw new DecodingError(`failed to parse response: ${describeError(error)}`, body, error);
    }

    const result = parseResponseSchema.safeParse(raw);
    if (!result.success) {
        throw new DecodingError(`failed to parse response: ${formatIssues(result.error)}`, body, result.error);
    }
    return result.data;
}

/**
 * Chunks referenced by a split, in split order. Ids with no chunk are skipped.
 */
export function resolveSplitChunks(response: ParseResponse, split: Split): Chunk[] {
    const byId = new Map<string, Chunk>(response.chunks.map((chunk): [string, Chunk] => [chunk.id, chunk]));
    const chunks: Chunk[] = [];
    for (const id of split.chunks) {
        const chunk = byId.get(id);
        if (chunk) {
            chunks.push(chunk);
        }
    }
    return chunks;
}

export function chunksOfType(response: ParseResponse, type: ChunkType): Chunk[] {
    return response.chunks.filter((chunk) => chunk.type === type);
}

export function hasFailedPages(metadata: ParseMetadata): boolean {
    return (metadata.failedPages?.length ?? 0) > 0;
}
