import {
    chunksOfType,
    decodeParseResponse,
    hasFailedPages,
    resolveSplitChunks,
} from '../../src/services/ade/response.js';
import { ChunkType, GroundingType, isChunkType, isGroundingType } from '../../src/services/ade/types.js';
import { DecodingError } from '../../src/core/exceptions.js';
import { readFixture } from './helpers/fake-http.js';

const body = readFixture('parse-response.json');

describe('decodeParseResponse', () => {
    it('keeps chunks in document order with their grounding', () => {
        const response = decodeParseResponse(body);

        expect(response.markdown).toBe('# Invoice\n\nTotal: 120.00\n\nSigned');
        expect(response.chunks.map((chunk) => chunk.id)).toEqual(['c-1', 'c-2', 'c-3']);
        expect(response.chunks[2]).toEqual({
            markdown: 'Signed',
            type: 'attestation',
            id: 'c-3',
            grounding: { box: { left: 0.6, top: 0.8, right: 0.95, bottom: 0.9 }, page: 1 },
        });
    });

    it('decodes splits and the grounding map', () => {
        const response = decodeParseResponse(body);

        expect(response.splits[0]).toEqual({
            class: 'page',
            identifier: 'page_0',
            pages: [0],
            markdown: '# Invoice\n\nTotal: 120.00',
            chunks: ['c-1', 'c-2'],
        });
        expect(Object.keys(response.grounding).sort()).toEqual(['c-1', 'c-2-cell-0']);
        expect(response.grounding['c-2-cell-0']).toEqual({
            box: { left: 0.1, top: 0.3, right: 0.5, bottom: 0.4 },
            page: 0,
            type: 'tableCell',
        });
    });

    it('fills missing collections and leaves optional metadata out', () => {
        const response = decodeParseResponse(
            JSON.stringify({
                markdown: 'hello',
                chunks: [],
                splits: null,
                metadata: {
                    filename: 'a.pdf',
                    org_id: null,
                    page_count: 1,
                    duration_ms: 10,
                    credit_usage: 1,
                    job_id: 'job-1',
                },
            })
        );

        expect(response.splits).toEqual([]);
        expect(response.grounding).toEqual({});
        expect(response.metadata).toEqual({
            filename: 'a.pdf',
            pageCount: 1,
            durationMs: 10,
            creditUsage: 1,
            jobId: 'job-1',
        });
    });

    it('keeps chunk types outside the known vocabulary', () => {
        const response = decodeParseResponse(
            JSON.stringify({ chunks: [{ markdown: '', type: 'stamp', id: 'x', grounding: { box: {}, page: 0 } }] })
        );

        expect(response.chunks[0].type).toBe('stamp');
        expect(response.chunks[0].grounding.box).toEqual({ left: 0, top: 0, right: 0, bottom: 0 });
    });

    it('rejects a body that is not an object', () => {
        expect(() => decodeParseResponse('[]')).toThrow(DecodingError);
    });

    it('keeps the offending body on the error', () => {
        try {
            decodeParseResponse('not json');
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(DecodingError);
            expect(error instanceof DecodingError && error.body).toBe('not json');
        }
    });
});

describe('response helpers', () => {
    const response = decodeParseResponse(body);

    it('resolves split chunk ids and skips unknown ones', () => {
        expect(resolveSplitChunks(response, response.splits[0]).map((chunk) => chunk.id)).toEqual(['c-1', 'c-2']);
        expect(resolveSplitChunks(response, response.splits[1]).map((chunk) => chunk.id)).toEqual(['c-3']);
    });

    it('filters chunks by type', () => {
        expect(chunksOfType(response, ChunkType.Table).map((chunk) => chunk.id)).toEqual(['c-2']);
        expect(chunksOfType(response, ChunkType.Logo)).toEqual([]);
    });

    it('reports failed pages only when some are listed', () => {
        expect(hasFailedPages(response.metadata)).toBe(false);
        expect(hasFailedPages({ ...response.metadata, failedPages: [3] })).toBe(true);
        expect(hasFailedPages({ ...response.metadata, failedPages: undefined })).toBe(false);
    });

    it('recognises the type vocabularies', () => {
        expect(isChunkType('scan_code')).toBe(true);
        expect(isChunkType('chunkText')).toBe(false);
        expect(isGroundingType(GroundingType.TableCell)).toBe(true);
        expect(isGroundingType('text')).toBe(false);
    });
});
