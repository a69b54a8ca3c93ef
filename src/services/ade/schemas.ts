/**
 * Wire schemas for parse responses and validation error bodies.
 *
 * Missing fields decode to empty values, mismatched types are rejected.
 *
 * @module ade/schemas
 */

import { z } from 'zod';
import type { ParseMetadata } from './types.js';

const boxSchema = z.object({
    left: z.number().default(0),
    top: z.number().default(0),
    right: z.number().default(0),
    bottom: z.number().default(0),
});

const groundingSchema = z.object({
    box: boxSchema.default({}),
    page: z.number().int().default(0),
});

const chunkSchema = z.object({
    markdown: z.string().default(''),
    type: z.string().default(''),
    id: z.string().default(''),
    grounding: groundingSchema.default({}),
});

const splitSchema = z.object({
    class: z.string().default(''),
    identifier: z.string().default(''),
    pages: z.array(z.number().int()).nullish().transform((pages) => pages ?? []),
    markdown: z.string().default(''),
    chunks: z.array(z.string()).nullish().transform((ids) => ids ?? []),
});

const responseGroundingSchema = groundingSchema.extend({
    type: z.string().default(''),
});

const metadataSchema = z
    .object({
        filename: z.string().default(''),
        org_id: z.string().nullish(),
        page_count: z.number().int().default(0),
        duration_ms: z.number().int().default(0),
        credit_usage: z.number().default(0),
        job_id: z.string().default(''),
        version: z.string().nullish(),
        failed_pages: z.array(z.number().int()).nullish(),
    })
    .transform((raw): ParseMetadata => {
        const metadata: ParseMetadata = {
            filename: raw.filename,
            pageCount: raw.page_count,
            durationMs: raw.duration_ms,
            creditUsage: raw.credit_usage,
            jobId: raw.job_id,
        };
        if (raw.org_id != null) {
            metadata.orgId = raw.org_id;
        }
        if (raw.version != null) {
            metadata.version = raw.version;
        }
        if (raw.failed_pages != null) {
            metadata.failedPages = raw.failed_pages;
        }
        return metadata;
    });

export const parseResponseSchema = z.object({
    markdown: z.string().default(''),
    chunks: z.array(chunkSchema).nullish().transform((chunks) => chunks ?? []),
    splits: z.array(splitSchema).nullish().transform((splits) => splits ?? []),
    grounding: z
        .record(responseGroundingSchema)
        .nullish()
        .transform((grounding) => grounding ?? {}),
    metadata: metadataSchema.default({}),
});

export const validationErrorSchema = z.object({
    loc: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).default([]),
    msg: z.string().default(''),
    type: z.string().default(''),
});

/**
 * Body of a 422 from request validation: `{ detail: [{ loc, msg, type }] }`
 */
export const validationErrorsBodySchema = z.object({
    detail: z.array(validationErrorSchema),
});
