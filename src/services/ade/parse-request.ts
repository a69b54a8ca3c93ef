/**
 * Parse Request Builder
 *
 * Collects the document source and options for one call to the parse
 * endpoint, then sends it as multipart/form-data. A builder is meant for a
 * single `execute()`; nothing is reset afterwards.
 *
 * @module ade/parse-request
 */

import * as fs from 'fs';
import * as path from 'path';
import axios, { type AxiosResponse } from 'axios';
import FormData from 'form-data';
import { getLogger } from '../../core/logging.js';
import { ConfigurationError, TransportError, describeError } from '../../core/exceptions.js';
import type { AdeClient } from './client.js';
import { classifyErrorResponse } from './errors.js';
import { decodeParseResponse } from './response.js';
import {
    DEFAULT_MIME_TYPE,
    FORM_FIELDS,
    MIME_TYPES,
    PARSE_ENDPOINT,
    SplitType,
    type ParseResponse,
} from './types.js';

const logger = getLogger('ade.parse');

/**
 * Content type for an uploaded file, by extension
 */
export function getMimeType(filename: string): string {
    const ext = path.extname(filename).toLowerCase();
    return MIME_TYPES[ext] ?? DEFAULT_MIME_TYPE;
}

function escapeQuotes(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Part header for an uploaded file. form-data rewrites names passed as
 * `filename` or `filepath`, so the header is written out to send the name
 * unchanged, with `\` and `"` escaped.
 */
export function fileFieldHeader(boundary: string, field: string, filename: string): string {
    return (
        `--${boundary}\r\n` +
        `Content-Disposition: form-data; name="${escapeQuotes(field)}"; filename="${escapeQuotes(filename)}"\r\n` +
        `Content-Type: ${getMimeType(filename)}\r\n\r\n`
    );
}

interface FilePayload {
    data: Buffer;
    filename: string;
}

function readBody(data: unknown): string {
    if (typeof data === 'string') {
        return data;
    }
    if (Buffer.isBuffer(data)) {
        return data.toString('utf8');
    }
    if (data === undefined || data === null) {
        return '';
    }
    return JSON.stringify(data);
}

function toTransportError(error: unknown): TransportError {
    if (axios.isCancel(error)) {
        return new TransportError('parse request was canceled', error);
    }
    if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
        return new TransportError(`parse request timed out: ${error.message}`, error);
    }
    return new TransportError(`failed to execute request: ${describeError(error)}`, error);
}

export class ParseRequestBuilder {
    private model?: string;
    private documentUrl?: string;
    private filePath = '';
    private fileData?: Buffer;
    private fileName = '';
    private split?: SplitType;

    constructor(
        private readonly client: AdeClient,
        private readonly signal?: AbortSignal
    ) {}

    /**
     * Model version, e.g. "dpt-2-latest" or "dpt-2-20250919"
     */
    withModel(model: string): this {
        this.model = model;
        return this;
    }

    /**
     * Parse a document the service downloads itself
     */
    withUrl(url: string): this {
        this.documentUrl = url;
        return this;
    }

    /**
     * Upload the file at `filePath`; the part is named after its base name
     */
    withFile(filePath: string): this {
        this.filePath = filePath;
        return this;
    }

    /**
     * Upload bytes already in memory. Takes precedence over `withFile`.
     */
    withFileData(data: Uint8Array, filename: string): this {
        this.fileData = Buffer.isBuffer(data) ? data : Buffer.from(data);
        this.fileName = filename;
        return this;
    }

    withSplit(split: SplitType): this {
        this.split = split;
        return this;
    }

    withPageSplit(): this {
        return this.withSplit(SplitType.Page);
    }

    /**
     * Send the request and decode the result.
     *
     * @throws {ConfigurationError} no document source, or a URL and a file together
     * @throws {TransportError} the file could not be read, or the HTTP call failed or was aborted
     * @throws {APIError} non-2xx response
     * @throws {ValidationErrors} 422 with a field-level validation body
     * @throws {DecodingError} 2xx body that is not a parse response
     */
    async execute(): Promise<ParseResponse> {
        this.validate();

        const form = await this.buildForm();
        const url = `${this.client.baseUrl}${PARSE_ENDPOINT}`;

        logger.debug('Dispatching parse request', {
            url,
            source: this.documentUrl !== undefined ? 'url' : 'file',
            model: this.model,
            split: this.split,
        });

        let response: AxiosResponse<unknown>;
        try {
            response = await this.client.httpClient.post<unknown>(url, form.getBuffer(), {
                headers: {
                    Authorization: `Bearer ${this.client.apiKey}`,
                    ...form.getHeaders(),
                },
                signal: this.signal,
                responseType: 'text',
                validateStatus: () => true,
                maxBodyLength: Infinity,
                maxContentLength: Infinity,
            });
        } catch (error) {
            throw toTransportError(error);
        }

        const body = readBody(response.data);
        logger.debug(`Parse response received with status ${response.status}`, { bytes: body.length });

        if (response.status < 200 || response.status >= 300) {
            throw classifyErrorResponse(response.status, body);
        }

        return decodeParseResponse(body);
    }

    private hasFile(): boolean {
        return this.filePath !== '' || this.fileData !== undefined;
    }

    private validate(): void {
        if (this.documentUrl !== undefined && this.hasFile()) {
            throw new ConfigurationError('cannot provide both document URL and file');
        }
        if (this.documentUrl === undefined && !this.hasFile()) {
            throw new ConfigurationError('must provide either document URL or file');
        }
    }

    private async resolveFile(): Promise<FilePayload> {
        if (this.fileData !== undefined) {
            return { data: this.fileData, filename: this.fileName };
        }

        try {
            const data = await fs.promises.readFile(this.filePath);
            return { data, filename: path.basename(this.filePath) };
        } catch (error) {
            throw new TransportError(`failed to read file: ${describeError(error)}`, error);
        }
    }

    private async buildForm(): Promise<FormData> {
        const form = new FormData();

        if (this.documentUrl !== undefined) {
            form.append(FORM_FIELDS.documentUrl, this.documentUrl);
        } else {
            const file = await this.resolveFile();
            form.append(FORM_FIELDS.document, file.data, {
                header: fileFieldHeader(form.getBoundary(), FORM_FIELDS.document, file.filename),
            });
        }

        if (this.model !== undefined) {
            form.append(FORM_FIELDS.model, this.model);
        }
        if (this.split !== undefined) {
            form.append(FORM_FIELDS.split, this.split);
        }

        return form;
    }
}
