/**
 * API error types and the status-code classifier.
 *
 * @module ade/errors
 */

import { AdeError } from '../../core/exceptions.js';
import { validationErrorsBodySchema } from './schemas.js';
import { HttpStatus, type JsonValue } from './types.js';

/**
 * What an error body carried besides its status:
 * - `none`: a JSON object without a `detail` field, or a JSON null
 * - `json`: the `detail` field of a JSON object body
 * - `raw`: the body text, when it was not a JSON object
 */
export type ErrorDetail =
    | { kind: 'none' }
    | { kind: 'json'; value: JsonValue }
    | { kind: 'raw'; text: string };

export const NO_DETAIL: ErrorDetail = { kind: 'none' };

export function formatDetail(detail: ErrorDetail): string | undefined {
    switch (detail.kind) {
        case 'none':
            return undefined;
        case 'raw':
            return detail.text;
        case 'json':
            return typeof detail.value === 'string' ? detail.value : JSON.stringify(detail.value);
    }
}

/**
 * User-facing message for common status codes
 */
export function getErrorMessage(statusCode: number): string {
    switch (statusCode) {
        case HttpStatus.BadRequest:
            return 'Bad request: Invalid request parameters';
        case HttpStatus.Unauthorized:
            return 'Unauthorized: Invalid or missing API key';
        case HttpStatus.PaymentRequired:
            return 'Payment required: Insufficient credits';
        case HttpStatus.UnprocessableEntity:
            return 'Unprocessable entity: Input validation failed';
        case HttpStatus.TooManyRequests:
            return 'Too many requests: Rate limit exceeded';
        case HttpStatus.InternalServerError:
            return 'Internal server error: Failed to process document';
        case HttpStatus.GatewayTimeout:
            return 'Gateway timeout: Request processing exceeded time limit';
        default:
            return `API request failed with status ${statusCode}`;
    }
}

/**
 * Non-2xx response from the parse API
 */
export class APIError extends AdeError {
    readonly statusCode: number;
    readonly apiMessage: string;
    readonly detail: ErrorDetail;

    constructor(statusCode: number, apiMessage: string = getErrorMessage(statusCode), detail: ErrorDetail = NO_DETAIL) {
        const rendered = formatDetail(detail);
        super(
            rendered === undefined
                ? `ADE API error (status ${statusCode}): ${apiMessage}`
                : `ADE API error (status ${statusCode}): ${apiMessage} - ${rendered}`
        );
        this.statusCode = statusCode;
        this.apiMessage = apiMessage;
        this.detail = detail;
    }

    isUnauthorized(): boolean {
        return this.statusCode === HttpStatus.Unauthorized;
    }

    isPaymentRequired(): boolean {
        return this.statusCode === HttpStatus.PaymentRequired;
    }

    isRateLimited(): boolean {
        return this.statusCode === HttpStatus.TooManyRequests;
    }

    isBadRequest(): boolean {
        return this.statusCode === HttpStatus.BadRequest;
    }

    /** 422 by status, whatever the body looked like */
    isValidationError(): boolean {
        return this.statusCode === HttpStatus.UnprocessableEntity;
    }

    isServerError(): boolean {
        return this.statusCode >= HttpStatus.InternalServerError;
    }

    isTimeout(): boolean {
        return this.statusCode === HttpStatus.GatewayTimeout;
    }

    // 206 is inside the success range and never reaches the classifier.
    isPartialContent(): boolean {
        return this.statusCode === HttpStatus.PartialContent;
    }
}

export interface ValidationError {
    loc: Array<string | number | boolean | null>;
    msg: string;
    type: string;
}

/**
 * Field-level failures from a 422 with a `{ detail: [...] }` body
 */
export class ValidationErrors extends AdeError {
    readonly statusCode = HttpStatus.UnprocessableEntity;
    readonly detail: ValidationError[];

    constructor(detail: ValidationError[]) {
        super(detail.length === 0 ? 'validation error' : `validation error: ${detail[0].msg}`);
        this.detail = detail;
    }
}

function parseJson(text: string): { ok: true; value: JsonValue } | { ok: false } {
    try {
        const value: JsonValue = JSON.parse(text);
        return { ok: true, value };
    } catch {
        return { ok: false };
    }
}

function extractDetail(body: string): ErrorDetail {
    const parsed = parseJson(body);
    if (!parsed.ok) {
        return { kind: 'raw', text: body };
    }
    const value = parsed.value;
    // a JSON null decodes as an empty object
    if (value === null) {
        return NO_DETAIL;
    }
    if (typeof value !== 'object' || Array.isArray(value)) {
        return { kind: 'raw', text: body };
    }
    const detail = value['detail'];
    return detail === undefined || detail === null ? NO_DETAIL : { kind: 'json', value: detail };
}

function parseValidationErrors(body: string): ValidationErrors | undefined {
    const parsed = parseJson(body);
    if (!parsed.ok) {
        return undefined;
    }
    const result = validationErrorsBodySchema.safeParse(parsed.value);
    return result.success ? new ValidationErrors(result.data.detail) : undefined;
}

/**
 * Turn a non-2xx status and its body into the error the caller receives
 */
export function classifyErrorResponse(statusCode: number, body: string): APIError | ValidationErrors {
    if (statusCode === HttpStatus.UnprocessableEntity) {
        const validationErrors = parseValidationErrors(body);
        if (validationErrors) {
            return validationErrors;
        }
    }
    return new APIError(statusCode, getErrorMessage(statusCode), extractDetail(body));
}
