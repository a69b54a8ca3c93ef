/**
 * Parse Document Script
 *
 * Parses a local file or a URL with the client configured from the
 * environment (ADE_API_KEY, ADE_REGION, ADE_BASE_URL, ADE_TIMEOUT_MS).
 *
 * Usage:
 *   npm run example -- ./invoice.pdf [--model dpt-2-latest] [--split]
 *   npm run example -- https://example.com/report.pdf
 */

import dotenv from 'dotenv';
import {
    AdeClient,
    APIError,
    ValidationErrors,
    TransportError,
    resolveSplitChunks,
    hasFailedPages,
    getConfig,
    logger,
    parseLogLevel,
} from '../src/index.js';

dotenv.config();
logger.setLevel(parseLogLevel(getConfig().logLevel));

interface CliArgs {
    source: string;
    model?: string;
    split: boolean;
}

function parseArgs(argv: string[]): CliArgs | null {
    const [source, ...rest] = argv;
    if (!source) {
        return null;
    }

    const args: CliArgs = { source, split: false };
    for (let i = 0; i < rest.length; i++) {
        if (rest[i] === '--split') {
            args.split = true;
        } else if (rest[i] === '--model' && rest[i + 1]) {
            args.model = rest[++i];
        }
    }
    return args;
}

async function parseDocument(args: CliArgs): Promise<void> {
    const client = AdeClient.fromConfig();
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const request = client.parse(controller.signal);
    if (/^https?:\/\//i.test(args.source)) {
        request.withUrl(args.source);
    } else {
        request.withFile(args.source);
    }
    if (args.model) {
        request.withModel(args.model);
    }
    if (args.split) {
        request.withPageSplit();
    }

    console.log(`\nParsing ${args.source} via ${client.baseUrl} ...\n`);

    const result = await request.execute();
    const { metadata } = result;

    console.log(`   File:     ${metadata.filename}`);
    console.log(`   Pages:    ${metadata.pageCount} in ${metadata.durationMs} ms`);
    console.log(`   Credits:  ${metadata.creditUsage.toFixed(2)}`);
    console.log(`   Chunks:   ${result.chunks.length}`);
    if (metadata.version) {
        console.log(`   Model:    ${metadata.version}`);
    }
    if (hasFailedPages(metadata)) {
        console.log(`   Failed:   pages ${metadata.failedPages?.join(', ')}`);
    }

    result.splits.forEach((split, i) => {
        const chunks = resolveSplitChunks(result, split);
        console.log(`   Split ${i}: pages [${split.pages.join(', ')}], ${chunks.length} chunks`);
    });

    console.log(`\n${result.markdown.slice(0, 300)}${result.markdown.length > 300 ? '...' : ''}\n`);
}

function reportError(error: unknown): void {
    if (error instanceof ValidationErrors) {
        logger.error('Request rejected by validation', undefined, error.detail);
    } else if (error instanceof APIError) {
        logger.error(`API error (status ${error.statusCode}): ${error.apiMessage}`);
        if (error.isUnauthorized()) {
            logger.error('  -> Invalid API key');
        } else if (error.isPaymentRequired()) {
            logger.error('  -> Insufficient credits');
        } else if (error.isRateLimited()) {
            logger.error('  -> Rate limit exceeded, try again later');
        }
    } else if (error instanceof TransportError) {
        logger.error(error.message, error.cause);
    } else {
        logger.error('Unexpected error', error);
    }
}

const args = parseArgs(process.argv.slice(2));
if (!args) {
    console.error('Usage: parse-document <file-or-url> [--model <model>] [--split]');
    process.exit(1);
}

parseDocument(args).catch((error: unknown) => {
    reportError(error);
    process.exit(1);
});
