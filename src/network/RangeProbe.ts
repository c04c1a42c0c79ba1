import type { IncomingHttpHeaders } from "node:http";
import { ProbeError, classifyError, redactCredentialUrls } from "@/errors";
import type { ProbeResult } from "@/types";
import { filenameFromContentDisposition } from "@/utils/common";
import { log } from "@/utils/logger";
import { HttpClient } from "./HttpClient";

const logger = log.child("RangeProbe");

export interface ContentRange {
    start: number | null;
    end: number | null;
    total: number | null;
}

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
    const value = headers[name];
    return Array.isArray(value) ? value[0] : value;
}

export function parseContentLength(headers: IncomingHttpHeaders): number | null {
    const raw = headerValue(headers, "content-length");
    if (raw === undefined || !/^\d+$/.test(raw.trim())) return null;
    return Number.parseInt(raw, 10);
}

/**
 * Parse `bytes 0-99/1000`, `bytes 0-99/*` and `bytes *\/1000`.
 */
export function parseContentRange(header: string | undefined): ContentRange | null {
    if (!header) return null;
    const match = /^bytes\s+(?:(\d+)-(\d+)|\*)\/(\d+|\*)$/i.exec(header.trim());
    if (!match) return null;

    return {
        start: match[1] !== undefined ? Number.parseInt(match[1], 10) : null,
        end: match[2] !== undefined ? Number.parseInt(match[2], 10) : null,
        total: match[3] !== "*" ? Number.parseInt(match[3], 10) : null,
    };
}

function acceptsByteRanges(headers: IncomingHttpHeaders): boolean {
    return (headerValue(headers, "accept-ranges") ?? "").toLowerCase().includes("bytes");
}

function isSuccess(statusCode: number): boolean {
    return statusCode >= 200 && statusCode < 400;
}

interface HeaderFacts {
    etag: string | null;
    lastModified: string | null;
    contentType: string | null;
    filename: string | null;
}

function readFacts(headers: IncomingHttpHeaders): HeaderFacts {
    return {
        etag: headerValue(headers, "etag") ?? null,
        lastModified: headerValue(headers, "last-modified") ?? null,
        contentType: headerValue(headers, "content-type") ?? null,
        filename: filenameFromContentDisposition(headerValue(headers, "content-disposition")),
    };
}

function buildResult(
    supportsRanges: boolean,
    totalSize: number | null,
    finalUrl: string,
    facts: HeaderFacts
): ProbeResult {
    return {
        supportsRanges: supportsRanges && totalSize !== null,
        totalSize,
        acceptsTimestampValidators: facts.etag !== null || facts.lastModified !== null,
        etag: facts.etag,
        lastModified: facts.lastModified,
        finalUrl,
        contentType: facts.contentType,
        filename: facts.filename,
    };
}

/**
 * Asks the server whether it serves byte ranges and how large the resource is.
 *
 * A HEAD is tried first. When it fails, or leaves either question open, a
 * `Range: bytes=0-0` GET settles it from the status code and Content-Range.
 * Conflicting sizes between the two answers yield a single-stream result
 * instead of an error.
 */
export class RangeProbe {
    constructor(private readonly client: HttpClient) {}

    async probe(url: string, signal?: AbortSignal): Promise<ProbeResult> {
        const headResult = await this.client.head(url, signal).then(
            result => result,
            (error: unknown) => {
                if (HttpClient.isAbortError(error, signal)) throw error;
                logger.debug(`HEAD failed for ${redactCredentialUrls(url)}: ${String(error)}`);
                return null;
            }
        );

        const headUsable = headResult !== null && isSuccess(headResult.statusCode);
        const headSize = headUsable ? parseContentLength(headResult.headers) : null;
        const headRanges = headUsable && acceptsByteRanges(headResult.headers);

        if (headUsable && headSize !== null && headRanges) {
            return buildResult(true, headSize, headResult.url, readFacts(headResult.headers));
        }

        let response;
        try {
            response = await this.client.open(url, { range: { start: 0, end: 0 }, signal });
        } catch (error) {
            if (HttpClient.isAbortError(error, signal)) throw error;
            if (headUsable) {
                // HEAD answered; trust it for a single-stream download.
                return buildResult(false, headSize, headResult.url, readFacts(headResult.headers));
            }
            throw new ProbeError(
                `Server unreachable: ${redactCredentialUrls(url)} (${classifyError(error).message})`,
                { cause: error }
            );
        }
        response.close();

        if (!isSuccess(response.statusCode)) {
            if (headUsable)
                return buildResult(false, headSize, headResult.url, readFacts(headResult.headers));
            throw new ProbeError(
                `Server answered HTTP ${response.statusCode} for ${redactCredentialUrls(url)}`
            );
        }

        const facts = readFacts(response.headers);

        if (response.statusCode === 206) {
            const contentRange = parseContentRange(headerValue(response.headers, "content-range"));
            const total = contentRange?.total ?? null;

            if (total === null) {
                logger.warn(`206 without a usable Content-Range total; using a single stream`);
                return buildResult(false, headSize, response.url, facts);
            }
            if (headSize !== null && headSize !== total) {
                logger.warn(
                    `Conflicting sizes (HEAD ${headSize}, Content-Range ${total}); using a single stream`
                );
                return buildResult(false, null, response.url, facts);
            }
            return buildResult(true, total, response.url, facts);
        }

        // 200: the range was ignored.
        const getSize = parseContentLength(response.headers);
        if (headSize !== null && getSize !== null && headSize !== getSize) {
            logger.warn(
                `Conflicting sizes (HEAD ${headSize}, GET ${getSize}); size treated as unknown`
            );
            return buildResult(false, null, response.url, facts);
        }
        return buildResult(false, getSize ?? headSize, response.url, facts);
    }
}
