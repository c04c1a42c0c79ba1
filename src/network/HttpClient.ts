import type { IncomingHttpHeaders } from "node:http";
import got, { type Got, type Request, type Response } from "got";
import { MAX_REDIRECTS } from "@/utils/constants";

export interface HttpClientOptions {
    connectTimeout: number;
    readTimeout: number;
    headers?: Record<string, string>;
    onRedirect?: (fromUrl: string, toUrl: string) => void;
}

export interface ByteRange {
    start: number;
    end: number | null;
}

export interface HeadResult {
    statusCode: number;
    headers: IncomingHttpHeaders;
    url: string;
}

/**
 * An open GET whose headers have arrived. The body has not been read yet;
 * iterate `body` or call `close()` to drop the connection.
 */
export interface RangeResponse {
    statusCode: number;
    headers: IncomingHttpHeaders;
    url: string;
    body: AsyncIterable<Buffer>;
    close(): void;
}

export function formatRangeHeader(range: ByteRange): string {
    return range.end === null ? `bytes=${range.start}-` : `bytes=${range.start}-${range.end}`;
}

export class HttpClient {
    private client: Got;

    constructor(options: HttpClientOptions) {
        this.client = got.extend({
            // Segment workers own retrying, so they can resume from the last written byte.
            retry: { limit: 0 },
            timeout: {
                connect: options.connectTimeout,
                socket: options.readTimeout,
            },
            headers: options.headers,
            followRedirect: true,
            maxRedirects: MAX_REDIRECTS,
            decompress: false,
            throwHttpErrors: false,
            hooks: {
                beforeRedirect: [
                    (nextOptions, response) => {
                        const fromUrl = String(response.url ?? "");
                        const toUrl = String(nextOptions.url ?? "");
                        if (fromUrl && toUrl && fromUrl !== toUrl)
                            options.onRedirect?.(fromUrl, toUrl);
                    },
                ],
            },
        });
    }

    async head(url: string, signal?: AbortSignal): Promise<HeadResult> {
        const response = await this.client.head(url, { signal });
        return { statusCode: response.statusCode, headers: response.headers, url: response.url };
    }

    /**
     * Issue a GET (ranged when `range` is given) and resolve once the
     * response headers are in.
     */
    async open(
        url: string,
        options: { range?: ByteRange; signal?: AbortSignal; headers?: Record<string, string> }
    ): Promise<RangeResponse> {
        const headers: Record<string, string> = { ...options.headers };
        if (options.range) headers.Range = formatRangeHeader(options.range);

        const request: Request = this.client.stream(url, {
            headers,
            signal: options.signal,
        });

        const response = await new Promise<Response>((resolve, reject) => {
            const onError = (error: unknown) => {
                request.off("response", onResponse);
                reject(error);
            };
            const onResponse = (incoming: Response) => {
                request.off("error", onError);
                resolve(incoming);
            };
            request.once("error", onError);
            request.once("response", onResponse);
        });

        // Errors raised before the body is iterated are replayed at the end of iteration.
        let streamError: unknown = null;
        request.on("error", (error: unknown) => {
            streamError = error;
        });

        async function* readBody(): AsyncGenerator<Buffer> {
            for await (const chunk of request) {
                yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
            }
            if (streamError) throw streamError;
        }

        return {
            statusCode: response.statusCode,
            headers: response.headers,
            url: response.url,
            body: readBody(),
            close: () => {
                if (!request.destroyed) request.destroy();
            },
        };
    }

    static isAbortError(error: unknown, signal?: AbortSignal): boolean {
        if (signal?.aborted) return true;
        if (!(error instanceof Error)) return false;

        const maybeCode = "code" in error ? error.code : undefined;
        return (
            error.name === "AbortError" ||
            maybeCode === "ABORT_ERR" ||
            maybeCode === "ERR_ABORTED" ||
            maybeCode === "ERR_CANCELED"
        );
    }
}
