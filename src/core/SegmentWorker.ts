import { setTimeout as sleep } from "node:timers/promises";
import {
    PlanStaleError,
    RangeIgnoredError,
    TransientNetworkError,
    classifyError,
    httpStatusError,
    type DownloadError,
} from "@/errors";
import { HttpClient, parseContentRange, type ByteRange } from "@/network";
import type { SegmentWriter } from "@/storage";
import type { Segment, SegmentOutcome } from "@/types";
import { backoffDelay } from "@/utils/common";
import { log } from "@/utils/logger";
import { isSegmentComplete, segmentLength } from "./SegmentPlanner";

const logger = log.child("SegmentWorker");

export interface SegmentWorkerOptions {
    segment: Segment;
    url: string;
    client: HttpClient;
    writer: SegmentWriter;
    supportsRanges: boolean;
    retries: number;
    retryDelay: number;
    maxRetryDelay: number;
    signal: AbortSignal;
    headers?: Record<string, string>;
    onProgress: (delta: number) => void;
}

/**
 * Downloads one segment into its slice of the destination file.
 *
 * The segment object is owned by the task and updated in place:
 * `downloadedBytes` only ever counts bytes that have been written, so it is
 * the offset a retry or a later resume continues from.
 */
export class SegmentWorker {
    private readonly segment: Segment;
    private readonly signal: AbortSignal;

    constructor(private readonly options: SegmentWorkerOptions) {
        this.segment = options.segment;
        this.signal = options.signal;
    }

    async run(): Promise<SegmentOutcome> {
        const { segment } = this;
        segment.state = "inFlight";
        let attempt = 0;

        for (;;) {
            if (this.signal.aborted) return this.stopped();
            if (isSegmentComplete(segment)) return this.completed();

            try {
                await this.fetchOnce();
                if (this.signal.aborted) return this.stopped();
                return this.completed();
            } catch (error) {
                if (HttpClient.isAbortError(error, this.signal)) return this.stopped();

                const resolved = classifyError(error);
                if (!resolved.retriable || attempt >= this.options.retries)
                    return this.failed(resolved);

                attempt++;
                segment.retries++;
                const delay = backoffDelay(
                    attempt,
                    this.options.retryDelay,
                    this.options.maxRetryDelay
                );
                logger.debug(
                    `Segment ${segment.index}: ${resolved.message}; retry ${attempt}/${this.options.retries} in ${delay}ms from offset ${segment.downloadedBytes}`
                );

                try {
                    await sleep(delay, undefined, { signal: this.signal });
                } catch (sleepError) {
                    if (HttpClient.isAbortError(sleepError, this.signal)) return this.stopped();
                    throw sleepError;
                }
            }
        }
    }

    private async fetchOnce(): Promise<void> {
        const { segment } = this;
        const length = segmentLength(segment);

        // Without range support the only way to continue is from byte 0.
        if (!this.options.supportsRanges && segment.downloadedBytes > 0) this.discardProgress();

        const range: ByteRange | undefined = this.options.supportsRanges
            ? { start: segment.start + segment.downloadedBytes, end: segment.end }
            : undefined;

        const response = await this.options.client.open(this.options.url, {
            range,
            signal: this.signal,
            headers: this.options.headers,
        });

        try {
            if (response.statusCode === 206 && range) {
                const contentRange = parseContentRange(response.headers["content-range"]);
                if (
                    contentRange !== null &&
                    contentRange.start !== null &&
                    contentRange.start !== range.start
                ) {
                    throw new TransientNetworkError(
                        `Segment ${segment.index}: server sent bytes from ${contentRange.start}, asked for ${range.start}`
                    );
                }
                await this.consume(response.body, length);
                return;
            }

            if (response.statusCode === 200) {
                if (range) {
                    // Reading the full body per segment would fetch the file once per segment.
                    throw new RangeIgnoredError(
                        `Segment ${segment.index}: server answered 200 to a range request`
                    );
                }
                if (segment.downloadedBytes > 0) this.discardProgress();
                await this.consume(response.body, length);
                return;
            }

            if (response.statusCode === 416) {
                if (length !== null && segment.downloadedBytes >= length) return;
                throw new PlanStaleError(
                    `Segment ${segment.index}: range ${segment.start + segment.downloadedBytes}-${segment.end ?? ""} not satisfiable`
                );
            }

            throw httpStatusError(response.statusCode, this.options.url);
        } finally {
            response.close();
        }
    }

    private async consume(body: AsyncIterable<Buffer>, length: number | null): Promise<void> {
        const { segment } = this;

        for await (const chunk of body) {
            if (this.signal.aborted) return;

            let data = chunk;

            if (length !== null) {
                const remaining = length - segment.downloadedBytes;
                if (remaining <= 0) break;
                if (data.length > remaining) data = data.subarray(0, remaining);
            }

            await this.options.writer.write(segment.start + segment.downloadedBytes, data);
            segment.downloadedBytes += data.length;
            this.options.onProgress(data.length);

            if (length !== null && segment.downloadedBytes >= length) break;
        }

        if (this.signal.aborted) return;

        if (length !== null && segment.downloadedBytes < length) {
            throw new TransientNetworkError(
                `Segment ${segment.index}: connection closed at ${segment.downloadedBytes}/${length} bytes`
            );
        }
    }

    private discardProgress(): void {
        const lost = this.segment.downloadedBytes;
        if (lost === 0) return;
        this.segment.downloadedBytes = 0;
        this.options.onProgress(-lost);
    }

    private stopped(): SegmentOutcome {
        this.segment.state = "paused";
        return { kind: "stopped", segment: this.segment };
    }

    private completed(): SegmentOutcome {
        this.segment.state = "completed";
        return { kind: "completed", segment: this.segment };
    }

    private failed(error: DownloadError): SegmentOutcome {
        this.segment.state = "failed";
        return { kind: "failed", segment: this.segment, error };
    }
}
