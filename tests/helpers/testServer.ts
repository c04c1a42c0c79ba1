import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

export interface FaultScript {
    /** Advertise `Accept-Ranges: bytes` and answer ranged GETs with 206. */
    acceptRanges: boolean;
    /** Keep advertising ranges but answer ranged GETs with the full body (200). */
    ignoreRanges: boolean;
    /** HEAD carries Accept-Ranges; when false only GETs reveal range support. */
    headAdvertisesRanges: boolean;
    /** Content-Length reported by HEAD instead of the payload's. */
    headLength: number | null;
    /** Replaces the payload once the next HEAD has been answered. */
    payloadAfterHead: Buffer | null;
    /** Only GETs whose range starts here are failed, dropped or stalled; null targets all. */
    targetStart: number | null;
    /** Number of upcoming targeted GETs answered with 503. */
    failNextGets: number;
    /** Number of upcoming targeted GETs whose connection is cut after `dropAfterBytes`. */
    dropNextGets: number;
    dropAfterBytes: number;
    /** Number of upcoming targeted GETs that send headers and then nothing. */
    stallNextGets: number;
    /** Delay between body chunks, 0 sends the body at once. */
    chunkDelayMs: number;
    chunkSize: number;
    etag: string | null;
}

export interface RecordedRequest {
    method: string;
    range: string | null;
}

const DEFAULT_SCRIPT: FaultScript = {
    acceptRanges: true,
    ignoreRanges: false,
    headAdvertisesRanges: true,
    headLength: null,
    payloadAfterHead: null,
    targetStart: null,
    failNextGets: 0,
    dropNextGets: 0,
    dropAfterBytes: 0,
    stallNextGets: 0,
    chunkDelayMs: 0,
    chunkSize: 16 * 1024,
    etag: '"v1"',
};

export function createPayload(size: number): Buffer {
    const payload = Buffer.alloc(size);
    for (let i = 0; i < size; i++) payload[i] = (i * 31 + (i >> 8)) % 251;
    return payload;
}

function rangeStart(range: string | null): number | null {
    const match = /^bytes=(\d+)-/.exec(range ?? "");
    return match ? Number.parseInt(match[1], 10) : null;
}

export function parseRange(header: string, size: number): { start: number; end: number } | null {
    const match = /^bytes=(\d+)-(\d*)$/.exec(header);
    if (!match) return null;

    const start = Number.parseInt(match[1], 10);
    const end = match[2] ? Math.min(Number.parseInt(match[2], 10), size - 1) : size - 1;
    if (start > end || start >= size) return null;
    return { start, end };
}

/** Start offsets of the ranged GETs seen so far, probe excluded. */
export function rangeStarts(requests: RecordedRequest[]): number[] {
    return requests
        .filter(request => request.method === "GET" && request.range && request.range !== "bytes=0-0")
        .map(request => rangeStart(request.range) ?? -1);
}

/**
 * In-process HTTP server serving one payload, with scripted misbehaviour.
 */
export class TestServer {
    readonly requests: RecordedRequest[] = [];
    /** Most segment GETs that were being answered at the same time. */
    peakConcurrentGets = 0;
    script: FaultScript;
    payload: Buffer;
    private server: Server;
    private port = 0;
    private activeGets = 0;

    constructor(payload: Buffer, script: Partial<FaultScript> = {}) {
        this.payload = payload;
        this.script = { ...DEFAULT_SCRIPT, ...script };
        this.server = createServer((req, res) => this.handle(req, res));
    }

    get url(): string {
        return `http://127.0.0.1:${this.port}/files/payload.bin`;
    }

    async start(): Promise<void> {
        await new Promise<void>(resolve => this.server.listen(0, "127.0.0.1", () => resolve()));
        const address = this.server.address();
        if (!address || typeof address === "string") throw new Error("Failed to start test server");
        this.port = address.port;
    }

    async close(): Promise<void> {
        if (!this.server.listening) return;
        this.server.closeAllConnections();
        await new Promise<void>(resolve => this.server.close(() => resolve()));
    }

    private baseHeaders(): Record<string, string | number> {
        const headers: Record<string, string | number> = {};
        if (this.script.acceptRanges) headers["Accept-Ranges"] = "bytes";
        if (this.script.etag) headers.ETag = this.script.etag;
        return headers;
    }

    private handle(req: IncomingMessage, res: ServerResponse): void {
        const range = req.headers.range ?? null;
        const method = req.method ?? "GET";
        this.requests.push({ method, range });

        const size = this.payload.length;

        if (method === "HEAD") {
            const headers = this.baseHeaders();
            if (!this.script.headAdvertisesRanges) delete headers["Accept-Ranges"];
            res.writeHead(200, { ...headers, "Content-Length": this.script.headLength ?? size });
            res.end();
            if (this.script.payloadAfterHead) {
                this.payload = this.script.payloadAfterHead;
                this.script.payloadAfterHead = null;
            }
            return;
        }

        if (method !== "GET") {
            res.writeHead(405);
            res.end();
            return;
        }

        const isProbe = range === "bytes=0-0";
        if (!isProbe) {
            this.activeGets++;
            this.peakConcurrentGets = Math.max(this.peakConcurrentGets, this.activeGets);
            res.once("close", () => {
                this.activeGets--;
            });
        }

        const targeted =
            !isProbe && (this.script.targetStart === null || rangeStart(range) === this.script.targetStart);

        if (targeted && this.script.failNextGets > 0) {
            this.script.failNextGets--;
            res.writeHead(503, { "Content-Length": 0 });
            res.end();
            return;
        }

        if (!range || !this.script.acceptRanges || this.script.ignoreRanges) {
            res.writeHead(200, { ...this.baseHeaders(), "Content-Length": size });
            this.send(res, this.payload, targeted);
            return;
        }

        const parsed = parseRange(range, size);
        if (!parsed) {
            res.writeHead(416, { "Content-Range": `bytes */${size}` });
            res.end();
            return;
        }

        const body = this.payload.subarray(parsed.start, parsed.end + 1);
        res.writeHead(206, {
            ...this.baseHeaders(),
            "Content-Length": body.length,
            "Content-Range": `bytes ${parsed.start}-${parsed.end}/${size}`,
        });
        this.send(res, body, targeted);
    }

    private send(res: ServerResponse, body: Buffer, targeted: boolean): void {
        if (targeted && this.script.stallNextGets > 0) {
            this.script.stallNextGets--;
            res.flushHeaders();
            return;
        }

        const drop = targeted && this.script.dropNextGets > 0;
        if (drop) this.script.dropNextGets--;
        const limit = drop ? Math.min(this.script.dropAfterBytes, body.length) : body.length;

        if (this.script.chunkDelayMs <= 0 && !drop) {
            res.end(body);
            return;
        }

        let offset = 0;
        const step = () => {
            if (res.destroyed) return;
            if (offset >= limit) {
                if (drop) res.destroy();
                else res.end();
                return;
            }
            const next = Math.min(offset + this.script.chunkSize, limit);
            res.write(body.subarray(offset, next));
            offset = next;
            if (this.script.chunkDelayMs > 0) setTimeout(step, this.script.chunkDelayMs);
            else setImmediate(step);
        };
        step();
    }
}
