import { RequestError, TimeoutError } from "got";

export type DownloadErrorKind =
    | "probe"
    | "transientNetwork"
    | "permanentHttp"
    | "planStale"
    | "resumeCorrupt"
    | "verification"
    | "filesystem"
    | "unexpected";

/**
 * Base class of every failure the engine reports. `kind` is the discriminant
 * subscribers switch on; `retriable` tells a worker whether backing off and
 * trying again can help.
 */
export class DownloadError extends Error {
    readonly kind: DownloadErrorKind = "unexpected";
    readonly retriable: boolean = false;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ProbeError extends DownloadError {
    override readonly kind = "probe";
}

export class TransientNetworkError extends DownloadError {
    override readonly kind = "transientNetwork";
    override readonly retriable = true;

    constructor(
        message: string,
        readonly statusCode?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class PermanentHttpError extends DownloadError {
    override readonly kind = "permanentHttp";

    constructor(
        message: string,
        readonly statusCode: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/** The server answered 416 for a range the plan still expects: size changed under us. */
export class PlanStaleError extends DownloadError {
    override readonly kind = "planStale";
}

/** A ranged GET came back as 200: the task has to fall back to one stream. */
export class RangeIgnoredError extends PlanStaleError {}

export class ResumeCorruptError extends DownloadError {
    override readonly kind = "resumeCorrupt";

    constructor(
        readonly taskId: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class VerificationError extends DownloadError {
    override readonly kind = "verification";

    constructor(
        message: string,
        readonly expected: string | number,
        readonly actual: string | number
    ) {
        super(message);
    }
}

export class FilesystemError extends DownloadError {
    override readonly kind = "filesystem";

    constructor(
        message: string,
        readonly path?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

const TRANSIENT_NETWORK_CODES = new Set([
    "ECONNRESET",
    "ECONNREFUSED",
    "ECONNABORTED",
    "ETIMEDOUT",
    "EPIPE",
    "EAI_AGAIN",
    "ENETUNREACH",
    "EHOSTUNREACH",
    "ENOTFOUND",
    "ERR_STREAM_PREMATURE_CLOSE",
]);

const FILESYSTEM_SYSCALLS = new Set([
    "open",
    "write",
    "read",
    "close",
    "ftruncate",
    "rename",
    "unlink",
    "mkdir",
    "stat",
    "fstat",
]);

function readErrno(error: unknown): { code?: string; syscall?: string; path?: string } {
    if (!error || typeof error !== "object") return {};
    const field = (key: string): string | undefined => {
        const value: unknown = Reflect.get(error, key);
        return typeof value === "string" ? value : undefined;
    };
    return { code: field("code"), syscall: field("syscall"), path: field("path") };
}

/**
 * Map an HTTP status that is not the one we asked for to the error taxonomy.
 * 5xx, 408 and 429 are worth another attempt; everything else is final.
 */
export function httpStatusError(statusCode: number, url: string): DownloadError {
    const message = `HTTP ${statusCode} from ${redactCredentialUrls(url)}`;
    if (statusCode >= 500 || statusCode === 408 || statusCode === 429)
        return new TransientNetworkError(message, statusCode);
    return new PermanentHttpError(message, statusCode);
}

/**
 * Normalise anything thrown by got, the filesystem or our own code into a
 * DownloadError.
 */
export function classifyError(error: unknown): DownloadError {
    if (error instanceof DownloadError) return error;

    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof TimeoutError)
        return new TransientNetworkError(`Timed out: ${message}`, undefined, { cause: error });

    const { code, syscall, path } = readErrno(error);

    if (code && TRANSIENT_NETWORK_CODES.has(code))
        return new TransientNetworkError(message, undefined, { cause: error });

    if (error instanceof RequestError)
        return new TransientNetworkError(message, undefined, { cause: error });

    if (code && syscall && FILESYSTEM_SYSCALLS.has(syscall))
        return new FilesystemError(message, path, { cause: error });

    return new DownloadError(message, { cause: error });
}

export function redactCredentialUrls(message: string): string {
    if (!message) return "";
    return message.replace(/(https?:\/\/)([^\s/:@]+)(?::[^\s@/]*)?@/gi, "$1[redacted]@");
}

/**
 * Human-readable cause carried by terminal events.
 */
export function formatDownloadError(error: unknown): string {
    const resolved = classifyError(error);
    const sanitized = redactCredentialUrls(resolved.message).replace(/\s+/g, " ").trim();

    if (!sanitized) return "Download failed.";

    switch (resolved.kind) {
        case "probe":
            return `Could not inspect the server: ${sanitized}`;
        case "permanentHttp":
            return `Server refused the request: ${sanitized}`;
        case "transientNetwork":
            return `Network failure: ${sanitized}`;
        case "verification":
            return `Integrity check failed: ${sanitized}`;
        case "filesystem":
            return `Cannot write the destination: ${sanitized}`;
        case "resumeCorrupt":
            return `Resume data unreadable: ${sanitized}`;
        case "planStale":
            return `Remote file changed during download: ${sanitized}`;
        case "unexpected":
            return sanitized;
    }
}
