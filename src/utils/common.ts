/**
 * Common utility functions shared across the codebase
 */

/**
 * Extract filename from URL
 */
export function extractFilename(url: string): string {
    try {
        const urlObj = new URL(url);
        const pathname = urlObj.pathname;
        const filename = pathname.split("/").pop() || "download";
        return decodeURIComponent(filename);
    } catch {
        return "download";
    }
}

/**
 * Pull the filename out of a Content-Disposition header, preferring the RFC 5987 form
 */
export function filenameFromContentDisposition(header: string | undefined): string | null {
    if (!header) return null;

    const extended = /filename\*\s*=\s*(?:[\w-]+)''([^;]+)/i.exec(header);
    if (extended?.[1]) {
        try {
            return decodeURIComponent(extended[1].trim());
        } catch {
            return extended[1].trim();
        }
    }

    const plain = /filename\s*=\s*("([^"]*)"|[^;]+)/i.exec(header);
    const value = plain?.[2] ?? plain?.[1];
    if (!value) return null;
    const trimmed = value.trim().replace(/^["']|["']$/g, "");
    return trimmed || null;
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
    if (bytes <= 0) return "0B";
    const k = 1024;
    const sizes = ["B", "KiB", "MiB", "GiB", "TiB"];
    const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
    return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + sizes[i];
}

/**
 * Format duration in seconds to human-readable string
 */
export function formatDuration(seconds: number | null): string {
    if (seconds === null || !Number.isFinite(seconds) || seconds < 0) return "--";
    if (seconds < 0.5) return "<1s";

    if (seconds < 60) return `${Math.floor(seconds)}s`;

    const minutes = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);

    if (minutes < 60) return secs > 0 ? `${minutes}m${secs}s` : `${minutes}m`;

    const hours = Math.floor(minutes / 60);
    const mins = minutes % 60;
    return mins > 0 ? `${hours}h${mins}m` : `${hours}h`;
}

/**
 * Helper to ignore ENOENT errors in file operations
 */
export function ignoreFileNotFound(error: unknown): error is NodeJS.ErrnoException {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        error.code === "ENOENT"
    );
}

/**
 * Exponential backoff: base, 2*base, 4*base... capped
 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
    if (attempt <= 0 || baseMs <= 0) return 0;
    return Math.min(baseMs * 2 ** (attempt - 1), maxMs);
}
