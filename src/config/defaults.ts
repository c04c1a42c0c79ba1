import type { EngineOptions, FileAllocation, ResolvedEngineOptions, SegmentPolicy } from "@/types";
import {
    DEFAULT_CONNECT_TIMEOUT_MS,
    DEFAULT_MAX_RETRY_DELAY_MS,
    DEFAULT_MIN_SEGMENT_SIZE_BYTES,
    DEFAULT_READ_TIMEOUT_MS,
    DEFAULT_RESUME_DIRECTORY,
    DEFAULT_RETRIES,
    DEFAULT_RETRY_DELAY_MS,
    PROGRESS_PUBLISH_INTERVAL_MS,
    SPEED_WINDOW_MS,
} from "@/utils/constants";

export const DEFAULT_OPTIONS: ResolvedEngineOptions = {
    segments: 5,
    maxConcurrentDownloads: 3,
    maxTotalConnections: 16,
    minSegmentSize: DEFAULT_MIN_SEGMENT_SIZE_BYTES,
    connectTimeout: DEFAULT_CONNECT_TIMEOUT_MS,
    readTimeout: DEFAULT_READ_TIMEOUT_MS,
    retries: DEFAULT_RETRIES,
    retryDelay: DEFAULT_RETRY_DELAY_MS,
    maxRetryDelay: DEFAULT_MAX_RETRY_DELAY_MS,
    headers: {},
    segmentPolicy: "failFast",
    segmentRetryRounds: 2,
    progressInterval: PROGRESS_PUBLISH_INTERVAL_MS,
    speedWindow: SPEED_WINDOW_MS,
    fileAllocation: "trunc",
    autoSaveInterval: 5,
    resumeDirectory: DEFAULT_RESUME_DIRECTORY,
};

const SIZE_UNITS: Record<string, number> = {
    B: 1,
    KB: 1024,
    MB: 1024 * 1024,
    GB: 1024 * 1024 * 1024,
};

export function parseSize(size: number | string): number {
    if (typeof size === "number") {
        if (!Number.isFinite(size) || size < 0) throw new Error(`Invalid size: ${size}`);
        return Math.floor(size);
    }

    const match = size.trim().match(/^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB)?$/i);
    if (!match) throw new Error(`Invalid size format: ${size}`);

    const value = parseFloat(match[1]);
    const unit = (match[2] ?? "B").toUpperCase();
    const multiplier = SIZE_UNITS[unit];

    if (multiplier === undefined) throw new Error(`Invalid unit in size: ${size}`);

    return Math.floor(value * multiplier);
}

const SEGMENT_POLICIES: readonly SegmentPolicy[] = ["failFast", "bestEffort"];
const FILE_ALLOCATIONS: readonly FileAllocation[] = ["none", "trunc", "prealloc"];

function assertPositiveInteger(value: number, name: string): void {
    if (!Number.isInteger(value) || value < 1)
        throw new Error(`Option ${name} must be a positive integer, got ${value}`);
}

export function mergeOptions(options?: EngineOptions): ResolvedEngineOptions {
    const merged: ResolvedEngineOptions = {
        ...DEFAULT_OPTIONS,
        ...options,
        headers: {
            ...DEFAULT_OPTIONS.headers,
            ...options?.headers,
        },
    };

    assertPositiveInteger(merged.segments, "segments");
    assertPositiveInteger(merged.maxConcurrentDownloads, "maxConcurrentDownloads");
    assertPositiveInteger(merged.maxTotalConnections, "maxTotalConnections");
    if (merged.retries < 0) throw new Error(`Option retries must be >= 0, got ${merged.retries}`);
    if (merged.segmentRetryRounds < 0)
        throw new Error(
            `Option segmentRetryRounds must be >= 0, got ${merged.segmentRetryRounds}`
        );
    if (!SEGMENT_POLICIES.includes(merged.segmentPolicy))
        throw new Error(`Unknown segment policy: ${merged.segmentPolicy}`);
    if (!FILE_ALLOCATIONS.includes(merged.fileAllocation))
        throw new Error(`Unknown file allocation method: ${merged.fileAllocation}`);
    parseSize(merged.minSegmentSize);

    return merged;
}
