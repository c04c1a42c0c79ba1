import type { DownloadError } from "@/errors";

export type SegmentState = "pending" | "inFlight" | "paused" | "completed" | "failed";

export interface Segment {
    index: number;
    start: number;
    end: number | null; // inclusive, null when the total size is unknown
    downloadedBytes: number;
    state: SegmentState;
    retries: number;
}

export type TaskState =
    | "queued"
    | "planning"
    | "downloading"
    | "paused"
    | "finalizing"
    | "completed"
    | "failed"
    | "cancelled";

export type SegmentPolicy = "failFast" | "bestEffort";

export type FileAllocation = "none" | "trunc" | "prealloc";

export interface ProbeResult {
    supportsRanges: boolean;
    totalSize: number | null;
    acceptsTimestampValidators: boolean;
    etag: string | null;
    lastModified: string | null;
    finalUrl: string;
    contentType: string | null;
    filename: string | null;
}

export interface ProgressSnapshot {
    readonly taskId: string;
    readonly downloadedBytes: number;
    readonly totalBytes: number | null;
    readonly percent: number | null;
    readonly speed: number; // bytes per second
    readonly eta: number | null; // seconds
    readonly activeSegments: number;
    readonly timestamp: number;
}

export interface EngineOptions {
    // Parallelism
    segments?: number;
    maxConcurrentDownloads?: number;
    maxTotalConnections?: number;

    // Planning
    minSegmentSize?: number | string; // e.g., 1048576 or "1MB"

    // Network
    connectTimeout?: number;
    readTimeout?: number;
    retries?: number;
    retryDelay?: number;
    maxRetryDelay?: number;
    headers?: Record<string, string>;

    // Failure policy
    segmentPolicy?: SegmentPolicy;
    segmentRetryRounds?: number;

    // Progress
    progressInterval?: number; // ms
    speedWindow?: number; // ms

    // Storage
    fileAllocation?: FileAllocation;

    // Resume
    autoSaveInterval?: number; // seconds, 0 disables
    resumeDirectory?: string;
}

export type ResolvedEngineOptions = Required<EngineOptions>;

export interface DownloadRequest {
    url: string;
    destinationPath: string;
    segments?: number;
    /** `algorithm:hex`, e.g. `sha256:9f86d0...`; a bare hex digest picks md5, sha1, sha256 or sha512 by its length. */
    expectedHash?: string;
    headers?: Record<string, string>;
}

export interface DownloadTaskInfo {
    id: string;
    url: string;
    destinationPath: string;
    totalSize: number | null;
    segmentCount: number;
    segments: Segment[];
    state: TaskState;
    expectedHash?: string;
    probe?: ProbeResult;
    error?: DownloadError;
    createdAt: Date;
    updatedAt: Date;
}

export interface ResumeRecord {
    version: number;
    taskId: string;
    url: string;
    destinationPath: string;
    totalSize: number | null;
    segmentCount: number;
    supportsRanges: boolean;
    etag: string | null;
    lastModified: string | null;
    expectedHash?: string;
    segments: Segment[];
    createdAt: string;
    updatedAt: string;
}

export interface ResumableDownload {
    taskId: string;
    url: string;
    destinationPath: string;
    partialBytes: number;
    totalSize: number | null;
}

export type TerminalState =
    | { state: "completed"; info: DownloadTaskInfo }
    | { state: "failed"; info: DownloadTaskInfo; error: DownloadError; cause: string }
    | { state: "cancelled"; info: DownloadTaskInfo };

export type SegmentOutcome =
    | { kind: "completed"; segment: Segment }
    | { kind: "stopped"; segment: Segment }
    | { kind: "failed"; segment: Segment; error: DownloadError };

export enum DownloadTaskEventName {
    Start = "start",
    StateChange = "stateChange",
    Progress = "progress",
    SegmentComplete = "segmentComplete",
    SegmentError = "segmentError",
    Complete = "complete",
    Error = "error",
    Redirect = "redirect",
    Pause = "pause",
    Resume = "resume",
    Cancel = "cancel",
    Terminal = "terminal",
}

export enum DownloadManagerEventName {
    Start = "start",
    StateChange = "stateChange",
    Progress = "progress",
    SegmentComplete = "segmentComplete",
    SegmentError = "segmentError",
    Complete = "complete",
    Error = "error",
    Redirect = "redirect",
    Pause = "pause",
    Resume = "resume",
    Cancel = "cancel",
    Terminal = "terminal",
}

export interface DownloadTaskEventMap {
    start: (info: DownloadTaskInfo) => void;
    stateChange: (info: DownloadTaskInfo, from: TaskState, to: TaskState) => void;
    progress: (info: DownloadTaskInfo, snapshot: ProgressSnapshot) => void;
    segmentComplete: (info: DownloadTaskInfo, segment: Segment) => void;
    segmentError: (info: DownloadTaskInfo, segment: Segment, error: DownloadError) => void;
    complete: (info: DownloadTaskInfo) => void;
    error: (info: DownloadTaskInfo, error: DownloadError) => void;
    redirect: (info: DownloadTaskInfo, fromUrl: string, toUrl: string) => void;
    pause: (info: DownloadTaskInfo) => void;
    resume: (info: DownloadTaskInfo) => void;
    cancel: (info: DownloadTaskInfo) => void;
    terminal: (terminal: TerminalState) => void;
}

export type DownloadManagerEventMap = DownloadTaskEventMap;
