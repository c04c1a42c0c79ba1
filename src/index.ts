export { DownloadManager, DownloadTask } from "@/core";
export type { EnqueueOptions } from "@/core";
export { DEFAULT_OPTIONS, mergeOptions, parseSize } from "@/config";
export {
    DownloadError,
    FilesystemError,
    PermanentHttpError,
    PlanStaleError,
    ProbeError,
    RangeIgnoredError,
    ResumeCorruptError,
    TransientNetworkError,
    VerificationError,
    formatDownloadError,
} from "@/errors";
export type { DownloadErrorKind } from "@/errors";
export { DownloadManagerEventName, DownloadTaskEventName } from "@/types";
export type {
    DownloadRequest,
    DownloadTaskInfo,
    EngineOptions,
    ProgressSnapshot,
    ResumableDownload,
    Segment,
    SegmentPolicy,
    TaskState,
    TerminalState,
} from "@/types";
