export { DownloadManager } from "./DownloadManager";
export type { EnqueueOptions } from "./DownloadManager";
export { DownloadTask } from "./DownloadTask";
export type { DownloadTaskContext } from "./DownloadTask";
export { ProgressAggregator } from "./ProgressAggregator";
export type { ProgressAggregatorOptions } from "./ProgressAggregator";
export { isSegmentComplete, planSegments, segmentLength, validatePlan } from "./SegmentPlanner";
export type { PlanInput } from "./SegmentPlanner";
export { SegmentWorker } from "./SegmentWorker";
export type { SegmentWorkerOptions } from "./SegmentWorker";
export {
    InvalidTransitionError,
    TaskStateMachine,
    canTransition,
    isTerminalState,
} from "./TaskStateMachine";
