import PQueue from "p-queue";
import { mergeOptions } from "@/config";
import { ResumeStore, toResumableDownload } from "@/storage";
import { DownloadManagerEventName, DownloadTaskEventName } from "@/types";
import type {
    DownloadManagerEventMap,
    DownloadRequest,
    DownloadTaskInfo,
    EngineOptions,
    ProgressSnapshot,
    ResolvedEngineOptions,
    ResumableDownload,
    TerminalState,
} from "@/types";
import { TypedEventEmitter } from "@/utils/TypedEventEmitter";
import { log } from "@/utils/logger";
import { DownloadTask, type DownloadTaskContext } from "./DownloadTask";

const logger = log.child("DownloadManager");

export type EnqueueOptions = Pick<DownloadRequest, "expectedHash" | "headers">;

export class DownloadManager extends TypedEventEmitter<DownloadManagerEventMap> {
    readonly options: ResolvedEngineOptions;
    private readonly store: ResumeStore;
    private readonly downloadQueue: PQueue;
    private readonly connections: PQueue;
    private readonly tasks = new Map<string, DownloadTask>();
    private readonly runs = new Map<string, Promise<void>>();

    constructor(options?: EngineOptions) {
        super();
        this.options = mergeOptions(options);
        this.store = new ResumeStore(this.options.resumeDirectory);

        this.downloadQueue = new PQueue({
            concurrency: this.options.maxConcurrentDownloads,
        });
        this.connections = new PQueue({
            concurrency: this.options.maxTotalConnections,
        });
    }

    enqueue(
        url: string,
        destinationPath: string,
        segments?: number,
        options: EnqueueOptions = {}
    ): string {
        const task = new DownloadTask(
            { url, destinationPath, segments, ...options },
            this.context()
        );
        this.register(task);
        this.schedule(task);
        return task.id;
    }

    startDownload(
        url: string,
        destinationPath: string,
        segments?: number,
        options?: EnqueueOptions
    ): string {
        return this.enqueue(url, destinationPath, segments, options);
    }

    pause(taskId: string): boolean {
        return this.tasks.get(taskId)?.pause() ?? false;
    }

    pauseDownload(taskId: string): boolean {
        return this.pause(taskId);
    }

    resume(taskId: string): boolean {
        const task = this.tasks.get(taskId);
        if (!task?.prepareResume()) return false;
        this.schedule(task);
        return true;
    }

    resumeDownload(taskId: string): boolean {
        return this.resume(taskId);
    }

    async cancel(taskId: string): Promise<boolean> {
        const task = this.tasks.get(taskId);
        if (!task) return false;
        await task.cancel();
        return true;
    }

    cancelDownload(taskId: string): Promise<boolean> {
        return this.cancel(taskId);
    }

    pauseAll(): void {
        for (const task of this.tasks.values()) task.pause();
    }

    async cancelAll(): Promise<void> {
        await Promise.all(Array.from(this.tasks.values(), task => task.cancel()));
    }

    /**
     * Listen to one task. Returns the function that removes both listeners.
     */
    subscribe(
        taskId: string,
        onProgress: (snapshot: ProgressSnapshot) => void,
        onTerminal?: (terminal: TerminalState) => void
    ): () => void {
        const task = this.tasks.get(taskId);
        if (!task) throw new Error(`Unknown task: ${taskId}`);

        const progress = (_info: DownloadTaskInfo, snapshot: ProgressSnapshot) =>
            onProgress(snapshot);
        const terminal = (state: TerminalState) => onTerminal?.(state);

        task.on(DownloadTaskEventName.Progress, progress);
        task.on(DownloadTaskEventName.Terminal, terminal);

        return () => {
            task.off(DownloadTaskEventName.Progress, progress);
            task.off(DownloadTaskEventName.Terminal, terminal);
        };
    }

    /**
     * Read the resume directory and register every persisted download as a
     * paused task. Nothing starts until `resume` is called.
     */
    async loadResumable(): Promise<ResumableDownload[]> {
        const records = await this.store.list();
        for (const record of records) {
            if (this.tasks.has(record.taskId)) continue;
            this.register(DownloadTask.fromResumeRecord(record, this.context()));
        }
        return records.map(toResumableDownload);
    }

    listResumable(): Promise<ResumableDownload[]> {
        return this.loadResumable();
    }

    getTask(taskId: string): DownloadTaskInfo | undefined {
        return this.tasks.get(taskId)?.info;
    }

    getTasks(): DownloadTaskInfo[] {
        return Array.from(this.tasks.values(), task => task.info);
    }

    /**
     * Resolves once the task's current run has settled (paused, failed,
     * completed or cancelled).
     */
    async waitFor(taskId: string): Promise<DownloadTaskInfo | undefined> {
        const task = this.tasks.get(taskId);
        await this.runs.get(taskId);
        return task?.info;
    }

    async waitForAll(): Promise<void> {
        await this.downloadQueue.onIdle();
    }

    private context(): DownloadTaskContext {
        return { options: this.options, store: this.store, connections: this.connections };
    }

    private register(task: DownloadTask): void {
        this.tasks.set(task.id, task);
        this.setupTaskEvents(task);

        task.on(DownloadTaskEventName.Terminal, terminal => {
            // Failed tasks stay registered so they can be resumed or discarded.
            if (terminal.state !== "failed") this.tasks.delete(task.id);
        });
    }

    private schedule(task: DownloadTask): void {
        const run = this.downloadQueue.add(() => task.run()).then(() => undefined);
        this.runs.set(task.id, run);

        void run.catch((error: unknown) => {
            logger.error(`Task ${task.id} stopped unexpectedly: ${String(error)}`);
        }).finally(() => {
            if (this.runs.get(task.id) === run) this.runs.delete(task.id);
        });
    }

    private setupTaskEvents(task: DownloadTask): void {
        const eventMapping: Array<{
            from: DownloadTaskEventName;
            to: DownloadManagerEventName;
        }> = [
            { from: DownloadTaskEventName.Start, to: DownloadManagerEventName.Start },
            { from: DownloadTaskEventName.StateChange, to: DownloadManagerEventName.StateChange },
            { from: DownloadTaskEventName.Progress, to: DownloadManagerEventName.Progress },
            { from: DownloadTaskEventName.SegmentComplete, to: DownloadManagerEventName.SegmentComplete },
            { from: DownloadTaskEventName.SegmentError, to: DownloadManagerEventName.SegmentError },
            { from: DownloadTaskEventName.Complete, to: DownloadManagerEventName.Complete },
            { from: DownloadTaskEventName.Error, to: DownloadManagerEventName.Error },
            { from: DownloadTaskEventName.Redirect, to: DownloadManagerEventName.Redirect },
            { from: DownloadTaskEventName.Pause, to: DownloadManagerEventName.Pause },
            { from: DownloadTaskEventName.Resume, to: DownloadManagerEventName.Resume },
            { from: DownloadTaskEventName.Cancel, to: DownloadManagerEventName.Cancel },
            { from: DownloadTaskEventName.Terminal, to: DownloadManagerEventName.Terminal },
        ];

        for (const { from, to } of eventMapping) {
            task.on(from, (...args: unknown[]) => {
                this.emit(to, ...args);
            });
        }
    }
}
