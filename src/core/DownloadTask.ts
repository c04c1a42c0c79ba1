import { randomUUID } from "node:crypto";
import type PQueue from "p-queue";
import {
    DownloadError,
    RangeIgnoredError,
    ResumeCorruptError,
    classifyError,
    formatDownloadError,
} from "@/errors";
import { HttpClient, RangeProbe } from "@/network";
import { ResumeStore, SegmentWriter, parseExpectedHash, verifyFile } from "@/storage";
import {
    DownloadTaskEventName,
    type DownloadRequest,
    type DownloadTaskEventMap,
    type DownloadTaskInfo,
    type ProbeResult,
    type ResolvedEngineOptions,
    type ResumeRecord,
    type Segment,
    type SegmentOutcome,
    type TaskState,
    type TerminalState,
} from "@/types";
import { parseSize } from "@/config";
import { TypedEventEmitter } from "@/utils/TypedEventEmitter";
import { RESUME_RECORD_VERSION } from "@/utils/constants";
import { log } from "@/utils/logger";
import { ProgressAggregator } from "./ProgressAggregator";
import { isSegmentComplete, planSegments } from "./SegmentPlanner";
import { SegmentWorker } from "./SegmentWorker";
import { TaskStateMachine, isTerminalState } from "./TaskStateMachine";

const logger = log.child("DownloadTask");

/** How many times a task re-probes after the server reports a stale plan. */
const MAX_REPLANS = 1;

export interface DownloadTaskContext {
    options: ResolvedEngineOptions;
    store: ResumeStore;
    /** Shared across all tasks of a manager; bounds concurrent segment requests. */
    connections: PQueue;
}

type StopReason = "pause" | "cancel";

type RunResult =
    | { kind: "completed" }
    | { kind: "stopped" }
    | { kind: "failed"; error: DownloadError }
    | { kind: "stale"; error: DownloadError };

interface Validators {
    etag: string | null;
    lastModified: string | null;
}

export class DownloadTask extends TypedEventEmitter<DownloadTaskEventMap> {
    public readonly id: string;
    public readonly info: DownloadTaskInfo;

    private readonly options: ResolvedEngineOptions;
    private readonly store: ResumeStore;
    private readonly connections: PQueue;
    private readonly headers: Record<string, string>;
    private readonly httpClient: HttpClient;
    private readonly rangeProbe: RangeProbe;
    private readonly machine: TaskStateMachine;

    private writer: SegmentWriter | null = null;
    private aggregator: ProgressAggregator | null = null;
    private abortController: AbortController | null = null;
    private stopReason: StopReason | null = null;
    private runPromise: Promise<void> | null = null;
    private autoSaveTimer: ReturnType<typeof setInterval> | null = null;
    private supportsRanges = false;
    private validators: Validators = { etag: null, lastModified: null };
    /** Plan carried over from a pause in this process or from a resume record. */
    private carriedPlan: ResumeRecord | null = null;
    /** Set once a ranged GET came back as 200; later plans use one stream. */
    private rangesIgnored = false;
    private started = false;

    constructor(
        request: DownloadRequest,
        context: DownloadTaskContext,
        id: string = randomUUID(),
        initialState: TaskState = "queued"
    ) {
        super();
        // Malformed digests are rejected here rather than after the whole download.
        if (request.expectedHash) parseExpectedHash(request.expectedHash);

        this.id = id;
        this.options = context.options;
        this.store = context.store;
        this.connections = context.connections;
        this.headers = { ...this.options.headers, ...request.headers };

        const now = new Date();
        this.info = {
            id,
            url: request.url,
            destinationPath: request.destinationPath,
            totalSize: null,
            segmentCount: request.segments ?? this.options.segments,
            segments: [],
            state: initialState,
            expectedHash: request.expectedHash,
            createdAt: now,
            updatedAt: now,
        };

        this.machine = new TaskStateMachine(initialState, (from, to) => {
            this.info.state = to;
            this.info.updatedAt = new Date();
            logger.debug(`Task ${this.id}: ${from} -> ${to}`);
            this.emit(DownloadTaskEventName.StateChange, this.info, from, to);
        });

        this.httpClient = new HttpClient({
            connectTimeout: this.options.connectTimeout,
            readTimeout: this.options.readTimeout,
            headers: this.headers,
            onRedirect: (fromUrl, toUrl) => {
                this.emit(DownloadTaskEventName.Redirect, this.info, fromUrl, toUrl);
            },
        });
        this.rangeProbe = new RangeProbe(this.httpClient);
    }

    /**
     * Rebuild a task from its persisted record. The task starts out paused
     * and does nothing until `prepareResume` + `run` are called.
     */
    static fromResumeRecord(record: ResumeRecord, context: DownloadTaskContext): DownloadTask {
        const task = new DownloadTask(
            {
                url: record.url,
                destinationPath: record.destinationPath,
                segments: record.segmentCount,
                expectedHash: record.expectedHash,
            },
            context,
            record.taskId,
            "paused"
        );
        task.info.createdAt = new Date(record.createdAt);
        task.info.totalSize = record.totalSize;
        task.info.segments = record.segments.map(segment => ({ ...segment }));
        task.carriedPlan = record;
        return task;
    }

    get state(): TaskState {
        return this.machine.state;
    }

    get isRunning(): boolean {
        return this.runPromise !== null;
    }

    get downloadedBytes(): number {
        return this.info.segments.reduce((sum, segment) => sum + segment.downloadedBytes, 0);
    }

    /**
     * Drive the task from `queued` until it pauses, fails, completes or is
     * cancelled. Never rejects: failures end in the `failed` state.
     */
    run(): Promise<void> {
        if (this.runPromise) return this.runPromise;
        if (!this.machine.is("queued")) return Promise.resolve();

        this.runPromise = this.runToSettlement().finally(() => {
            this.runPromise = null;
        });
        return this.runPromise;
    }

    pause(): boolean {
        if (!this.machine.is("planning", "downloading") || !this.abortController) return false;
        this.stopReason ??= "pause";
        this.abortController.abort();
        return true;
    }

    /**
     * Move a paused or failed task back to `queued`. The caller schedules `run`.
     */
    prepareResume(): boolean {
        if (!this.machine.is("paused", "failed") || this.runPromise) return false;
        this.info.error = undefined;
        this.machine.transition("queued");
        this.emit(DownloadTaskEventName.Resume, this.info);
        return true;
    }

    async cancel(): Promise<void> {
        if (isTerminalState(this.machine.state)) return;

        if (this.runPromise) {
            this.stopReason = "cancel";
            this.abortController?.abort();
            await this.runPromise;
        }

        // The run may have settled as paused or failed before it saw the request.
        if (!isTerminalState(this.machine.state)) await this.settleCancelled();
    }

    private async runToSettlement(): Promise<void> {
        this.stopReason = null;
        this.abortController = new AbortController();
        const signal = this.abortController.signal;

        let result: RunResult;
        try {
            result = await this.execute(signal);
        } catch (error) {
            result = this.stopReason
                ? { kind: "stopped" }
                : { kind: "failed", error: classifyError(error) };
        }

        // Past this point no worker is running and no more bytes are written.
        this.stopAutoSave();
        this.aggregator?.stop();
        await this.closeWriter();

        try {
            if (this.stopReason === "cancel") {
                await this.settleCancelled();
            } else if (this.stopReason === "pause" && result.kind === "stopped") {
                await this.settlePaused();
            } else if (result.kind === "completed") {
                await this.finalize();
            } else if (result.kind === "failed" || result.kind === "stale") {
                await this.settleFailed(result.error);
            } else {
                await this.settleFailed(new DownloadError("Download stopped unexpectedly"));
            }
        } catch (error) {
            await this.settleFailed(classifyError(error));
        } finally {
            this.abortController = null;
        }
    }

    private async execute(signal: AbortSignal): Promise<RunResult> {
        let replans = 0;

        for (;;) {
            this.machine.transition("planning");
            await this.plan(signal);
            if (signal.aborted) return { kind: "stopped" };

            this.machine.transition("downloading");
            if (!this.started) {
                this.started = true;
                this.emit(DownloadTaskEventName.Start, this.info);
            }

            const result = await this.downloadSegments(signal);
            if (result.kind !== "stale") return result;

            if (result.error instanceof RangeIgnoredError && !this.rangesIgnored) {
                this.rangesIgnored = true;
                logger.warn(`Task ${this.id}: ${result.error.message}; continuing as a single stream`);
            } else if (replans < MAX_REPLANS) {
                replans++;
                logger.warn(`Task ${this.id}: ${result.error.message}; re-probing the server`);
            } else {
                return { kind: "failed", error: result.error };
            }

            this.carriedPlan = null;
            this.info.segments = [];
            await this.closeWriter();
            await this.store.delete(this.id);
        }
    }

    private async plan(signal: AbortSignal): Promise<void> {
        const probe = await this.rangeProbe.probe(this.info.url, signal);
        this.info.probe = probe;
        logger.debug(
            `Task ${this.id}: ranges=${probe.supportsRanges} size=${probe.totalSize ?? "unknown"}`
        );

        const carried = await this.takeCarriedPlan();
        let segments: Segment[] | null = null;

        if (carried) {
            const mismatch = await this.describeMismatch(carried, probe);
            if (mismatch === null) {
                segments = carried.segments.map(segment => ({
                    ...segment,
                    state: isSegmentComplete(segment) ? "completed" : "pending",
                    retries: 0,
                }));
                this.validators = { etag: carried.etag, lastModified: carried.lastModified };
                this.supportsRanges = carried.supportsRanges;
            } else {
                logger.warn(`Task ${this.id}: ${mismatch}; restarting from scratch`);
            }
        }

        const fresh = segments === null;
        if (segments === null) {
            const supportsRanges = probe.supportsRanges && !this.rangesIgnored;
            segments = planSegments({
                totalSize: probe.totalSize,
                supportsRanges,
                segmentCount: this.info.segmentCount,
                minSegmentSize: parseSize(this.options.minSegmentSize),
            });
            this.validators = { etag: probe.etag, lastModified: probe.lastModified };
            this.supportsRanges = supportsRanges;
        }

        this.info.totalSize = probe.totalSize;
        this.info.segments = segments;

        // Sized once, here, before any worker writes into it.
        this.writer = new SegmentWriter();
        await this.writer.open(this.info.destinationPath, probe.totalSize, this.options.fileAllocation, {
            reset: fresh,
        });

        this.aggregator?.stop();
        this.aggregator = new ProgressAggregator({
            taskId: this.id,
            totalBytes: probe.totalSize,
            initialBytes: this.downloadedBytes,
            publishInterval: this.options.progressInterval,
            speedWindow: this.options.speedWindow,
            activeSegments: () => this.info.segments.filter(s => s.state === "inFlight").length,
            onPublish: snapshot => {
                this.info.updatedAt = new Date(snapshot.timestamp);
                this.emit(DownloadTaskEventName.Progress, this.info, snapshot);
            },
        });

        await this.persist();
    }

    private async takeCarriedPlan(): Promise<ResumeRecord | null> {
        if (this.carriedPlan) {
            const plan = this.carriedPlan;
            this.carriedPlan = null;
            return plan;
        }

        try {
            return await this.store.load(this.id);
        } catch (error) {
            if (!(error instanceof ResumeCorruptError)) throw error;
            logger.warn(`Task ${this.id}: ${error.message}; starting over`);
            await this.store.delete(this.id);
            return null;
        }
    }

    /**
     * Why the bytes on disk can no longer be trusted, or null when they can.
     * Fails closed: a validator that disappeared counts as a change.
     */
    private async describeMismatch(record: ResumeRecord, probe: ProbeResult): Promise<string | null> {
        if (record.totalSize !== probe.totalSize)
            return `remote size changed from ${record.totalSize ?? "unknown"} to ${probe.totalSize ?? "unknown"}`;
        if (record.totalSize === null) return "size unknown, partial data cannot be reused";

        if (record.etag !== null) {
            if (record.etag !== probe.etag) return "ETag changed";
        } else if (record.lastModified !== null && record.lastModified !== probe.lastModified) {
            return "Last-Modified changed";
        }

        if (record.supportsRanges && !probe.supportsRanges && record.segments.length > 1)
            return "server no longer accepts range requests";

        const partial = record.segments.some(segment => segment.downloadedBytes > 0);
        if (partial) {
            const file = await SegmentWriter.exists(record.destinationPath);
            if (!file.exists) return "partial file is missing";
        }

        return null;
    }

    private async downloadSegments(signal: AbortSignal): Promise<RunResult> {
        const aggregator = this.aggregator;
        const writer = this.writer;
        if (!aggregator || !writer) throw new DownloadError("Task was not planned");

        // Fail-fast stops the siblings of a failed segment without touching the task signal.
        const workers = new AbortController();
        const forwardAbort = () => workers.abort();
        signal.addEventListener("abort", forwardAbort, { once: true });

        const failures: DownloadError[] = [];
        const rounds = this.options.segmentPolicy === "bestEffort" ? this.options.segmentRetryRounds : 0;

        const runSegment = async (segment: Segment): Promise<SegmentOutcome> => {
            for (let round = 0; ; round++) {
                const outcome = await this.connections.add(() =>
                    new SegmentWorker({
                        segment,
                        url: this.info.url,
                        client: this.httpClient,
                        writer,
                        supportsRanges: this.supportsRanges,
                        retries: this.options.retries,
                        retryDelay: this.options.retryDelay,
                        maxRetryDelay: this.options.maxRetryDelay,
                        signal: workers.signal,
                        headers: this.headers,
                        onProgress: delta => aggregator.record(delta),
                    }).run()
                );
                if (!outcome) return { kind: "stopped", segment };

                if (
                    outcome.kind === "failed" &&
                    round < rounds &&
                    outcome.error.kind !== "planStale" &&
                    !workers.signal.aborted
                ) {
                    logger.warn(
                        `Task ${this.id}: segment ${segment.index} failed (${outcome.error.message}); task-level retry ${round + 1}/${rounds}`
                    );
                    segment.retries = 0;
                    segment.state = "pending";
                    continue;
                }
                return outcome;
            }
        };

        const handleOutcome = (outcome: SegmentOutcome): void => {
            if (outcome.kind === "completed") {
                this.emit(DownloadTaskEventName.SegmentComplete, this.info, outcome.segment);
                this.persist().catch((error: unknown) => {
                    logger.warn(`Task ${this.id}: checkpoint failed: ${classifyError(error).message}`);
                });
            } else if (outcome.kind === "failed") {
                this.emit(DownloadTaskEventName.SegmentError, this.info, outcome.segment, outcome.error);
                failures.push(outcome.error);
                workers.abort();
            }
        };

        const pending: Segment[] = [];
        for (const segment of this.info.segments) {
            if (isSegmentComplete(segment)) segment.state = "completed";
            else pending.push(segment);
        }

        aggregator.restart(this.downloadedBytes);
        this.startAutoSave();

        try {
            await Promise.all(
                pending.map(segment =>
                    runSegment(segment).then(outcome => {
                        handleOutcome(outcome);
                        return outcome;
                    })
                )
            );
        } finally {
            signal.removeEventListener("abort", forwardAbort);
            this.stopAutoSave();
        }

        aggregator.flush();

        if (signal.aborted) return { kind: "stopped" };

        const [failure] = failures;
        if (failure)
            return failure.kind === "planStale"
                ? { kind: "stale", error: failure }
                : { kind: "failed", error: failure };

        return { kind: "completed" };
    }

    private async finalize(): Promise<void> {
        this.machine.transition("finalizing");

        if (this.info.totalSize === null) {
            // Length only became known by reading to the end.
            this.info.totalSize = this.downloadedBytes;
            const [only] = this.info.segments;
            if (only) only.end = this.info.totalSize - 1;
        }

        await verifyFile(this.info.destinationPath, this.info.totalSize, this.info.expectedHash);

        if (this.stopReason === "cancel") {
            await this.settleCancelled();
            return;
        }

        await this.store.delete(this.id);
        this.machine.transition("completed");
        this.emit(DownloadTaskEventName.Complete, this.info);
        this.emitTerminal({ state: "completed", info: this.info });
    }

    private async settlePaused(): Promise<void> {
        // Paused while probing: nothing was planned, so nothing to keep.
        if (this.info.segments.length === 0) {
            this.carriedPlan = null;
            this.machine.transition("paused");
            this.emit(DownloadTaskEventName.Pause, this.info);
            return;
        }

        for (const segment of this.info.segments) {
            if (!isSegmentComplete(segment)) segment.state = "paused";
        }
        this.carriedPlan = this.toResumeRecord();
        await this.persist();
        if (this.stopReason === "cancel") {
            await this.settleCancelled();
            return;
        }
        this.machine.transition("paused");
        this.emit(DownloadTaskEventName.Pause, this.info);
    }

    private async settleFailed(error: DownloadError): Promise<void> {
        if (this.machine.is("failed")) return;
        if (this.stopReason === "cancel") {
            await this.settleCancelled();
            return;
        }

        this.info.error = error;
        // The file is left in place; only cancellation removes it.
        if (this.info.segments.length > 0) {
            this.carriedPlan = this.toResumeRecord();
            await this.persist().catch((persistError: unknown) => {
                logger.warn(
                    `Task ${this.id}: could not save state after failure: ${classifyError(persistError).message}`
                );
            });
        }
        if (this.stopReason === "cancel") {
            await this.settleCancelled();
            return;
        }

        this.machine.transition("failed");
        const cause = formatDownloadError(error);
        logger.error(`Task ${this.id} failed: ${cause}`);
        this.emit(DownloadTaskEventName.Error, this.info, error);
        this.emitTerminal({ state: "failed", info: this.info, error, cause });
    }

    private async settleCancelled(): Promise<void> {
        if (this.machine.is("cancelled")) return;

        await this.closeWriter();
        await this.store.delete(this.id);
        await SegmentWriter.delete(this.info.destinationPath);

        this.carriedPlan = null;
        this.machine.transition("cancelled");
        this.emit(DownloadTaskEventName.Cancel, this.info);
        this.emitTerminal({ state: "cancelled", info: this.info });
    }

    private emitTerminal(terminal: TerminalState): void {
        this.emit(DownloadTaskEventName.Terminal, terminal);
    }

    toResumeRecord(): ResumeRecord {
        return {
            version: RESUME_RECORD_VERSION,
            taskId: this.id,
            url: this.info.url,
            destinationPath: this.info.destinationPath,
            totalSize: this.info.totalSize,
            segmentCount: this.info.segmentCount,
            supportsRanges: this.supportsRanges,
            etag: this.validators.etag,
            lastModified: this.validators.lastModified,
            expectedHash: this.info.expectedHash,
            segments: this.info.segments.map(segment => ({ ...segment })),
            createdAt: this.info.createdAt.toISOString(),
            updatedAt: new Date().toISOString(),
        };
    }

    private async persist(): Promise<void> {
        await this.store.save(this.toResumeRecord());
    }

    private startAutoSave(): void {
        if (this.options.autoSaveInterval <= 0) return;

        this.stopAutoSave();
        this.autoSaveTimer = setInterval(() => {
            this.persist().catch((error: unknown) => {
                logger.warn(`Task ${this.id}: autosave failed: ${classifyError(error).message}`);
            });
        }, this.options.autoSaveInterval * 1000);
    }

    private stopAutoSave(): void {
        if (this.autoSaveTimer) {
            clearInterval(this.autoSaveTimer);
            this.autoSaveTimer = null;
        }
    }

    private async closeWriter(): Promise<void> {
        const writer = this.writer;
        this.writer = null;
        await writer?.close();
    }
}
