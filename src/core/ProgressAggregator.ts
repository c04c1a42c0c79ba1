import type { ProgressSnapshot } from "@/types";

export interface ProgressAggregatorOptions {
    taskId: string;
    totalBytes: number | null;
    initialBytes?: number;
    publishInterval: number;
    speedWindow: number;
    activeSegments?: () => number;
    onPublish: (snapshot: ProgressSnapshot) => void;
}

interface SpeedSample {
    at: number;
    bytes: number;
}

/**
 * Single sink for the byte deltas of every worker of a task.
 *
 * Workers call `record` from their read loops; all accumulation happens
 * here, on the event loop, so the running total always equals the sum of
 * deltas received. Snapshots go out at most once per `publishInterval`
 * with a trailing publish, so bursts collapse into one update and the last
 * value is never dropped.
 */
export class ProgressAggregator {
    private downloaded: number;
    private readonly totalBytes: number | null;
    private samples: SpeedSample[] = [];
    private sessionStart = Date.now();
    private lastPublish = 0;
    private publishTimer: ReturnType<typeof setTimeout> | null = null;
    private stopped = false;

    constructor(private readonly options: ProgressAggregatorOptions) {
        this.downloaded = options.initialBytes ?? 0;
        this.totalBytes = options.totalBytes;
    }

    get downloadedBytes(): number {
        return this.downloaded;
    }

    /**
     * Begin a new measuring session, e.g. after resume; old samples would
     * otherwise make the first speeds look too low.
     */
    restart(initialBytes = this.downloaded): void {
        this.downloaded = initialBytes;
        this.samples = [];
        this.sessionStart = Date.now();
        this.stopped = false;
    }

    record(delta: number): void {
        if (delta === 0) return;
        this.downloaded += delta;
        if (delta > 0) this.samples.push({ at: Date.now(), bytes: delta });
        this.schedulePublish();
    }

    speed(now = Date.now()): number {
        const windowStart = now - this.options.speedWindow;
        while (this.samples.length > 0 && this.samples[0].at <= windowStart) this.samples.shift();

        const elapsed = Math.min(this.options.speedWindow, now - this.sessionStart);
        if (elapsed <= 0 || this.samples.length === 0) return 0;

        const bytes = this.samples.reduce((sum, sample) => sum + sample.bytes, 0);
        return Math.floor((bytes * 1000) / elapsed);
    }

    snapshot(now = Date.now()): ProgressSnapshot {
        const total = this.totalBytes;
        const downloaded = total === null ? this.downloaded : Math.min(this.downloaded, total);
        const speed = this.speed(now);
        const eta = total !== null && speed > 0 ? Math.max(0, total - downloaded) / speed : null;
        const percent =
            total === null ? null : total === 0 ? 100 : Math.min(100, (downloaded / total) * 100);

        return Object.freeze({
            taskId: this.options.taskId,
            downloadedBytes: downloaded,
            totalBytes: total,
            percent,
            speed,
            eta,
            activeSegments: this.options.activeSegments?.() ?? 0,
            timestamp: now,
        });
    }

    private schedulePublish(): void {
        if (this.stopped || this.publishTimer) return;

        const wait = this.lastPublish + this.options.publishInterval - Date.now();
        if (wait <= 0) {
            this.publish();
            return;
        }
        this.publishTimer = setTimeout(() => {
            this.publishTimer = null;
            this.publish();
        }, wait);
    }

    private publish(): void {
        if (this.stopped) return;
        const now = Date.now();
        this.lastPublish = now;
        this.options.onPublish(this.snapshot(now));
    }

    /**
     * Publish right now, bypassing the rate limit.
     */
    flush(): void {
        this.clearTimer();
        this.publish();
    }

    stop(): void {
        this.clearTimer();
        this.stopped = true;
    }

    private clearTimer(): void {
        if (this.publishTimer) {
            clearTimeout(this.publishTimer);
            this.publishTimer = null;
        }
    }
}
