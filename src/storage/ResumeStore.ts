import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { FilesystemError, ResumeCorruptError, classifyError } from "@/errors";
import { validatePlan } from "@/core/SegmentPlanner";
import type { ResumableDownload, ResumeRecord } from "@/types";
import { RESUME_FILE_EXTENSION } from "@/utils/constants";
import { ignoreFileNotFound } from "@/utils/common";
import { log } from "@/utils/logger";

const logger = log.child("ResumeStore");

const segmentSchema = z.object({
    index: z.number().int().nonnegative(),
    start: z.number().int().nonnegative(),
    end: z.number().int().min(-1).nullable(),
    downloadedBytes: z.number().int().nonnegative(),
    state: z.enum(["pending", "inFlight", "paused", "completed", "failed"]),
    retries: z.number().int().nonnegative().default(0),
});

// Unknown keys are stripped, so records written by newer versions still load.
const resumeRecordSchema = z.object({
    version: z.number().int().positive(),
    taskId: z.string().min(1),
    url: z.string().url(),
    destinationPath: z.string().min(1),
    totalSize: z.number().int().nonnegative().nullable(),
    segmentCount: z.number().int().positive().default(1),
    supportsRanges: z.boolean(),
    etag: z.string().nullable().default(null),
    lastModified: z.string().nullable().default(null),
    expectedHash: z.string().optional(),
    segments: z.array(segmentSchema).min(1),
    createdAt: z.string(),
    updatedAt: z.string(),
});

const TASK_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * One JSON file per task under a directory. Writes go to a temporary file
 * that is renamed over the record, so a crash leaves either the previous or
 * the new record on disk, never a torn one.
 */
export class ResumeStore {
    private queues = new Map<string, Promise<unknown>>();

    constructor(readonly directory: string) {}

    pathFor(taskId: string): string {
        if (!TASK_ID_PATTERN.test(taskId)) throw new Error(`Invalid task id: ${taskId}`);
        return join(this.directory, `${taskId}${RESUME_FILE_EXTENSION}`);
    }

    /**
     * Operations on the same task run one after another, so a late autosave
     * can never resurrect a record that was just deleted.
     */
    private enqueue<T>(taskId: string, operation: () => Promise<T>): Promise<T> {
        const previous = this.queues.get(taskId) ?? Promise.resolve();
        const next = previous.then(operation, operation);
        const settled = next.then(
            () => undefined,
            () => undefined
        );
        this.queues.set(taskId, settled);
        void settled.then(() => {
            if (this.queues.get(taskId) === settled) this.queues.delete(taskId);
        });
        return next;
    }

    save(record: ResumeRecord): Promise<void> {
        const target = this.pathFor(record.taskId);
        return this.enqueue(record.taskId, async () => {
            const temp = `${target}.${randomUUID()}.tmp`;
            try {
                await mkdir(this.directory, { recursive: true });
                await writeFile(temp, JSON.stringify(record, null, 2), "utf-8");
                await rename(temp, target);
            } catch (error) {
                await unlink(temp).catch((cleanupError: unknown) => {
                    if (!ignoreFileNotFound(cleanupError))
                        logger.warn(`Could not remove ${temp}: ${String(cleanupError)}`);
                });
                throw new FilesystemError(
                    `Cannot save resume record ${target}: ${classifyError(error).message}`,
                    target,
                    { cause: error }
                );
            }
        });
    }

    /**
     * Returns null when no record exists; throws ResumeCorruptError when one
     * exists but cannot be trusted.
     */
    load(taskId: string): Promise<ResumeRecord | null> {
        const target = this.pathFor(taskId);
        return this.enqueue(taskId, async () => {
            let content: string;
            try {
                content = await readFile(target, "utf-8");
            } catch (error) {
                if (ignoreFileNotFound(error)) return null;
                throw new FilesystemError(
                    `Cannot read resume record ${target}: ${classifyError(error).message}`,
                    target,
                    { cause: error }
                );
            }
            return parseResumeRecord(taskId, content);
        });
    }

    delete(taskId: string): Promise<void> {
        const target = this.pathFor(taskId);
        return this.enqueue(taskId, async () => {
            await unlink(target).catch((error: unknown) => {
                if (!ignoreFileNotFound(error)) throw error;
            });
        });
    }

    /**
     * All loadable records. Corrupt ones are reported and skipped.
     */
    async list(): Promise<ResumeRecord[]> {
        let entries: string[];
        try {
            entries = await readdir(this.directory);
        } catch (error) {
            if (ignoreFileNotFound(error)) return [];
            throw error;
        }

        const records: ResumeRecord[] = [];
        for (const entry of entries.sort()) {
            if (!entry.endsWith(RESUME_FILE_EXTENSION)) continue;
            const taskId = entry.slice(0, -RESUME_FILE_EXTENSION.length);
            if (!TASK_ID_PATTERN.test(taskId)) continue;

            try {
                const record = await this.load(taskId);
                if (record) records.push(record);
            } catch (error) {
                if (!(error instanceof ResumeCorruptError)) throw error;
                logger.warn(`Skipping unreadable resume record ${entry}: ${error.message}`);
            }
        }
        return records;
    }
}

export function parseResumeRecord(taskId: string, content: string): ResumeRecord {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new ResumeCorruptError(taskId, `Resume record for ${taskId} is not valid JSON`, {
            cause: error,
        });
    }

    const result = resumeRecordSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue ? `${issue.path.join(".") || "record"}: ${issue.message}` : "invalid";
        throw new ResumeCorruptError(taskId, `Resume record for ${taskId} is invalid (${where})`);
    }

    const record: ResumeRecord = result.data;
    if (record.taskId !== taskId)
        throw new ResumeCorruptError(
            taskId,
            `Resume record for ${taskId} belongs to task ${record.taskId}`
        );

    const planProblem = validatePlan(record.segments, record.totalSize);
    if (planProblem)
        throw new ResumeCorruptError(taskId, `Resume record for ${taskId}: ${planProblem}`);

    return record;
}

export function toResumableDownload(record: ResumeRecord): ResumableDownload {
    return {
        taskId: record.taskId,
        url: record.url,
        destinationPath: record.destinationPath,
        partialBytes: record.segments.reduce((sum, segment) => sum + segment.downloadedBytes, 0),
        totalSize: record.totalSize,
    };
}
