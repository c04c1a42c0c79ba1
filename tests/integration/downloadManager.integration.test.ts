import { createHash } from "node:crypto";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import { DownloadManager } from "@/core";
import { VerificationError } from "@/errors";
import { DownloadManagerEventName } from "@/types";
import { ResumeStore } from "@/storage";
import type { EngineOptions, ResumeRecord, TerminalState } from "@/types";
import { LogLevel, log } from "@/utils/logger";
import { TestServer, createPayload, rangeStarts } from "../helpers/testServer";

const TEST_TIMEOUT_MS = 20_000;
const KB = 1024;
const MB = 1024 * KB;

let workDir: string;
let resumeDir: string;
let server: TestServer | null = null;

function createManager(options: EngineOptions = {}): DownloadManager {
    return new DownloadManager({
        resumeDirectory: resumeDir,
        retryDelay: 10,
        maxRetryDelay: 50,
        progressInterval: 20,
        autoSaveInterval: 0,
        connectTimeout: 2000,
        readTimeout: 5000,
        ...options,
    });
}

async function startServer(...args: ConstructorParameters<typeof TestServer>): Promise<TestServer> {
    server = new TestServer(...args);
    await server.start();
    return server;
}

/** Wait for the task's current run and return the terminal state it reported, if any. */
async function settle(manager: DownloadManager, taskId: string): Promise<TerminalState | null> {
    const outcome: { terminal: TerminalState | null } = { terminal: null };
    const unsubscribe = manager.subscribe(
        taskId,
        () => undefined,
        terminal => {
            outcome.terminal = terminal;
        }
    );
    await manager.waitFor(taskId);
    unsubscribe();
    return outcome.terminal;
}

function recordPath(taskId: string): string {
    return join(resumeDir, `${taskId}.splitfetch.json`);
}

describe("DownloadManager integration", () => {
    beforeAll(() => {
        log.setLevel(LogLevel.SILENT);
    });

    afterAll(() => {
        log.setLevel(LogLevel.INFO);
    });

    beforeEach(async () => {
        workDir = await mkdtemp(join(tmpdir(), "splitfetch-it-"));
        resumeDir = join(workDir, "resume");
    });

    afterEach(async () => {
        await server?.close();
        server = null;
        await rm(workDir, { recursive: true, force: true });
    });

    test(
        "downloads 10 MiB in four ranged segments",
        async () => {
            const payload = createPayload(10 * MB);
            const { url, requests } = await startServer(payload);
            const destination = join(workDir, "ten.bin");

            const manager = createManager();
            const taskId = manager.enqueue(url, destination, 4);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            const content = await readFile(destination);
            expect(content.length).toBe(10_485_760);
            expect(content.equals(payload)).toBe(true);
            expect(rangeStarts(requests).sort((a, b) => a - b)).toEqual([
                0, 2621440, 5242880, 7864320,
            ]);
            expect(existsSync(recordPath(taskId))).toBe(false);
            expect(manager.getTask(taskId)).toBeUndefined();
        },
        TEST_TIMEOUT_MS
    );

    test(
        "falls back to one segment when ranges are not advertised",
        async () => {
            const payload = createPayload(2 * MB);
            const { url, requests } = await startServer(payload, { acceptRanges: false });
            const destination = join(workDir, "single.bin");

            const manager = createManager();
            const taskId = manager.enqueue(url, destination, 4);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            expect(terminal?.info.segments).toHaveLength(1);
            expect((await readFile(destination)).equals(payload)).toBe(true);
            expect(requests.filter(request => request.method === "GET")).toEqual([
                { method: "GET", range: "bytes=0-0" },
                { method: "GET", range: null },
            ]);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "falls back to a single stream when ranged requests get the full body",
        async () => {
            const payload = createPayload(8 * MB);
            const { url, requests } = await startServer(payload, { ignoreRanges: true });
            const destination = join(workDir, "ignored.bin");

            const manager = createManager();
            const taskId = manager.enqueue(url, destination, 4);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            expect(terminal?.info.segments).toHaveLength(1);
            expect((await readFile(destination)).equals(payload)).toBe(true);
            const fullBodyGets = requests.filter(
                request => request.method === "GET" && request.range === null
            );
            expect(fullBodyGets).toHaveLength(1);
            expect(rangeStarts(requests).length).toBeLessThanOrEqual(4);
            expect(requests.filter(request => request.method === "HEAD")).toHaveLength(2);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "recovers from three transient 5xx responses",
        async () => {
            const payload = createPayload(512 * KB);
            const { url, requests } = await startServer(payload, { failNextGets: 3 });
            const destination = join(workDir, "flaky.bin");

            const manager = createManager({ retries: 3 });
            const taskId = manager.enqueue(url, destination, 1);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            expect((await readFile(destination)).equals(payload)).toBe(true);
            expect(requests.filter(request => request.method === "GET")).toHaveLength(4);
            expect(terminal?.info.segments[0].retries).toBe(3);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "retries one segment of four without refetching the others",
        async () => {
            const payload = createPayload(2 * MB);
            const segmentSize = 512 * KB;
            const { url, requests } = await startServer(payload, {
                targetStart: 2 * segmentSize,
                failNextGets: 3,
            });
            const destination = join(workDir, "third-segment.bin");

            const manager = createManager({ retries: 3, minSegmentSize: "256KB" });
            const taskId = manager.enqueue(url, destination, 4);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            expect((await readFile(destination)).equals(payload)).toBe(true);
            expect(rangeStarts(requests).sort((a, b) => a - b)).toEqual([
                0,
                segmentSize,
                2 * segmentSize,
                2 * segmentSize,
                2 * segmentSize,
                2 * segmentSize,
                3 * segmentSize,
            ]);
            expect(terminal?.info.segments.map(segment => segment.retries)).toEqual([0, 0, 3, 0]);
            expect(terminal?.info.segments.map(segment => segment.downloadedBytes)).toEqual([
                segmentSize,
                segmentSize,
                segmentSize,
                segmentSize,
            ]);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "retries a response that stalls past the read timeout",
        async () => {
            const payload = createPayload(256 * KB);
            const { url, requests } = await startServer(payload, { stallNextGets: 1 });
            const destination = join(workDir, "stalled.bin");

            const manager = createManager({ retries: 2, readTimeout: 300 });
            const taskId = manager.enqueue(url, destination, 1);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            expect((await readFile(destination)).equals(payload)).toBe(true);
            expect(requests.filter(request => request.method === "GET")).toHaveLength(2);
            expect(terminal?.info.segments[0].retries).toBe(1);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "re-probes and re-plans when the remote file shrinks mid-download",
        async () => {
            const payload = createPayload(2 * MB);
            const shrunk = createPayload(MB);
            const { url, requests } = await startServer(payload, { payloadAfterHead: shrunk });
            const destination = join(workDir, "shrunk.bin");

            const manager = createManager({ minSegmentSize: "256KB" });
            const taskId = manager.enqueue(url, destination, 4);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            expect(terminal?.info.totalSize).toBe(MB);
            expect((await readFile(destination)).equals(shrunk)).toBe(true);
            expect(requests.filter(request => request.method === "HEAD")).toHaveLength(2);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "fails once the retries are used up",
        async () => {
            const payload = createPayload(256 * KB);
            const { url, requests } = await startServer(payload, { failNextGets: 10 });
            const destination = join(workDir, "down.bin");

            const manager = createManager({ retries: 2 });
            const taskId = manager.enqueue(url, destination, 1);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("failed");
            if (terminal?.state !== "failed") return;
            expect(terminal.error.kind).toBe("transientNetwork");
            expect(terminal.cause).toBe(`Network failure: HTTP 503 from ${url}`);
            expect(requests.filter(request => request.method === "GET")).toHaveLength(3);
            expect(manager.getTask(taskId)?.state).toBe("failed");
            expect(existsSync(recordPath(taskId))).toBe(true);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "best-effort policy gives a failed segment further rounds",
        async () => {
            const payload = createPayload(256 * KB);
            const { url } = await startServer(payload, { failNextGets: 2 });
            const destination = join(workDir, "rounds.bin");

            const manager = createManager({
                retries: 0,
                segmentPolicy: "bestEffort",
                segmentRetryRounds: 2,
            });
            const taskId = manager.enqueue(url, destination, 1);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            expect((await readFile(destination)).equals(payload)).toBe(true);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "continues a segment after the connection drops mid-body",
        async () => {
            const payload = createPayload(MB);
            const { url, requests } = await startServer(payload, {
                dropNextGets: 1,
                dropAfterBytes: 100 * KB,
            });
            const destination = join(workDir, "dropped.bin");

            const manager = createManager();
            const taskId = manager.enqueue(url, destination, 1);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            expect((await readFile(destination)).equals(payload)).toBe(true);
            expect(rangeStarts(requests)).toHaveLength(2);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "pauses, survives a restart and resumes to identical bytes",
        async () => {
            const payload = createPayload(2 * MB);
            const segmentSize = 512 * KB;
            const testServer = await startServer(payload, { chunkDelayMs: 10, chunkSize: 8 * KB });
            const destination = join(workDir, "paused.bin");

            const manager = createManager({ minSegmentSize: "256KB" });
            const taskId = manager.enqueue(testServer.url, destination, 4);
            const unsubscribe = manager.subscribe(taskId, snapshot => {
                if (snapshot.downloadedBytes > 0) manager.pause(taskId);
            });
            await manager.waitFor(taskId);
            unsubscribe();

            const paused = manager.getTask(taskId);
            expect(paused?.state).toBe("paused");
            const partial = (paused?.segments ?? []).reduce((sum, s) => sum + s.downloadedBytes, 0);
            expect(partial).toBeGreaterThan(0);
            expect(partial).toBeLessThan(payload.length);
            expect(existsSync(recordPath(taskId))).toBe(true);

            testServer.script.chunkDelayMs = 0;
            const requestsBefore = testServer.requests.length;

            const restarted = createManager({ minSegmentSize: "256KB" });
            const resumable = await restarted.listResumable();
            expect(resumable).toEqual([
                {
                    taskId,
                    url: testServer.url,
                    destinationPath: destination,
                    partialBytes: partial,
                    totalSize: payload.length,
                },
            ]);
            expect(restarted.getTask(taskId)?.state).toBe("paused");

            expect(restarted.resume(taskId)).toBe(true);
            const terminal = await settle(restarted, taskId);

            expect(terminal?.state).toBe("completed");
            expect((await readFile(destination)).equals(payload)).toBe(true);
            const resumedStarts = rangeStarts(testServer.requests.slice(requestsBefore));
            expect(resumedStarts.some(start => start % segmentSize !== 0)).toBe(true);
            expect(existsSync(recordPath(taskId))).toBe(false);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "starts over when the remote file changed while paused",
        async () => {
            const original = createPayload(2 * MB);
            const segmentSize = 512 * KB;
            const testServer = await startServer(original, { chunkDelayMs: 10, chunkSize: 8 * KB });
            const destination = join(workDir, "changed.bin");

            const manager = createManager({ minSegmentSize: "256KB" });
            const taskId = manager.enqueue(testServer.url, destination, 4);
            const unsubscribe = manager.subscribe(taskId, snapshot => {
                if (snapshot.downloadedBytes > 0) manager.pause(taskId);
            });
            await manager.waitFor(taskId);
            unsubscribe();
            expect(manager.getTask(taskId)?.state).toBe("paused");

            const replacement = Buffer.from(original.map(byte => 255 - byte));
            testServer.payload = replacement;
            testServer.script.etag = '"v2"';
            testServer.script.chunkDelayMs = 0;
            const requestsBefore = testServer.requests.length;

            expect(manager.resume(taskId)).toBe(true);
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("completed");
            expect((await readFile(destination)).equals(replacement)).toBe(true);
            const starts = rangeStarts(testServer.requests.slice(requestsBefore));
            expect(starts.sort((a, b) => a - b)).toEqual([
                0,
                segmentSize,
                2 * segmentSize,
                3 * segmentSize,
            ]);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "cancel removes the partial file and the resume record",
        async () => {
            const payload = createPayload(2 * MB);
            const { url } = await startServer(payload, { chunkDelayMs: 10, chunkSize: 8 * KB });
            const destination = join(workDir, "cancelled.bin");

            const manager = createManager({ minSegmentSize: "256KB" });
            const taskId = manager.enqueue(url, destination, 4);
            const cancelled: { promise: Promise<boolean> | null } = { promise: null };
            const terminal = await (async () => {
                const outcome: { terminal: TerminalState | null } = { terminal: null };
                const unsubscribe = manager.subscribe(
                    taskId,
                    snapshot => {
                        if (snapshot.downloadedBytes > 0 && !cancelled.promise)
                            cancelled.promise = manager.cancel(taskId);
                    },
                    state => {
                        outcome.terminal = state;
                    }
                );
                await manager.waitFor(taskId);
                unsubscribe();
                return outcome.terminal;
            })();

            expect(await cancelled.promise).toBe(true);
            expect(terminal?.state).toBe("cancelled");
            expect(existsSync(destination)).toBe(false);
            expect(existsSync(recordPath(taskId))).toBe(false);
            expect(manager.getTask(taskId)).toBeUndefined();
        },
        TEST_TIMEOUT_MS
    );

    test(
        "cancel wins over a pause that is still saving its checkpoint",
        async () => {
            const payload = createPayload(2 * MB);
            const { url } = await startServer(payload, { chunkDelayMs: 10, chunkSize: 8 * KB });
            const destination = join(workDir, "pause-then-cancel.bin");

            const manager = createManager({ minSegmentSize: "256KB" });
            const taskId = manager.enqueue(url, destination, 4);

            const pending: { pauseRequested: boolean; cancel: Promise<boolean> | null } = {
                pauseRequested: false,
                cancel: null,
            };
            const save = ResumeStore.prototype.save;
            const saveSpy = vi
                .spyOn(ResumeStore.prototype, "save")
                .mockImplementation(function (this: ResumeStore, record: ResumeRecord) {
                    if (pending.pauseRequested && !pending.cancel)
                        pending.cancel = manager.cancel(taskId);
                    return save.call(this, record);
                });

            try {
                const unsubscribe = manager.subscribe(taskId, snapshot => {
                    if (snapshot.downloadedBytes > 0 && manager.pause(taskId))
                        pending.pauseRequested = true;
                });
                await manager.waitFor(taskId);
                unsubscribe();
                expect(await pending.cancel).toBe(true);
            } finally {
                saveSpy.mockRestore();
            }

            expect(manager.getTask(taskId)).toBeUndefined();
            expect(existsSync(destination)).toBe(false);
            expect(existsSync(recordPath(taskId))).toBe(false);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "keeps the file and fails when the digest does not match",
        async () => {
            const payload = createPayload(256 * KB);
            const { url } = await startServer(payload);
            const destination = join(workDir, "tampered.bin");

            const manager = createManager();
            const taskId = manager.enqueue(url, destination, 2, {
                expectedHash: `sha256:${"0".repeat(64)}`,
            });
            const terminal = await settle(manager, taskId);

            expect(terminal?.state).toBe("failed");
            if (terminal?.state !== "failed") return;
            expect(terminal.error).toBeInstanceOf(VerificationError);
            expect(terminal.cause.startsWith("Integrity check failed: sha256 mismatch")).toBe(true);
            expect((await readFile(destination)).equals(payload)).toBe(true);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "completes when the digest matches",
        async () => {
            const payload = createPayload(256 * KB);
            const { url } = await startServer(payload);
            const destination = join(workDir, "verified.bin");
            const digest = createHash("sha256").update(payload).digest("hex");

            const manager = createManager();
            const taskId = manager.enqueue(url, destination, 2, { expectedHash: digest });

            expect((await settle(manager, taskId))?.state).toBe("completed");
        },
        TEST_TIMEOUT_MS
    );

    test(
        "rejects a malformed digest before downloading",
        async () => {
            const { url, requests } = await startServer(createPayload(KB));
            const manager = createManager();

            expect(() =>
                manager.enqueue(url, join(workDir, "x.bin"), 1, { expectedHash: "not-a-digest" })
            ).toThrow("Unrecognised hash: not-a-digest");
            expect(requests).toHaveLength(0);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "runs one task at a time under maxConcurrentDownloads 1",
        async () => {
            const payload = createPayload(256 * KB);
            const { url } = await startServer(payload);

            const manager = createManager({ maxConcurrentDownloads: 1 });
            const events: string[] = [];
            manager.on(DownloadManagerEventName.Start, info => events.push(`start:${info.id}`));
            manager.on(DownloadManagerEventName.Complete, info => events.push(`complete:${info.id}`));

            const first = manager.enqueue(url, join(workDir, "first.bin"), 2);
            const second = manager.enqueue(url, join(workDir, "second.bin"), 2);
            expect(manager.getTask(second)?.state).toBe("queued");

            await manager.waitForAll();

            expect(events).toEqual([
                `start:${first}`,
                `complete:${first}`,
                `start:${second}`,
                `complete:${second}`,
            ]);
        },
        TEST_TIMEOUT_MS
    );

    test(
        "caps segment requests across tasks",
        async () => {
            const payload = createPayload(MB);
            const testServer = await startServer(payload, { chunkDelayMs: 2, chunkSize: 32 * KB });

            const manager = createManager({ maxTotalConnections: 2, minSegmentSize: "128KB" });
            manager.enqueue(testServer.url, join(workDir, "a.bin"), 4);
            manager.enqueue(testServer.url, join(workDir, "b.bin"), 4);
            await manager.waitForAll();

            expect(rangeStarts(testServer.requests)).toHaveLength(8);
            expect(testServer.peakConcurrentGets).toBeGreaterThan(0);
            expect(testServer.peakConcurrentGets).toBeLessThanOrEqual(2);
        },
        TEST_TIMEOUT_MS
    );
});
