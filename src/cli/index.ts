#!/usr/bin/env node

import { existsSync } from "node:fs";
import { basename, join, parse, resolve } from "node:path";
import { Command } from "commander";
import { DownloadManager } from "@/core";
import { formatDownloadError } from "@/errors";
import type {
    DownloadTaskInfo,
    EngineOptions,
    FileAllocation,
    ProgressSnapshot,
    SegmentPolicy,
    TerminalState,
} from "@/types";
import { DownloadManagerEventName } from "@/types";
import { extractFilename, formatBytes, formatDuration } from "@/utils/common";
import { GID_LENGTH, GID_PREFIX } from "@/utils/constants";
import { log, parseLogLevel } from "@/utils/logger";

interface GlobalOptions {
    resumeDir?: string;
    logLevel: string;
    verbose?: boolean;
}

interface GetOptions {
    output?: string;
    segments: string;
    sha256?: string;
    hash?: string;
    minSegmentSize: string;
    maxConnections: string;
    retries: string;
    allocation: FileAllocation;
    policy: SegmentPolicy;
    header: string[];
}

function parseNumberOption(value: string, optionName: string, allowZero = false): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed < 0 || (!allowZero && parsed === 0)) {
        throw new Error(`Invalid value for ${optionName}: ${value}`);
    }
    return parsed;
}

function collectHeader(value: string, previous: string[]): string[] {
    return [...previous, value];
}

function parseHeaders(values: string[]): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const value of values) {
        const separator = value.indexOf(":");
        if (separator <= 0) throw new Error(`Invalid header: ${value}`);
        headers[value.slice(0, separator).trim()] = value.slice(separator + 1).trim();
    }
    return headers;
}

function findAvailablePath(filePath: string): string {
    if (!existsSync(filePath)) return filePath;

    const { dir, name, ext } = parse(filePath);
    for (let counter = 1; ; counter++) {
        const candidate = join(dir, `${name}.${counter}${ext}`);
        if (!existsSync(candidate)) return candidate;
    }
}

function shortId(taskId: string): string {
    return GID_PREFIX + taskId.replace(/-/g, "").slice(0, GID_LENGTH);
}

function setupLogging(options: GlobalOptions): void {
    log.setLevel(parseLogLevel(options.verbose ? "debug" : options.logLevel));
}

function createManager(options: GlobalOptions, extra: EngineOptions = {}): DownloadManager {
    return new DownloadManager({
        ...extra,
        ...(options.resumeDir ? { resumeDirectory: options.resumeDir } : {}),
    });
}

/**
 * Render progress for one task until its current run settles. SIGINT
 * pauses the task so it can be picked up later with `resume`.
 */
async function follow(manager: DownloadManager, taskId: string): Promise<TerminalState | null> {
    const gid = shortId(taskId);
    const startTime = Date.now();
    const outcome: { terminal: TerminalState | null } = { terminal: null };
    let interrupted = false;

    const onProgress = (snapshot: ProgressSnapshot) => {
        if (interrupted) return;
        const total = snapshot.totalBytes === null ? "?" : formatBytes(snapshot.totalBytes);
        const percent = snapshot.percent === null ? "" : `(${snapshot.percent.toFixed(1)}%)`;
        log.progress({
            gid,
            progressText: `${formatBytes(snapshot.downloadedBytes)}/${total}${percent}`,
            connections: snapshot.activeSegments,
            speedText: snapshot.speed > 0 ? `${formatBytes(snapshot.speed)}/s` : "--",
            etaText: formatDuration(snapshot.eta),
        });
    };

    const unsubscribe = manager.subscribe(taskId, onProgress, state => {
        outcome.terminal = state;
    });

    const seenRedirects = new Set<string>();
    const redirectHandler = (info: DownloadTaskInfo, _fromUrl: string, toUrl: string) => {
        if (info.id !== taskId || seenRedirects.has(toUrl)) return;
        seenRedirects.add(toUrl);
        log.info(`${gid} Redirecting to ${toUrl}`);
    };
    manager.on(DownloadManagerEventName.Redirect, redirectHandler);

    const shutdownHandler = () => {
        if (interrupted) return;
        interrupted = true;
        log.stopProgress();
        log.info("Shutdown sequence commencing...");
        manager.pause(taskId);
    };
    process.on("SIGINT", shutdownHandler);

    try {
        await manager.waitFor(taskId);
    } finally {
        unsubscribe();
        manager.off(DownloadManagerEventName.Redirect, redirectHandler);
        process.off("SIGINT", shutdownHandler);
        log.stopProgress();
    }

    const result = outcome.terminal;
    if (result === null) {
        const info = manager.getTask(taskId);
        log.info(`Download ${gid} not complete: ${info?.destinationPath ?? taskId}`);
        log.info(`Continue it with: splitfetch resume ${taskId}`);
        return null;
    }

    reportTerminal(result, gid, startTime);
    return result;
}

function reportTerminal(terminal: TerminalState, gid: string, startTime: number): void {
    const { info } = terminal;
    switch (terminal.state) {
        case "completed": {
            const size = info.totalSize ?? 0;
            const elapsed = (Date.now() - startTime) / 1000;
            const avgSpeed = elapsed > 0 ? `${formatBytes(size / elapsed)}/s` : "--";
            log.success(
                `Download complete: ${formatBytes(size)} in ${formatDuration(elapsed)} (${avgSpeed})`
            );
            log.info(`Saved to: ${info.destinationPath}`);
            break;
        }
        case "failed":
            log.error(`Download ${gid} failed: ${terminal.cause}`);
            process.exitCode = 1;
            break;
        case "cancelled":
            log.info(`Download ${gid} cancelled`);
            break;
    }
}

const program = new Command();

program
    .name("splitfetch")
    .description("Segmented, resumable HTTP downloader")
    .version("0.1.0")
    .option("--resume-dir <dir>", "Directory holding resume records")
    .option("--log-level <level>", "Set log level (debug, info, warn, error, silent)", "info")
    .option("-v, --verbose", "Alias for --log-level debug");

program
    .command("get")
    .description("Download a URL")
    .argument("<url>", "URL to download")
    .option("-o, --output <file>", "Destination file")
    .option("-s, --segments <number>", "Number of parallel segments", "5")
    .option("-x, --max-connections <number>", "Maximum concurrent connections", "16")
    .option("-k, --min-segment-size <size>", "Smallest segment worth splitting (e.g. 1MB, 512KB)", "1MB")
    .option("--retries <number>", "Retries per segment", "3")
    .option("--sha256 <hex>", "Expected SHA-256 digest")
    .option("--hash <algorithm:hex>", "Expected digest, e.g. sha1:2fd4e1...")
    .option("-a, --allocation <method>", "File allocation method (none|trunc|prealloc)", "trunc")
    .option("--policy <policy>", "Segment failure policy (failFast|bestEffort)", "failFast")
    .option("-H, --header <header>", "Extra request header, repeatable", collectHeader, [])
    .action(async (url: string, options: GetOptions) => {
        const globals = program.opts<GlobalOptions>();
        setupLogging(globals);

        const manager = createManager(globals, {
            segments: parseNumberOption(options.segments, "--segments"),
            maxTotalConnections: parseNumberOption(options.maxConnections, "--max-connections"),
            minSegmentSize: options.minSegmentSize,
            retries: parseNumberOption(options.retries, "--retries", true),
            fileAllocation: options.allocation,
            segmentPolicy: options.policy,
        });

        const destination = options.output
            ? resolve(options.output)
            : findAvailablePath(resolve(extractFilename(url)));
        if (!options.output && basename(destination) !== extractFilename(url))
            log.info(`File already exists. Renamed to ${destination}.`);

        const expectedHash = options.hash ?? (options.sha256 ? `sha256:${options.sha256}` : undefined);
        const taskId = manager.enqueue(url, destination, undefined, {
            expectedHash,
            headers: parseHeaders(options.header),
        });

        log.debug(`Task ${taskId}: ${url} -> ${destination}`);
        await follow(manager, taskId);
    });

program
    .command("list")
    .description("List downloads that can be resumed")
    .action(async () => {
        const globals = program.opts<GlobalOptions>();
        setupLogging(globals);

        const resumable = await createManager(globals).listResumable();
        if (resumable.length === 0) {
            log.info("No resumable downloads");
            return;
        }

        for (const entry of resumable) {
            const total = entry.totalSize === null ? "?" : formatBytes(entry.totalSize);
            const percent =
                entry.totalSize && entry.totalSize > 0
                    ? ` (${((entry.partialBytes / entry.totalSize) * 100).toFixed(1)}%)`
                    : "";
            process.stdout.write(
                `${entry.taskId}  ${formatBytes(entry.partialBytes)}/${total}${percent}  ${entry.destinationPath}  ${entry.url}\n`
            );
        }
    });

program
    .command("resume")
    .description("Continue a paused or failed download")
    .argument("<taskId>", "Task id as shown by `list`")
    .action(async (taskId: string) => {
        const globals = program.opts<GlobalOptions>();
        setupLogging(globals);

        const manager = createManager(globals);
        const resumable = await manager.loadResumable();
        const entry = resumable.find(candidate => candidate.taskId === taskId);
        if (!entry || !manager.resume(taskId)) {
            log.error(`No resumable download with id ${taskId}`);
            process.exitCode = 1;
            return;
        }

        const total = entry.totalSize === null ? "?" : formatBytes(entry.totalSize);
        log.info(`Resuming: ${formatBytes(entry.partialBytes)}/${total} -> ${entry.destinationPath}`);
        await follow(manager, taskId);
    });

program
    .command("discard")
    .description("Delete a persisted download and its partial file")
    .argument("<taskId>", "Task id as shown by `list`")
    .action(async (taskId: string) => {
        const globals = program.opts<GlobalOptions>();
        setupLogging(globals);

        const manager = createManager(globals);
        await manager.loadResumable();
        if (!(await manager.cancel(taskId))) {
            log.error(`No resumable download with id ${taskId}`);
            process.exitCode = 1;
            return;
        }
        log.success(`Discarded ${taskId}`);
    });

program.parseAsync().catch((error: unknown) => {
    log.stopProgress();
    log.error(formatDownloadError(error));
    process.exitCode = 1;
});
