import { mkdir, open, stat, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { FilesystemError, classifyError } from "@/errors";
import type { FileAllocation } from "@/types";
import { PREALLOC_BUFFER_SIZE } from "@/utils/constants";
import { ignoreFileNotFound } from "@/utils/common";

/**
 * Shared handle on the destination file. Every worker of a task writes its
 * own disjoint byte range through `write`, so no locking is needed once the
 * file exists and has its final size.
 */
export class SegmentWriter {
    private fileHandle: FileHandle | null = null;
    private filePath = "";

    /**
     * Open (or create) the file and size it. Must complete before any worker starts.
     * An existing file is opened in place so resumed bytes survive.
     */
    async open(
        filePath: string,
        size: number | null,
        allocation: FileAllocation = "trunc",
        options: { reset?: boolean } = {}
    ): Promise<void> {
        this.filePath = filePath;

        try {
            await mkdir(dirname(filePath), { recursive: true });

            const existing = await SegmentWriter.exists(filePath);
            const flags = existing.exists && !options.reset ? "r+" : "w";
            this.fileHandle = await open(filePath, flags);

            if (size === null) return;

            switch (allocation) {
                case "trunc":
                    await this.fileHandle.truncate(size);
                    break;
                case "prealloc":
                    await this.fileHandle.truncate(size);
                    if (!existing.exists || options.reset) await this.zeroFill(size);
                    break;
                case "none":
                    break;
            }
        } catch (error) {
            await this.close().catch(() => undefined);
            throw new FilesystemError(
                `Cannot prepare ${filePath}: ${classifyError(error).message}`,
                filePath,
                { cause: error }
            );
        }
    }

    private async zeroFill(size: number): Promise<void> {
        if (!this.fileHandle) return;
        const buffer = Buffer.alloc(Math.min(PREALLOC_BUFFER_SIZE, Math.max(1, size)), 0);
        let written = 0;
        while (written < size) {
            const toWrite = Math.min(buffer.length, size - written);
            await this.fileHandle.write(buffer, 0, toWrite, written);
            written += toWrite;
        }
    }

    /**
     * Write a chunk at an absolute file position
     */
    async write(position: number, data: Buffer): Promise<void> {
        if (!this.fileHandle) throw new FilesystemError("File not open", this.filePath);

        let offset = 0;
        while (offset < data.length) {
            const { bytesWritten } = await this.fileHandle
                .write(data, offset, data.length - offset, position + offset)
                .catch((error: unknown) => {
                    throw new FilesystemError(
                        `Write to ${this.filePath} failed: ${classifyError(error).message}`,
                        this.filePath,
                        { cause: error }
                    );
                });
            offset += bytesWritten;
        }
    }

    async close(): Promise<void> {
        if (this.fileHandle) {
            const handle = this.fileHandle;
            this.fileHandle = null;
            await handle.close();
        }
    }

    static async exists(filePath: string): Promise<{ exists: boolean; size: number }> {
        return stat(filePath)
            .then(stats => ({ exists: true, size: stats.size }))
            .catch(() => ({ exists: false, size: 0 }));
    }

    static async delete(filePath: string): Promise<void> {
        await unlink(filePath).catch((error: unknown) => {
            // Only ignore ENOENT (file not found), re-throw others
            if (ignoreFileNotFound(error)) return;
            throw error;
        });
    }
}
