import { createHash, getHashes } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { FilesystemError, VerificationError, classifyError } from "@/errors";
import { HASH_READ_BUFFER_SIZE } from "@/utils/constants";

export interface ExpectedHash {
    algorithm: string;
    digest: string;
}

const ALGORITHM_BY_HEX_LENGTH: Record<number, string> = {
    32: "md5",
    40: "sha1",
    64: "sha256",
    128: "sha512",
};

/**
 * Accepts `sha256:<hex>`, `sha512-<hex>` or a bare hex digest, whose length
 * picks the algorithm.
 */
export function parseExpectedHash(value: string): ExpectedHash {
    const trimmed = value.trim();
    const prefixed = /^([a-z0-9-]+?)[:-]([0-9a-f]+)$/i.exec(trimmed);

    if (prefixed) {
        const algorithm = prefixed[1].toLowerCase();
        if (!getHashes().includes(algorithm))
            throw new Error(`Unsupported hash algorithm: ${prefixed[1]}`);
        return { algorithm, digest: prefixed[2].toLowerCase() };
    }

    if (/^[0-9a-f]+$/i.test(trimmed)) {
        const algorithm = ALGORITHM_BY_HEX_LENGTH[trimmed.length];
        if (algorithm) return { algorithm, digest: trimmed.toLowerCase() };
    }

    throw new Error(`Unrecognised hash: ${value}`);
}

export async function computeFileHash(filePath: string, algorithm: string): Promise<string> {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath, { highWaterMark: HASH_READ_BUFFER_SIZE });
    for await (const chunk of stream) hash.update(chunk);
    return hash.digest("hex");
}

/**
 * Final integrity checks on a finished file. Throws VerificationError on
 * mismatch; the file itself is never touched.
 */
export async function verifyFile(
    filePath: string,
    expectedSize: number | null,
    expectedHash?: string
): Promise<{ size: number; hash: string | null }> {
    let size: number;
    try {
        size = (await stat(filePath)).size;
    } catch (error) {
        throw new FilesystemError(
            `Cannot inspect ${filePath}: ${classifyError(error).message}`,
            filePath,
            { cause: error }
        );
    }

    if (expectedSize !== null && size !== expectedSize) {
        throw new VerificationError(
            `Size mismatch: expected ${expectedSize} bytes, found ${size}`,
            expectedSize,
            size
        );
    }

    if (!expectedHash) return { size, hash: null };

    const expected = parseExpectedHash(expectedHash);
    const actual = await computeFileHash(filePath, expected.algorithm);
    if (actual !== expected.digest) {
        throw new VerificationError(
            `${expected.algorithm} mismatch: expected ${expected.digest}, got ${actual}`,
            expected.digest,
            actual
        );
    }

    return { size, hash: actual };
}
