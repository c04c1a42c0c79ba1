import type { Segment } from "@/types";

export interface PlanInput {
    totalSize: number | null;
    supportsRanges: boolean;
    segmentCount: number;
    minSegmentSize: number;
}

export function segmentLength(segment: Segment): number | null {
    return segment.end === null ? null : segment.end - segment.start + 1;
}

export function isSegmentComplete(segment: Segment): boolean {
    const length = segmentLength(segment);
    return length !== null && segment.downloadedBytes >= length;
}

function createSegment(index: number, start: number, end: number | null): Segment {
    return { index, start, end, downloadedBytes: 0, state: "pending", retries: 0 };
}

/**
 * Split `[0, totalSize)` into contiguous segments.
 *
 * The result depends only on the input, so a persisted plan can be rebuilt
 * and compared on resume. Unknown size or no range support always gives a
 * single segment; otherwise the requested count is lowered until no segment
 * is smaller than `minSegmentSize`. Segments share `floor(total / count)`
 * bytes and the last one also takes the remainder.
 */
export function planSegments(input: PlanInput): Segment[] {
    const { totalSize, supportsRanges } = input;

    if (totalSize === null) return [createSegment(0, 0, null)];
    if (totalSize <= 0) return [createSegment(0, 0, -1)];
    if (!supportsRanges) return [createSegment(0, 0, totalSize - 1)];

    const floor = Math.max(1, Math.floor(input.minSegmentSize));
    const maxSegmentsBySize = Math.max(1, Math.floor(totalSize / floor));
    const targetSegments = Math.max(1, Math.min(Math.floor(input.segmentCount), maxSegmentsBySize));
    const segmentSize = Math.floor(totalSize / targetSegments);

    const segments: Segment[] = [];
    for (let index = 0; index < targetSegments; index++) {
        const start = index * segmentSize;
        const end = index === targetSegments - 1 ? totalSize - 1 : start + segmentSize - 1;
        segments.push(createSegment(index, start, end));
    }

    return segments;
}

/**
 * Check that `segments` is an ordered, gap-free, non-overlapping cover of the
 * resource. Returns a reason string when it is not.
 */
export function validatePlan(segments: Segment[], totalSize: number | null): string | null {
    if (segments.length === 0) return "plan has no segments";

    if (totalSize === null) {
        const [only] = segments;
        if (segments.length !== 1 || only.start !== 0 || only.end !== null)
            return "unknown-size plan must be a single open segment";
        return null;
    }

    let expectedStart = 0;
    for (const [position, segment] of segments.entries()) {
        if (segment.index !== position) return `segment ${position} has index ${segment.index}`;
        if (segment.start !== expectedStart)
            return `segment ${position} starts at ${segment.start}, expected ${expectedStart}`;
        if (segment.end === null) return `segment ${position} has no end`;
        if (segment.end < segment.start - 1) return `segment ${position} has a negative length`;

        const length = segment.end - segment.start + 1;
        if (segment.downloadedBytes < 0 || segment.downloadedBytes > length)
            return `segment ${position} reports ${segment.downloadedBytes} of ${length} bytes`;

        expectedStart = segment.end + 1;
    }

    if (expectedStart !== totalSize)
        return `plan covers ${expectedStart} bytes, resource has ${totalSize}`;

    return null;
}
