export { SegmentWriter } from "./SegmentWriter";
export { ResumeStore, parseResumeRecord, toResumableDownload } from "./ResumeStore";
export { computeFileHash, parseExpectedHash, verifyFile } from "./Verifier";
export type { ExpectedHash } from "./Verifier";
