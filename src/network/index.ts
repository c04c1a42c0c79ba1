export { HttpClient, formatRangeHeader } from "./HttpClient";
export type { ByteRange, HeadResult, HttpClientOptions, RangeResponse } from "./HttpClient";
export { RangeProbe, parseContentLength, parseContentRange } from "./RangeProbe";
export type { ContentRange } from "./RangeProbe";
