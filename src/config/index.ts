export { DEFAULT_OPTIONS, mergeOptions, parseSize } from "./defaults";
