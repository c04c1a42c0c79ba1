/**
 * Application-wide constants
 */

// Progress reporting
export const PROGRESS_PUBLISH_INTERVAL_MS = 200; // Minimum time between progress snapshots (ms)
export const SPEED_WINDOW_MS = 3000; // Rolling window used for speed (ms)

// CLI display constants
export const GID_LENGTH = 6; // Number of hex characters shown for a task id
export const GID_PREFIX = "#"; // GID prefix character

// File system constants
export const RESUME_FILE_EXTENSION = ".splitfetch.json"; // Resume record extension
export const DEFAULT_RESUME_DIRECTORY = "./.splitfetch";
export const RESUME_RECORD_VERSION = 1;
export const DEFAULT_MIN_SEGMENT_SIZE_BYTES = 1024 * 1024; // 1MB segment floor

// Buffer sizes
export const PREALLOC_BUFFER_SIZE = 1024 * 1024; // 1MB buffer for pre-allocation
export const HASH_READ_BUFFER_SIZE = 1024 * 1024; // 1MB read buffer for hashing

// Network constants
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000; // Connect timeout (10s)
export const DEFAULT_READ_TIMEOUT_MS = 30000; // Idle socket timeout (30s)
export const DEFAULT_RETRIES = 3; // Retry attempts per segment
export const DEFAULT_RETRY_DELAY_MS = 1000; // First backoff step
export const DEFAULT_MAX_RETRY_DELAY_MS = 30000; // Backoff ceiling (30s)
export const MAX_REDIRECTS = 5; // Maximum HTTP redirects to follow

// Logging
export const LOG_LEVEL_TOKEN_WIDTH = "[PROGRESS]".length; // Width of log level tokens
