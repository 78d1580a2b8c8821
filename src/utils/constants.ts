/**
 * Centralized constants for timeouts, limits, and defaults.
 */

/** Timeout values */
export const TIMEOUTS = {
  /** Step timeout in seconds when neither the step nor the workflow sets one */
  DEFAULT_STEP_TIMEOUT_S: 300,
  /** Default timeout for HTTP requests */
  DEFAULT_HTTP_TIMEOUT_MS: 30000,
  /** Poll interval of control/wait */
  WAIT_POLL_INTERVAL_MS: 1000,
} as const;

/** Database related constants */
export const DB = {
  /** SQLite busy/locked error code */
  SQLITE_BUSY: 5,
  /** Milliseconds SQLite waits on a locked database before reporting busy */
  BUSY_TIMEOUT_MS: 5000,
  /** Attempts for an operation that keeps reporting busy */
  MAX_RETRIES: 5,
  RETRY_BASE_DELAY_MS: 10,
  RETRY_MAX_DELAY_MS: 500,
  RETRY_JITTER_MS: 10,
} as const;

/** Limit values for various operations */
export const LIMITS = {
  /** Maximum bytes to read from HTTP responses */
  MAX_HTTP_RESPONSE_BYTES: 2 * 1024 * 1024,
  /** Maximum bytes to capture from process stdout/stderr */
  MAX_PROCESS_OUTPUT_BYTES: 2 * 1024 * 1024,
  /** Maximum string length for CLI input values */
  MAX_INPUT_STRING_LENGTH: 100_000,
  /** Maximum depth for balanced brace matching in JSON extraction */
  MAX_JSON_BRACE_DEPTH: 100,
  /** Maximum string length to attempt JSON extraction from */
  MAX_JSON_PARSE_LENGTH: 1_000_000,
  /** Characters per token used by the token_limit scanner */
  CHARS_PER_TOKEN: 4,
} as const;

/** File mode constants for secure filesystem operations */
export const FILE_MODES = {
  /** Owner-only permissions for captured output files */
  SECURE_FILE: 0o600,
  SECURE_DIR: 0o700,
} as const;
