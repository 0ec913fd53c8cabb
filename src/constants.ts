/**
 * Hard ceiling on the UTF-8 size of content sent in one remote call.
 * Deliberately tighter than the default `review.maxFileSize` (1 MiB).
 */
export const MAX_REMOTE_CONTENT_BYTES = 500_000;

/** Share of non-printable characters at which content is treated as non-text. */
export const NON_TEXT_RATIO = 0.05;

/** Upper bound accepted for `review.concurrency`. */
export const MAX_CONCURRENCY = 64;

export const DEFAULT_API_URL = 'http://127.0.0.1:1234/v1/chat/completions';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_TOKENS = 2048;
export const DEFAULT_TEMPERATURE = 0.2;
export const DEFAULT_CONCURRENCY = 3;
export const DEFAULT_MAX_FILE_SIZE = 1_048_576; // 1MB

export const USER_AGENT = 'aireview/1.0';

/** Hosts that are known to reject unauthenticated requests. */
export const HOSTED_API_DOMAINS = [
  'api.openai.com',
  'openai.azure.com',
  'api.anthropic.com',
  'generativelanguage.googleapis.com',
];
