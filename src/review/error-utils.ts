const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED']);

/** Mask potential tokens/secrets in error messages. */
export function sanitizeErrorMessage(error: unknown): string {
  const msg = error instanceof Error ? error.message : String(error);
  return msg.replace(/[A-Za-z0-9+/=_-]{32,}/g, '[REDACTED]').replace(
    // Common secret prefixes (even if shorter than 32 chars)
    /(?:sk-|ghp_|gho_|ghu_|ghs_|ghr_|glpat-|xox[bsrap]-)[A-Za-z0-9+/=_-]+/gi,
    '[REDACTED]',
  );
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isTimeout(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== undefined && TIMEOUT_CODES.has(code)) return true;
  return error instanceof Error && /timed? ?out/i.test(error.message);
}

export function describeTransportError(error: unknown): string {
  const code = errorCode(error);
  const msg = sanitizeErrorMessage(error);
  return code && !msg.includes(code) ? `${msg} (${code})` : msg;
}
