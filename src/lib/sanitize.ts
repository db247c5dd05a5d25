/**
 * Sanitize - Keep untrusted strings out of file names and log lines
 *
 * Session IDs come from transcript file names and end up in cache paths;
 * error messages end up in daemon.log.
 */

// ---------------------------------------------------------------------------
// Session ID (cache file names)
// ---------------------------------------------------------------------------

const MAX_SESSION_ID_LENGTH = 128;

/**
 * Make a session ID safe to embed in `models-<id>.json`.
 * Path separators become underscores, dot runs collapse, leading dots go,
 * anything outside [A-Za-z0-9._-] becomes an underscore.
 *
 * Returns '' when nothing usable remains; callers treat that as "no session".
 */
export function sanitizeSessionId(sessionId: string | null | undefined): string {
  if (!sessionId) return '';

  const cleaned = sessionId
    .replace(/[\/\\]/g, '_')
    .replace(/\.{2,}/g, '.')
    .replace(/^\.+/, '')
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .slice(0, MAX_SESSION_ID_LENGTH);

  return cleaned;
}

// ---------------------------------------------------------------------------
// Error text (daemon log)
// ---------------------------------------------------------------------------

const MAX_ERROR_LENGTH = 160;

const SENSITIVE_PATTERNS = [
  /https?:\/\/[^\s]+/gi,
  /Bearer\s+[a-zA-Z0-9._-]+/gi,
  /sk-[a-zA-Z0-9_-]{10,}/gi,
  /token[=:]\s*["']?[a-zA-Z0-9._-]{10,}/gi
];

/**
 * First line of an error, credentials redacted, length capped.
 */
export function sanitizeError(error: unknown): string {
  if (error === null || error === undefined) return '';

  let msg = error instanceof Error ? error.message : String(error);

  const newlineIdx = msg.indexOf('\n');
  if (newlineIdx >= 0) {
    msg = msg.slice(0, newlineIdx);
  }

  for (const pattern of SENSITIVE_PATTERNS) {
    msg = msg.replace(pattern, '[REDACTED]');
  }

  if (msg.length > MAX_ERROR_LENGTH) {
    msg = msg.slice(0, MAX_ERROR_LENGTH) + '...';
  }

  return msg;
}
