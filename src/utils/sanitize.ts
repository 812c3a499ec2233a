const MAX_ERROR_BODY_LENGTH = 200;
const SENSITIVE_PATTERNS =
  /("?(?:access_token|refresh_token|id_token|client_secret|code|token)"?\s*[:=]\s*"?)([^"&\s]{4})[^"&\s]*/gi;
const BEARER_PATTERN = /(Bearer\s+)([^\s"]{4})[^\s"]*/gi;

// Provider bodies only ever reach logs, never HTTP responses.
export function sanitizeProviderResponse(body: string): string {
  const truncated =
    body.length > MAX_ERROR_BODY_LENGTH ? `${body.slice(0, MAX_ERROR_BODY_LENGTH)}...[truncated]` : body;
  return truncated
    .replace(SENSITIVE_PATTERNS, "$1$2***REDACTED***")
    .replace(BEARER_PATTERN, "$1$2***REDACTED***");
}
