const ALLOWED_METHODS = 'DELETE, GET, HEAD, OPTIONS, PATCH, POST, PUT';
const PREFLIGHT_MAX_AGE_SECONDS = 600;

export function isOriginAllowed(
  origin: string,
  allowedOrigins: readonly string[],
): boolean {
  return allowedOrigins.includes('*') || allowedOrigins.includes(origin);
}

// Credentials are allowed, so the origin is echoed back instead of '*'.
export function getCorsHeaders(origin: string): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': origin,
    'Access-Control-Allow-Credentials': 'true',
    Vary: 'Origin',
  };
}

export function getPreflightHeaders(
  origin: string,
  requestedHeaders: string | null,
): Record<string, string> {
  const headers: Record<string, string> = {
    ...getCorsHeaders(origin),
    'Access-Control-Allow-Methods': ALLOWED_METHODS,
    'Access-Control-Max-Age': String(PREFLIGHT_MAX_AGE_SECONDS),
  };
  if (requestedHeaders && requestedHeaders.trim().length > 0) {
    headers['Access-Control-Allow-Headers'] = requestedHeaders;
  }
  return headers;
}
