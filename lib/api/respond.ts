import { errorMessage, isTutorError } from '@/lib/errors';

export type RouteContext = { params: { id: string } };

export function jsonError(message: string, status: number, code?: string): Response {
  return Response.json({ error: code ? { message, code } : { message } }, { status });
}

/** Positive integer id from a path segment, or null. */
export function parseId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function errorResponse(scope: string, error: unknown): Response {
  if (isTutorError(error)) {
    if (error.status >= 500) {
      console.error(`[api/${scope}] error`, { message: error.message, code: error.code });
    }
    return jsonError(error.message, error.status, error.code);
  }
  console.error(`[api/${scope}] error`, {
    message: errorMessage(error),
    stack: error instanceof Error ? error.stack?.split('\n').slice(0, 6).join('\n') : undefined
  });
  return jsonError(errorMessage(error) || `${scope} failed`, 500);
}
