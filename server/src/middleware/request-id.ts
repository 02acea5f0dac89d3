import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;
const MAX_REQUEST_ID_LENGTH = 64;

/**
 * Accepts a caller-supplied X-Request-ID when it is a short token, otherwise
 * generates one. Handlers log through `c.get('log')`, which carries the id.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const raw = c.req.header('X-Request-ID');
  let requestId: string = randomUUID();
  if (raw) {
    const candidate = raw.trim().slice(0, MAX_REQUEST_ID_LENGTH);
    if (REQUEST_ID_PATTERN.test(candidate)) {
      requestId = candidate;
    }
  }
  c.set('requestId', requestId);
  c.set('log', logger.child({ requestId }));
  c.header('X-Request-ID', requestId);
  await next();
}
