import * as Sentry from '@sentry/node';
import logger from './logger.js';
import { errorMessage } from './errors.js';

const SENSITIVE_ENV_KEYS = [
  'OPENROUTER_API_KEY',
  'ANTHROPIC_API_KEY',
  'SUPABASE_SERVICE_ROLE_KEY',
  'SENTRY_DSN',
];

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return lowerKey.includes('key')
    || lowerKey.includes('token')
    || lowerKey.includes('secret')
    || lowerKey.includes('authorization');
}

let enabled = false;

export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.info('SENTRY_DSN not set, Sentry disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0.1,
    beforeSend(event) {
      // Application text and API keys stay out of error reports
      if (event.extra) {
        for (const key of SENSITIVE_ENV_KEYS) {
          if (key in event.extra) {
            event.extra[key] = '[REDACTED]';
          }
        }
      }

      for (const crumb of event.breadcrumbs ?? []) {
        if (!crumb.data) continue;
        for (const key of Object.keys(crumb.data)) {
          if (isSensitiveKey(key)) {
            crumb.data[key] = '[REDACTED]';
          }
        }
      }

      return event;
    },
  });

  enabled = true;
  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  if (!enabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        scope.setExtra(key, value);
      }
    }
    Sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ error: errorMessage(err) }, 'Sentry flush failed during shutdown');
  }
}
