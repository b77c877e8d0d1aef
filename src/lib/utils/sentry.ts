/**
 * Sentry error tracking for the relay server
 *
 * Exceptions, log-derived messages and breadcrumbs, plus one span per
 * /chat request. Every function is a no-op while SENTRY_DSN is unset.
 */

import * as Sentry from '@sentry/node';
import { nodeProfilingIntegration } from '@sentry/profiling-node';
import { getConfig } from '../../types/config';

let isInitialized = false;
let enabled = false;

function sampleRate(environment: string): number {
  return environment === 'production' ? 0.1 : 1.0;
}

/**
 * Initialize Sentry. Call once at startup, before the app is created.
 */
export function initializeSentry(): void {
  if (isInitialized) {
    return;
  }
  isInitialized = true;

  const dsn = getConfig('SENTRY_DSN', '');
  if (!dsn) {
    console.warn('[Sentry] SENTRY_DSN not configured. Error tracking disabled.');
    return;
  }

  const environment = getConfig('SENTRY_ENVIRONMENT', 'development');

  try {
    Sentry.init({
      dsn,
      environment,
      release: getConfig('SENTRY_RELEASE', '') || undefined,
      tracesSampleRate: sampleRate(environment),
      profilesSampleRate: sampleRate(environment),
      integrations: [nodeProfilingIntegration()],
      maxBreadcrumbs: 50,
      attachStacktrace: true,
      // Chat messages stay out of error reports
      sendDefaultPii: false,
      initialScope: {
        tags: {
          runtime: 'node',
          'node.version': process.version,
        },
      },
    });

    enabled = true;
    console.info('[Sentry] Error tracking initialized successfully');
  } catch (error) {
    console.error('[Sentry] Failed to initialize:', error);
  }
}

/**
 * @returns the Sentry event id, or undefined when disabled
 */
export function captureException(
  error: unknown,
  context?: Record<string, unknown>
): string | undefined {
  return enabled ? Sentry.captureException(error, { extra: context }) : undefined;
}

export function captureMessage(
  message: string,
  level: Sentry.SeverityLevel = 'info',
  context?: Record<string, unknown>
): string | undefined {
  return enabled ? Sentry.captureMessage(message, { level, extra: context }) : undefined;
}

/**
 * Record a breadcrumb; attached to whatever error is captured next
 */
export function addBreadcrumb(
  message: string,
  category: string,
  level: Sentry.SeverityLevel = 'info',
  data?: Record<string, unknown>
): void {
  if (!enabled) {
    return;
  }

  Sentry.addBreadcrumb({
    message,
    category,
    level,
    data,
    timestamp: Date.now() / 1000,
  });
}

export function setTag(key: string, value: string): void {
  if (enabled) {
    Sentry.setTag(key, value);
  }
}

export type TransactionStatus =
  | 'ok'
  | 'cancelled'
  | 'invalid_argument'
  | 'unavailable'
  | 'internal_error';

export interface Transaction {
  setStatus: (status: TransactionStatus) => void;
  finish: () => void;
}

// Span status codes from the Sentry span API
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * Start a request span. Returns undefined when Sentry is disabled.
 * `finish` ends the span once; later calls are ignored.
 */
export function startTransaction(name: string, op: string): Transaction | undefined {
  if (!enabled) {
    return undefined;
  }

  const span = Sentry.startInactiveSpan({ name, op, forceTransaction: true });
  let finished = false;

  return {
    setStatus: (status) => {
      span.setStatus(
        status === 'ok'
          ? { code: SPAN_STATUS_OK }
          : { code: SPAN_STATUS_ERROR, message: status }
      );
    },
    finish: () => {
      if (finished) return;
      finished = true;
      span.end();
    },
  };
}

/**
 * Flush pending events and close the client. Called on shutdown.
 */
export async function closeSentry(timeout: number = 2000): Promise<boolean> {
  return enabled ? Sentry.close(timeout) : true;
}
