/**
 * Structured logging utilities
 *
 * Writes leveled lines to the console and forwards them to Application
 * Insights and Sentry when those are configured.
 */

import { trackTrace, trackException, SeverityLevel } from './telemetry';
import { captureException, captureMessage, addBreadcrumb } from './sentry';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m',
};
const COLOR_RESET = '\x1b[0m';

function useColors(): boolean {
  return !process.env.NO_COLOR && process.stdout.isTTY === true;
}

function formatLevel(level: LogLevel): string {
  return useColors() ? `${LEVEL_COLORS[level]}[${level}]${COLOR_RESET}` : `[${level}]`;
}

/**
 * Formats a log message with timestamp and context
 */
export function formatLogMessage(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` | ${JSON.stringify(context, errorReplacer)}` : '';
  return `[${timestamp}] ${formatLevel(level)} ${message}${contextStr}`;
}

// Error instances stringify to {} otherwise
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Convert LogContext to string properties for Application Insights
 */
function contextToProperties(context?: LogContext): Record<string, string> | undefined {
  if (!context) return undefined;

  const properties: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    properties[key] =
      typeof value === 'object' ? JSON.stringify(value, errorReplacer) : String(value);
  }
  return properties;
}

/**
 * Log debug message
 */
export function debug(message: string, context?: LogContext): void {
  console.debug(formatLogMessage(LogLevel.DEBUG, message, context));
  trackTrace(message, SeverityLevel.Verbose, contextToProperties(context));
  addBreadcrumb(message, 'debug', 'debug', context);
}

/**
 * Log informational message
 */
export function info(message: string, context?: LogContext): void {
  console.info(formatLogMessage(LogLevel.INFO, message, context));
  trackTrace(message, SeverityLevel.Information, contextToProperties(context));
  addBreadcrumb(message, 'info', 'info', context);
}

/**
 * Log warning message
 */
export function warn(message: string, context?: LogContext): void {
  console.warn(formatLogMessage(LogLevel.WARN, message, context));
  trackTrace(message, SeverityLevel.Warning, contextToProperties(context));
  captureMessage(message, 'warning', context);
}

/**
 * Log error message
 */
export function error(message: string, context?: LogContext): void {
  console.error(formatLogMessage(LogLevel.ERROR, message, context));
  trackTrace(message, SeverityLevel.Error, contextToProperties(context));
  captureMessage(message, 'error', context);
}

/**
 * Log error with full error object details
 */
export function logError(message: string, err: unknown, context?: LogContext): void {
  const asError = err instanceof Error ? err : new Error(String(err));
  error(message, {
    ...context,
    errorName: asError.name,
    errorMessage: asError.message,
    errorStack: asError.stack,
  });

  trackException(asError, contextToProperties(context));
  captureException(asError, context);
}
